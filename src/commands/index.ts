export { jsonToQmdCommand } from './json-to-qmd.command';
export { jsonToMdCommand } from './json-to-md.command';
export { regenerateBibCommand } from './regenerate-bib.command';
export type { RegenerateBibResult } from './regenerate-bib.command';
export { parseArgs, HELP_TEXT, COMMANDS } from './parse-args';
export type { ParsedCommand } from './parse-args';
export type { CommandContext } from './command.types';
