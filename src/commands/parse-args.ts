/**
 * Command-line parsing for report-convert
 *
 * Usage:
 *   report-convert json-to-qmd report.json [--no-bib] [--csl-file style.csl]
 *   report-convert json-to-md report.json
 *   report-convert regenerate-bib report.bib [--inplace] [--show-mapping] [--save-mapping]
 *
 * Global options: -v/--verbose, --version, -h/--help
 */

import { z, ZodError, ZodTypeAny } from 'zod';
import { AppError } from '../utils/app-error';
import { ErrorCodes } from '../utils/error-codes';
import {
  MarkdownOptions,
  markdownOptionsSchema,
  QuartoOptions,
  quartoOptionsSchema,
  RegenerateBibOptions,
  regenerateBibOptionsSchema,
} from '../schemas/report.schemas';

export type ParsedCommand =
  | { command: 'json-to-qmd'; verbose: boolean; options: QuartoOptions }
  | { command: 'json-to-md'; verbose: boolean; options: MarkdownOptions }
  | { command: 'regenerate-bib'; verbose: boolean; options: RegenerateBibOptions }
  | { command: 'help'; verbose: boolean }
  | { command: 'version'; verbose: boolean };

export const COMMANDS = ['json-to-qmd', 'json-to-md', 'regenerate-bib'] as const;

export const HELP_TEXT = `Usage: report-convert [-v|--verbose] <command> [options]

Convert research report JSON artifacts to Quarto and Markdown formats

Commands:
  json-to-qmd <json_file>     Convert report JSON to Quarto markdown (.qmd)
      --no-bib                Skip the bibliography check and proceed without prompting
      --csl-file <path>       Custom CSL file (default: bundled apa.csl)
  json-to-md <json_file>      Convert report JSON to plain markdown (.md)
  regenerate-bib <bib_file>   Regenerate citation keys as AuthorYearTitleWords
      --inplace               Modify the file in place (creates .backup)
      --show-mapping          Display key mappings after regeneration
      --save-mapping          Save key mappings to a text file

Options:
  -v, --verbose               Show detailed output and error traces
  --version                   Show version
  -h, --help                  Show this help

Examples:
  report-convert json-to-qmd report.json
  report-convert json-to-md report.json
  report-convert regenerate-bib report.bib --inplace
`;

const FLAGS_WITH_VALUE = new Set(['--csl-file']);

interface Tokens {
  positionals: string[];
  flags: Set<string>;
  values: Map<string, string>;
}

function tokenize(args: string[]): Tokens {
  const positionals: string[] = [];
  const flags = new Set<string>();
  const values = new Map<string, string>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (!arg.startsWith('-') || arg === '-') {
      positionals.push(arg);
      continue;
    }

    const [name, inline] = arg.split(/=(.*)/s, 2);
    if (FLAGS_WITH_VALUE.has(name)) {
      const value = inline ?? args[++i];
      if (value === undefined) {
        throw AppError.badRequest(`Option ${name} requires a value`);
      }
      values.set(name, value);
      continue;
    }

    flags.add(name === '-v' ? '--verbose' : name === '-h' ? '--help' : name);
  }

  return { positionals, flags, values };
}

function validate<S extends ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  try {
    return schema.parse(input);
  } catch (error) {
    if (error instanceof ZodError) {
      throw AppError.badRequest(error.issues.map(issue => issue.message).join('; '));
    }
    throw error;
  }
}

function rejectUnknown(tokens: Tokens, allowed: string[]): void {
  const given = [...tokens.flags, ...tokens.values.keys()];
  const unknown = given.filter(flag => !allowed.includes(flag));
  if (unknown.length > 0) {
    throw AppError.badRequest(`Unknown option: ${unknown.join(', ')}`);
  }
}

export function parseArgs(args: string[]): ParsedCommand {
  const tokens = tokenize(args);
  const { positionals, flags, values } = tokens;
  const verbose = flags.has('--verbose');

  if (flags.has('--version')) return { command: 'version', verbose };
  if (flags.has('--help') || positionals.length === 0) return { command: 'help', verbose };

  const [command, file] = positionals;
  if (positionals.length > 2) {
    throw AppError.badRequest(`Unexpected argument: ${positionals[2]}`);
  }

  switch (command) {
    case 'json-to-qmd':
      rejectUnknown(tokens, ['--verbose', '--no-bib', '--csl-file']);
      return {
        command,
        verbose,
        options: validate(quartoOptionsSchema, {
          jsonFile: file ?? '',
          noBib: flags.has('--no-bib'),
          cslFile: values.get('--csl-file'),
        }),
      };
    case 'json-to-md':
      rejectUnknown(tokens, ['--verbose']);
      return { command, verbose, options: validate(markdownOptionsSchema, { jsonFile: file ?? '' }) };
    case 'regenerate-bib':
      rejectUnknown(tokens, ['--verbose', '--inplace', '--show-mapping', '--save-mapping']);
      return {
        command,
        verbose,
        options: validate(regenerateBibOptionsSchema, {
          bibFile: file ?? '',
          inplace: flags.has('--inplace'),
          showMapping: flags.has('--show-mapping'),
          saveMapping: flags.has('--save-mapping'),
        }),
      };
    default:
      throw new AppError(
        `Unknown command: ${command}. Expected one of ${COMMANDS.join(', ')}`,
        ErrorCodes.UNKNOWN_COMMAND,
        2
      );
  }
}
