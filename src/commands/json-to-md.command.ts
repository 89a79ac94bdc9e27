import path from 'path';
import { assertFileExists, writeTextFile } from '../utils/file-helpers';
import { MarkdownOptions } from '../schemas/report.schemas';
import { markdownConverterService, MarkdownConversionResult } from '../services/report/markdown-converter.service';
import { CommandContext } from './command.types';

export async function jsonToMdCommand(
  options: MarkdownOptions,
  context: CommandContext
): Promise<MarkdownConversionResult> {
  await assertFileExists(options.jsonFile);

  context.print(`📄 Converting ${path.basename(options.jsonFile)} to markdown...`);
  const result = await markdownConverterService.convert(options.jsonFile);
  await writeTextFile(result.outputPath, result.content);

  context.print(`✅ Successfully converted to ${path.basename(result.outputPath)}`);
  return result;
}
