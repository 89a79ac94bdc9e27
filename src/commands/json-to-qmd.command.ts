import path from 'path';
import { AppError } from '../utils/app-error';
import { assertFileExists, writeTextFile } from '../utils/file-helpers';
import { QuartoOptions } from '../schemas/report.schemas';
import { bibliographyLocatorService } from '../services/report/bibliography-locator.service';
import { quartoConverterService, QuartoConversionResult } from '../services/report/quarto-converter.service';
import { CommandContext } from './command.types';

export async function jsonToQmdCommand(options: QuartoOptions, context: CommandContext): Promise<QuartoConversionResult> {
  const { jsonFile } = options;
  const { print } = context;

  await assertFileExists(jsonFile);

  print('Checking for bibliography file...');
  const bibPath = await bibliographyLocatorService.locateBibliography(jsonFile);

  if (!bibPath && !options.noBib) {
    if (context.interactive) {
      const proceed = await context.confirm('\nContinue without bibliography file? (y/n): ');
      if (!proceed) {
        throw AppError.cancelled('Conversion cancelled. Please add the .bib file next to the JSON file first.');
      }
    } else {
      print('⚠️  Continuing without bibliography file (non-interactive mode)');
      print('   Citations will not render correctly');
    }
  }

  print(`\n📄 Converting ${path.basename(jsonFile)} to Quarto markdown...`);

  const result = await quartoConverterService.convert(jsonFile, { bibPath, cslPath: options.cslFile });
  await writeTextFile(result.outputPath, result.content);

  print(`✅ Successfully converted to ${path.basename(result.outputPath)}`);

  if (result.bibliographyPath) {
    print(`✅ Bibliography linked: ${path.basename(result.bibliographyPath)}`);
    print(`✅ Citation style: ${result.cslFileName}`);

    const { diagnostics } = result;
    if (diagnostics.collisions.length > 0) {
      print(`⚠️  ${diagnostics.collisions.length} author/year forms match more than one bibliography entry`);
    }
    if (diagnostics.unresolved.length > 0) {
      print(`⚠️  ${diagnostics.unresolved.length} citations were not found in the bibliography`);
      if (context.verbose) {
        diagnostics.unresolved.forEach(marker => print(`   ${marker}`));
      }
    }

    print(`\nYou can now render with: quarto render ${result.outputPath}`);
  } else {
    print('\n⚠️  Warning: No bibliography file found');
    print('   Citations will not render correctly without a .bib file');
  }

  return result;
}
