import path from 'path';
import { readTextFile, stripExtension, writeTextFile } from '../utils/file-helpers';
import { RegenerateBibOptions } from '../schemas/report.schemas';
import { citationKeyService } from '../services/bibliography/citation-key.service';
import { KeyMapping } from '../services/bibliography/bibliography.types';
import { CommandContext } from './command.types';

export interface RegenerateBibResult {
  mapping: KeyMapping;
  outputPath: string;
  backupPath: string | null;
  mappingPath: string | null;
}

export async function regenerateBibCommand(
  options: RegenerateBibOptions,
  context: CommandContext
): Promise<RegenerateBibResult> {
  const { bibFile } = options;
  const { print } = context;

  const original = await readTextFile(bibFile);
  print(`📖 Reading ${path.basename(bibFile)}...`);

  const { content, mapping } = citationKeyService.regenerateKeys(original);
  print(`✅ Regenerated ${mapping.size} citation keys`);

  if (options.showMapping || context.verbose) {
    print('\n📝 Key mappings:');
    for (const [oldKey, newKey] of citationKeyService.sortedMappings(mapping)) {
      if (oldKey !== newKey) {
        print(`   ${oldKey.padEnd(30)} -> ${newKey}`);
      }
    }
  }

  let outputPath: string;
  let backupPath: string | null = null;

  if (options.inplace) {
    backupPath = `${bibFile}.backup`;
    await writeTextFile(backupPath, original);
    print(`\n💾 Backed up original to ${path.basename(backupPath)}`);

    outputPath = bibFile;
    await writeTextFile(outputPath, content);
    print(`✅ Updated ${path.basename(bibFile)} in place`);
  } else {
    outputPath = `${stripExtension(bibFile)}.new.bib`;
    await writeTextFile(outputPath, content);
    print(`\n✅ Created new file: ${path.basename(outputPath)}`);
    print('   Review and rename to replace original if satisfied');
  }

  let mappingPath: string | null = null;
  if (options.saveMapping) {
    mappingPath = `${stripExtension(bibFile)}_key_mapping.txt`;
    await writeTextFile(mappingPath, citationKeyService.formatMappingReport(mapping));
    print(`📋 Key mapping saved to: ${path.basename(mappingPath)}`);
  }

  return { mapping, outputPath, backupPath, mappingPath };
}
