/**
 * regenerate-bib command against real files in a temporary directory
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';

vi.mock('../../src/lib/logger', () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

import { regenerateBibCommand } from '../../src/commands/regenerate-bib.command';
import type { CommandContext } from '../../src/commands/command.types';

const ORIGINAL = `% Exported references

@article{old1,
  author = {Smith, John and Doe, Jane},
  title = {A Study of Graph Neural Networks},
  year = {2020}
}

@inproceedings{old2,
  author = {John Smith},
  title = {Study of Graph Neural Nets},
  year = 2020
}
`;

const REGENERATED = `% Exported references

@article{Smith2020StudyGraphNeural,
  author = {Smith, John and Doe, Jane},
  title = {A Study of Graph Neural Networks},
  year = {2020}
}

@inproceedings{Smith2020StudyGraphNeural_1,
  author = {John Smith},
  title = {Study of Graph Neural Nets},
  year = 2020
}

`;

describe('regenerateBibCommand', () => {
  let dir: string;
  let bibFile: string;
  let printed: string[];
  let context: CommandContext;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'regenerate-'));
    bibFile = path.join(dir, 'refs.bib');
    await fs.writeFile(bibFile, ORIGINAL);
    printed = [];
    context = {
      verbose: false,
      interactive: false,
      confirm: vi.fn(async () => true),
      print: (message: string) => printed.push(message),
    };
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('writes a .new.bib next to the original by default', async () => {
    const result = await regenerateBibCommand(
      { bibFile, inplace: false, showMapping: false, saveMapping: false },
      context
    );

    expect(result.outputPath).toBe(path.join(dir, 'refs.new.bib'));
    expect(result.backupPath).toBeNull();
    expect(result.mappingPath).toBeNull();
    expect(await fs.readFile(result.outputPath, 'utf-8')).toBe(REGENERATED);
    expect(await fs.readFile(bibFile, 'utf-8')).toBe(ORIGINAL);
    expect([...result.mapping]).toEqual([
      ['old1', 'Smith2020StudyGraphNeural'],
      ['old2', 'Smith2020StudyGraphNeural_1'],
    ]);
    expect(printed).toContain('✅ Regenerated 2 citation keys');
  });

  it('updates in place after writing a backup', async () => {
    const result = await regenerateBibCommand(
      { bibFile, inplace: true, showMapping: false, saveMapping: false },
      context
    );

    expect(result.outputPath).toBe(bibFile);
    expect(result.backupPath).toBe(`${bibFile}.backup`);
    expect(await fs.readFile(`${bibFile}.backup`, 'utf-8')).toBe(ORIGINAL);
    expect(await fs.readFile(bibFile, 'utf-8')).toBe(REGENERATED);
  });

  it('shows and saves the key mapping', async () => {
    const result = await regenerateBibCommand(
      { bibFile, inplace: false, showMapping: true, saveMapping: true },
      context
    );

    expect(printed).toContain(`   ${'old1'.padEnd(30)} -> Smith2020StudyGraphNeural`);
    expect(printed).toContain(`   ${'old2'.padEnd(30)} -> Smith2020StudyGraphNeural_1`);
    expect(result.mappingPath).toBe(path.join(dir, 'refs_key_mapping.txt'));
    expect(await fs.readFile(path.join(dir, 'refs_key_mapping.txt'), 'utf-8')).toBe(
      'Old Key -> New Key\n' +
        `${'='.repeat(70)}\n` +
        `${'old1'.padEnd(30)} -> Smith2020StudyGraphNeural\n` +
        `${'old2'.padEnd(30)} -> Smith2020StudyGraphNeural_1\n`
    );
  });

  it('produces the same file when run on its own output', async () => {
    const first = await regenerateBibCommand(
      { bibFile, inplace: false, showMapping: false, saveMapping: false },
      context
    );
    const regeneratedPath = path.join(dir, 'again.bib');
    await fs.copyFile(first.outputPath, regeneratedPath);

    const second = await regenerateBibCommand(
      { bibFile: regeneratedPath, inplace: false, showMapping: false, saveMapping: false },
      context
    );

    expect(await fs.readFile(second.outputPath, 'utf-8')).toBe(REGENERATED);
  });

  it('fails for a missing file', async () => {
    await expect(
      regenerateBibCommand(
        { bibFile: path.join(dir, 'absent.bib'), inplace: false, showMapping: false, saveMapping: false },
        context
      )
    ).rejects.toMatchObject({ code: 'FILE_NOT_FOUND', exitCode: 1 });
  });
});
