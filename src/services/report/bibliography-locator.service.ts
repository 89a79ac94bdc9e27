/**
 * Bibliography Locator Service
 * Finds the .bib file that belongs to a report JSON file by naming convention.
 */

import path from 'path';
import fs from 'fs/promises';
import { logger } from '../../lib/logger';
import { fileExists, stripExtension } from '../../utils/file-helpers';

class BibliographyLocatorService {
  /**
   * Tried in order:
   * 1. report.json -> report.bib
   * 2. last "-" of the name replaced by "_" (2024-05-01-abc.json -> 2024-05-01_abc.bib)
   * 3. the only .bib in the directory, else one whose name contains the report prefix
   */
  async locateBibliography(jsonPath: string): Promise<string | null> {
    const basePath = stripExtension(jsonPath);
    const expected = `${basePath}.bib`;

    if (await fileExists(expected)) {
      return expected;
    }

    const directory = path.dirname(jsonPath);
    const name = path.basename(basePath);

    const dash = name.lastIndexOf('-');
    if (dash !== -1) {
      const alternate = path.join(directory, `${name.slice(0, dash)}_${name.slice(dash + 1)}.bib`);
      if (await fileExists(alternate)) {
        return alternate;
      }
    }

    const candidates = await this.listBibFiles(directory);
    if (candidates.length === 1) {
      logger.info(`[Bibliography Locator] Found bibliography file: ${candidates[0]}`);
      return path.join(directory, candidates[0]);
    }

    const prefix = name.split('_')[0].split('-')[0];
    const similar = candidates.find(file => file.includes(prefix));
    if (similar) {
      logger.info(`[Bibliography Locator] Found bibliography file: ${similar}`);
      return path.join(directory, similar);
    }

    logger.warn(`[Bibliography Locator] Bibliography file not found, expected ${expected}`);
    return null;
  }

  private async listBibFiles(directory: string): Promise<string[]> {
    let files: string[];
    try {
      files = await fs.readdir(directory);
    } catch (error) {
      logger.debug(`[Bibliography Locator] Could not list ${directory}: ${error}`);
      return [];
    }

    return files.filter(file => file.endsWith('.bib') && !file.endsWith('.new.bib')).sort();
  }
}

export const bibliographyLocatorService = new BibliographyLocatorService();
