/**
 * CSL Service
 * Places the citation style file next to the generated .qmd document.
 */

import path from 'path';
import fs from 'fs/promises';
import { config } from '../../config';
import { logger } from '../../lib/logger';
import { fileExists } from '../../utils/file-helpers';

export const DEFAULT_CSL_FILE_NAME = 'apa.csl';

class CslService {
  /**
   * Copy `cslPath` (bundled APA style when omitted) into `targetDir`.
   * Returns the file name used in front matter, or null when nothing could be copied.
   */
  async copyCslFile(targetDir: string, cslPath?: string): Promise<string | null> {
    const source = cslPath ?? config.defaultCslPath;

    if (!(await fileExists(source))) {
      logger.warn(`[CSL] CSL file not found: ${source}`);
      return null;
    }

    const fileName = path.basename(source);
    const target = path.join(targetDir, fileName);

    if (path.resolve(source) === path.resolve(target)) {
      return fileName;
    }

    if (await this.isSameContent(source, target)) {
      logger.debug(`[CSL] ${fileName} already up to date in ${targetDir}`);
      return fileName;
    }

    try {
      await fs.copyFile(source, target);
      logger.info(`[CSL] Copied CSL file: ${fileName}`);
      return fileName;
    } catch (error) {
      logger.warn(`[CSL] Could not copy CSL file: ${error instanceof Error ? error.message : error}`);
      return null;
    }
  }

  private async isSameContent(source: string, target: string): Promise<boolean> {
    if (!(await fileExists(target))) {
      return false;
    }

    try {
      const [a, b] = await Promise.all([fs.readFile(source), fs.readFile(target)]);
      return a.equals(b);
    } catch (error) {
      logger.debug(`[CSL] Could not compare ${source} with ${target}: ${error}`);
      return false;
    }
  }
}

export const cslService = new CslService();
