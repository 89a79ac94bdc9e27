/**
 * BibTeX Parser Service
 * Splits .bib content into entries and extracts first-level fields.
 *
 * Only the simple shapes are understood: `name = {value}`, `name = "value"` and
 * bare `name = 2024`. Nested braces end a value early.
 */

import { logger } from '../../lib/logger';
import { BibChunk, BibEntry, BibFields } from './bibliography.types';

const ENTRY_BOUNDARY = /(?=@\w+\s*\{)/;
const ENTRY_HEADER = /^@(\w+)\s*\{\s*([^,]+?)\s*,/;
const FIELD_SOURCE = String.raw`(\w+)\s*=\s*(?:[{"]([^}"]*)["}]?|(\w+))`;

class BibtexParserService {
  /**
   * Split raw .bib text at every `@type{` marker. Whatever precedes the first
   * marker is returned as a preamble chunk.
   */
  splitEntries(content: string): BibChunk[] {
    const chunks: BibChunk[] = [];

    for (const piece of content.split(ENTRY_BOUNDARY)) {
      const text = piece.trim();
      if (!text) continue;

      if (!text.startsWith('@')) {
        chunks.push({ kind: 'preamble', text });
        continue;
      }

      const entry = this.parseEntry(text);
      if (!entry) {
        logger.debug(`[BibTeX Parser] Passing through unparseable entry: ${text.substring(0, 60)}`);
        chunks.push({ kind: 'unparsed', text });
        continue;
      }

      chunks.push({ kind: 'entry', text, entry });
    }

    return chunks;
  }

  parseEntry(text: string): BibEntry | null {
    const match = text.match(ENTRY_HEADER);
    if (!match) {
      return null;
    }

    const [, entryType, originalKey] = match;
    return {
      entryType,
      originalKey: originalKey.trim(),
      fields: this.extractFields(text),
      rawText: text,
    };
  }

  /**
   * Field names are lowercased; a repeated field overwrites the earlier value.
   */
  extractFields(text: string): BibFields {
    const fields: Record<string, string> = {};
    const pattern = new RegExp(FIELD_SOURCE, 'g');

    for (const match of text.matchAll(pattern)) {
      const name = match[1].toLowerCase();
      fields[name] = match[2] ?? match[3] ?? '';
    }

    return fields;
  }

  /** Parsed entries only, in source order */
  parseEntries(content: string): BibEntry[] {
    return this.splitEntries(content).flatMap(chunk => (chunk.kind === 'entry' ? [chunk.entry] : []));
  }
}

export const bibtexParserService = new BibtexParserService();
