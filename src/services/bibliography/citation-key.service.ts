/**
 * Citation Key Service
 * Derives `AuthorYearTitleWords` keys (e.g. Yancosek2024BeaconBayesianEvolutionary)
 * and rewrites every entry of a .bib file to use them.
 */

import { logger } from '../../lib/logger';
import stopWordList from '../../data/stop-words.json';
import { bibtexParserService } from './bibtex-parser.service';
import { BibFields, KeyMapping, KeyRegenerationResult, RegeneratedEntry } from './bibliography.types';

export const STOP_WORDS: ReadonlySet<string> = new Set(stopWordList.map(word => word.toLowerCase()));

const TITLE_WORD_COUNT = 3;
const UNKNOWN_AUTHOR = 'Unknown';
const UNKNOWN_YEAR = 'NoYear';
const UNKNOWN_TITLE = 'NoTitle';

// Whole words of ASCII letters only; "réseaux" or "Über" yield nothing rather than fragments.
const ASCII_WORD = /(?<![\p{L}\p{N}_])[A-Za-z]+(?![\p{L}\p{N}_])/gu;

export function capitalizeFirst(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

/**
 * Last name of the first author, reduced to letters and digits and left in its
 * original case. Empty when nothing usable remains.
 *
 * "Smith, John and Doe, Jane" -> "Smith"; "John van Smith" -> "Smith"
 */
export function extractRawLastName(authorField: string | undefined): string {
  if (!authorField) return '';

  const authors = authorField.replace(/[{}]/g, '').trim().split(/\s+and\s+/i);
  const firstAuthor = authors[0].trim();

  let lastName: string;
  if (firstAuthor.includes(',')) {
    lastName = firstAuthor.split(',')[0].trim();
  } else {
    const parts = firstAuthor.split(/\s+/).filter(Boolean);
    lastName = parts[parts.length - 1] ?? '';
  }

  return lastName.replace(/[^\p{L}\p{N}]/gu, '');
}

export function extractAuthorLastName(authorField: string | undefined): string {
  const lastName = extractRawLastName(authorField);
  return lastName ? capitalizeFirst(lastName) : UNKNOWN_AUTHOR;
}

export function extractYear(yearField: string | undefined): string {
  return yearField?.match(/\d{4}/)?.[0] ?? UNKNOWN_YEAR;
}

/**
 * First `count` substantial title words, capitalized and concatenated. Only
 * words made entirely of ASCII letters count. Words of
 * two letters or fewer and stop words are skipped; when fewer than `count`
 * substantial words exist the first raw words are used instead.
 */
export function extractTitleWords(titleField: string | undefined, count: number = TITLE_WORD_COUNT): string {
  if (!titleField) return UNKNOWN_TITLE;

  const title = titleField.replace(/[{}"'`]/g, '');
  const words = title.match(ASCII_WORD) ?? [];
  if (words.length === 0) return UNKNOWN_TITLE;

  const substantial = words
    .filter(word => word.length > 2 && !STOP_WORDS.has(word.toLowerCase()))
    .slice(0, count);

  const chosen = substantial.length < count ? words.slice(0, count) : substantial;
  return chosen.map(capitalizeFirst).join('');
}

export function generateKey(fields: BibFields): string {
  const author = extractAuthorLastName(fields.author);
  const year = extractYear(fields.year);
  const title = extractTitleWords(fields.title);

  return `${author}${year}${title}`;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function rewriteEntryKey(entryText: string, oldKey: string, newKey: string): string {
  const header = new RegExp(`(@\\w+\\s*\\{\\s*)${escapeRegExp(oldKey)}`);
  return entryText.replace(header, (_match, prefix: string) => `${prefix}${newKey}`);
}

class CitationKeyService {
  /**
   * Regenerate every key in a .bib file. Keys are unique across the file; the
   * first entry producing a key keeps it, later ones get `_1`, `_2`, ...
   */
  regenerateKeys(content: string): KeyRegenerationResult {
    const assigned = new Set<string>();
    const mapping: KeyMapping = new Map();
    const entries: RegeneratedEntry[] = [];
    const pieces: string[] = [];
    let unparsedCount = 0;

    for (const chunk of bibtexParserService.splitEntries(content)) {
      if (chunk.kind !== 'entry') {
        if (chunk.kind === 'unparsed') unparsedCount++;
        pieces.push(chunk.text);
        continue;
      }

      const { originalKey, fields } = chunk.entry;
      const baseKey = generateKey(fields);
      const key = this.uniqueKey(baseKey, assigned);

      if (key !== baseKey) {
        logger.debug(`[Citation Keys] Collision on ${baseKey}, using ${key}`);
      }

      assigned.add(key);
      mapping.set(originalKey, key);
      entries.push({ originalKey, baseKey, key });
      pieces.push(rewriteEntryKey(chunk.text, originalKey, key));
    }

    logger.info(`[Citation Keys] Regenerated ${entries.length} keys (${unparsedCount} entries passed through)`);

    return {
      content: pieces.map(piece => `${piece}\n\n`).join(''),
      mapping,
      entries,
      unparsedCount,
    };
  }

  /**
   * Human-readable mapping, sorted by old key
   */
  formatMappingReport(mapping: KeyMapping): string {
    const lines = ['Old Key -> New Key', '='.repeat(70)];
    for (const [oldKey, newKey] of this.sortedMappings(mapping)) {
      lines.push(`${oldKey.padEnd(30)} -> ${newKey}`);
    }
    return `${lines.join('\n')}\n`;
  }

  sortedMappings(mapping: KeyMapping): Array<[string, string]> {
    return [...mapping.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  }

  private uniqueKey(baseKey: string, assigned: ReadonlySet<string>): string {
    let key = baseKey;
    let suffix = 1;
    while (assigned.has(key)) {
      key = `${baseKey}_${suffix}`;
      suffix++;
    }
    return key;
  }
}

export const citationKeyService = new CitationKeyService();
