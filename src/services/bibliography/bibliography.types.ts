/**
 * Bibliography Type Definitions
 */

/** Lowercase field name -> raw field value */
export type BibFields = Readonly<Record<string, string>>;

/** One parsed `@type{key, ...}` entry */
export interface BibEntry {
  readonly entryType: string;
  readonly originalKey: string;
  readonly fields: BibFields;
  readonly rawText: string;
}

/**
 * A piece of a .bib file in source order. Preambles and entries that do not
 * match the `@type{key,` shape are carried through untouched.
 */
export type BibChunk =
  | { kind: 'preamble'; text: string }
  | { kind: 'unparsed'; text: string }
  | { kind: 'entry'; text: string; entry: BibEntry };

/** originalKey -> generatedKey, insertion order = source order */
export type KeyMapping = Map<string, string>;

export interface RegeneratedEntry {
  originalKey: string;
  baseKey: string;
  key: string;
}

export interface KeyRegenerationResult {
  content: string;
  mapping: KeyMapping;
  entries: RegeneratedEntry[];
  unparsedCount: number;
}
