/**
 * Citation Resolution Type Definitions
 */

/** Normalized "Author Year" surface form -> bibliography key */
export type CitationVariantTable = ReadonlyMap<string, string>;

/** Two bibliography entries produced the same surface form */
export interface VariantCollision {
  variant: string;
  previousKey: string;
  key: string;
}

export interface VariantTableResult {
  table: CitationVariantTable;
  collisions: VariantCollision[];
}

/**
 * How a marker was turned into a key:
 * - exact: normalized marker found in the table
 * - unwrapped: found after removing surrounding parentheses
 * - synthesized: built from a leading author name and a year, may not exist
 * - sanitized: marker reduced to letters and digits
 */
export type CitationStrategy = 'exact' | 'unwrapped' | 'synthesized' | 'sanitized';

export interface CitationMatch {
  key: string;
  strategy: CitationStrategy;
}

export type ReferenceFormat = 'quarto' | 'markdown';

export interface CitationDiagnostics {
  total: number;
  byStrategy: Record<CitationStrategy, number>;
  unresolved: string[];
  collisions: VariantCollision[];
}
