/**
 * Citation Resolver Service
 * Maps free-text citation markers such as "(Smith et al., 2020)" to the keys of
 * a bibliography file.
 */

import { logger } from '../../lib/logger';
import { bibtexParserService } from '../bibliography/bibtex-parser.service';
import { extractRawLastName } from '../bibliography/citation-key.service';
import { BibEntry } from '../bibliography/bibliography.types';
import { contentMarkerService } from './content-marker.service';
import {
  CitationDiagnostics,
  CitationMatch,
  CitationStrategy,
  CitationVariantTable,
  ReferenceFormat,
  VariantCollision,
  VariantTableResult,
} from './citation.types';

const AUTHOR_YEAR_MARKER = /^\(?([A-Za-z]+)(?:\s+et\s+al\.)?,?\s+(\d{4})\)?/;

export function citationVariants(lastName: string, year: string): string[] {
  return [
    `${lastName}${year}`,
    `${lastName}etal${year}`,
    `(${lastName} et al., ${year})`,
    `(${lastName}, ${year})`,
    `${lastName} et al., ${year}`,
    `${lastName}, ${year}`,
  ].map(variant => variant.toLowerCase().trim());
}

export function formatReferenceToken(key: string, display: string, format: ReferenceFormat): string {
  return format === 'quarto' ? `[@${key}]` : display;
}

export function emptyDiagnostics(collisions: VariantCollision[] = []): CitationDiagnostics {
  return {
    total: 0,
    byStrategy: { exact: 0, unwrapped: 0, synthesized: 0, sanitized: 0 },
    unresolved: [],
    collisions,
  };
}

class CitationResolverService {
  buildVariantTable(bibContent: string): VariantTableResult {
    return this.buildVariantTableFromEntries(bibtexParserService.parseEntries(bibContent));
  }

  /**
   * Every entry with an author and a 4-digit year contributes six lowercase
   * variants. A later entry overwrites an earlier one on the same variant; each
   * overwrite is reported as a collision.
   */
  buildVariantTableFromEntries(entries: BibEntry[]): VariantTableResult {
    const table = new Map<string, string>();
    const collisions: VariantCollision[] = [];

    for (const entry of entries) {
      const year = entry.fields.year?.match(/\d{4}/)?.[0];
      const lastName = extractRawLastName(entry.fields.author);
      if (!year || !lastName) continue;

      const key = entry.originalKey;
      for (const variant of citationVariants(lastName, year)) {
        const previousKey = table.get(variant);
        if (previousKey !== undefined && previousKey !== key) {
          collisions.push({ variant, previousKey, key });
          logger.warn(`[Citation Resolver] "${variant}" matches both ${previousKey} and ${key}; using ${key}`);
        }
        table.set(variant, key);
      }
    }

    logger.info(`[Citation Resolver] Found ${new Set(table.values()).size} unique citation keys in bibliography`);
    logger.info(`[Citation Resolver] Built ${table.size} citation mappings`);

    return { table, collisions };
  }

  matchCitation(rawMarker: string, table: CitationVariantTable): CitationMatch {
    const trimmed = rawMarker.trim();

    const exact = table.get(trimmed.toLowerCase());
    if (exact !== undefined) {
      return { key: exact, strategy: 'exact' };
    }

    const unwrapped = table.get(trimmed.replace(/^[()]+|[()]+$/g, '').toLowerCase().trim());
    if (unwrapped !== undefined) {
      return { key: unwrapped, strategy: 'unwrapped' };
    }

    const authorYear = trimmed.match(AUTHOR_YEAR_MARKER);
    if (authorYear) {
      return { key: `${authorYear[1]}${authorYear[2]}`, strategy: 'synthesized' };
    }

    return { key: rawMarker.replace(/[^\p{L}\p{N}]/gu, ''), strategy: 'sanitized' };
  }

  resolveCitation(rawMarker: string, table: CitationVariantTable): string {
    return this.matchCitation(rawMarker, table).key;
  }

  /**
   * Replace every citation placeholder in `text` with a reference token.
   * Markdown output keeps the display string and skips resolution.
   */
  rewriteCitations(
    text: string,
    table: CitationVariantTable,
    format: ReferenceFormat,
    diagnostics: CitationDiagnostics = emptyDiagnostics()
  ): string {
    return contentMarkerService.replaceCitationMarkers(text, display => {
      if (format === 'markdown') {
        return formatReferenceToken(display, display, format);
      }

      const match = this.matchCitation(display, table);
      this.record(diagnostics, display, match.strategy);
      return formatReferenceToken(match.key, display, format);
    });
  }

  private record(diagnostics: CitationDiagnostics, display: string, strategy: CitationStrategy): void {
    diagnostics.total++;
    diagnostics.byStrategy[strategy]++;
    if (strategy === 'synthesized' || strategy === 'sanitized') {
      diagnostics.unresolved.push(display);
      logger.debug(`[Citation Resolver] No bibliography match for "${display}" (${strategy})`);
    }
  }
}

export const citationResolverService = new CitationResolverService();
