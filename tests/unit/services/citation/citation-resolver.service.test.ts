/**
 * Citation Resolver Service Tests
 *
 * Variant table construction and marker -> key resolution
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../../../../src/lib/logger', () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

import { logger } from '../../../../src/lib/logger';
import {
  citationResolverService,
  citationVariants,
  emptyDiagnostics,
  formatReferenceToken,
} from '../../../../src/services/citation/citation-resolver.service';

const SMITH_BIB = `@article{smith2020paper,
  author = {Smith, John and Lee, Ann},
  year = {2020},
  title = {Paper}
}
`;

describe('CitationResolverService', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('buildVariantTable', () => {
    it('maps six lowercase surface forms to the entry key', () => {
      const { table, collisions } = citationResolverService.buildVariantTable(SMITH_BIB);

      expect([...table.keys()]).toEqual([
        'smith2020',
        'smithetal2020',
        '(smith et al., 2020)',
        '(smith, 2020)',
        'smith et al., 2020',
        'smith, 2020',
      ]);
      expect(new Set(table.values())).toEqual(new Set(['smith2020paper']));
      expect(collisions).toEqual([]);
    });

    it('skips entries without an author or a 4-digit year', () => {
      const { table } = citationResolverService.buildVariantTable(
        '@misc{noyear, author = {Doe, Jane}, year = {n.d.}}\n@misc{noauthor, year = {2019}}'
      );

      expect(table.size).toBe(0);
    });

    it('lets a later entry overwrite an earlier one and reports the collision', () => {
      const { table, collisions } = citationResolverService.buildVariantTable(
        '@article{smith2020a, author = {Smith, John}, year = {2020}, title = {One}}\n' +
          '@article{smith2020b, author = {Smith, Jane}, year = {2020}, title = {Two}}'
      );

      expect(table.get('smith2020')).toBe('smith2020b');
      expect(collisions).toHaveLength(6);
      expect(collisions[0]).toEqual({ variant: 'smith2020', previousKey: 'smith2020a', key: 'smith2020b' });
      expect(logger.warn).toHaveBeenCalledTimes(6);
    });
  });

  describe('matchCitation', () => {
    const { table } = citationResolverService.buildVariantTable(SMITH_BIB);

    it('finds a direct match ignoring case and surrounding whitespace', () => {
      expect(citationResolverService.matchCitation('(Smith et al., 2020)', table)).toEqual({
        key: 'smith2020paper',
        strategy: 'exact',
      });
      expect(citationResolverService.matchCitation('  SMITH2020 ', table).key).toBe('smith2020paper');
    });

    it('retries without the wrapping parentheses', () => {
      expect(citationResolverService.matchCitation('((Smith, 2020))', table)).toEqual({
        key: 'smith2020paper',
        strategy: 'unwrapped',
      });
    });

    it('synthesizes Author+Year when the bibliography has no match', () => {
      expect(citationResolverService.matchCitation('(Doe, 2019)', table)).toEqual({
        key: 'Doe2019',
        strategy: 'synthesized',
      });
      expect(citationResolverService.resolveCitation('Doe et al. 2019', table)).toBe('Doe2019');
    });

    it('falls back to the marker stripped to letters and digits', () => {
      expect(citationResolverService.matchCitation('Smith and Jones (2021)', table)).toEqual({
        key: 'SmithandJones2021',
        strategy: 'sanitized',
      });
    });
  });

  describe('resolveCitation', () => {
    it('resolves a known marker to the bibliography key', () => {
      const { table } = citationResolverService.buildVariantTable(SMITH_BIB);

      expect(citationResolverService.resolveCitation('(Smith et al., 2020)', table)).toBe('smith2020paper');
    });
  });

  describe('rewriteCitations', () => {
    const text =
      'Known <Paper corpusId="1" paperTitle="(Smith et al., 2020)" isShortName></Paper> and ' +
      'unknown <Paper paperTitle="(Doe, 2019)"></Paper>.';

    it('writes [@key] tokens for Quarto and records diagnostics', () => {
      const { table } = citationResolverService.buildVariantTable(SMITH_BIB);
      const diagnostics = emptyDiagnostics();

      const rewritten = citationResolverService.rewriteCitations(text, table, 'quarto', diagnostics);

      expect(rewritten).toBe('Known [@smith2020paper] and unknown [@Doe2019].');
      expect(diagnostics.total).toBe(2);
      expect(diagnostics.byStrategy).toEqual({ exact: 1, unwrapped: 0, synthesized: 1, sanitized: 0 });
      expect(diagnostics.unresolved).toEqual(['(Doe, 2019)']);
    });

    it('keeps the display string for Markdown', () => {
      expect(citationResolverService.rewriteCitations(text, new Map(), 'markdown')).toBe(
        'Known (Smith et al., 2020) and unknown (Doe, 2019).'
      );
    });
  });
});

describe('citationVariants', () => {
  it('keeps the last name as written before lowercasing', () => {
    expect(citationVariants('McKay', '1999')[2]).toBe('(mckay et al., 1999)');
  });
});

describe('formatReferenceToken', () => {
  it('formats per output format', () => {
    expect(formatReferenceToken('key1', '(A, 2000)', 'quarto')).toBe('[@key1]');
    expect(formatReferenceToken('key1', '(A, 2000)', 'markdown')).toBe('(A, 2000)');
  });
});
