/**
 * References Service Tests
 */
import { describe, it, expect, vi } from 'vitest';

vi.mock('../../../../src/lib/logger', () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

import { referencesService } from '../../../../src/services/report/references.service';
import { citationResolverService } from '../../../../src/services/citation/citation-resolver.service';
import type { ReportSection } from '../../../../src/schemas/report.schemas';

const sections: ReportSection[] = [
  {
    title: 'Background',
    citations: [
      {
        id: '(Zed, 2021)',
        paper: {
          title: 'Zeta',
          year: 2021,
          venue: 'Journal Z',
          corpusId: 42,
          nCitations: 7,
          authors: [{ name: 'A. Zed' }, { name: 'B. Why' }],
        },
        snippets: ['short', 'x'.repeat(510)],
      },
    ],
  },
  {
    title: 'Methods',
    citations: [
      { id: '(Alpha et al., 2020)', paper: { title: 'Alpha paper', year: 2020, authors: [] }, snippets: [] },
      { id: '(Zed, 2021)', paper: { title: 'Duplicate' } },
      { paper: { title: 'No id' } },
    ],
  },
];

describe('ReferencesService', () => {
  describe('collectCitations', () => {
    it('keeps the first occurrence of each id and skips citations without one', () => {
      const citations = referencesService.collectCitations(sections);

      expect(citations.map(c => c.id)).toEqual(['(Zed, 2021)', '(Alpha et al., 2020)']);
      expect(citations[0].paper?.title).toBe('Zeta');
    });

    it('returns nothing for sections without citations', () => {
      expect(referencesService.collectCitations([{ title: 'Empty' }])).toEqual([]);
    });
  });

  describe('buildReferencesSection', () => {
    it('renders entries sorted by id with truncated snippets', () => {
      expect(referencesService.buildReferencesSection(sections, 500)).toBe(
        '\n## References\n\n' +
          '### (Alpha et al., 2020)\n\n' +
          'Unknown Authors (2020). *Alpha paper*.\n\n' +
          '---\n\n' +
          '### (Zed, 2021)\n\n' +
          'A. Zed, B. Why (2021). *Zeta*. Journal Z.\n\n' +
          '- **Corpus ID:** 42\n' +
          '- **Citations:** 7\n' +
          '\n**Key Excerpts:**\n\n' +
          '1. short\n\n' +
          `2. ${'x'.repeat(500)}...\n\n` +
          '---\n\n'
      );
    });

    it('returns an empty string when nothing is cited', () => {
      expect(referencesService.buildReferencesSection([])).toBe('');
    });
  });

  describe('buildReferencesSummary', () => {
    const { table } = citationResolverService.buildVariantTable(
      '@article{smith2020paper, author = {Smith, John}, year = {2020}, title = {Graphs}}'
    );

    it('renders a table with resolved keys and truncated titles', () => {
      const summarySections: ReportSection[] = [
        {
          citations: [
            { id: '(Smith et al., 2020)', paper: { title: 'A'.repeat(70), year: 2020, venue: 'GJ' } },
            { id: '(Doe, 2019)', paper: { title: 'Pipes | in title', year: '2019' } },
          ],
        },
      ];

      expect(referencesService.buildReferencesSummary(summarySections, table, 60)).toBe(
        '\n## References Summary\n\n' +
          'The following sources are cited in this report and detailed in the accompanying `.bib` file:\n\n' +
          '| Citation | Title | Year | Venue |\n' +
          '|----------|-------|------|-------|\n' +
          '| `@Doe2019` | Pipes \\| in title | 2019 | N/A |\n' +
          `| \`@smith2020paper\` | ${'A'.repeat(57)}... | 2020 | GJ |\n`
      );
    });

    it('keeps titles at the limit intact', () => {
      const summary = referencesService.buildReferencesSummary(
        [{ citations: [{ id: 'x', paper: { title: 'B'.repeat(60) } }] }],
        table,
        60
      );

      expect(summary).toContain(`| \`@x\` | ${'B'.repeat(60)} | Unknown | N/A |`);
    });
  });
});
