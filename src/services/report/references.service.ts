/**
 * References Service
 * Builds the reference listings appended to converted reports.
 */

import { config } from '../../config';
import { ReportCitation, ReportPaper, ReportSection } from '../../schemas/report.schemas';
import { citationResolverService } from '../citation/citation-resolver.service';
import { CitationVariantTable } from '../citation/citation.types';
import { escapeTableCell, truncate } from '../../utils/report.utils';

export interface IdentifiedCitation extends ReportCitation {
  id: string;
}

const byId = (a: IdentifiedCitation, b: IdentifiedCitation): number => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0);

class ReferencesService {
  /**
   * Unique citations across all sections, first occurrence wins.
   * Citations without an id are skipped.
   */
  collectCitations(sections: ReportSection[]): IdentifiedCitation[] {
    const seen = new Map<string, IdentifiedCitation>();

    for (const section of sections) {
      for (const citation of section.citations ?? []) {
        const id = citation.id;
        if (id && !seen.has(id)) {
          seen.set(id, { ...citation, id });
        }
      }
    }

    return [...seen.values()];
  }

  /**
   * Full "## References" section for plain Markdown output, sorted by citation id
   */
  buildReferencesSection(sections: ReportSection[], snippetMaxLength: number = config.snippetMaxLength): string {
    const citations = this.collectCitations(sections).sort(byId);
    if (citations.length === 0) {
      return '';
    }

    let content = '\n## References\n\n';

    for (const citation of citations) {
      const paper: ReportPaper = citation.paper ?? {};
      const title = paper.title ?? 'Unknown Title';
      const year = paper.year ?? 'Unknown Year';
      const authorNames = (paper.authors ?? [])
        .map(author => author.name ?? '')
        .filter(name => name.length > 0);
      const authors = authorNames.length > 0 ? authorNames.join(', ') : 'Unknown Authors';

      content += `### ${citation.id}\n\n`;
      content += `${authors} (${year}). *${title}*`;
      if (paper.venue) {
        content += `. ${paper.venue}`;
      }
      content += '.\n\n';

      if (paper.corpusId) {
        content += `- **Corpus ID:** ${paper.corpusId}\n`;
      }
      if (paper.nCitations) {
        content += `- **Citations:** ${paper.nCitations}\n`;
      }

      const snippets = citation.snippets ?? [];
      if (snippets.length > 0) {
        content += '\n**Key Excerpts:**\n\n';
        snippets.forEach((snippet, index) => {
          content += `${index + 1}. ${truncate(snippet, snippetMaxLength)}\n\n`;
        });
      }

      content += '---\n\n';
    }

    return content;
  }

  /**
   * "## References Summary" table for Quarto output. Keys go through the same
   * resolver as the inline citations so the table matches the text.
   */
  buildReferencesSummary(
    sections: ReportSection[],
    table: CitationVariantTable,
    titleMaxLength: number = config.summaryTitleMaxLength
  ): string {
    const citations = this.collectCitations(sections).sort(byId);
    if (citations.length === 0) {
      return '';
    }

    let content = '\n## References Summary\n\n';
    content += 'The following sources are cited in this report and detailed in the accompanying `.bib` file:\n\n';
    content += '| Citation | Title | Year | Venue |\n';
    content += '|----------|-------|------|-------|\n';

    for (const citation of citations) {
      const paper: ReportPaper = citation.paper ?? {};
      const fullTitle = paper.title ?? 'Unknown Title';
      const title =
        fullTitle.length > titleMaxLength ? `${fullTitle.substring(0, titleMaxLength - 3)}...` : fullTitle;
      const year = paper.year ?? 'Unknown';
      const venue = paper.venue || 'N/A';
      const key = citationResolverService.resolveCitation(citation.id, table);

      content += `| \`@${key}\` | ${escapeTableCell(title)} | ${year} | ${escapeTableCell(venue)} |\n`;
    }

    return content;
  }
}

export const referencesService = new ReferencesService();
