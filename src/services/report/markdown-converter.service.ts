/**
 * Markdown Converter Service
 * Report JSON -> plain Markdown with display-string citations and a references section
 */

import { logger } from '../../lib/logger';
import { replaceExtension } from '../../utils/file-helpers';
import { frontMatter, reportDateFromFileName, reportTitle } from '../../utils/report.utils';
import { ResearchReport } from '../../schemas/report.schemas';
import { citationResolverService } from '../citation/citation-resolver.service';
import { contentMarkerService } from '../citation/content-marker.service';
import { reportLoaderService } from './report-loader.service';
import { referencesService } from './references.service';

export interface MarkdownConversionResult {
  content: string;
  outputPath: string;
}

class MarkdownConverterService {
  async convert(jsonPath: string): Promise<MarkdownConversionResult> {
    const report = await reportLoaderService.loadReport(jsonPath);
    const content = this.render(report, jsonPath);

    logger.debug(`[Markdown Converter] Rendered ${report.sections?.length ?? 0} sections from ${jsonPath}`);

    return { content, outputPath: replaceExtension(jsonPath, '.md') };
  }

  render(report: ResearchReport, sourcePath: string): string {
    let content = frontMatter({ title: reportTitle(report), format: 'pdf' });

    content += `**Report ID:** ${report.id ?? 'Unknown'}\n\n`;

    const date = reportDateFromFileName(sourcePath);
    if (date) {
      content += `**Generated:** ${date}\n\n`;
    }

    if (report.query) {
      content += `**Research Question:** ${report.query}\n\n`;
    }

    content += '---\n\n';

    const sections = report.sections ?? [];
    for (const section of sections) {
      content += `## ${section.title || 'Untitled Section'}\n\n`;

      if (section.tldr) {
        content += `**TL;DR:** ${section.tldr}\n\n`;
      }

      if (section.text) {
        const cleaned = contentMarkerService.stripContentMarkers(section.text);
        content += `${citationResolverService.rewriteCitations(cleaned, new Map(), 'markdown')}\n\n`;
      }
    }

    content += referencesService.buildReferencesSection(sections);
    return content;
  }
}

export const markdownConverterService = new MarkdownConverterService();
