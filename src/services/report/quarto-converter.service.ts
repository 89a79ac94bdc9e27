/**
 * Quarto Converter Service
 * Report JSON -> .qmd with `[@key]` citations resolved against the report's .bib file
 */

import path from 'path';
import { logger } from '../../lib/logger';
import { readTextFile, replaceExtension } from '../../utils/file-helpers';
import { frontMatter, reportDateFromFileName, reportTitle } from '../../utils/report.utils';
import { ResearchReport } from '../../schemas/report.schemas';
import { citationResolverService, emptyDiagnostics } from '../citation/citation-resolver.service';
import { contentMarkerService } from '../citation/content-marker.service';
import { CitationDiagnostics, CitationVariantTable } from '../citation/citation.types';
import { bibliographyLocatorService } from './bibliography-locator.service';
import { cslService, DEFAULT_CSL_FILE_NAME } from './csl.service';
import { reportLoaderService } from './report-loader.service';
import { referencesService } from './references.service';

export interface QuartoConversionOptions {
  /** Bibliography to link; located next to the JSON file when undefined, none when null */
  bibPath?: string | null;
  /** Citation style to copy; bundled APA style when undefined */
  cslPath?: string;
}

export interface QuartoConversionResult {
  content: string;
  outputPath: string;
  cslFileName: string;
  bibliographyPath: string | null;
  diagnostics: CitationDiagnostics;
}

interface RenderContext {
  sourcePath: string;
  bibFileName: string | null;
  cslFileName: string;
  table: CitationVariantTable;
  diagnostics: CitationDiagnostics;
}

class QuartoConverterService {
  async convert(jsonPath: string, options: QuartoConversionOptions = {}): Promise<QuartoConversionResult> {
    const report = await reportLoaderService.loadReport(jsonPath);

    const bibliographyPath =
      options.bibPath === undefined ? await bibliographyLocatorService.locateBibliography(jsonPath) : options.bibPath;

    const outputDir = path.dirname(jsonPath);
    const cslFileName = (await cslService.copyCslFile(outputDir, options.cslPath)) ?? DEFAULT_CSL_FILE_NAME;

    let table: CitationVariantTable = new Map();
    let diagnostics = emptyDiagnostics();
    if (bibliographyPath) {
      const variants = citationResolverService.buildVariantTable(await readTextFile(bibliographyPath));
      table = variants.table;
      diagnostics = emptyDiagnostics(variants.collisions);
    }

    const content = this.render(report, {
      sourcePath: jsonPath,
      bibFileName: bibliographyPath ? path.basename(bibliographyPath) : null,
      cslFileName,
      table,
      diagnostics,
    });

    if (diagnostics.unresolved.length > 0) {
      logger.warn(
        `[Quarto Converter] ${diagnostics.unresolved.length} of ${diagnostics.total} citations have no bibliography match`
      );
    }

    return {
      content,
      outputPath: replaceExtension(jsonPath, '.qmd'),
      cslFileName,
      bibliographyPath,
      diagnostics,
    };
  }

  render(report: ResearchReport, context: RenderContext): string {
    const { bibFileName, cslFileName, table, diagnostics } = context;

    const metadata: Record<string, unknown> = {
      title: reportTitle(report),
      format: { pdf: { toc: true, 'number-sections': true } },
    };
    if (bibFileName) {
      metadata.bibliography = bibFileName;
      metadata.csl = cslFileName;
      metadata['link-citations'] = true;
    }

    let content = frontMatter(metadata);

    content += '## Document Information\n\n';
    content += `**Report ID:** \`${report.id ?? 'Unknown'}\`\n\n`;

    const date = reportDateFromFileName(context.sourcePath);
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
        content += '::: {.callout-note}\n';
        content += `## TL;DR\n${section.tldr}\n`;
        content += ':::\n\n';
      }

      if (section.text) {
        const cleaned = contentMarkerService.stripContentMarkers(section.text);
        content += `${citationResolverService.rewriteCitations(cleaned, table, 'quarto', diagnostics)}\n\n`;
      }
    }

    if (bibFileName) {
      content += referencesService.buildReferencesSummary(sections, table);
      content += '\n## References\n\n';
      content += '::: {#refs}\n:::\n';
    } else {
      content += '\n**Note:** Bibliography file not found. Citations may not render correctly.\n';
    }

    return content;
  }
}

export const quartoConverterService = new QuartoConverterService();
