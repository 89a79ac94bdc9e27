/**
 * Report Utilities
 * Small formatting helpers shared by the Markdown and Quarto converters
 */

import path from 'path';
import { stringify } from 'yaml';
import { config } from '../config';
import { ResearchReport } from '../schemas/report.schemas';

/**
 * Date prefix of report file names like "2024-05-01-report.json" -> "2024-05-01".
 * Null when the name has fewer than three dash-separated parts.
 */
export function reportDateFromFileName(filePath: string): string | null {
  const parts = path.basename(filePath).split('-');
  return parts.length >= 3 ? parts.slice(0, 3).join('-') : null;
}

export function reportTitle(report: ResearchReport, prefix: string = config.reportTitlePrefix): string {
  const type = report.type || 'Report';
  const query = report.query || 'Research Report';
  return `${prefix} ${type}: ${query}`;
}

export function frontMatter(metadata: Record<string, unknown>): string {
  return `---\n${stringify(metadata)}---\n\n`;
}

export function truncate(text: string, maxLength: number, ellipsis: string = '...'): string {
  return text.length > maxLength ? `${text.substring(0, maxLength)}${ellipsis}` : text;
}

/** Escape characters that would break a Markdown table cell */
export function escapeTableCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}
