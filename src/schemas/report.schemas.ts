/**
 * Research Report Validation Schemas
 */

import { z } from 'zod';

const scalarSchema = z.union([z.string(), z.number()]);

export const authorSchema = z.object({
  name: z.string().nullish(),
});

export const paperSchema = z.object({
  title: z.string().nullish(),
  year: scalarSchema.nullish(),
  venue: z.string().nullish(),
  corpusId: scalarSchema.nullish(),
  nCitations: z.number().nullish(),
  authors: z.array(authorSchema).nullish(),
});

export const citationSchema = z.object({
  id: z.string().nullish(),
  paper: paperSchema.nullish(),
  snippets: z.array(z.string()).nullish(),
});

export const sectionSchema = z.object({
  title: z.string().nullish(),
  tldr: z.string().nullish(),
  text: z.string().nullish(),
  citations: z.array(citationSchema).nullish(),
});

export const researchReportSchema = z.object({
  id: scalarSchema.nullish(),
  query: z.string().nullish(),
  type: z.string().nullish(),
  sections: z.array(sectionSchema).nullish(),
});

// ============================================
// CLI OPTION SCHEMAS
// ============================================

export const quartoOptionsSchema = z.object({
  jsonFile: z.string().min(1, 'JSON file path is required'),
  noBib: z.boolean().default(false),
  cslFile: z.string().min(1).optional(),
});

export const markdownOptionsSchema = z.object({
  jsonFile: z.string().min(1, 'JSON file path is required'),
});

export const regenerateBibOptionsSchema = z.object({
  bibFile: z.string().min(1, 'BibTeX file path is required'),
  inplace: z.boolean().default(false),
  showMapping: z.boolean().default(false),
  saveMapping: z.boolean().default(false),
});

// ============================================
// TYPE EXPORTS
// ============================================

export type ReportAuthor = z.infer<typeof authorSchema>;
export type ReportPaper = z.infer<typeof paperSchema>;
export type ReportCitation = z.infer<typeof citationSchema>;
export type ReportSection = z.infer<typeof sectionSchema>;
export type ResearchReport = z.infer<typeof researchReportSchema>;
export type QuartoOptions = z.infer<typeof quartoOptionsSchema>;
export type MarkdownOptions = z.infer<typeof markdownOptionsSchema>;
export type RegenerateBibOptions = z.infer<typeof regenerateBibOptionsSchema>;
