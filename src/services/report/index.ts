/**
 * Report Conversion Services - Central Exports
 */

export { reportLoaderService } from './report-loader.service';
export { bibliographyLocatorService } from './bibliography-locator.service';
export { cslService, DEFAULT_CSL_FILE_NAME } from './csl.service';
export { referencesService } from './references.service';
export type { IdentifiedCitation } from './references.service';
export { markdownConverterService } from './markdown-converter.service';
export type { MarkdownConversionResult } from './markdown-converter.service';
export { quartoConverterService } from './quarto-converter.service';
export type { QuartoConversionOptions, QuartoConversionResult } from './quarto-converter.service';
