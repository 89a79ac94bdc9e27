/**
 * Bibliography Services - Central Exports
 */

export { bibtexParserService } from './bibtex-parser.service';
export {
  citationKeyService,
  generateKey,
  extractAuthorLastName,
  extractRawLastName,
  extractYear,
  extractTitleWords,
  rewriteEntryKey,
  STOP_WORDS,
} from './citation-key.service';

export * from './bibliography.types';
