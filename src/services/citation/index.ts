/**
 * Citation Services - Central Exports
 */

export {
  citationResolverService,
  citationVariants,
  emptyDiagnostics,
  formatReferenceToken,
} from './citation-resolver.service';
export { contentMarkerService } from './content-marker.service';

export * from './citation.types';
