/**
 * Content Marker Service
 * Handles the inline XML-like markers embedded in report text:
 * `<Paper paperTitle="(Smith et al., 2020)" ...></Paper>` citation placeholders and
 * `<Model ...>...</Model>` generation annotations.
 */

const PAPER_MARKER_SOURCE = String.raw`<Paper[^>]*paperTitle="([^"]*)"[^>]*></Paper>`;
const MODEL_BLOCK = /<Model[^>]*>.*?<\/Model>/g;
const MODEL_TAG = /<Model[^>]*\/?>/g;
const HORIZONTAL_WHITESPACE_RUN = /[ \t]{2,}/g;
const SPACE_BEFORE_PUNCTUATION = /\s+([.,;:!?])/g;

class ContentMarkerService {
  /**
   * Remove generation annotations together with their content, then tidy the
   * whitespace left behind. Line breaks are kept. Running it twice changes nothing.
   */
  stripContentMarkers(text: string): string {
    return text
      .replace(MODEL_BLOCK, '')
      .replace(MODEL_TAG, '')
      .replace(HORIZONTAL_WHITESPACE_RUN, ' ')
      .replace(SPACE_BEFORE_PUNCTUATION, '$1')
      .trim();
  }

  /** Display strings of every citation placeholder, in order of appearance */
  extractCitationMarkers(text: string): string[] {
    return [...text.matchAll(new RegExp(PAPER_MARKER_SOURCE, 'g'))].map(match => match[1]);
  }

  replaceCitationMarkers(text: string, replacer: (display: string) => string): string {
    return text.replace(new RegExp(PAPER_MARKER_SOURCE, 'g'), (_match, display: string) => replacer(display));
  }
}

export const contentMarkerService = new ContentMarkerService();
