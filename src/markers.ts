/**
 * Section marker detection
 * Markers are matched as case-sensitive substrings anywhere within a line
 */

import { StartMarkerMatch } from './types.js';

export const SECTION_START_MARKER = 'SECTION-START[';
export const SECTION_END_MARKER = 'SECTION-END';

/**
 * Match a line against the section start marker
 *
 * The name is everything strictly between `SECTION-START[` and the first
 * `]` following it.
 *
 * @example
 * ```typescript
 * matchSectionStart('// SECTION-START[imports]') // Returns: { name: 'imports' }
 * matchSectionStart('// SECTION-START[imports')  // Returns: 'malformed'
 * matchSectionStart('plain text')                // Returns: undefined
 * ```
 */
export function matchSectionStart(line: string): StartMarkerMatch {
  const markerIndex = line.indexOf(SECTION_START_MARKER);
  if (markerIndex === -1) {
    return undefined;
  }

  const startIndex = markerIndex + SECTION_START_MARKER.length;
  const endIndex = line.indexOf(']', startIndex);
  if (endIndex === -1) {
    return 'malformed';
  }

  return { name: line.substring(startIndex, endIndex) };
}

/**
 * Check whether a line carries the section end marker
 */
export function matchSectionEnd(line: string): boolean {
  return line.includes(SECTION_END_MARKER);
}
