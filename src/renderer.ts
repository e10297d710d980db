/**
 * Section tree renderer
 */

import { Section } from './section.js';

/**
 * Serialize a section tree back to text
 *
 * Emits, in order: the starting marker line, head content, every child,
 * tail content, the ending marker line. Marker lines get a separator;
 * content buffers are written verbatim.
 *
 * @param section - Section to render, usually the root
 * @param lineSeparator - Separator appended after each marker line
 * @returns Rendered text
 */
export function renderSection(section: Section, lineSeparator: string): string {
  const parts: string[] = [];
  appendSection(section, lineSeparator, parts);
  return parts.join('');
}

function appendSection(section: Section, lineSeparator: string, parts: string[]): void {
  if (section.startingLine !== null) {
    parts.push(section.startingLine, lineSeparator);
  }

  parts.push(section.headContent);

  for (const child of section.children) {
    appendSection(child, lineSeparator, parts);
  }

  parts.push(section.tailContent);

  if (section.endingLine !== null) {
    parts.push(section.endingLine, lineSeparator);
  }
}
