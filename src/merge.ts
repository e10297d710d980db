/**
 * Section merging
 * Carries hand-edited section content from an existing text into freshly generated text
 */

import { SectionReplacer } from './replacer.js';
import { Section } from './section.js';
import { SectionEditorOptions } from './section-editor.js';
import { readSectionTree } from './tree-reader.js';
import { MergeResult } from './types.js';

/**
 * Collect the head content of every named section
 *
 * When a name occurs more than once the first occurrence in document
 * order wins.
 */
export function collectHeadContent(
  section: Section,
  contents: Map<string, string> = new Map()
): Map<string, string> {
  if (section.name !== null && !contents.has(section.name)) {
    contents.set(section.name, section.headContent);
  }
  for (const child of section.children) {
    collectHeadContent(child, contents);
  }
  return contents;
}

/**
 * Merge existing section content into generated text
 *
 * Both texts are parsed with the same options. Every named section of
 * `generated` that also exists in `existing` gets the existing head
 * content; everything else comes from `generated`, including tail
 * content after a section's last child and text between nested siblings.
 *
 * @param generated - Newly generated text
 * @param existing - Previously generated and hand-edited text
 * @param options - Editor options shared by both parses
 * @returns Merged text with the names merged and dropped
 * @throws {SectionParseError} When either text has an invalid section structure
 *
 * @example
 * ```typescript
 * const result = await mergeSections(
 *   'SECTION-START[body]\n// TODO\nSECTION-END\n',
 *   'SECTION-START[body]\nreturn 42;\nSECTION-END\n',
 *   { lineSeparator: '\n' }
 * );
 * // result.text: 'SECTION-START[body]\nreturn 42;\nSECTION-END\n'
 * // result.merged: ['body']
 * ```
 */
export async function mergeSections(
  generated: string,
  existing: string,
  options: SectionEditorOptions = {}
): Promise<MergeResult> {
  const existingContent = collectHeadContent(await readSectionTree(existing, options));

  const replacer = new SectionReplacer(Object.fromEntries(existingContent), options);
  const text = (await replacer.edit(generated)) ?? '';

  return {
    text,
    merged: replacer.presentSections.filter((name) => existingContent.has(name)),
    dropped: replacer.unmatched,
  };
}
