/**
 * Section tree access
 * Exposes the parsed tree of a text and a JSON-friendly outline of it
 */

import { Section } from './section.js';
import { SectionEditor, SectionEditorOptions } from './section-editor.js';
import { SectionOutline } from './types.js';

/**
 * Section editor keeping the root of the last completed cycle
 */
export class SectionTreeReader extends SectionEditor {
  private lastRoot: Section | undefined;

  get root(): Section | undefined {
    return this.lastRoot;
  }

  protected override async getOutput(root: Section): Promise<string> {
    const output = await super.getOutput(root);
    this.lastRoot = root;
    return output;
  }
}

/**
 * Parse text into a section tree
 *
 * @param text - Text containing section markers
 * @param options - Editor options (line separator, strategy)
 * @returns Root section of the parsed tree
 * @throws {SectionParseError} When the section structure is invalid
 */
export async function readSectionTree(
  text: string,
  options: SectionEditorOptions = {}
): Promise<Section> {
  const reader = new SectionTreeReader(options);
  await reader.edit(text);

  const root = reader.root;
  if (!root) {
    throw new Error('Section tree was not produced');
  }
  return root;
}

/**
 * Build an outline of the named sections below a section
 *
 * @example
 * ```typescript
 * const root = await readSectionTree('SECTION-START[a]\nSECTION-START[b]\nSECTION-END\nSECTION-END\n');
 * outlineSections(root)
 * // Returns: [{ name: 'a', children: [{ name: 'b', children: [] }] }]
 * ```
 */
export function outlineSections(section: Section): SectionOutline[] {
  return section.children.flatMap((child) =>
    child.name === null
      ? outlineSections(child)
      : [{ name: child.name, children: outlineSections(child) }]
  );
}
