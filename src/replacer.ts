/**
 * Section content replacement
 */

import { Section } from './section.js';
import { SectionEditor, SectionEditorOptions } from './section-editor.js';

/**
 * Section editor replacing the head content of named sections
 *
 * Every section whose name is a key of `replacements` gets that value as
 * its head content. Children and tail content are kept. A replacement not
 * ending in the line separator gets one appended; an empty replacement
 * empties the section head.
 *
 * @example
 * ```typescript
 * const replacer = new SectionReplacer({ imports: 'import * as fs from "fs";' });
 * const output = await replacer.edit(source);
 * console.error(replacer.unmatched); // names not found in source
 * ```
 */
export class SectionReplacer extends SectionEditor {
  private readonly replacements: Map<string, string>;

  constructor(replacements: Record<string, string>, options: SectionEditorOptions = {}) {
    super(options);
    this.replacements = new Map(Object.entries(replacements));
  }

  protected override editSection(section: Section): void {
    super.editSection(section);

    if (section.name === null) {
      return;
    }

    const replacement = this.replacements.get(section.name);
    if (replacement !== undefined) {
      section.headContent = this.terminate(replacement);
    }
  }

  /**
   * Replacement names not encountered in the last completed cycle, sorted
   */
  get unmatched(): string[] {
    return Array.from(this.replacements.keys())
      .filter((name) => !this.isSectionPresent(name))
      .sort();
  }

  private terminate(content: string): string {
    if (content.length === 0 || content.endsWith(this.lineSeparator)) {
      return content;
    }
    return content + this.lineSeparator;
  }
}
