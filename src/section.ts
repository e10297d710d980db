/**
 * Section tree model
 */

/**
 * Node of a parsed section tree
 *
 * The root and the parser's ordering wrappers have no name. Content buffers
 * already hold their line separators; marker lines do not.
 */
export class Section {
  name: string | null;

  /** Literal marker line that opened the section, null for the root */
  startingLine: string | null = null;

  /** Literal marker line that closed the section, null for the root */
  endingLine: string | null = null;

  /** Content before the first child */
  headContent = '';

  /** Content after the last child */
  tailContent = '';

  readonly children: Section[] = [];

  constructor(name: string | null = null) {
    this.name = name;
  }

  get isAnonymous(): boolean {
    return this.name === null;
  }

  /**
   * Find the first section with the given name
   *
   * Searches this section and its descendants depth-first in document order.
   *
   * @example
   * ```typescript
   * const imports = root.findSection('imports');
   * if (imports) {
   *   imports.headContent = 'import * as fs from "fs";\n';
   * }
   * ```
   */
  findSection(name: string): Section | undefined {
    if (this.name === name) {
      return this;
    }

    for (const child of this.children) {
      const found = child.findSection(name);
      if (found) {
        return found;
      }
    }

    return undefined;
  }
}
