/**
 * Section editor
 * Parses marked sections into a tree, edits each section and renders the tree back to text
 */

import { LineEditor, LineEditorOptions } from './line-editor.js';
import { matchSectionEnd, matchSectionStart } from './markers.js';
import { renderSection } from './renderer.js';
import { Section } from './section.js';
import { EditStrategy, EditTask, sequentialStrategy } from './strategy.js';
import {
  MalformedSectionMarkerError,
  UnmatchedSectionEndError,
  UnterminatedSectionError,
} from './types.js';

export interface SectionEditorOptions extends LineEditorOptions {
  /** Scheduling of edit tasks (default: sequential) */
  strategy?: EditStrategy;
}

/**
 * Where plain lines of an open section go
 *
 * A section starts in head mode and switches to tail mode for good when
 * its first child opens.
 */
type ContentMode = 'head' | 'tail';

interface OpenSection {
  section: Section;
  mode: ContentMode;
}

/**
 * Editor for text containing nested, named sections
 *
 * Sections open on a line containing `SECTION-START[name]` and close on a
 * line containing `SECTION-END`. Nothing is returned until end of input;
 * the whole tree is then edited via `editSection` and rendered in document
 * order.
 *
 * Plain text between two sibling sections is kept in an anonymous wrapper
 * section holding that text and the following sibling, so it renders at
 * its original position.
 *
 * One instance runs one cycle at a time and may be reused for further
 * cycles; every cycle starts from an empty stack.
 *
 * @example
 * ```typescript
 * class BannerEditor extends SectionEditor {
 *   protected override editSection(section: Section): void {
 *     super.editSection(section);
 *     if (section.name === 'banner') {
 *       section.headContent = '// Generated file' + this.lineSeparator;
 *     }
 *   }
 * }
 *
 * const output = await new BannerEditor().edit(source);
 * ```
 */
export class SectionEditor extends LineEditor {
  private readonly strategy: EditStrategy;
  private stack: OpenSection[] | null = null;
  private readonly presence = new Set<string>();

  constructor(options: SectionEditorOptions = {}) {
    super(options);
    this.strategy = options.strategy ?? sequentialStrategy;
  }

  protected override async editLine(line: string | null): Promise<string | undefined> {
    const stack: OpenSection[] = this.stack ?? [{ section: new Section(), mode: 'head' }];
    this.stack = stack;

    if (line === null) {
      return this.finish(stack);
    }

    try {
      this.consumeLine(stack, line);
    } catch (error) {
      this.stack = null;
      throw error;
    }

    return undefined;
  }

  private consumeLine(stack: OpenSection[], line: string): void {
    let current = stack[stack.length - 1];
    const child = this.detectSectionStart(line);

    if (child) {
      child.startingLine = line;

      if (current.mode === 'tail' && current.section.tailContent.length > 0) {
        const wrapper = new Section();
        wrapper.headContent = current.section.tailContent;
        current.section.tailContent = '';
        current.section.children.push(wrapper);
        current = { section: wrapper, mode: 'head' };
        stack.push(current);
      }

      current.section.children.push(child);
      current.mode = 'tail';
      stack.push({ section: child, mode: 'head' });
      return;
    }

    if (this.detectSectionEnd(line)) {
      const closed = stack.pop();
      if (closed) {
        closed.section.endingLine = line;
      }

      if (stack.length === 0) {
        throw new UnmatchedSectionEndError(line, this.lineNumber);
      }

      // A wrapper only hosts the section that just closed
      if (stack.length > 1 && stack[stack.length - 1].section.isAnonymous) {
        stack.pop();
      }
      return;
    }

    if (current.mode === 'head') {
      current.section.headContent += line + this.lineSeparator;
    } else {
      current.section.tailContent += line + this.lineSeparator;
    }
  }

  private async finish(stack: OpenSection[]): Promise<string> {
    this.stack = null;

    const top = stack.pop();
    if (!top || stack.length > 0) {
      throw new UnterminatedSectionError(top?.section.name ?? null, this.lineNumber);
    }

    return this.getOutput(top.section);
  }

  /**
   * Detect the start of a section
   *
   * Override together with `detectSectionEnd` to use other markers.
   *
   * @param line - Line to inspect
   * @returns New unnamed-content section, or undefined for any other line
   * @throws {MalformedSectionMarkerError} When the start marker is not closed
   */
  protected detectSectionStart(line: string): Section | undefined {
    const match = matchSectionStart(line);
    if (match === 'malformed') {
      throw new MalformedSectionMarkerError(line, this.lineNumber);
    }
    return match ? new Section(match.name) : undefined;
  }

  /**
   * Detect the end of a section
   */
  protected detectSectionEnd(line: string): boolean {
    return matchSectionEnd(line);
  }

  /**
   * Edit a section before rendering
   *
   * Records the section as present and changes nothing. Overrides may
   * rewrite `headContent` and `tailContent` but must not touch names,
   * marker lines or children. Calls may run concurrently under a
   * concurrent strategy.
   */
  protected editSection(section: Section): void | Promise<void> {
    if (section.name !== null) {
      this.presence.add(section.name);
    }
  }

  /**
   * Edit every section of a parsed tree, then render it
   *
   * @param root - Root of the parsed tree
   * @returns Rendered text
   */
  protected async getOutput(root: Section): Promise<string> {
    this.presence.clear();

    const tasks: EditTask[] = [];
    this.collectTasks(root, tasks);

    if (tasks.length > 1) {
      await this.strategy.run(tasks);
    } else {
      await sequentialStrategy.run(tasks);
    }

    return renderSection(root, this.lineSeparator);
  }

  private collectTasks(section: Section, tasks: EditTask[]): void {
    tasks.push(() => this.editSection(section));
    for (const child of section.children) {
      this.collectTasks(child, tasks);
    }
  }

  /**
   * Whether the last completed cycle encountered a section with the given name
   */
  isSectionPresent(name: string): boolean {
    return this.presence.has(name);
  }

  /**
   * Names of all sections encountered in the last completed cycle, sorted
   */
  get presentSections(): string[] {
    return Array.from(this.presence).sort();
  }
}
