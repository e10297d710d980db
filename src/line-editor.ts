/**
 * Line-oriented text editing
 * Feeds text to an editor one line at a time and collects the replacements
 */

import * as os from 'os';

export interface LineEditorOptions {
  /** Separator used to join output lines (default: os.EOL) */
  lineSeparator?: string;

  /** Editor receiving this editor's output */
  next?: LineEditor;
}

/**
 * Split text into lines
 *
 * Lines end at `\r\n`, `\r` or `\n`. A terminator at the very end does not
 * start another line, so `'a\n'` is one line. The empty string is a single
 * empty line.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) {
    return [''];
  }

  const lines = text.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Base line editor
 *
 * Subclasses override `editLine`. It is called once per input line and a
 * last time with `null` to signal end of input. A returned string replaces
 * the line (followed by the separator); `undefined` drops it. The value
 * returned for `null` is appended without a separator.
 *
 * The base class is the identity editor.
 *
 * @example
 * ```typescript
 * const editor = new TrailingWhitespaceEditor({ next: new SectionEditor() });
 * const output = await editor.edit(text);
 * ```
 */
export class LineEditor {
  readonly lineSeparator: string;
  private readonly next: LineEditor | undefined;
  private currentLineNumber = 0;

  constructor(options: LineEditorOptions = {}) {
    this.lineSeparator = options.lineSeparator ?? os.EOL;
    this.next = options.next;
  }

  /**
   * Number of the last line fed to `editLine` (1-based)
   */
  get lineNumber(): number {
    return this.currentLineNumber;
  }

  /**
   * Edit text line by line
   *
   * @param text - Text to edit
   * @returns Edited text, or undefined when the editor produced nothing
   */
  async edit(text: string): Promise<string | undefined> {
    this.currentLineNumber = 0;

    let output = '';
    let appended = false;

    for (const line of splitLines(text)) {
      this.currentLineNumber++;
      const replacement = await this.editLine(line);
      if (replacement !== undefined) {
        output += replacement + this.lineSeparator;
        appended = true;
      }
    }

    const replacement = await this.editLine(null);
    if (replacement !== undefined) {
      output += replacement;
      appended = true;
    }

    const edited = appended ? output : undefined;

    if (this.next && edited !== undefined) {
      return this.next.edit(edited);
    }

    return edited;
  }

  /**
   * Edit a single line
   *
   * @param line - Line to edit, or null at end of input
   * @returns Replacement for the line, or undefined to drop it
   */
  protected editLine(line: string | null): string | undefined | Promise<string | undefined> {
    return line ?? undefined;
  }
}
