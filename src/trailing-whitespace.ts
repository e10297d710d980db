/**
 * Editor removing trailing whitespace from every line
 */

import { LineEditor } from './line-editor.js';

const TRAILING_WHITESPACE_PATTERN = /\s+$/;

export class TrailingWhitespaceEditor extends LineEditor {
  protected override editLine(line: string | null): string | undefined {
    return line === null ? undefined : line.replace(TRAILING_WHITESPACE_PATTERN, '');
  }
}
