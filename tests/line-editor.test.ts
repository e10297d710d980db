/**
 * Tests for line-editor.ts and trailing-whitespace.ts
 */

import * as os from 'os';
import { LineEditor, splitLines } from '../src/line-editor';
import { TrailingWhitespaceEditor } from '../src/trailing-whitespace';

class NullEditor extends LineEditor {
  protected override editLine(): undefined {
    return undefined;
  }
}

class UpperCaseEditor extends LineEditor {
  protected override async editLine(line: string | null): Promise<string | undefined> {
    return line?.toUpperCase();
  }
}

describe('line-editor', () => {
  describe('splitLines', () => {
    it('should treat the empty string as one empty line', () => {
      expect(splitLines('')).toEqual(['']);
    });

    it('should not create a line after a final terminator', () => {
      expect(splitLines('a\nb\n')).toEqual(['a', 'b']);
      expect(splitLines('\n')).toEqual(['']);
    });

    it('should keep a last line without terminator', () => {
      expect(splitLines('a\nb')).toEqual(['a', 'b']);
    });

    it('should split on CRLF, CR and LF', () => {
      expect(splitLines('a\r\nb\rc\nd')).toEqual(['a', 'b', 'c', 'd']);
    });

    it('should keep empty lines in the middle', () => {
      expect(splitLines('a\n\n\nb\n')).toEqual(['a', '', '', 'b']);
    });
  });

  describe('LineEditor', () => {
    it('should default the separator to the platform newline', () => {
      expect(new LineEditor().lineSeparator).toBe(os.EOL);
    });

    it('should return the separator for empty input', async () => {
      const editor = new LineEditor({ lineSeparator: '\n' });

      expect(await editor.edit('')).toBe('\n');
      expect(editor.lineNumber).toBe(1);
    });

    it('should terminate a last line without separator', async () => {
      const editor = new LineEditor({ lineSeparator: '\n' });

      expect(await editor.edit('NO LINE SEPARATOR')).toBe('NO LINE SEPARATOR\n');
      expect(editor.lineNumber).toBe(1);
    });

    it('should treat a lone separator as one empty line', async () => {
      const editor = new LineEditor({ lineSeparator: '\n' });

      expect(await editor.edit('\n')).toBe('\n');
      expect(editor.lineNumber).toBe(1);
    });

    it('should normalize line separators', async () => {
      const editor = new LineEditor({ lineSeparator: '\r\n' });

      expect(await editor.edit('a\nb\rc\r\n')).toBe('a\r\nb\r\nc\r\n');
      expect(editor.lineNumber).toBe(3);
    });

    it('should reset the line number on every call', async () => {
      const editor = new LineEditor({ lineSeparator: '\n' });

      await editor.edit('a\nb\nc\n');
      expect(editor.lineNumber).toBe(3);

      await editor.edit('a\n');
      expect(editor.lineNumber).toBe(1);
    });

    it('should await asynchronous line edits', async () => {
      const editor = new UpperCaseEditor({ lineSeparator: '\n' });

      expect(await editor.edit('one\ntwo\n')).toBe('ONE\nTWO\n');
    });

    it('should return undefined when nothing was produced', async () => {
      const editor = new NullEditor({ lineSeparator: '\n' });

      expect(await editor.edit('a\nb\n')).toBeUndefined();
      expect(editor.lineNumber).toBe(2);
    });
  });

  describe('chaining', () => {
    it('should feed the output to the next editor', async () => {
      const editor = new UpperCaseEditor({
        lineSeparator: '\n',
        next: new TrailingWhitespaceEditor({ lineSeparator: '\n' }),
      });

      expect(await editor.edit('a  \nb\t\n')).toBe('A\nB\n');
    });

    it('should return the chained editor result', async () => {
      const chained = new LineEditor({ lineSeparator: '\n', next: new NullEditor() });

      expect(await chained.edit('')).toBeUndefined();
      expect(chained.lineNumber).toBe(1);
      expect(await chained.edit('NO LINE SEPARATOR')).toBeUndefined();
      expect(chained.lineNumber).toBe(1);
    });

    it('should not call the next editor when nothing was produced', async () => {
      const next = new UpperCaseEditor({ lineSeparator: '\n' });
      const edit = jest.spyOn(next, 'edit');
      const editor = new NullEditor({ lineSeparator: '\n', next });

      expect(await editor.edit('a\n')).toBeUndefined();
      expect(edit).not.toHaveBeenCalled();
    });
  });

  describe('TrailingWhitespaceEditor', () => {
    const editor = new TrailingWhitespaceEditor({ lineSeparator: '\n' });

    it('should reduce whitespace-only lines to empty lines', async () => {
      expect(await editor.edit('\t     ')).toBe('\n');
      expect(await editor.edit('\t     \n')).toBe('\n');
    });

    it('should keep leading and interior whitespace', async () => {
      expect(await editor.edit('   X ')).toBe('   X\n');
      expect(await editor.edit('a  b\t\n')).toBe('a  b\n');
    });
  });
});
