/**
 * Tests for tree-reader.ts and section.ts
 */

import * as fs from 'fs';
import * as path from 'path';
import { outlineSections, readSectionTree, SectionTreeReader } from '../src/tree-reader';
import { UnterminatedSectionError } from '../src/types';

const NESTED = fs.readFileSync(
  path.resolve(__dirname, 'fixtures', 'sections', 'nested.txt'),
  'utf8'
);

describe('tree-reader', () => {
  describe('readSectionTree', () => {
    it('should build the tree in document order', async () => {
      const root = await readSectionTree('a\nSECTION-START[X]\nb\nSECTION-END\nc\n', {
        lineSeparator: '\n',
      });

      expect(root.isAnonymous).toBe(true);
      expect(root.headContent).toBe('a\n');
      expect(root.tailContent).toBe('c\n');
      expect(root.children).toHaveLength(1);

      const x = root.children[0];
      expect(x.name).toBe('X');
      expect(x.startingLine).toBe('SECTION-START[X]');
      expect(x.endingLine).toBe('SECTION-END');
      expect(x.headContent).toBe('b\n');
      expect(x.tailContent).toBe('');
    });

    it('should keep text between siblings in a wrapper', async () => {
      const root = await readSectionTree(
        'SECTION-START[1]\nSECTION-END\nbetween\nSECTION-START[2]\nSECTION-END\n',
        { lineSeparator: '\n' }
      );

      expect(root.children).toHaveLength(2);
      const wrapper = root.children[1];
      expect(wrapper.isAnonymous).toBe(true);
      expect(wrapper.headContent).toBe('between\n');
      expect(wrapper.children.map((child) => child.name)).toEqual(['2']);
    });

    it('should put text after the first child in the tail', async () => {
      const root = await readSectionTree(
        'SECTION-START[p]\nhead\nSECTION-START[c]\nSECTION-END\ntail\nSECTION-END\n',
        { lineSeparator: '\n' }
      );

      const p = root.children[0];
      expect(p.headContent).toBe('head\n');
      expect(p.tailContent).toBe('tail\n');
      expect(p.children.map((child) => child.name)).toEqual(['c']);
    });

    it('should reject an invalid structure', async () => {
      await expect(readSectionTree('SECTION-START[X]\n')).rejects.toThrow(UnterminatedSectionError);
    });
  });

  describe('SectionTreeReader', () => {
    it('should have no root before the first edit', () => {
      expect(new SectionTreeReader().root).toBeUndefined();
    });

    it('should pass the text through unchanged', async () => {
      const reader = new SectionTreeReader({ lineSeparator: '\n' });

      expect(await reader.edit(NESTED)).toBe(NESTED);
      expect(reader.root?.findSection('1.2')?.name).toBe('1.2');
    });
  });

  describe('outlineSections', () => {
    it('should list named sections without wrappers', async () => {
      const root = await readSectionTree(NESTED, { lineSeparator: '\n' });

      expect(outlineSections(root)).toEqual([
        {
          name: '1',
          children: [
            { name: '1.1', children: [] },
            { name: '1.2', children: [] },
          ],
        },
        { name: '2', children: [] },
      ]);
    });

    it('should return an empty outline for plain text', async () => {
      const root = await readSectionTree('just text\n', { lineSeparator: '\n' });

      expect(outlineSections(root)).toEqual([]);
    });
  });

  describe('Section.findSection', () => {
    it('should find nested sections depth-first', async () => {
      const root = await readSectionTree(
        'SECTION-START[a]\nSECTION-START[dup]\nfirst\nSECTION-END\nSECTION-END\n' +
          'SECTION-START[dup]\nsecond\nSECTION-END\n',
        { lineSeparator: '\n' }
      );

      expect(root.findSection('dup')?.headContent).toBe('first\n');
      expect(root.findSection('missing')).toBeUndefined();
    });
  });
});
