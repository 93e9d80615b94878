import { describe, expect, it } from 'vitest';

import { findUnformattedLines, formatSource, indentAtCursor } from '../src/index.js';

describe('source formatting', () => {
  it('formats every line and keeps line terminators', () => {
    expect(formatSource('start: CLS\r\nJP start\n')).toBe('start:  CLS\r\n        JP start\n');
  });

  it('reports the lines that would change', () => {
    expect(findUnformattedLines('start:  CLS\nJP start\n   ;;; x')).toEqual([2, 3]);
    expect(findUnformattedLines(formatSource('a: CLS\n b:\nRET'))).toEqual([]);
  });
});

describe('indentAtCursor', () => {
  it('moves a cursor in the indentation to the instruction column', () => {
    expect(indentAtCursor('   CLS', 0)).toEqual({ text: '        CLS', cursor: 8 });
  });

  it('keeps the cursor position inside the instruction', () => {
    expect(indentAtCursor('   CLS', 5)).toEqual({ text: '        CLS', cursor: 10 });
    expect(indentAtCursor('loop:CLS', 8)).toEqual({ text: 'loop:   CLS', cursor: 11 });
  });

  it('keeps the cursor position inside the label', () => {
    expect(indentAtCursor('  loop: CLS', 4)).toEqual({ text: 'loop:   CLS', cursor: 2 });
  });
});
