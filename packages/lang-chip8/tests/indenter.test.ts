import { describe, expect, it } from 'vitest';

import { indentLine, LangToolError } from '../src/index.js';

describe('indenter', () => {
  it('pads the instruction to the configured column after a short label', () => {
    expect(indentLine('loop: JP loop')).toBe('loop:   JP loop');
    expect(indentLine('\t  loop:\tCLS')).toBe('loop:   CLS');
  });

  it('leaves one space after a label that reaches the column', () => {
    expect(indentLine('verylonglabel: ADD V0, V1')).toBe('verylonglabel: ADD V0, V1');
    expect(indentLine('abcdefg:CLS')).toBe('abcdefg: CLS');
  });

  it('indents unlabelled instructions and plain comments', () => {
    expect(indentLine('JP loop')).toBe('        JP loop');
    expect(indentLine('  ; note')).toBe('        ; note');
  });

  it('moves section comments to column 0', () => {
    expect(indentLine('   ;;; header')).toBe(';;; header');
    expect(indentLine(';;;; banner')).toBe(';;;; banner');
  });

  it('handles lines without instruction content', () => {
    expect(indentLine('  loop:   ')).toBe('loop:');
    expect(indentLine('   ')).toBe('   ');
    expect(indentLine('')).toBe('');
  });

  it('honours a custom instruction column', () => {
    expect(indentLine('CLS', { instructionColumn: 4 })).toBe('    CLS');
    expect(indentLine('loop: JP loop', { instructionColumn: 4 })).toBe('loop: JP loop');
    expect(indentLine('  CLS', { instructionColumn: 0 })).toBe('CLS');
  });

  it('is a fixed point on its own output', () => {
    const lines = [
      'loop: JP loop',
      'verylonglabel: ADD V0, V1',
      '   ;;; header',
      '  start:',
      '\tLD I, sprite ; load',
      '   ',
      'x:y'
    ];
    for (const line of lines) {
      const once = indentLine(line);
      expect(indentLine(once)).toBe(once);
    }
  });

  it('rejects an invalid column', () => {
    expect(() => indentLine('CLS', { instructionColumn: -1 })).toThrowError(LangToolError);
    expect(() => indentLine('CLS', { instructionColumn: 1.5 })).toThrowError(/instructionColumn/);
  });
});
