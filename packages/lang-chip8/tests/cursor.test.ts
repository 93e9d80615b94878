import { describe, expect, it } from 'vitest';

import { analyzeLine, firstNonBlankColumn, instructionColumn, smartHome } from '../src/index.js';

describe('cursor positioning', () => {
  it('finds the instruction column past the label', () => {
    expect(instructionColumn('loop:   JP loop')).toBe(8);
    expect(instructionColumn('   CLS')).toBe(3);
    expect(instructionColumn('loop:')).toBe(5);
    expect(instructionColumn('')).toBe(0);
    expect(firstNonBlankColumn('  loop: CLS')).toBe(2);
  });

  it('toggles between the instruction column and the first non-blank column', () => {
    const line = '  loop:  CLS';
    expect(smartHome(line, 0)).toBe(9);
    expect(smartHome(line, 9)).toBe(2);
    expect(smartHome(line, 2)).toBe(9);
  });

  it('is idempotent when the instruction is already leftmost', () => {
    expect(smartHome('    CLS', 0)).toBe(4);
    expect(smartHome('    CLS', 4)).toBe(4);
  });

  it('summarises a line', () => {
    expect(analyzeLine('loop: CLS')).toEqual({
      text: 'loop: CLS',
      label: 'loop',
      instructionColumn: 6,
      sectionComment: false
    });
    expect(analyzeLine(';;; sprites')).toEqual({
      text: ';;; sprites',
      instructionColumn: 0,
      sectionComment: true
    });
  });
});
