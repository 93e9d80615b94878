import { matchLabel } from './classifier.js';
import { isSectionComment } from './indenter.js';
import type { LineAnalysis } from './types.js';

function firstNonBlankFrom(line: string, from: number): number {
  for (let i = from; i < line.length; i += 1) {
    if (!/\s/.test(line[i] ?? '')) {
      return i;
    }
  }
  return line.length;
}

export function firstNonBlankColumn(line: string): number {
  return firstNonBlankFrom(line, 0);
}

// label とコロン、続く空白を飛ばした最初の桁。
export function instructionColumn(line: string): number {
  const label = matchLabel(line);
  return firstNonBlankFrom(line, label ? label.end : 0);
}

export function smartHome(line: string, cursor: number): number {
  const target = instructionColumn(line);
  if (cursor === target) {
    return firstNonBlankColumn(line);
  }
  return target;
}

export function analyzeLine(line: string): LineAnalysis {
  const label = matchLabel(line);
  const analysis: LineAnalysis = {
    text: line,
    instructionColumn: instructionColumn(line),
    sectionComment: isSectionComment(line)
  };
  if (label) {
    analysis.label = label.name;
  }
  return analysis;
}
