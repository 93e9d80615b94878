import { matchLabel } from './classifier.js';
import { resolveOptions } from './options.js';
import type { LangOptions } from './types.js';

export const SECTION_COMMENT_MARKER = ';;;';

export function isSectionComment(line: string): boolean {
  return line.trimStart().startsWith(SECTION_COMMENT_MARKER);
}

// 1 行を正規の字下げへ整形する。前後の行は参照しない。
export function indentLine(line: string, options: Partial<LangOptions> = {}): string {
  const { instructionColumn } = resolveOptions(options);

  if (isSectionComment(line)) {
    return line.trimStart();
  }

  const label = matchLabel(line);
  const head = label ? `${label.name}:` : '';
  const instruction = line.slice(label ? label.end : 0).trimStart();

  if (instruction.length === 0) {
    return label ? head : line;
  }

  // label が桁位置を越える場合は空白 1 つだけ空ける。
  const column = label ? Math.max(instructionColumn, head.length + 1) : instructionColumn;
  return head.padEnd(column, ' ') + instruction;
}
