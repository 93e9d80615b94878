import { matchLabel } from './classifier.js';
import { instructionColumn } from './cursor.js';
import { indentLine } from './indenter.js';
import { resolveOptions } from './options.js';
import type { CursorEdit, LangOptions } from './types.js';

// 改行コード (\n / \r\n) は入力のまま残す。
export function formatSource(source: string, options: Partial<LangOptions> = {}): string {
  const resolved = resolveOptions(options);
  return source
    .split(/(\r?\n)/)
    .map((part, index) => (index % 2 === 1 ? part : indentLine(part, resolved)))
    .join('');
}

// 整形で内容が変わる行番号 (1 始まり)。
export function findUnformattedLines(source: string, options: Partial<LangOptions> = {}): number[] {
  const resolved = resolveOptions(options);
  const changed: number[] = [];
  source.split(/\r?\n/).forEach((line, index) => {
    if (indentLine(line, resolved) !== line) {
      changed.push(index + 1);
    }
  });
  return changed;
}

export function indentAtCursor(line: string, cursor: number, options: Partial<LangOptions> = {}): CursorEdit {
  const text = indentLine(line, options);
  const at = Math.min(Math.max(cursor, 0), line.length);
  const oldStart = instructionColumn(line);
  const newStart = instructionColumn(text);
  const label = matchLabel(line);

  if (label && at >= label.start && at <= label.end) {
    // label は 0 桁目へ移るので、label 内の相対位置を保つ。
    return { text, cursor: at - label.start };
  }
  if (at < oldStart) {
    return { text, cursor: newStart };
  }
  return { text, cursor: Math.min(newStart + (at - oldStart), text.length) };
}
