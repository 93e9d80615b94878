import type { LabelMatch, SourceToken, Token, TokenCategory, TokenizeOptions } from './types.js';
import { isOperation, isPseudoOperation, isRegister } from './vocabulary.js';

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
const LABEL_PATTERN = /^\s*([A-Za-z_][A-Za-z0-9_]*):/;
const DECIMAL_PATTERN = /^[0-9]+$/;
const HEX_PATTERN = /^#[0-9A-Fa-f]+$/;
const BINARY_PATTERN = /^\$[01]+$/;

function isWordChar(ch: string | undefined): boolean {
  return ch !== undefined && /[A-Za-z0-9_]/.test(ch);
}

// 行頭 (空白のみ許容) の `name:` を label とみなす。
export function matchLabel(line: string): LabelMatch | undefined {
  const match = LABEL_PATTERN.exec(line);
  if (!match) {
    return undefined;
  }
  const name = match[1] ?? '';
  const end = match[0].length;
  return { name, start: end - 1 - name.length, end };
}

// `\;` はコメント開始として扱わない。
export function findCommentStart(line: string): number {
  for (let i = 0; i < line.length; i += 1) {
    if (line[i] === ';' && line[i - 1] !== '\\') {
      return i;
    }
  }
  return -1;
}

export function isNumberLiteral(word: string): boolean {
  return DECIMAL_PATTERN.test(word) || HEX_PATTERN.test(word) || BINARY_PATTERN.test(word);
}

// label 以外のカテゴリを優先順位どおりに判定する。
export function classifyWord(word: string): Exclude<TokenCategory, 'label' | 'comment'> | undefined {
  const identifierShaped = IDENTIFIER_PATTERN.test(word);
  if (identifierShaped && isOperation(word)) {
    return 'operation';
  }
  if (identifierShaped && isPseudoOperation(word)) {
    return 'pseudo-operation';
  }
  if (isNumberLiteral(word)) {
    return 'number';
  }
  if (identifierShaped && isRegister(word)) {
    return 'register';
  }
  return identifierShaped ? 'identifier' : undefined;
}

function readWord(line: string, from: number, limit: number): number {
  let end = from;
  while (end < limit && isWordChar(line[end])) {
    end += 1;
  }
  return end;
}

export function* tokenizeLine(line: string, options: TokenizeOptions = {}): Generator<Token, void, undefined> {
  const commentStart = findCommentStart(line);
  const codeEnd = commentStart < 0 ? line.length : commentStart;
  let index = 0;

  const label = matchLabel(line);
  if (label) {
    yield { category: 'label', start: label.start, end: label.end - 1, text: label.name };
    index = label.end;
  }

  while (index < codeEnd) {
    const ch = line[index] ?? '';

    if (ch === '#' || ch === '$') {
      const end = readWord(line, index + 1, codeEnd);
      const text = line.slice(index, end);
      if (isNumberLiteral(text)) {
        yield { category: 'number', start: index, end, text };
        index = end;
        continue;
      }
      // 接頭辞だけ読み飛ばし、続く語は通常の語として扱う。
      index += 1;
      continue;
    }

    if (isWordChar(ch)) {
      const end = readWord(line, index, codeEnd);
      const text = line.slice(index, end);
      const category = classifyWord(text);
      if (category !== undefined) {
        yield { category, start: index, end, text };
      }
      index = end;
      continue;
    }

    index += 1;
  }

  if (options.comments && commentStart >= 0) {
    yield { category: 'comment', start: commentStart, end: line.length, text: line.slice(commentStart) };
  }
}

export function* tokenizeSource(source: string, options: TokenizeOptions = {}): Generator<SourceToken, void, undefined> {
  const lines = source.split(/\r?\n/);
  for (let line = 0; line < lines.length; line += 1) {
    for (const token of tokenizeLine(lines[line] ?? '', options)) {
      yield { ...token, line };
    }
  }
}
