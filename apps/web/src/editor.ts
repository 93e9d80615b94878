import { indentAtCursor, smartHome, type LangOptions } from '@chip8asm/lang-chip8';

export interface EditorState {
  value: string;
  cursor: number;
}

export interface LineLocation {
  start: number;
  end: number;
  text: string;
  column: number;
}

// textarea の値は \n 区切りに正規化されている前提。
export function locateLine(value: string, offset: number): LineLocation {
  const start = offset === 0 ? 0 : value.lastIndexOf('\n', offset - 1) + 1;
  const newline = value.indexOf('\n', offset);
  const end = newline < 0 ? value.length : newline;
  return { start, end, text: value.slice(start, end), column: offset - start };
}

export function reindentAt(state: EditorState, options: Partial<LangOptions> = {}): EditorState {
  const line = locateLine(state.value, state.cursor);
  const edit = indentAtCursor(line.text, line.column, options);
  return {
    value: state.value.slice(0, line.start) + edit.text + state.value.slice(line.end),
    cursor: line.start + edit.cursor
  };
}

export function smartHomeAt(state: EditorState): EditorState {
  const line = locateLine(state.value, state.cursor);
  return { value: state.value, cursor: line.start + smartHome(line.text, line.column) };
}
