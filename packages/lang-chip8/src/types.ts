export type TokenCategory =
  | 'label'
  | 'operation'
  | 'pseudo-operation'
  | 'register'
  | 'number'
  | 'identifier'
  | 'comment';

export interface Token {
  category: TokenCategory;
  start: number;
  end: number;
  text: string;
}

export interface SourceToken extends Token {
  line: number;
}

export interface TokenizeOptions {
  comments?: boolean;
}

export interface LabelMatch {
  name: string;
  start: number;
  // コロンの直後の位置。
  end: number;
}

export interface LineAnalysis {
  text: string;
  label?: string;
  instructionColumn: number;
  sectionComment: boolean;
}

export interface LangOptions {
  instructionColumn: number;
}

export interface CursorEdit {
  text: string;
  cursor: number;
}
