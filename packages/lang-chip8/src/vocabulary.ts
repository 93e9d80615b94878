// Chip-8 / SUPER-CHIP の命令ニーモニック。
export const CHIP8_OPERATIONS = [
  'ADD',
  'AND',
  'CALL',
  'CLS',
  'DRW',
  'EXIT',
  'HIGH',
  'JP',
  'LD',
  'LOW',
  'OR',
  'RET',
  'RND',
  'SCD',
  'SCL',
  'SCR',
  'SE',
  'SHL',
  'SHR',
  'SKNP',
  'SKP',
  'SNE',
  'SUB',
  'SUBN',
  'SYS',
  'XOR'
] as const;

// アセンブラ指令。機械語には対応しない。
export const CHIP8_PSEUDO_OPERATIONS = [
  'ALIGN',
  'BYTE',
  'DB',
  'DEFINE',
  'DS',
  'DW',
  'ELSE',
  'ENDIF',
  'EQU',
  'IFDEF',
  'IFNDEF',
  'INCLUDE',
  'OPTION',
  'ORG',
  'TEXT',
  'VAR',
  'WORD'
] as const;

const V_REGISTERS = Array.from({ length: 16 }, (_, index) => `V${index.toString(16).toUpperCase()}`);

export const CHIP8_REGISTERS: readonly string[] = [...V_REGISTERS, 'DT', 'ST', 'I', 'F', 'HF'];

export type Chip8Operation = (typeof CHIP8_OPERATIONS)[number];
export type Chip8PseudoOperation = (typeof CHIP8_PSEUDO_OPERATIONS)[number];

// 照合は大文字へ正規化したキーで行う。
const OPERATION_SET: ReadonlySet<string> = new Set(CHIP8_OPERATIONS);
const PSEUDO_OPERATION_SET: ReadonlySet<string> = new Set(CHIP8_PSEUDO_OPERATIONS);
const REGISTER_SET: ReadonlySet<string> = new Set(CHIP8_REGISTERS);

export function isOperation(word: string): boolean {
  return OPERATION_SET.has(word.toUpperCase());
}

export function isPseudoOperation(word: string): boolean {
  return PSEUDO_OPERATION_SET.has(word.toUpperCase());
}

export function isRegister(word: string): boolean {
  return REGISTER_SET.has(word.toUpperCase());
}
