import { LangToolError } from './errors.js';
import type { LangOptions } from './types.js';

export const DEFAULT_INSTRUCTION_COLUMN = 8;
export const MAX_INSTRUCTION_COLUMN = 80;

export const DEFAULT_OPTIONS: Readonly<LangOptions> = Object.freeze({
  instructionColumn: DEFAULT_INSTRUCTION_COLUMN
});

export function resolveOptions(options: Partial<LangOptions> = {}): LangOptions {
  const instructionColumn = options.instructionColumn ?? DEFAULT_INSTRUCTION_COLUMN;
  if (
    !Number.isInteger(instructionColumn) ||
    instructionColumn < 0 ||
    instructionColumn > MAX_INSTRUCTION_COLUMN
  ) {
    throw new LangToolError(
      'BAD_OPTION',
      `instructionColumn must be an integer between 0 and ${MAX_INSTRUCTION_COLUMN}: ${String(instructionColumn)}`
    );
  }
  return { instructionColumn };
}
