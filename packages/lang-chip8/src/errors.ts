import {
  getErrorCatalogEntry,
  getUnknownErrorCatalogEntry,
  type ErrorCatalogEntry,
  type LangErrorCode,
  type NumericErrorCode
} from './error-catalog.js';

export type { ErrorCatalogEntry, LangErrorCode, NumericErrorCode } from './error-catalog.js';

export class LangToolError extends Error {
  readonly code: LangErrorCode;

  constructor(code: LangErrorCode, detail?: string) {
    super(detail ?? getErrorCatalogEntry(code).message);
    this.name = 'LangToolError';
    this.code = code;
  }

  getCatalogEntry(): ErrorCatalogEntry {
    return getErrorCatalogEntry(this.code);
  }

  getNumericCode(): NumericErrorCode {
    return this.getCatalogEntry().numericCode;
  }

  toDisplayString(): string {
    return `${this.message} (${this.getNumericCode()})`;
  }
}

// CLI や UI 表示向けに unknown を文字列化する共通入口。
export function asDisplayError(error: unknown): string {
  if (error instanceof LangToolError) {
    return error.toDisplayString();
  }
  const unknownEntry = getUnknownErrorCatalogEntry();
  if (error instanceof Error) {
    const message = error.message.length > 0 ? error.message : unknownEntry.message;
    return `${message} (${unknownEntry.numericCode})`;
  }
  return `${unknownEntry.message} (${unknownEntry.numericCode})`;
}
