// 設定と CLI の入出力で使うエラーコード定義。
export type LangErrorCode = 'BAD_OPTION' | 'READ_FAILED' | 'WRITE_FAILED' | 'UNFORMATTED';

export type NumericErrorCode = `E${string}`;

export interface ErrorCatalogEntry {
  code?: LangErrorCode;
  numericCode: NumericErrorCode;
  message: string;
}

export const ERROR_CATALOG: readonly ErrorCatalogEntry[] = [
  { code: 'BAD_OPTION', numericCode: 'E01', message: 'BAD OPTION' },
  { code: 'READ_FAILED', numericCode: 'E02', message: 'READ FAILED' },
  { code: 'WRITE_FAILED', numericCode: 'E03', message: 'WRITE FAILED' },
  { code: 'UNFORMATTED', numericCode: 'E04', message: 'NOT FORMATTED' },

  { numericCode: 'E99', message: 'UNKNOWN' }
];

const UNKNOWN_ENTRY: ErrorCatalogEntry = ERROR_CATALOG.find((entry) => entry.numericCode === 'E99') ?? {
  numericCode: 'E99',
  message: 'UNKNOWN'
};

const ENTRY_BY_CODE = new Map<LangErrorCode, ErrorCatalogEntry>();
for (const entry of ERROR_CATALOG) {
  if (entry.code !== undefined) {
    ENTRY_BY_CODE.set(entry.code, entry);
  }
}

export function getErrorCatalogEntry(code: LangErrorCode): ErrorCatalogEntry {
  return ENTRY_BY_CODE.get(code) ?? UNKNOWN_ENTRY;
}

export function getUnknownErrorCatalogEntry(): ErrorCatalogEntry {
  return UNKNOWN_ENTRY;
}
