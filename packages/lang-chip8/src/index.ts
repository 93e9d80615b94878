// lang-chip8 パッケージの公開 API 入口。
export * from './classifier.js';
export * from './cursor.js';
export * from './error-catalog.js';
export * from './errors.js';
export * from './format.js';
export * from './indenter.js';
export * from './options.js';
export * from './types.js';
export * from './vocabulary.js';
