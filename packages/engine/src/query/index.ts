export { QueryCompiler, compileQuery, resolveRows, readPages } from './query-compiler.js';
export type { CompileOptions, PageCursor, ReadPagesOptions } from './query-compiler.js';
