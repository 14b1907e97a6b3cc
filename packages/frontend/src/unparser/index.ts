export { Unparser, quoteString, unparse, type RenderMode, type UnparseOptions } from './unparser';
