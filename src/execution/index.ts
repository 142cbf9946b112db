/** Execution — chain executor and extraction contract */
export { ChainExecutor, isWritable } from './ChainExecutor.js';
export type { ChainExecutorOptions, ExecuteError } from './ChainExecutor.js';
export { found, notFound, errored } from './Extraction.js';
export type { Extraction, ExtractFn } from './Extraction.js';
