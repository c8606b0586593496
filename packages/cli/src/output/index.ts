export { Reporter, createColorFns } from './reporter.js';
export type { ReporterOptions, ColorFn, ColorFunctions } from './types.js';
