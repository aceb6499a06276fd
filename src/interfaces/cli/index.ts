export { buildProgram } from './program.js';
export type { CliDeps } from './program.js';
