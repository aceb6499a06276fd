export { ArrayLineSource } from './array-line-source.js';
export { StreamLineSource, FileLineSource } from './stream-line-source.js';
