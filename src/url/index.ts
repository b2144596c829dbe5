export type { ParsedUrl } from './parser.js';
export { STORAGE_URL_PREFIXES, canHandleStorageUrl, parseStorageUrl, formatContainerUrl } from './parser.js';
