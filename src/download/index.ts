export type { ChunkRange } from './range.js';
export { RangeDownloader, calculateRanges } from './range.js';
