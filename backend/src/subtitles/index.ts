export * from './types';
export * from './errors';
export { SubtitleDocument } from './document';
export { timestampCodec, timestampToMs, msToTimestamp } from './timestamps';
export { patternSet } from './patterns';
export { createEngine, detectFormat, isSubtitleFormat, DEFAULT_CUE_LENGTH } from './engine';
