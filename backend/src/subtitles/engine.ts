import { createAssEngine } from './ass';
import { withCommonOperations } from './common';
import { createSrtEngine } from './srt';
import { EngineOptions, SubtitleEngine, SubtitleFormat } from './types';
import { createVttEngine } from './vtt';

export const DEFAULT_CUE_LENGTH = 1000;

/**
 * Factory function to create the engine for a subtitle format
 */
export function createEngine(format: SubtitleFormat, options: Partial<EngineOptions> = {}): SubtitleEngine {
  const resolved: EngineOptions = {
    defaultCueLength: options.defaultCueLength ?? DEFAULT_CUE_LENGTH,
  };

  switch (format) {
    case 'vtt':
      return withCommonOperations(createVttEngine(resolved));
    case 'srt':
      return withCommonOperations(createSrtEngine(resolved));
    case 'ass':
      return withCommonOperations(createAssEngine(resolved));
    default:
      throw new Error(`Unknown subtitle format: ${String(format)}`);
  }
}

export function isSubtitleFormat(value: unknown): value is SubtitleFormat {
  return value === 'vtt' || value === 'srt' || value === 'ass';
}

/**
 * Guesses the format from a file extension, then from the content.
 * Returns null when neither is conclusive.
 */
export function detectFormat(fileName?: string, content?: string): SubtitleFormat | null {
  const extension = fileName?.toLowerCase().match(/\.([a-z]+)$/)?.[1];
  if (extension === 'ssa') return 'ass';
  if (isSubtitleFormat(extension)) return extension;

  if (content === undefined) return null;
  const head = content.replace(/^\uFEFF/, '').trimStart();
  if (head.startsWith('WEBVTT')) return 'vtt';
  if (head.startsWith('[Script Info]') || /^Dialogue:/m.test(head)) return 'ass';
  if (/^\d+[ \t]*\r?\n\d+:\d+:\d+,\d+[ \t]*-->/.test(head)) return 'srt';
  if (/^(?:\d+:)?\d+:\d+\.\d+[ \t]*-->/m.test(head)) return 'vtt';
  return null;
}
