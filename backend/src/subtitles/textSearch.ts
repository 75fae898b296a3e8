import { Position } from './types';

/**
 * Regex scanning helpers over raw document text. Patterns are passed as
 * sources and compiled once per flag set; every search sets `lastIndex`
 * explicitly, so sharing the compiled objects is safe.
 */

/** Sources built from cue ids and times vary per call, so the cache is bounded */
export const MAX_COMPILED_PATTERNS = 256;

// Insertion order doubles as recency: a hit moves the entry to the end
const compiled = new Map<string, RegExp>();

function compile(source: string, flags: string): RegExp {
  const key = `${flags}/${source}`;
  let regex = compiled.get(key);
  if (regex) {
    compiled.delete(key);
  } else {
    regex = new RegExp(source, flags);
  }
  compiled.set(key, regex);

  if (compiled.size > MAX_COMPILED_PATTERNS) {
    const oldest = compiled.keys().next();
    if (!oldest.done) compiled.delete(oldest.value);
  }
  return regex;
}

/** Number of compiled patterns currently cached */
export function compiledPatternCount(): number {
  return compiled.size;
}

/** Escapes a literal string for use inside a pattern */
export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Matches `source` exactly at `pos` */
export function lookingAt(text: string, source: string, pos: Position): RegExpExecArray | null {
  const regex = compile(source, 'yd');
  regex.lastIndex = pos;
  return regex.exec(text);
}

/** Finds the first match starting at or after `from` */
export function searchForward(text: string, source: string, from: Position): RegExpExecArray | null {
  const regex = compile(source, 'gd');
  regex.lastIndex = from;
  return regex.exec(text);
}

/**
 * Tries every start offset from `origin` down to 0 and returns the first
 * match `accept` agrees with. By default a match must end at or before
 * `origin`.
 */
export function searchBackward(
  text: string,
  source: string,
  origin: Position,
  accept: (match: RegExpExecArray) => boolean = (match) => matchEnd(match) <= origin
): RegExpExecArray | null {
  const regex = compile(source, 'yd');
  for (let start = Math.min(origin, text.length); start >= 0; start--) {
    regex.lastIndex = start;
    const match = regex.exec(text);
    if (match && accept(match)) {
      return match;
    }
  }
  return null;
}

/** Start offset of a named group, or null if it did not participate */
export function groupStart(match: RegExpExecArray, name: string): Position | null {
  const range = match.indices?.groups?.[name];
  return range ? range[0] : null;
}

/** Offset just after the end of the match */
export function matchEnd(match: RegExpExecArray): Position {
  return match.index + match[0].length;
}

/** Offset of the newline ending the line at `pos`, or the text length */
export function lineEnd(text: string, pos: Position): Position {
  const newline = text.indexOf('\n', pos);
  return newline === -1 ? text.length : newline;
}

/** Start of the following line, or the text length on the last line */
export function nextLineStart(text: string, pos: Position): Position {
  const newline = text.indexOf('\n', pos);
  return newline === -1 ? text.length : newline + 1;
}
