/**
 * Sequence Pattern
 * Splits filenames into prefix / frame digits / suffix and rebuilds them.
 */

import { SEQUENCE_DEFAULTS } from '../config/SequenceConfig';
import { getFileExtension } from '../utils/media/SupportedMediaFormats';
import { Logger } from '../utils/Logger';

const log = new Logger('SequencePattern');

export interface SequencePattern {
  /** Literal text before the frame field, e.g. "shot010_v02." */
  readonly prefix: string;
  /** Literal text after the frame field, extension included, e.g. ".exr" */
  readonly suffix: string;
  /** Digit count of the frame field ("0001" -> 4) */
  readonly padding: number;
}

export interface ParsedFilename {
  filename: string;
  pattern: SequencePattern;
  /** The frame field exactly as written */
  digits: string;
  frame: number;
}

export type PatternStyle = 'hash' | 'printf';

// Last run of ASCII digits, with no digit after it.
const LAST_DIGIT_RUN = /(\d+)(?=\D*$)/;

const NON_DIGIT = /\D/;

/**
 * Part of the filename the frame field is searched in: everything before
 * the last dot when the text after it is an extension (holds a non-digit),
 * otherwise the whole name. `cache.0001` keeps its trailing digits.
 */
function stemLength(filename: string): number {
  const dotIdx = filename.lastIndexOf('.');
  if (dotIdx > 0 && NON_DIGIT.test(filename.slice(dotIdx + 1))) {
    return dotIdx;
  }
  return filename.length;
}

/**
 * Parse a filename into its sequence pattern and frame number.
 * Returns null for names without a usable frame field.
 */
export function parseSequenceFilename(filename: string): ParsedFilename | null {
  const stemEnd = stemLength(filename);
  const match = LAST_DIGIT_RUN.exec(filename.slice(0, stemEnd));
  if (!match || match[1] === undefined) return null;

  const digits = match[1];
  if (digits.length > SEQUENCE_DEFAULTS.MAX_FRAME_DIGITS) {
    log.debug(`Ignoring "${filename}": ${digits.length}-digit frame field is too wide`);
    return null;
  }

  const start = match.index;
  const end = start + digits.length;
  return {
    filename,
    pattern: {
      prefix: filename.slice(0, start),
      suffix: filename.slice(end),
      padding: digits.length,
    },
    digits,
    frame: parseInt(digits, 10),
  };
}

/**
 * Grouping identity of a pattern. JSON encoding keeps prefixes and suffixes
 * containing any separator from colliding.
 */
export function patternKey(pattern: SequencePattern): string {
  return JSON.stringify([pattern.prefix, pattern.suffix, pattern.padding]);
}

export function patternsEqual(a: SequencePattern, b: SequencePattern): boolean {
  return a.prefix === b.prefix && a.suffix === b.suffix && a.padding === b.padding;
}

/**
 * Zero-pad a frame number to the pattern width.
 * Frames wider than the padding keep all their digits.
 */
export function padFrame(frame: number, padding: number): string {
  return String(frame).padStart(padding, '0');
}

export function formatFrameFilename(pattern: SequencePattern, frame: number): string {
  return pattern.prefix + padFrame(frame, pattern.padding) + pattern.suffix;
}

/**
 * Render the pattern with a placeholder frame field:
 * 'hash' -> "render.####.exr", 'printf' -> "render.%04d.exr".
 */
export function formatPatternString(pattern: SequencePattern, style: PatternStyle = 'hash'): string {
  const field =
    style === 'printf'
      ? `%0${pattern.padding}d`
      : SEQUENCE_DEFAULTS.HASH_CHAR.repeat(pattern.padding);
  return pattern.prefix + field + pattern.suffix;
}

/** File extension carried by the pattern's suffix ('' when none). */
export function patternExtension(pattern: SequencePattern): string {
  return getFileExtension(pattern.suffix);
}
