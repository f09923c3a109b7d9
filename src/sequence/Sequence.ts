/**
 * Sequence
 * One numbered file sequence: a pattern, the directory it lives in, and the
 * frame numbers observed there. Immutable once built.
 */

import { join } from 'path';
import { SEQUENCE_DEFAULTS } from '../config/SequenceConfig';
import { InvalidArgumentError } from '../core/errors';
import { Logger } from '../utils/Logger';
import {
  formatFrameFilename,
  formatPatternString,
  parseSequenceFilename,
  patternExtension,
  patternsEqual,
  type SequencePattern,
} from './SequencePattern';

const log = new Logger('Sequence');

export interface FrameRange {
  start: number;
  end: number;
}

export interface SequenceSnapshot {
  pattern: SequencePattern;
  directory: string;
  frames: number[];
}

function assertInteger(name: string, value: number): void {
  if (!Number.isSafeInteger(value)) {
    throw new InvalidArgumentError(`${name} must be an integer, got ${value}`);
  }
}

export class Sequence {
  readonly pattern: SequencePattern;
  readonly directory: string;
  private readonly _frames: readonly number[];
  private readonly _frameSet: ReadonlySet<number>;

  constructor(pattern: SequencePattern, directory: string, frames: Iterable<number>) {
    if (!Number.isInteger(pattern.padding) || pattern.padding < 1) {
      throw new InvalidArgumentError(`padding must be a positive integer, got ${pattern.padding}`);
    }
    const frameSet = new Set<number>();
    for (const frame of frames) {
      if (!Number.isSafeInteger(frame) || frame < 0) {
        throw new InvalidArgumentError(`frame numbers must be non-negative integers, got ${frame}`);
      }
      frameSet.add(frame);
    }

    this.pattern = { prefix: pattern.prefix, suffix: pattern.suffix, padding: pattern.padding };
    this.directory = directory;
    this._frameSet = frameSet;
    this._frames = Array.from(frameSet).sort((a, b) => a - b);
  }

  get prefix(): string {
    return this.pattern.prefix;
  }

  get suffix(): string {
    return this.pattern.suffix;
  }

  get padding(): number {
    return this.pattern.padding;
  }

  get extension(): string {
    return patternExtension(this.pattern);
  }

  get frameCount(): number {
    return this._frames.length;
  }

  get startFrame(): number | null {
    return this._frames[0] ?? null;
  }

  get endFrame(): number | null {
    return this._frames[this._frames.length - 1] ?? null;
  }

  /** Observed frame numbers, ascending. */
  frames(): number[] {
    return [...this._frames];
  }

  frameRange(): FrameRange | null {
    const start = this.startFrame;
    const end = this.endFrame;
    if (start === null || end === null) return null;
    return { start, end };
  }

  hasFrame(frame: number): boolean {
    return this._frameSet.has(frame);
  }

  filenameForFrame(frame: number): string {
    return formatFrameFilename(this.pattern, frame);
  }

  pathForFrame(frame: number): string {
    return join(this.directory, this.filenameForFrame(frame));
  }

  /**
   * Paths of every observed frame in ascending frame order.
   * Rebuilt from the pattern; the filesystem is not consulted.
   */
  files(): string[] {
    return this._frames.map(frame => this.pathForFrame(frame));
  }

  /** Whether a filename belongs to this sequence's pattern. */
  matches(filename: string): boolean {
    const parsed = parseSequenceFilename(filename);
    return parsed !== null && patternsEqual(parsed.pattern, this.pattern);
  }

  /**
   * Frame numbers of the progression start, start+step, ... up to end that
   * have no file. Defaults cover the observed range with step 1.
   * Frames too wide for the padding are still reported.
   */
  findMissingFrames(start?: number, end?: number, step: number = SEQUENCE_DEFAULTS.STEP): number[] {
    if (!Number.isSafeInteger(step) || step <= 0) {
      throw new InvalidArgumentError(`step must be a positive integer, got ${step}`);
    }
    if (start !== undefined) assertInteger('start', start);
    if (end !== undefined) assertInteger('end', end);

    const from = start ?? this.startFrame;
    const to = end ?? this.endFrame;
    if (from === null || to === null || from > to) return [];

    const missing: number[] = [];
    for (let frame = from; frame <= to; frame += step) {
      if (!this._frameSet.has(frame)) {
        missing.push(frame);
      }
    }
    return missing;
  }

  /** Same query as findMissingFrames, reported as file paths. */
  findMissingFiles(start?: number, end?: number, step?: number): string[] {
    return this.findMissingFrames(start, end, step).map(frame => this.pathForFrame(frame));
  }

  /** Number of missing frames over the observed range at step 1. */
  get missingCount(): number {
    const range = this.frameRange();
    return range ? range.end - range.start + 1 - this.frameCount : 0;
  }

  isContiguous(): boolean {
    return this.missingCount === 0;
  }

  /** First `limit` missing frames of the observed range, stopping early. */
  private firstMissing(limit: number): number[] {
    const range = this.frameRange();
    const missing: number[] = [];
    if (!range) return missing;
    for (let frame = range.start; frame <= range.end && missing.length < limit; frame++) {
      if (!this._frameSet.has(frame)) missing.push(frame);
    }
    return missing;
  }

  /**
   * Human-readable dump of the sequence state, also sent to the logger.
   * The layout is for people, not parsers.
   */
  debug(): string {
    const range = this.frameRange();
    const missingCount = this.missingCount;
    const shown = this.firstMissing(SEQUENCE_DEFAULTS.DEBUG_MISSING_LIMIT);
    const more = missingCount > shown.length ? ', ...' : '';
    const lines = [
      `Sequence ${formatPatternString(this.pattern)}`,
      `  directory: ${this.directory}`,
      `  prefix: ${JSON.stringify(this.prefix)}`,
      `  suffix: ${JSON.stringify(this.suffix)}`,
      `  extension: ${this.extension || '(none)'}`,
      `  padding: ${this.padding}`,
      `  frames: ${this.frameCount}`,
      `  range: ${range ? `${range.start}-${range.end}` : '(empty)'}`,
      `  frame list: [${this._frames.join(', ')}]`,
      `  missing: ${missingCount} [${shown.join(', ')}${more}]`,
    ];
    const dump = lines.join('\n');
    log.info(dump);
    return dump;
  }

  toJSON(): SequenceSnapshot {
    return {
      pattern: { ...this.pattern },
      directory: this.directory,
      frames: this.frames(),
    };
  }
}
