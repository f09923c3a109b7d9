/**
 * SequencePattern Unit Tests
 */

import { describe, it, expect, vi } from 'vitest';
import {
  parseSequenceFilename,
  patternKey,
  patternsEqual,
  padFrame,
  formatFrameFilename,
  formatPatternString,
  patternExtension,
} from './SequencePattern';
import { Logger, LogLevel } from '../utils/Logger';

describe('SequencePattern', () => {
  describe('parseSequenceFilename', () => {
    it('SPT-001: splits a dotted frame name into prefix, digits and suffix', () => {
      expect(parseSequenceFilename('render.0001.exr')).toEqual({
        filename: 'render.0001.exr',
        pattern: { prefix: 'render.', suffix: '.exr', padding: 4 },
        digits: '0001',
        frame: 1,
      });
    });

    it('SPT-002: uses the last digit run when several are present', () => {
      const parsed = parseSequenceFilename('shot010_v02.0001.exr');
      expect(parsed?.pattern).toEqual({ prefix: 'shot010_v02.', suffix: '.exr', padding: 4 });
      expect(parsed?.frame).toBe(1);
    });

    it('SPT-003: keeps text between frame field and extension in the suffix', () => {
      const parsed = parseSequenceFilename('img_0005_beauty.exr');
      expect(parsed?.pattern).toEqual({ prefix: 'img_', suffix: '_beauty.exr', padding: 4 });
      expect(parsed?.frame).toBe(5);
    });

    it('SPT-004: ignores digits inside the extension', () => {
      expect(parseSequenceFilename('clip.mp4')).toBeNull();
      const parsed = parseSequenceFilename('scan.0100.jp2');
      expect(parsed?.pattern).toEqual({ prefix: 'scan.', suffix: '.jp2', padding: 4 });
      expect(parsed?.frame).toBe(100);
    });

    it('SPT-005: returns null for names without digits', () => {
      expect(parseSequenceFilename('notes.txt')).toBeNull();
      expect(parseSequenceFilename('README')).toBeNull();
      expect(parseSequenceFilename('')).toBeNull();
    });

    it('SPT-006: handles names without an extension', () => {
      expect(parseSequenceFilename('frame10')).toEqual({
        filename: 'frame10',
        pattern: { prefix: 'frame', suffix: '', padding: 2 },
        digits: '10',
        frame: 10,
      });
    });

    it('SPT-007: treats a leading dot as part of the stem', () => {
      const parsed = parseSequenceFilename('.cache12');
      expect(parsed?.pattern).toEqual({ prefix: '.cache', suffix: '', padding: 2 });
    });

    it('SPT-018: takes the frame from an all-digit tail after the last dot', () => {
      expect(parseSequenceFilename('cache.0001')).toEqual({
        filename: 'cache.0001',
        pattern: { prefix: 'cache.', suffix: '', padding: 4 },
        digits: '0001',
        frame: 1,
      });
      expect(parseSequenceFilename('frame.0007')?.pattern).toEqual({
        prefix: 'frame.',
        suffix: '',
        padding: 4,
      });
    });

    it('SPT-008: only the last dot separates the extension', () => {
      const parsed = parseSequenceFilename('img.0001.tar.gz');
      expect(parsed?.pattern).toEqual({ prefix: 'img.', suffix: '.tar.gz', padding: 4 });
    });

    it('SPT-009: accepts 15-digit frame fields and rejects wider ones', () => {
      const sink = vi.fn();
      Logger.setLevel(LogLevel.DEBUG);
      Logger.setSink(sink);

      expect(parseSequenceFilename('x.123456789012345.exr')?.frame).toBe(123456789012345);
      expect(parseSequenceFilename('x.1234567890123456.exr')).toBeNull();
      expect(sink).toHaveBeenCalledWith(
        LogLevel.DEBUG,
        '[SequencePattern]',
        'Ignoring "x.1234567890123456.exr": 16-digit frame field is too wide'
      );
    });

    it('SPT-010: prefix + digits + suffix reconstructs the name', () => {
      const names = ['a.0001.exr', 'b_v003_0042.dpx', 'c7', 'plate-00099.tif', 'd.1.png'];
      for (const name of names) {
        const parsed = parseSequenceFilename(name);
        expect(parsed).not.toBeNull();
        if (parsed) {
          expect(parsed.pattern.prefix + parsed.digits + parsed.pattern.suffix).toBe(name);
        }
      }
    });
  });

  describe('patternKey', () => {
    it('SPT-011: differs when only the padding differs', () => {
      const a = { prefix: 'img.', suffix: '.exr', padding: 3 };
      const b = { prefix: 'img.', suffix: '.exr', padding: 4 };
      expect(patternKey(a)).not.toBe(patternKey(b));
      expect(patternsEqual(a, b)).toBe(false);
    });

    it('SPT-012: does not collide when separators move between prefix and suffix', () => {
      const a = { prefix: 'a|', suffix: 'b', padding: 2 };
      const b = { prefix: 'a', suffix: '|b', padding: 2 };
      expect(patternKey(a)).not.toBe(patternKey(b));
    });

    it('SPT-013: is equal for equal patterns', () => {
      const a = { prefix: 'img.', suffix: '.exr', padding: 4 };
      expect(patternKey(a)).toBe(patternKey({ ...a }));
      expect(patternsEqual(a, { ...a })).toBe(true);
    });
  });

  describe('formatting', () => {
    const pattern = { prefix: 'render.', suffix: '.exr', padding: 4 };

    it('SPT-014: zero-pads frames to the pattern width', () => {
      expect(padFrame(7, 4)).toBe('0007');
      expect(formatFrameFilename(pattern, 42)).toBe('render.0042.exr');
    });

    it('SPT-015: keeps every digit of frames wider than the padding', () => {
      expect(padFrame(10000, 3)).toBe('10000');
      expect(formatFrameFilename({ prefix: 'img.', suffix: '.exr', padding: 3 }, 10000)).toBe(
        'img.10000.exr'
      );
    });

    it('SPT-016: renders hash and printf placeholders', () => {
      expect(formatPatternString(pattern)).toBe('render.####.exr');
      expect(formatPatternString(pattern, 'printf')).toBe('render.%04d.exr');
    });

    it('SPT-017: reads the extension from the suffix', () => {
      expect(patternExtension(pattern)).toBe('exr');
      expect(patternExtension({ prefix: 'a_', suffix: '_beauty.exr', padding: 2 })).toBe('exr');
      expect(patternExtension({ prefix: 'frame', suffix: '', padding: 2 })).toBe('');
    });
  });
});
