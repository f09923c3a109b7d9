/**
 * Centralized sequence-matching constants.
 *
 * Import from here (or via `src/config`) rather than scattering magic
 * numbers through the matcher and the Sequence entity.
 */
export const SEQUENCE_DEFAULTS = {
  /** Step used by missing-frame queries when the caller gives none */
  STEP: 1,
  /**
   * Longest digit run accepted as a frame field. Sixteen digits can exceed
   * Number.MAX_SAFE_INTEGER and would no longer round-trip to the filename.
   */
  MAX_FRAME_DIGITS: 15,
  /** Missing frames listed by `Sequence.debug()` before the list is cut short */
  DEBUG_MISSING_LIMIT: 20,
  /** Placeholder character used by `render.####.exr` style patterns */
  HASH_CHAR: '#',
} as const;
