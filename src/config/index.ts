/**
 * Configuration barrel export.
 *
 * Re-exports every centralized constant so consumers can import from
 * `src/config` instead of reaching into individual config modules.
 */

export * from './SequenceConfig';
export * from './LogConfig';
