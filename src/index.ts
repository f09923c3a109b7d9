/**
 * Public entry point: sequence discovery, the Sequence entity, and the
 * supporting error, logging and configuration types.
 */

export { findSequences, groupSequences } from './sequence/SequenceMatcher';
export type { FindSequencesOptions, GroupOptions } from './sequence/SequenceMatcher';
export { Sequence } from './sequence/Sequence';
export type { FrameRange, SequenceSnapshot } from './sequence/Sequence';
export {
  parseSequenceFilename,
  formatFrameFilename,
  formatPatternString,
  padFrame,
  patternKey,
} from './sequence/SequencePattern';
export type { SequencePattern, ParsedFilename, PatternStyle } from './sequence/SequencePattern';
export { nodeDirectoryReader, toDirectoryError } from './sequence/DirectoryReader';
export type { DirectoryReader } from './sequence/DirectoryReader';
export { AppError, NotFoundError, PermissionError, InvalidArgumentError } from './core/errors';
export { Logger, LogLevel } from './utils/Logger';
export type { LogSink } from './utils/Logger';
export { IMAGE_SEQUENCE_EXTENSIONS, getFileExtension } from './utils/media/SupportedMediaFormats';
export * from './config';
