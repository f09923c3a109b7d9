/**
 * Sequence Matcher
 * Groups a flat list of filenames into numbered file sequences.
 */

import { Logger } from '../utils/Logger';
import { getFileExtension, normalizeExtensions } from '../utils/media/SupportedMediaFormats';
import { nodeDirectoryReader, type DirectoryReader } from './DirectoryReader';
import { Sequence } from './Sequence';
import { parseSequenceFilename, patternKey, type SequencePattern } from './SequencePattern';

const log = new Logger('SequenceMatcher');

export interface GroupOptions {
  /**
   * Extension mask, with or without leading dots. Matched case-sensitively
   * against the text after the filename's last `.`.
   */
  extensions?: string | Iterable<string>;
}

export interface FindSequencesOptions extends GroupOptions {
  /** Source of directory entries; defaults to the local filesystem. */
  reader?: DirectoryReader;
}

interface Group {
  pattern: SequencePattern;
  frames: Set<number>;
}

/**
 * Partition filenames into sequences by (prefix, suffix, padding).
 * Sequences come back in the order their first member was seen; names
 * without a frame field or outside the extension mask are skipped.
 */
export function groupSequences(
  directory: string,
  filenames: Iterable<string>,
  options: GroupOptions = {}
): Sequence[] {
  const mask = normalizeExtensions(options.extensions);
  const groups = new Map<string, Group>();
  let skipped = 0;

  for (const filename of filenames) {
    if (mask && !mask.has(getFileExtension(filename))) continue;

    const parsed = parseSequenceFilename(filename);
    if (!parsed) {
      skipped++;
      continue;
    }

    const key = patternKey(parsed.pattern);
    let group = groups.get(key);
    if (!group) {
      group = { pattern: parsed.pattern, frames: new Set() };
      groups.set(key, group);
    }
    group.frames.add(parsed.frame);
  }

  if (skipped > 0) {
    log.debug(`${skipped} file(s) in ${directory} have no frame number`);
  }

  return Array.from(groups.values(), group => new Sequence(group.pattern, directory, group.frames));
}

/**
 * Scan one directory (non-recursively) and return the sequences found in it.
 * An empty directory yields an empty list.
 */
export function findSequences(directoryPath: string, options: FindSequencesOptions = {}): Sequence[] {
  const reader = options.reader ?? nodeDirectoryReader;
  const filenames = Array.from(reader.listFiles(directoryPath));
  const sequences = groupSequences(directoryPath, filenames, options);
  log.debug(`Scanned ${directoryPath}: ${filenames.length} file(s), ${sequences.length} sequence(s)`);
  return sequences;
}
