import { isUnpakError } from '../errors.ts';
import type FilterSet from '../filter/FilterSet.ts';
import formatBytesSI from '../formatBytesSI.ts';
import { silentLogger } from '../lib/logger.ts';
import { type ArchiveReader, entrySize, type ExtractOptions, type ExtractStats, type ValueCallback } from '../types.ts';
import extractEntry from './extractEntry.ts';
import ProgressCounter from './ProgressCounter.ts';

function run(reader: ArchiveReader, dest: string, filter: FilterSet, options: ExtractOptions, callback: ValueCallback<ExtractStats>): void {
  const entries = reader.entries;
  const parallelism = Math.max(0, options.parallelism ?? 0);
  const logger = (options.logger ?? silentLogger).child({ name: 'extract' });
  const output = options.output;
  const counter = new ProgressCounter(entries.length);

  const next = (index: number): void => {
    if (index >= entries.length) return callback(null, counter.stats());
    const entry = entries[index];

    let excluded: boolean;
    try {
      excluded = filter.isExcluded(entry.path);
    } catch (err) {
      return callback(err instanceof Error ? err : new Error(String(err)));
    }

    if (excluded) {
      if (output) output.write(counter.line(entry.path, 'excluded'));
      counter.exclude();
      // keeps long runs of excluded entries off the stack
      setImmediate(() => next(index + 1));
      return;
    }

    if (output) output.write(counter.line(entry.path, formatBytesSI(entrySize(entry))));
    extractEntry(reader, entry, dest, { parallelism, logger }, (err) => {
      if (err) {
        logger.error('extraction aborted', { path: entry.path, code: isUnpakError(err) ? err.code : undefined, error: err.message });
        return callback(err);
      }
      counter.extract();
      next(index + 1);
    });
  };

  next(0);
}

/**
 * Extract the reader's entries below `dest`, in listing order and one entry at a time.
 *
 * Entries the filter excludes are counted and skipped. The first failure stops the run; entries
 * already extracted stay on disk.
 */
export default function extractEntries(reader: ArchiveReader, dest: string, filter: FilterSet, options?: ExtractOptions): Promise<ExtractStats>;
export default function extractEntries(reader: ArchiveReader, dest: string, filter: FilterSet, options: ExtractOptions, callback: ValueCallback<ExtractStats>): void;
export default function extractEntries(reader: ArchiveReader, dest: string, filter: FilterSet, options: ExtractOptions = {}, callback?: ValueCallback<ExtractStats>): Promise<ExtractStats> | void {
  if (typeof callback === 'function') return run(reader, dest, filter, options, callback);
  return new Promise((resolve, reject) => {
    run(reader, dest, filter, options, (err, stats) => (err || !stats ? reject(err) : resolve(stats)));
  });
}
