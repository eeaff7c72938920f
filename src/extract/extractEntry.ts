import once from 'call-once-fn';
import crypto from 'crypto';
import fs from 'fs';
import { safeRm } from 'fs-remove-compat';
import mkdirp from 'mkdirp-classic';
import oo from 'on-one';
import path from 'path';
import type { Readable } from 'stream';
import { createUnpakError, isUnpakError, type UnpakCodedError, UnpakErrorCode } from '../errors.ts';
import { type Logger, silentLogger } from '../lib/logger.ts';
import type { ArchiveEntry, ArchiveReader, NoParamCallback } from '../types.ts';

export const TEMP_PREFIX = '.unpak-';

export interface ExtractEntryOptions {
  parallelism: number;
  logger?: Logger;
}

/**
 * Destination of an entry below the extraction root
 */
export function entryDestination(dest: string, entry: ArchiveEntry): string {
  return path.join(dest, ...entry.path.split('/'));
}

export function tempPath(dest: string): string {
  return path.join(dest, `${TEMP_PREFIX}${crypto.randomBytes(6).toString('hex')}`);
}

function fsError(message: string, err: unknown): UnpakCodedError {
  return isUnpakError(err) ? err : createUnpakError(message, UnpakErrorCode.FILESYSTEM, err);
}

/**
 * Stream the entry into a new temporary file and wait until the file is closed. `created`
 * tells whether the temporary file exists, and so whether it needs removing after a failure.
 */
function writeTemp(stream: Readable, fullPath: string, callback: (err: Error | null, created: boolean) => void): void {
  const writeStream = fs.createWriteStream(fullPath, { flags: 'wx' });
  let sourceError: Error | null = null;

  // Use once since errors can come from either stream
  const cb = once((err?: Error | null) => {
    if (err) {
      stream.destroy();
      if (err === sourceError) return callback(err, true);
      // the name was taken, the file is not ours
      return callback(fsError('write temp file', err), !('code' in err && err.code === 'EEXIST'));
    }
    writeStream.writableFinished ? callback(null, true) : callback(createUnpakError('write temp file: closed before all data was written', UnpakErrorCode.FILESYSTEM), true);
  });

  // errors don't propagate through pipe; the write stream reports them once its file is open
  stream.on('error', (err: Error) => {
    if (!sourceError) sourceError = err;
    writeStream.destroy(err);
  });

  stream.pipe(writeStream);
  // close follows finish, so the descriptor is released before the rename
  oo(writeStream, ['error', 'close'], cb);
}

/**
 * Extract one entry atomically: write a temporary file in `dest`, then rename it onto the
 * entry's path. Never replaces an existing file. On failure the temporary file is removed
 * and the destination path is left untouched.
 */
export default function extractEntry(reader: ArchiveReader, entry: ArchiveEntry, dest: string, options: ExtractEntryOptions, callback: NoParamCallback): void {
  const logger = options.logger ?? silentLogger;
  const fullPath = entryDestination(dest, entry);
  const tmp = tempPath(dest);

  const fail = (err: UnpakCodedError, created = true): void => {
    if (!created) return callback(err);
    safeRm(tmp, (rmErr?: Error | null) => {
      if (rmErr) {
        err.cleanupError = rmErr;
        logger.warn('remove temp file failed', { path: tmp, error: rmErr.message });
      }
      callback(err);
    });
  };

  mkdirp(path.dirname(fullPath), (err) => {
    if (err) return callback(fsError(`create ${JSON.stringify(path.dirname(fullPath))}`, err));

    let stream: Readable;
    try {
      stream = reader.openEntry(entry, options.parallelism);
    } catch (err) {
      return callback(isUnpakError(err) ? err : createUnpakError(`read ${JSON.stringify(entry.path)}`, UnpakErrorCode.ARCHIVE_READ, err));
    }

    logger.debug('extracting entry', { path: entry.path, chunks: entry.chunks.length, parallelism: options.parallelism, temp: tmp });
    writeTemp(stream, tmp, (err, created) => {
      if (err) return fail(isUnpakError(err) ? err : createUnpakError(`extract ${JSON.stringify(entry.path)}`, UnpakErrorCode.ARCHIVE_READ, err), created);

      fs.lstat(fullPath, (err) => {
        if (!err) return fail(createUnpakError(`extract ${JSON.stringify(entry.path)}: ${JSON.stringify(fullPath)} already exists`, UnpakErrorCode.FILESYSTEM));
        if (err.code !== 'ENOENT') return fail(fsError(`extract ${JSON.stringify(entry.path)}: stat destination`, err));

        fs.rename(tmp, fullPath, (err) => {
          err ? fail(fsError(`extract ${JSON.stringify(entry.path)}: rename temp file`, err)) : callback();
        });
      });
    });
  });
}
