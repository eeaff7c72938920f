import fs from 'fs';
import type { Readable } from 'stream';
import { createUnpakError, UnpakErrorCode } from '../errors.ts';
import Lock from '../lib/Lock.ts';
import type { ArchiveEntry, ArchiveReader, NoParamCallback } from '../types.ts';
import ChunkStream from './ChunkStream.ts';
import { HEADER_SIZE } from './constants.ts';
import { parseHeader, parseIndex } from './headers.ts';

export type OpenCallback = (err: Error | null, reader?: PakReader) => void;

function readAt(fd: number, length: number, position: number, callback: (err: Error | null, buf?: Buffer) => void): void {
  const buf = Buffer.alloc(length);
  fs.read(fd, buf, 0, length, position, (err, bytesRead) => {
    if (err) return callback(err);
    callback(null, bytesRead === length ? buf : buf.subarray(0, bytesRead));
  });
}

/**
 * Reader for a pak archive file
 *
 * Usage:
 *   const reader = await PakReader.open('game.pak');
 *   reader.openEntry(reader.entries[0], 4).pipe(fs.createWriteStream('out'));
 *   await reader.close();
 *
 * Entry streams share the file descriptor with the reader; it is closed once the reader is
 * closed and every entry stream has finished.
 */
export default class PakReader implements ArchiveReader {
  readonly path: string;
  readonly size: number;
  readonly entries: readonly ArchiveEntry[];

  private fd: number;
  private lock: Lock | null;
  private members: Set<ArchiveEntry>;

  private constructor(path: string, fd: number, size: number, entries: ArchiveEntry[]) {
    this.path = path;
    this.fd = fd;
    this.size = size;
    this.entries = entries;
    this.members = new Set(entries);
    this.lock = new Lock();
    this.lock.onDestroy = (callback) => fs.close(fd, callback);
  }

  /**
   * Open an archive and read its index
   */
  static open(path: string): Promise<PakReader>;
  static open(path: string, callback: OpenCallback): void;
  static open(path: string, callback?: OpenCallback): Promise<PakReader> | void {
    if (typeof callback === 'function') return PakReader.openInternal(path, callback);
    return new Promise((resolve, reject) => {
      PakReader.openInternal(path, (err, reader) => (err || !reader ? reject(err) : resolve(reader)));
    });
  }

  private static openInternal(path: string, callback: OpenCallback): void {
    fs.open(path, 'r', (err, fd) => {
      if (err) return callback(createUnpakError(`open ${JSON.stringify(path)}`, UnpakErrorCode.ARCHIVE_READ, err));

      const fail = (err: Error): void => {
        fs.close(fd, () => callback(err));
      };

      fs.fstat(fd, (err, stats) => {
        if (err) return fail(createUnpakError(`stat ${JSON.stringify(path)}`, UnpakErrorCode.ARCHIVE_READ, err));

        readAt(fd, HEADER_SIZE, 0, (err, headerBuf) => {
          if (err || !headerBuf) return fail(createUnpakError('read header', UnpakErrorCode.ARCHIVE_READ, err ?? 'no data'));

          try {
            const header = parseHeader(headerBuf);
            if (HEADER_SIZE + header.indexSize > stats.size) throw createUnpakError(`index (${header.indexSize} bytes) extends past end of archive`, UnpakErrorCode.ARCHIVE_FORMAT);

            readAt(fd, header.indexSize, HEADER_SIZE, (err, indexBuf) => {
              if (err || !indexBuf) return fail(createUnpakError('read index', UnpakErrorCode.ARCHIVE_READ, err ?? 'no data'));
              let entries: ArchiveEntry[];
              try {
                entries = parseIndex(indexBuf, header.entryCount, stats.size);
              } catch (err) {
                return fail(err instanceof Error ? err : new Error(String(err)));
              }
              callback(null, new PakReader(path, fd, stats.size, entries));
            });
          } catch (err) {
            fail(err instanceof Error ? err : new Error(String(err)));
          }
        });
      });
    });
  }

  openEntry(entry: ArchiveEntry, parallelism: number): Readable {
    const lock = this.lock;
    if (!lock) throw createUnpakError(`read ${JSON.stringify(entry.path)}: archive is closed`, UnpakErrorCode.ARCHIVE_READ);
    if (!this.members.has(entry)) throw createUnpakError(`read ${JSON.stringify(entry.path)}: entry does not belong to ${JSON.stringify(this.path)}`, UnpakErrorCode.ARCHIVE_READ);

    lock.retain();
    return new ChunkStream(this.fd, entry, Math.max(0, parallelism), () => lock.release());
  }

  /**
   * Release the reader's hold on the file; entry streams still open keep it until they finish
   */
  close(): Promise<void>;
  close(callback: NoParamCallback): void;
  close(callback?: NoParamCallback): Promise<void> | void {
    if (typeof callback !== 'function') {
      return new Promise((resolve, reject) => {
        this.close((err) => (err ? reject(err) : resolve()));
      });
    }

    const lock = this.lock;
    this.lock = null;
    if (!lock) return callback();
    lock.release(callback);
  }
}
