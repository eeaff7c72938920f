/**
 * ChunkStream - Readable of an entry's decompressed chunks, in chunk order
 *
 * Parallel mode (parallelism > 0): a queue of `parallelism` workers reads and inflates chunks
 * ahead of the consumer. A worker keeps its slot until its chunk has been pushed, so no more
 * than `parallelism` chunks are held outside the stream buffer and a slow consumer stalls
 * the workers instead of growing memory.
 *
 * Lazy mode (parallelism = 0): each chunk is read and inflated only when the consumer asks
 * for more data.
 */

import once from 'call-once-fn';
import fs from 'fs';
import Queue from 'queue-cb';
import { Readable } from 'stream';
import zlib from 'zlib';
import { createUnpakError, UnpakErrorCode } from '../errors.ts';
import type { ArchiveEntry, Chunk } from '../types.ts';

type ChunkCallback = (err: Error | null, data: Buffer | null) => void;
type Release = () => void;

/**
 * Read one stored chunk and inflate it when compressed
 */
export function decodeChunk(fd: number, chunk: Chunk, callback: ChunkCallback): void {
  const stored = Buffer.alloc(chunk.compressedSize);
  fs.read(fd, stored, 0, stored.length, chunk.offset, (err, bytesRead) => {
    if (err) return callback(err, null);
    if (bytesRead !== stored.length) return callback(new Error(`short read (${bytesRead} of ${stored.length} bytes)`), null);
    if (chunk.compressedSize === chunk.uncompressedSize) return callback(null, stored);

    zlib.inflate(stored, (err, data) => {
      if (err) return callback(err, null);
      if (data.length !== chunk.uncompressedSize) return callback(new Error(`inflated ${data.length} bytes, expected ${chunk.uncompressedSize}`), null);
      callback(null, data);
    });
  });
}

function noop(): void {}

export default class ChunkStream extends Readable {
  private fd: number;
  private entry: ArchiveEntry;
  private parallel: boolean;

  // next chunk to push
  private cursor = 0;
  private wanted = false;
  private ended = false;
  private decoding = false;
  private inflight = 0;

  // parallel mode: decoded chunks and the worker slots holding them
  private decoded: Array<Buffer | undefined> = [];
  private releases: Array<Release | undefined> = [];

  private onSettled: () => void;

  /**
   * @param onSettled - Called once the stream is destroyed and no read is in flight on `fd`
   */
  constructor(fd: number, entry: ArchiveEntry, parallelism: number, onSettled: () => void) {
    super();
    this.fd = fd;
    this.entry = entry;
    this.parallel = parallelism > 0;
    const settled = once(onSettled);
    this.onSettled = () => {
      settled();
    };
    if (this.parallel && entry.chunks.length > 0) this.startWorkers(parallelism);
  }

  // `release` runs instead of `callback` when the stream is destroyed or the chunk fails
  private decode(index: number, release: Release, callback: (data: Buffer) => void): void {
    this.inflight++;
    decodeChunk(this.fd, this.entry.chunks[index], (err, data) => {
      this.inflight--;
      if (this.destroyed) {
        release();
        return this.maybeSettled();
      }
      if (err || !data) {
        release();
        this.destroy(createUnpakError(`read ${JSON.stringify(this.entry.path)} chunk ${index}`, UnpakErrorCode.ARCHIVE_READ, err ?? 'no data'));
        return;
      }
      callback(data);
    });
  }

  private startWorkers(parallelism: number): void {
    const queue = new Queue(parallelism);
    for (let index = 0; index < this.entry.chunks.length; index++) {
      queue.defer((callback) => {
        const release = (): void => {
          callback();
        };
        if (this.destroyed) return release();
        this.decode(index, release, (data) => {
          this.decoded[index] = data;
          this.releases[index] = release;
          this.flush();
        });
      });
    }
    queue.await((err) => {
      if (err && !this.destroyed) this.destroy(err);
    });
  }

  private flush(): void {
    const count = this.entry.chunks.length;
    while (this.wanted && this.cursor < count) {
      const data = this.decoded[this.cursor];
      if (data === undefined) return;
      const release = this.releases[this.cursor];
      this.decoded[this.cursor] = undefined;
      this.releases[this.cursor] = undefined;
      this.cursor++;
      if (data.length > 0) this.wanted = this.push(data);
      if (release) release();
    }
    if (this.cursor >= count) this.finish();
  }

  private readNext(): void {
    if (this.decoding || this.ended) return;
    if (this.cursor >= this.entry.chunks.length) return this.finish();

    this.decoding = true;
    this.decode(this.cursor, noop, (data) => {
      this.decoding = false;
      this.cursor++;
      // an empty chunk pushes nothing, so nothing would call _read again
      data.length > 0 ? this.push(data) : this.readNext();
    });
  }

  private finish(): void {
    if (this.ended) return;
    this.ended = true;
    this.push(null);
  }

  private maybeSettled(): void {
    if (this.destroyed && this.inflight === 0) this.onSettled();
  }

  _read(): void {
    this.wanted = true;
    this.parallel ? this.flush() : this.readNext();
  }

  _destroy(err: Error | null, callback: (error?: Error | null) => void): void {
    // free the worker slots so the queue drains
    const releases = this.releases;
    this.releases = [];
    this.decoded = [];
    for (let index = 0; index < releases.length; index++) {
      const release = releases[index];
      if (release) release();
    }
    callback(err);
    this.maybeSettled();
  }
}
