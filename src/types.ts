import type { Readable } from 'stream';
import type { Logger } from './lib/logger.ts';

export interface Chunk {
  /** Absolute byte offset of the stored chunk in the archive file */
  offset: number;
  compressedSize: number;
  uncompressedSize: number;
}

export interface ArchiveEntry {
  /** Relative, forward-slash separated, without `..` segments */
  path: string;
  chunks: Chunk[];
  loadFlags: number;
  textureFlags: number;
}

/**
 * Source of entries for the extraction pipeline
 */
export interface ArchiveReader {
  readonly entries: readonly ArchiveEntry[];
  /**
   * Decompressed entry bytes, in order. Up to `parallelism` chunks are decoded ahead of
   * the consumer; 0 decodes each chunk only when it is read.
   */
  openEntry(entry: ArchiveEntry, parallelism: number): Readable;
}

/**
 * Transcript sink, e.g. process.stdout
 */
export interface Output {
  write(text: string): unknown;
}

export interface ExtractOptions {
  parallelism?: number;
  output?: Output;
  logger?: Logger;
}

export interface ExtractStats {
  /** Entries visited, extracted or excluded */
  processed: number;
  extracted: number;
  excluded: number;
  total: number;
}

export type NoParamCallback = (err?: Error | null) => void;
export type ValueCallback<T> = (err: Error | null, value?: T) => void;

export function entrySize(entry: ArchiveEntry): number {
  let size = 0;
  for (let index = 0; index < entry.chunks.length; index++) size += entry.chunks[index].uncompressedSize;
  return size;
}
