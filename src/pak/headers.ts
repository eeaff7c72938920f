/**
 * PAK Header and Index Parsing
 */

import { createUnpakError, type UnpakCodedError, UnpakErrorCode } from '../errors.ts';
import type { ArchiveEntry, Chunk } from '../types.ts';
import { CHUNK_RECORD_SIZE, ENTRY_COUNT_OFFSET, ENTRY_TAIL_SIZE, HEADER_SIZE, INDEX_SIZE_OFFSET, MAGIC, MAGIC_OFFSET, MAGIC_SIZE, PATH_LENGTH_SIZE, UINT32_RANGE, VERSION, VERSION_OFFSET } from './constants.ts';

export interface PakHeader {
  version: number;
  entryCount: number;
  indexSize: number;
}

function formatError(message: string): UnpakCodedError {
  return createUnpakError(message, UnpakErrorCode.ARCHIVE_FORMAT);
}

/**
 * Check the magic bytes at the start of a header block
 */
export function isPak(buf: Buffer): boolean {
  if (buf.length < MAGIC_SIZE) return false;
  for (let i = 0; i < MAGIC_SIZE; i++) {
    if (buf[MAGIC_OFFSET + i] !== MAGIC[i]) return false;
  }
  return true;
}

/**
 * Parse the fixed-size header
 */
export function parseHeader(buf: Buffer): PakHeader {
  if (buf.length < HEADER_SIZE) throw formatError(`truncated header (${buf.length} of ${HEADER_SIZE} bytes)`);
  if (!isPak(buf)) throw formatError('not a pak archive (bad magic)');

  const version = buf.readUInt16LE(VERSION_OFFSET);
  if (version !== VERSION) throw formatError(`unsupported pak version ${version}`);

  return {
    version,
    entryCount: buf.readUInt32LE(ENTRY_COUNT_OFFSET),
    indexSize: buf.readUInt32LE(INDEX_SIZE_OFFSET),
  };
}

/**
 * Validate an entry path: relative, forward slashes, no empty, `.` or `..` segments
 */
export function checkPath(path: string): string | null {
  if (path.length === 0) return 'empty path';
  if (path.indexOf('\\') >= 0) return 'backslash in path';
  if (path.indexOf('\0') >= 0) return 'NUL in path';
  if (path.charAt(0) === '/') return 'absolute path';
  const segments = path.split('/');
  for (let i = 0; i < segments.length; i++) {
    const segment = segments[i];
    if (segment === '' || segment === '.' || segment === '..') return `invalid segment ${JSON.stringify(segment)}`;
  }
  return null;
}

/**
 * Parse the index of entry records
 *
 * @param buf - Index bytes, exactly `indexSize` long
 * @param archiveSize - Archive file size, chunks must lie within it
 */
export function parseIndex(buf: Buffer, entryCount: number, archiveSize: number): ArchiveEntry[] {
  const entries: ArchiveEntry[] = [];
  const seen = new Set<string>();
  let offset = 0;

  const need = (size: number, what: string): void => {
    if (offset + size > buf.length) throw formatError(`truncated index reading ${what} of entry ${entries.length}`);
  };

  for (let index = 0; index < entryCount; index++) {
    need(PATH_LENGTH_SIZE, 'path length');
    const pathLength = buf.readUInt16LE(offset);
    offset += PATH_LENGTH_SIZE;

    need(pathLength, 'path');
    const path = buf.toString('utf8', offset, offset + pathLength);
    offset += pathLength;

    const problem = checkPath(path);
    if (problem) throw formatError(`entry ${index} ${JSON.stringify(path)}: ${problem}`);
    if (seen.has(path)) throw formatError(`entry ${index} ${JSON.stringify(path)}: duplicate path`);
    seen.add(path);

    need(ENTRY_TAIL_SIZE, 'flags');
    const loadFlags = buf.readUInt32LE(offset);
    const textureFlags = buf.readUInt16LE(offset + 4);
    const chunkCount = buf.readUInt16LE(offset + 6);
    offset += ENTRY_TAIL_SIZE;

    need(chunkCount * CHUNK_RECORD_SIZE, 'chunks');
    const chunks: Chunk[] = [];
    for (let c = 0; c < chunkCount; c++) {
      const chunk: Chunk = {
        offset: buf.readUInt32LE(offset) + buf.readUInt32LE(offset + 4) * UINT32_RANGE,
        compressedSize: buf.readUInt32LE(offset + 8),
        uncompressedSize: buf.readUInt32LE(offset + 12),
      };
      offset += CHUNK_RECORD_SIZE;
      if (chunk.offset + chunk.compressedSize > archiveSize) throw formatError(`entry ${JSON.stringify(path)}: chunk ${c} extends past end of archive`);
      chunks.push(chunk);
    }

    entries.push({ path, chunks, loadFlags, textureFlags });
  }

  if (offset !== buf.length) throw formatError(`${buf.length - offset} trailing bytes after index`);
  return entries;
}
