/**
 * PAK archive reader
 */

export { default as ChunkStream, decodeChunk } from './ChunkStream.ts';
export * from './constants.ts';
export * from './headers.ts';
export { default as PakReader, type OpenCallback } from './PakReader.ts';
