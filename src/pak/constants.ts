/**
 * PAK Format Constants
 *
 * Little-endian container: a fixed header, an index of entry records, then chunk data
 * addressed by absolute offsets from the index.
 */

// "UPAK"
export const MAGIC = [85, 80, 65, 75];
export const VERSION = 1;

// Header field offsets and sizes
export const HEADER_SIZE = 16;
export const MAGIC_OFFSET = 0;
export const MAGIC_SIZE = 4;
export const VERSION_OFFSET = 4;
export const RESERVED_OFFSET = 6;
export const ENTRY_COUNT_OFFSET = 8;
export const INDEX_SIZE_OFFSET = 12;

// Entry record: u16 path length, path bytes, then the fixed tail below
export const PATH_LENGTH_SIZE = 2;
export const ENTRY_TAIL_SIZE = 8; // u32 loadFlags, u16 textureFlags, u16 chunkCount

// Chunk record: u32 offset low, u32 offset high, u32 compressed size, u32 uncompressed size
export const CHUNK_RECORD_SIZE = 16;

// 2^32, combines the two offset words
export const UINT32_RANGE = 4294967296;
