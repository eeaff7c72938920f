export { availableParallelism, applyThreadPool, resolveConfig, type UnpakConfig } from './config.ts';
export { createUnpakError, isUnpakError, type UnpakCodedError, UnpakErrorCode } from './errors.ts';
export { extractEntries, extractEntry, entryDestination, ProgressCounter, TEMP_PREFIX } from './extract/index.ts';
export { default as FilterSet } from './filter/FilterSet.ts';
export { default as matchGlobParents, escapeGlob, type FilterPattern, parsePattern } from './filter/matchGlobParents.ts';
export { default as formatBytesSI } from './formatBytesSI.ts';
export { createLogger, type Logger, type LogLevel } from './lib/logger.ts';
export { default as PakFlags, type Flags, type FlagsRule } from './manifest/PakFlags.ts';
export { DEFAULT_IGNORES, default as PakIgnore } from './manifest/PakIgnore.ts';
export { ChunkStream, PakReader } from './pak/index.ts';
export * from './types.ts';
export { default, FLAGS_FILE, IGNORE_FILE, prepareOutputDirectory, type UnpackOptions } from './unpack.ts';
