export { default as extractEntries } from './extractEntries.ts';
export { default as extractEntry, entryDestination, TEMP_PREFIX } from './extractEntry.ts';
export { default as ProgressCounter } from './ProgressCounter.ts';
