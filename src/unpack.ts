import { promises as fsPromises } from 'fs';
import mkdirp from 'mkdirp-classic';
import path from 'path';
import { createUnpakError, isUnpakError, UnpakErrorCode } from './errors.ts';
import extractEntries from './extract/extractEntries.ts';
import FilterSet from './filter/FilterSet.ts';
import { type Logger, silentLogger } from './lib/logger.ts';
import PakFlags from './manifest/PakFlags.ts';
import PakIgnore from './manifest/PakIgnore.ts';
import PakReader from './pak/PakReader.ts';
import type { ArchiveEntry, ExtractStats, Output, ValueCallback } from './types.ts';

export const FLAGS_FILE = '.pakflags';
export const IGNORE_FILE = '.pakignore';

export interface UnpackOptions {
  /** Output directory, created when missing, otherwise empty apart from ignored names */
  dest: string;
  /** Archive to extract; without one the output is initialised with manifests only */
  archive?: string;
  exclude?: string[];
  include?: string[];
  /** Chunks decoded ahead per entry, 0 decodes lazily */
  parallelism?: number;
  /** One .pakflags rule per file instead of inherited directory rules */
  flagsExplicit?: boolean;
  /** Leave the default entries out of .pakignore */
  ignoreNoDefault?: boolean;
  /** Transcript, process.stdout by default */
  output?: Output;
  logger?: Logger;
}

/**
 * Create the output directory or check that everything already in it is ignored.
 * Throws UNPAK_PRECONDITION for the first name that is not.
 */
export async function prepareOutputDirectory(dest: string, ignore: PakIgnore): Promise<void> {
  let names: string[];
  try {
    await new Promise<void>((resolve, reject) => mkdirp(dest, (err) => (err ? reject(err) : resolve())));
    names = await fsPromises.readdir(dest);
  } catch (err) {
    throw createUnpakError(`create output directory ${JSON.stringify(dest)}`, UnpakErrorCode.FILESYSTEM, err);
  }

  for (let index = 0; index < names.length; index++) {
    if (!ignore.match(names[index])) {
      throw createUnpakError(`output directory must not exist or be empty (other than ignored files), found ${JSON.stringify(names[index])}`, UnpakErrorCode.PRECONDITION);
    }
  }
}

async function writeManifest(dest: string, name: string, text: string): Promise<void> {
  try {
    await fsPromises.writeFile(path.join(dest, name), text, 'utf8');
  } catch (err) {
    throw createUnpakError(`write ${name}`, UnpakErrorCode.FILESYSTEM, err);
  }
}

async function run(options: UnpackOptions): Promise<ExtractStats> {
  const output = options.output ?? process.stdout;
  const logger = (options.logger ?? silentLogger).child({ name: 'unpack' });
  const print = (line = ''): void => {
    output.write(`${line}\n`);
  };
  const dest = options.dest;
  const archive = options.archive;

  // patterns are validated before anything is read or written
  const filter = new FilterSet(options.exclude, options.include);

  let reader: PakReader | null = null;
  if (archive) {
    print(`unpacking ${JSON.stringify(archive)} to ${JSON.stringify(dest)}`);
    reader = await PakReader.open(archive);
    logger.info('opened archive', { archive, entries: reader.entries.length, size: reader.size });
  } else {
    print(`initializing new pak tree in ${JSON.stringify(dest)}`);
  }

  try {
    const entries: readonly ArchiveEntry[] = reader ? reader.entries : [];

    const flags = new PakFlags();
    print(`... generating ${FLAGS_FILE}${options.flagsExplicit && reader ? ' (without inheritance)' : ''}`);
    if (reader) {
      options.flagsExplicit ? flags.generateExplicit(entries) : flags.generate(entries);
      try {
        flags.test(entries);
      } catch (err) {
        // the rules do not describe the archive they came from; show what was generated
        print(flags.toString());
        throw isUnpakError(err) ? err : createUnpakError('test generated pakflags', UnpakErrorCode.INTERNAL_CONSISTENCY, err);
      }
    }

    const ignore = new PakIgnore();
    print(`... generating ${IGNORE_FILE}${options.ignoreNoDefault ? ' (without default entries)' : ''}`);
    if (!options.ignoreNoDefault) ignore.addDefault();
    ignore.addAutoExclusions(entries);

    print('... creating output directory');
    await prepareOutputDirectory(dest, ignore);

    print(`... saving ${FLAGS_FILE}`);
    await writeManifest(dest, FLAGS_FILE, flags.toString());
    print(`... saving ${IGNORE_FILE}`);
    await writeManifest(dest, IGNORE_FILE, ignore.toString());

    print();
    const stats = reader ? await extractEntries(reader, dest, filter, { parallelism: options.parallelism, output, logger }) : { processed: 0, extracted: 0, excluded: 0, total: 0 };
    print();

    print(stats.excluded !== 0 ? `success (${stats.excluded} files excluded by command-line filter)` : 'success');
    return stats;
  } finally {
    if (reader) {
      try {
        await reader.close();
      } catch (err) {
        logger.warn('close archive failed', { archive, error: err instanceof Error ? err.message : String(err) });
      }
    }
  }
}

/**
 * Extract an archive into `dest`, writing .pakflags and .pakignore regenerated from its
 * contents, or initialise `dest` with empty manifests when no archive is given.
 */
export default function unpack(options: UnpackOptions): Promise<ExtractStats>;
export default function unpack(options: UnpackOptions, callback: ValueCallback<ExtractStats>): void;
export default function unpack(options: UnpackOptions, callback?: ValueCallback<ExtractStats>): Promise<ExtractStats> | void {
  if (typeof callback === 'function') {
    run(options).then(
      (stats) => callback(null, stats),
      (err: unknown) => callback(err instanceof Error ? err : new Error(String(err)))
    );
    return;
  }
  return run(options);
}
