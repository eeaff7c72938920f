import { parseArgs } from 'util';
import { applyThreadPool, resolveConfig } from './config.ts';
import { isUnpakError, UnpakErrorCode } from './errors.ts';
import { createLogger } from './lib/logger.ts';
import type { Output } from './types.ts';
import unpack from './unpack.ts';

export interface CliIO {
  stdout: Output;
  stderr: Output;
  env?: Record<string, string | undefined>;
  /** Restart the command in a new process with `env`; resolves with its exit code */
  relaunch?: (env: Record<string, string | undefined>) => Promise<number>;
}

const OPTIONS = {
  threads: { type: 'string', short: 'j' },
  exclude: { type: 'string', multiple: true },
  include: { type: 'string', multiple: true },
  'flags-explicit': { type: 'boolean' },
  'ignore-no-default': { type: 'boolean' },
  'raise-threadpool': { type: 'boolean' },
  'log-level': { type: 'string' },
  help: { type: 'boolean', short: 'h' },
} as const;

export const USAGE = `usage: unpak [options] empty_output_path [archive_path]

options:
  -j, --threads <n>        decompression workers per file (0 to only decompress chunks as they are read) (default: number of cores)
      --exclude <glob>     exclude files or directories matching the glob (anchor to the start with /), repeatable, comma separated
      --include <glob>     negate --exclude for files or directories matching the glob
      --flags-explicit     do not optimize .pakflags for inheritance; generate one line for each file
      --ignore-no-default  do not add default .pakignore entries
      --raise-threadpool   raise the libuv thread pool when --threads exceeds the number of cores
      --log-level <level>  debug, info, warn or error (default: warn)
  -h, --help               show this help message
`;

function parseCommandLine(argv: string[]) {
  return parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true });
}

// comma separated like repeated flags
function splitList(values: string[] | undefined): string[] {
  const result: string[] = [];
  if (!values) return result;
  for (let index = 0; index < values.length; index++) {
    const parts = values[index].split(',');
    for (let p = 0; p < parts.length; p++) {
      if (parts[p] !== '') result.push(parts[p]);
    }
  }
  return result;
}

/**
 * Run the command line; resolves with the process exit code
 */
export async function main(argv: string[], io: CliIO = { stdout: process.stdout, stderr: process.stderr }): Promise<number> {
  const env = io.env ?? process.env;

  let parsed: ReturnType<typeof parseCommandLine>;
  try {
    parsed = parseCommandLine(argv);
  } catch (err) {
    io.stderr.write(`error: ${err instanceof Error ? err.message : String(err)}\n\n${USAGE}`);
    return 2;
  }

  const { values, positionals } = parsed;
  if (values.help) {
    io.stderr.write(USAGE);
    return 0;
  }
  if (positionals.length === 0 || positionals.length > 2) {
    io.stderr.write(USAGE);
    return 2;
  }

  try {
    const config = resolveConfig({ threads: values.threads, raiseThreadPool: values['raise-threadpool'], logLevel: values['log-level'] }, env);
    const logger = createLogger({ name: 'unpak', level: config.logLevel, sink: (line) => io.stderr.write(`${line}\n`) });
    logger.debug('configuration', { parallelism: config.parallelism, threadPoolSize: env.UV_THREADPOOL_SIZE ?? null });

    // libuv sizes its pool on first use, which happened while this process loaded
    const poolSize = applyThreadPool(config, env);
    if (poolSize !== null) {
      if (!io.relaunch) {
        logger.warn('thread pool already started; set UV_THREADPOOL_SIZE before launching', { size: poolSize });
      } else {
        logger.info('relaunching with thread pool', { size: poolSize });
        return await io.relaunch(env);
      }
    }

    await unpack({
      dest: positionals[0],
      archive: positionals[1],
      exclude: splitList(values.exclude),
      include: splitList(values.include),
      parallelism: config.parallelism,
      flagsExplicit: values['flags-explicit'],
      ignoreNoDefault: values['ignore-no-default'],
      output: io.stdout,
      logger,
    });
    return 0;
  } catch (err) {
    io.stderr.write(`error: ${err instanceof Error ? err.message : String(err)}\n`);
    return isUnpakError(err, UnpakErrorCode.USAGE) ? 2 : 1;
  }
}
