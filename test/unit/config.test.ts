import assert from 'assert';
import os from 'os';
import { applyThreadPool, type Environment, resolveConfig, type UnpakConfig } from '../../src/config.ts';
import { isUnpakError, UnpakErrorCode } from '../../src/errors.ts';

function usageError(message: string) {
  return (err: unknown): boolean => isUnpakError(err, UnpakErrorCode.USAGE) && err.message === message;
}

describe('config', () => {
  describe('resolveConfig', () => {
    it('defaults', () => {
      assert.deepEqual(resolveConfig({}, {}), { parallelism: os.availableParallelism(), raiseThreadPool: false, logLevel: 'warn' });
    });

    it('reads the environment', () => {
      assert.deepEqual(resolveConfig({}, { UNPAK_THREADS: '3', UNPAK_LOG_LEVEL: 'debug', UNPAK_RAISE_THREADPOOL: 'YES' }), { parallelism: 3, raiseThreadPool: true, logLevel: 'debug' });
      assert.equal(resolveConfig({}, { UNPAK_THREADS: '' }).parallelism, os.availableParallelism());
      assert.equal(resolveConfig({}, { UNPAK_RAISE_THREADPOOL: '0' }).raiseThreadPool, false);
    });

    it('prefers command line values', () => {
      const config = resolveConfig({ threads: '5', logLevel: 'error', raiseThreadPool: true }, { UNPAK_THREADS: '3', UNPAK_LOG_LEVEL: 'debug' });
      assert.deepEqual(config, { parallelism: 5, raiseThreadPool: true, logLevel: 'error' });
    });

    it('clamps negative thread counts to lazy decoding', () => {
      assert.equal(resolveConfig({ threads: '-2' }, {}).parallelism, 0);
      assert.equal(resolveConfig({ threads: ' 7 ' }, {}).parallelism, 7);
    });

    it('rejects values that do not parse', () => {
      assert.throws(() => resolveConfig({ threads: 'x' }, {}), usageError('--threads: expected an integer, got "x"'));
      assert.throws(() => resolveConfig({}, { UNPAK_THREADS: '1.5' }), usageError('UNPAK_THREADS: expected an integer, got "1.5"'));
      assert.throws(() => resolveConfig({ logLevel: 'loud' }, {}), usageError('log level must be one of debug, info, warn, error, got "loud"'));
    });
  });

  describe('applyThreadPool', () => {
    function config(parallelism: number, raiseThreadPool = true): UnpakConfig {
      return { parallelism, raiseThreadPool, logLevel: 'warn' };
    }

    it('raises the pool past the processing units', () => {
      const env: Environment = {};
      assert.equal(applyThreadPool(config(16), env, 4), 16);
      assert.equal(env.UV_THREADPOOL_SIZE, '16');
    });

    it('caps the pool size', () => {
      const env: Environment = {};
      assert.equal(applyThreadPool(config(5000), env, 4), 1024);
      assert.equal(env.UV_THREADPOOL_SIZE, '1024');
    });

    it('leaves the pool alone otherwise', () => {
      const env: Environment = {};
      assert.equal(applyThreadPool(config(4), env, 4), null);
      assert.equal(applyThreadPool(config(16, false), env, 4), null);
      assert.deepEqual(env, {});

      const preset: Environment = { UV_THREADPOOL_SIZE: '8' };
      assert.equal(applyThreadPool(config(16), preset, 4), null);
      assert.equal(preset.UV_THREADPOOL_SIZE, '8');
    });
  });
});
