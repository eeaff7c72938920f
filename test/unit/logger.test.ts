import assert from 'assert';
import { createLogger, isLogLevel } from '../../src/lib/logger.ts';

function capture() {
  const records: Record<string, unknown>[] = [];
  const sink = (line: string): void => {
    records.push(JSON.parse(line));
  };
  return { records, sink };
}

describe('logger', () => {
  it('writes structured records at or above its level', () => {
    const { records, sink } = capture();
    const logger = createLogger({ name: 'unpak', level: 'info', sink });
    logger.debug('hidden');
    logger.info('shown', { entries: 3 });
    logger.error('failed');

    assert.deepEqual(
      records.map((record) => [record.level, record.message, record.logger]),
      [
        ['info', 'shown', 'unpak'],
        ['error', 'failed', 'unpak'],
      ]
    );
    assert.equal(records[0].entries, 3);
    assert.equal(typeof records[0].timestamp, 'string');
  });

  it('defaults to warn', () => {
    const { records, sink } = capture();
    const logger = createLogger({ name: 'unpak', sink });
    logger.info('hidden');
    logger.warn('shown');
    assert.equal(records.length, 1);
    assert.equal(records[0].message, 'shown');
  });

  it('child loggers merge their context', () => {
    const { records, sink } = capture();
    const logger = createLogger({ name: 'unpak', level: 'debug', sink, defaultFields: { run: 1 } });
    logger.child({ name: 'extract', defaultFields: { dest: 'out' } }).debug('entry', { path: 'a' });

    const record = records[0];
    assert.equal(record.logger, 'extract');
    assert.equal(record.run, 1);
    assert.equal(record.dest, 'out');
    assert.equal(record.path, 'a');
  });

  it('isLogLevel', () => {
    assert.ok(isLogLevel('debug'));
    assert.ok(isLogLevel('error'));
    assert.ok(!isLogLevel('trace'));
    assert.ok(!isLogLevel(undefined));
  });
});
