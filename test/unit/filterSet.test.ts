import assert from 'assert';
import { isUnpakError, UnpakErrorCode } from '../../src/errors.ts';
import FilterSet from '../../src/filter/FilterSet.ts';

const PATHS = ['readme.txt', 'build/out.log', 'build/keep.log', 'src/app.log', 'src/keep.log', 'src/main.c', 'docs/build/index.html'];

function permutations<T>(items: T[]): T[][] {
  if (items.length <= 1) return [items.slice()];
  const result: T[][] = [];
  for (let index = 0; index < items.length; index++) {
    const rest = items.slice(0, index).concat(items.slice(index + 1));
    const tails = permutations(rest);
    for (let t = 0; t < tails.length; t++) result.push([items[index]].concat(tails[t]));
  }
  return result;
}

describe('FilterSet', () => {
  it('excludes nothing without patterns', () => {
    const filter = new FilterSet();
    assert.ok(filter.empty);
    assert.ok(!filter.isExcluded('anything/at/all'));
  });

  it('includes alone never exclude', () => {
    const filter = new FilterSet([], ['*.txt']);
    assert.ok(!filter.empty);
    assert.ok(!filter.isExcluded('a.txt'));
    assert.ok(!filter.isExcluded('b.bin'));
  });

  it('excludes when any exclude matches', () => {
    const filter = new FilterSet(['*.log', 'tmp']);
    assert.ok(filter.isExcluded('tmp/a.txt'));
    assert.ok(filter.isExcluded('src/x.log'));
    assert.ok(!filter.isExcluded('src/x.txt'));
  });

  it('lets an include rescue a path inside an excluded directory', () => {
    const filter = new FilterSet(['/secrets'], ['/secrets/public.txt']);
    assert.ok(!filter.isExcluded('secrets/public.txt'));
    assert.ok(filter.isExcluded('secrets/key.pem'));
    assert.ok(filter.isExcluded('secrets/deep/token'));
    assert.ok(!filter.isExcluded('docs/secrets/x'));
    assert.ok(!filter.isExcluded('readme.md'));
  });

  it('include overrides every matching exclude', () => {
    const filter = new FilterSet(['*.log', '/build'], ['keep.log']);
    assert.ok(!filter.isExcluded('build/keep.log'));
    assert.ok(filter.isExcluded('build/out.log'));
  });

  it('gives the same result for every pattern order', () => {
    const excludes = permutations(['*.log', '/build', 'index.html']);
    const includes = permutations(['keep.log', '/src/main.c']);
    const expected = PATHS.map((path) => new FilterSet(excludes[0], includes[0]).isExcluded(path));
    assert.deepEqual(expected, [false, true, false, true, false, false, true]);

    for (let e = 0; e < excludes.length; e++) {
      for (let i = 0; i < includes.length; i++) {
        const filter = new FilterSet(excludes[e], includes[i]);
        assert.deepEqual(
          PATHS.map((path) => filter.isExcluded(path)),
          expected
        );
      }
    }
  });

  it('rejects an invalid pattern on construction', () => {
    assert.throws(
      () => new FilterSet(['*.log'], ['[oops']),
      (err: unknown) => isUnpakError(err, UnpakErrorCode.PATTERN_INVALID)
    );
  });
});
