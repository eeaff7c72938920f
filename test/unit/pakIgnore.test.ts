import assert from 'assert';
import { isUnpakError, UnpakErrorCode } from '../../src/errors.ts';
import PakIgnore from '../../src/manifest/PakIgnore.ts';
import type { ArchiveEntry } from '../../src/types.ts';

function entry(path: string): ArchiveEntry {
  return { path, chunks: [], loadFlags: 0, textureFlags: 0 };
}

const HEADER = '# pakignore: one glob per line, / anchors to the root, ! keeps a match\n';
const DEFAULTS = '.DS_Store\nThumbs.db\ndesktop.ini\n.git\n/.pakflags\n/.pakignore\n';

describe('PakIgnore', () => {
  it('default entries', () => {
    const ignore = new PakIgnore().addDefault();
    assert.ok(ignore.match('.DS_Store'));
    assert.ok(ignore.match('sub/.DS_Store'));
    assert.ok(ignore.match('art/Thumbs.db'));
    assert.ok(ignore.match('.git/config'));
    assert.ok(ignore.match('.pakflags'));
    assert.ok(!ignore.match('sub/.pakflags'));
    assert.ok(!ignore.match('readme.txt'));
    assert.equal(ignore.toString(), HEADER + DEFAULTS);
  });

  it('an empty rule set ignores nothing', () => {
    const ignore = new PakIgnore();
    assert.ok(!ignore.match('.DS_Store'));
    assert.equal(ignore.toString(), HEADER);
  });

  it('the last matching line wins', () => {
    const ignore = new PakIgnore().add('*.log').add('!keep.log');
    assert.ok(ignore.match('x.log'));
    assert.ok(!ignore.match('a/keep.log'));
    ignore.add('/a');
    assert.ok(ignore.match('a/keep.log'));
    assert.ok(!ignore.match('b/keep.log'));
  });

  it('keeps archive entries that default entries would ignore', () => {
    const ignore = new PakIgnore().addDefault().addAutoExclusions([entry('.git/keep'), entry('a/Thumbs.db'), entry('x.txt')]);
    assert.ok(!ignore.match('.git/keep'));
    assert.ok(!ignore.match('a/Thumbs.db'));
    assert.ok(ignore.match('.git/config'));
    assert.ok(ignore.match('b/Thumbs.db'));
    assert.equal(ignore.toString(), `${HEADER}${DEFAULTS}!/.git/keep\n!/a/Thumbs.db\n`);
  });

  it('escapes glob syntax in automatic exclusions', () => {
    const ignore = new PakIgnore().add('*.bak').addAutoExclusions([entry('w[1].bak')]);
    assert.deepEqual(
      ignore.rules.map((rule) => rule.pattern.text),
      ['*.bak', '/w\\[1\\].bak']
    );
    assert.ok(!ignore.match('w[1].bak'));
    assert.ok(ignore.match('w1.bak'));
  });

  it('rejects invalid patterns', () => {
    assert.throws(
      () => new PakIgnore().add('!['),
      (err: unknown) => isUnpakError(err, UnpakErrorCode.PATTERN_INVALID)
    );
  });
});
