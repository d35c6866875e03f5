import test from 'node:test';
import assert from 'node:assert/strict';
import { ZipFs } from '../src/vfs/ZipFs.js';
import { VfsError } from '../src/vfs/errors.js';
import { compileGlob } from '../src/vfs/glob.js';
import { BufferSeekableStream } from '../src/reader/SeekableStream.js';
import { buildZip, sampleZip } from './helpers/zipFixture.js';

function mount(bytes: Uint8Array = sampleZip()): Promise<ZipFs> {
  return ZipFs.open(new BufferSeekableStream(bytes));
}

test('star matches a single top-level segment, directories included', async () => {
  const fs = await mount();
  assert.deepEqual(await fs.glob('*'), ['a.txt', 'dir/']);
});

test('a directory prefix narrows matches to its children', async () => {
  const fs = await mount();
  assert.deepEqual(await fs.glob('dir/*'), ['dir/b.txt']);
});

test('question marks and character classes match one character', async () => {
  const fs = await mount();
  assert.deepEqual(await fs.glob('?.txt'), ['a.txt']);
  assert.deepEqual(await fs.glob('[ab].txt'), ['a.txt']);
  assert.deepEqual(await fs.glob('dir/[!a]*'), ['dir/b.txt']);
});

test('no match yields an empty list', async () => {
  const fs = await mount();
  assert.deepEqual(await fs.glob('*.md'), []);
  assert.deepEqual(await fs.glob('dir/*/*'), []);
});

test('matches keep listing order', async () => {
  const fs = await mount(
    buildZip([
      { name: 'zeta.txt', data: 'z' },
      { name: 'alpha.txt', data: 'a' },
      { name: 'mid.log', data: 'm' },
      { name: 'beta.txt', data: 'b' }
    ])
  );
  assert.deepEqual(await fs.glob('*.txt'), ['zeta.txt', 'alpha.txt', 'beta.txt']);
});

test('malformed patterns are rejected instead of matching nothing', async () => {
  const fs = await mount();
  for (const pattern of ['[a', 'a.txt\\', '\\', '[]a]', '[]', 'dir/[a-]', '[-a]']) {
    await assert.rejects(fs.glob(pattern), (err: unknown) => {
      return (
        err instanceof VfsError &&
        err.code === 'VFS_BAD_PATTERN' &&
        err.operation === 'glob' &&
        err.pattern === pattern
      );
    });
  }
});

test('the empty pattern matches nothing', async () => {
  const fs = await mount();
  assert.deepEqual(await fs.glob(''), []);
  assert.equal(compileGlob('')(''), false);
});

test('regex and brace syntax is matched literally', async () => {
  const fs = await mount();
  for (const pattern of ['(z|a).txt', '(nope|dir/b).txt', 'a{1}.txt', 'a+.txt', '@(a).txt', '$a.txt', 'a.tx^t']) {
    assert.deepEqual(await fs.glob(pattern), [], pattern);
  }

  const odd = await mount(
    buildZip([
      { name: '(z|a).txt', data: '1' },
      { name: 'a{1}.txt', data: '2' },
      { name: 'plain.txt', data: '3' }
    ])
  );
  assert.deepEqual(await odd.glob('(z|a).txt'), ['(z|a).txt']);
  assert.deepEqual(await odd.glob('a{1}.txt'), ['a{1}.txt']);
  assert.deepEqual(await odd.glob('(*'), ['(z|a).txt']);
});

test('a leading ./ is part of the pattern', async () => {
  const fs = await mount();
  assert.deepEqual(await fs.glob('./a.txt'), []);
  assert.deepEqual(await fs.glob('./*'), []);
});

test('a trailing slash selects directory entries', async () => {
  const fs = await mount();
  assert.deepEqual(await fs.glob('dir/'), ['dir/']);
  assert.deepEqual(await fs.glob('*/'), ['dir/']);
  assert.deepEqual(await fs.glob('a.txt/'), []);
  assert.deepEqual(await fs.glob('*'), ['a.txt', 'dir/']);
});

test('compiled matchers follow shell rules', () => {
  const match = compileGlob('*.txt');
  assert.equal(match('notes.txt'), true);
  assert.equal(match('.hidden.txt'), true);
  assert.equal(match('dir/notes.txt'), false);
  assert.equal(match('notes.txt.bak'), false);

  assert.equal(compileGlob('**')('a/b'), false);
  assert.equal(compileGlob('{a,b}')('a'), false);
  assert.equal(compileGlob('\\*')('*'), true);
  assert.equal(compileGlob('\\*')('x'), false);
  assert.equal(compileGlob('[\\]]')(']'), true);
  assert.equal(compileGlob('[^a]')('b'), true);
  assert.equal(compileGlob('[^a]')('a'), false);
  assert.equal(compileGlob('[a-c]x')('bx'), true);
  assert.equal(compileGlob('[a-c]x')('dx'), false);
});

test('compileGlob throws on unterminated classes', () => {
  assert.throws(() => compileGlob('files/[0-9'), (err: unknown) => {
    return err instanceof VfsError && err.code === 'VFS_BAD_PATTERN' && err.pattern === 'files/[0-9';
  });
});
