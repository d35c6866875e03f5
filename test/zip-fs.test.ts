import test from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { ZipFs } from '../src/vfs/ZipFs.js';
import { VfsError, isNotExist } from '../src/vfs/errors.js';
import { BufferSeekableStream, type SeekOrigin } from '../src/reader/SeekableStream.js';
import { ZipError } from '../src/errors.js';
import { readAllBytes } from '../src/streams/adapters.js';
import { FIXTURE_MTIME, buildZip, sampleZip } from './helpers/zipFixture.js';
import { RecordingStream } from './helpers/streams.js';

const decoder = new TextDecoder();

function mount(bytes: Uint8Array = sampleZip()): Promise<ZipFs> {
  return ZipFs.open(new BufferSeekableStream(bytes));
}

function isVfsError(code: string) {
  return (err: unknown): boolean => err instanceof VfsError && err.code === code;
}

test('every entry stats under its own name with the recorded metadata', async () => {
  const fs = await mount();
  const expected = new Map([
    ['a.txt', { size: 15n, isDirectory: false, mode: 0o100644 }],
    ['dir/', { size: 0n, isDirectory: true, mode: 0o040755 }],
    ['dir/b.txt', { size: 1200n, isDirectory: false, mode: 0o100644 }]
  ]);
  for (const entry of fs.entries()) {
    const info = await fs.stat(entry.name);
    const want = expected.get(entry.name);
    assert.ok(want);
    assert.equal(info.path, entry.name);
    assert.equal(info.size, want.size);
    assert.equal(info.isDirectory, want.isDirectory);
    assert.equal(info.mode, want.mode);
    assert.equal(info.mtime.getTime(), FIXTURE_MTIME.getTime());
  }
});

test('directories resolve without their trailing separator', async () => {
  const fs = await mount();
  const info = await fs.stat('dir');
  assert.equal(info.name, 'dir');
  assert.equal(info.path, 'dir/');
  assert.equal(info.isDirectory, true);
  assert.equal((await fs.stat('dir/b.txt')).name, 'b.txt');
});

test('paths are matched literally', async () => {
  const fs = await mount();
  for (const name of ['./a.txt', '/a.txt', 'A.TXT', 'dir/../a.txt', 'dir//b.txt']) {
    await assert.rejects(fs.stat(name), isVfsError('VFS_NOT_FOUND'), name);
  }
});

test('missing paths fail with the requested path attached', async () => {
  const fs = await mount();
  await assert.rejects(fs.stat('missing.txt'), (err: unknown) => {
    return (
      err instanceof VfsError &&
      err.code === 'VFS_NOT_FOUND' &&
      err.operation === 'stat' &&
      err.path === 'missing.txt' &&
      err.message === 'path "missing.txt" does not exist'
    );
  });
  await assert.rejects(fs.open('missing.txt'), (err: unknown) => isNotExist(err));
});

test('open streams entry contents', async () => {
  const fs = await mount();
  assert.equal(decoder.decode(await readAllBytes(await fs.open('a.txt'))), 'alpha contents\n');
  assert.equal((await readAllBytes(await fs.open('dir'))).length, 0);
});

test('concurrent opens read the same bytes as sequential opens', async () => {
  const bytes = buildZip([
    { name: 'one.bin', data: 'first entry '.repeat(3000), method: 8 },
    { name: 'two.bin', data: 'second entry '.repeat(7000) }
  ]);
  const stream = new RecordingStream(bytes, 4096);
  const fs = await ZipFs.open(stream);

  const sequentialOne = await readAllBytes(await fs.open('one.bin'));
  const sequentialTwo = await readAllBytes(await fs.open('two.bin'));

  const [one, two] = await Promise.all([fs.open('one.bin'), fs.open('two.bin')]);
  const [concurrentOne, concurrentTwo] = await Promise.all([readAllBytes(one), readAllBytes(two)]);

  assert.deepEqual(concurrentOne, sequentialOne);
  assert.deepEqual(concurrentTwo, sequentialTwo);
  assert.equal(decoder.decode(concurrentTwo), 'second entry '.repeat(7000));
  assert.equal(stream.maxInFlight, 1);
});

test('an archive without entries is rejected', async () => {
  await assert.rejects(mount(buildZip([])), (err: unknown) => {
    return err instanceof VfsError && err.code === 'VFS_EMPTY_ARCHIVE' && err.operation === 'mount';
  });
});

test('unparseable input fails to open with the parser error as cause', async () => {
  await assert.rejects(mount(new TextEncoder().encode('definitely not an archive')), (err: unknown) => {
    return (
      err instanceof VfsError &&
      err.code === 'VFS_OPEN_FAILED' &&
      err.cause instanceof ZipError &&
      err.cause.code === 'ZIP_EOCD_NOT_FOUND'
    );
  });
});

class UnseekableEnd extends BufferSeekableStream {
  override async seek(offset: bigint, origin: SeekOrigin): Promise<bigint> {
    if (origin === 'end') throw new Error('no length');
    return super.seek(offset, origin);
  }
}

test('a stream whose length cannot be found fails to open', async () => {
  await assert.rejects(ZipFs.open(new UnseekableEnd(sampleZip())), (err: unknown) => {
    return (
      err instanceof VfsError &&
      err.code === 'VFS_OPEN_FAILED' &&
      err.cause instanceof Error &&
      err.cause.message === 'no length'
    );
  });
});

test('repeated stat and glob calls return identical results', async () => {
  const fs = await mount();
  assert.deepEqual(await fs.stat('dir/b.txt'), await fs.stat('dir/b.txt'));
  assert.deepEqual(await fs.glob('*'), await fs.glob('*'));
});

test('returned listings and metadata are copies', async () => {
  const fs = await mount();
  fs.entries().pop();
  assert.equal(fs.entries().length, 3);
  const info = await fs.stat('a.txt');
  info.mtime.setFullYear(1999);
  assert.equal((await fs.stat('a.txt')).mtime.getTime(), FIXTURE_MTIME.getTime());
});

test('aborted contexts reject before any lookup', async () => {
  const fs = await mount();
  const controller = new AbortController();
  controller.abort(new Error('cancelled'));
  const context = { signal: controller.signal };
  await assert.rejects(fs.stat('a.txt', context), { message: 'cancelled' });
  await assert.rejects(fs.open('a.txt', context), { message: 'cancelled' });
  await assert.rejects(fs.glob('*', context), { message: 'cancelled' });
});

test('fromFile mounts an archive on disk and close releases it', async () => {
  const dir = await mkdtemp(path.join(tmpdir(), 'archive-vfs-zipfs-'));
  try {
    const filePath = path.join(dir, 'sample.zip');
    await writeFile(filePath, sampleZip());
    const fs = await ZipFs.fromFile(filePath);
    assert.equal(decoder.decode(await readAllBytes(await fs.open('dir/b.txt'))), 'bravo '.repeat(200));
    await fs.close();
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});

test('parse warnings are kept on the file system', async () => {
  const fs = await mount(buildZip([{ name: 'a.txt', data: 'a' }], { trailing: new Uint8Array([9]) }));
  assert.deepEqual(
    fs.warnings().map((warning) => warning.code),
    ['ZIP_BAD_EOCD']
  );
});
