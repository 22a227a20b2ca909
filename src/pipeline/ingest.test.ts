import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FakeFetcher, FakeTranscoder, listFiles, makeTempDir, removeDir, seedPool } from '../test/fakes.js';
import { hashFile } from '../utils/hash.js';
import { MediaIngestPipeline, collectLocalSources, readVideoUrls, type SourceReference } from './ingest.js';
import { AspectRatioNormalizer } from './normalizer.js';
import { MediaPool } from './pool.js';

const remote = (url: string): SourceReference => ({ kind: 'remote', url });

describe('readVideoUrls', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('keeps only https:// lines, trimmed', async () => {
    const list = path.join(dir, 'video-urls.txt');
    fs.writeFileSync(list, [
      'https://example.com/a',
      '# comment',
      'http://example.com/insecure',
      '  https://example.com/b  ',
      '',
      'ftp://example.com/c',
    ].join('\n'));

    await expect(readVideoUrls(list)).resolves.toEqual([
      remote('https://example.com/a'),
      remote('https://example.com/b'),
    ]);
  });

  it('returns no sources when the list file is missing', async () => {
    await expect(readVideoUrls(path.join(dir, 'absent.txt'))).resolves.toEqual([]);
  });
});

describe('collectLocalSources', () => {
  it('lists visible files only', async () => {
    const dir = makeTempDir();
    try {
      fs.writeFileSync(path.join(dir, 'b.mp4'), 'b');
      fs.writeFileSync(path.join(dir, 'a.mov'), 'a');
      fs.writeFileSync(path.join(dir, '.hidden'), 'h');
      fs.mkdirSync(path.join(dir, 'nested'));

      await expect(collectLocalSources(dir)).resolves.toEqual([
        { kind: 'local', path: path.join(dir, 'a.mov') },
        { kind: 'local', path: path.join(dir, 'b.mp4') },
      ]);
    } finally {
      removeDir(dir);
    }
  });

  it('skips clips and manifests left in the work area', async () => {
    const dir = makeTempDir();
    try {
      fs.writeFileSync(path.join(dir, 'clip_1.mp4'), 'stale clip');
      fs.writeFileSync(path.join(dir, 'clip_12.mp4'), 'stale clip');
      fs.writeFileSync(path.join(dir, 'concat_list.txt'), "file 'clip_1.mp4'\n");
      fs.writeFileSync(path.join(dir, 'clip_final.mp4'), 'user video');

      await expect(collectLocalSources(dir)).resolves.toEqual([
        { kind: 'local', path: path.join(dir, 'clip_final.mp4') },
      ]);
    } finally {
      removeDir(dir);
    }
  });
});

describe('MediaIngestPipeline', () => {
  let root: string;
  let poolDir: string;
  let scratchDir: string;
  let pool: MediaPool;
  let transcoder: FakeTranscoder;

  function pipeline(fetcher: FakeFetcher): MediaIngestPipeline {
    return new MediaIngestPipeline({ fetcher, normalizer: new AspectRatioNormalizer(transcoder) });
  }

  function transformsInto(ratio: string): number {
    return transcoder.transforms.filter(t => path.basename(path.dirname(t.outputPath)) === ratio).length;
  }

  beforeEach(() => {
    root = makeTempDir();
    poolDir = path.join(root, 'input');
    scratchDir = path.join(root, 'temp');
    fs.mkdirSync(scratchDir, { recursive: true });
    pool = new MediaPool(poolDir);
    transcoder = new FakeTranscoder();
  });

  afterEach(() => {
    removeDir(root);
  });

  it('stores identical downloads once per aspect ratio', async () => {
    const fetcher = new FakeFetcher({
      'https://example.com/one': 'same bytes',
      'https://example.com/mirror': 'same bytes',
    });

    const report = await pipeline(fetcher).ingest(
      pool,
      [remote('https://example.com/one'), remote('https://example.com/mirror')],
      ['9-16', '1-1'],
      { forceDownload: false, scratchDir },
    );

    expect(report).toMatchObject({ fetched: 2, duplicates: 1, normalized: 2, reused: 0 });
    expect(await pool.count('9-16')).toBe(1);
    expect(await pool.count('1-1')).toBe(1);
  });

  it('names pool entries by content id', async () => {
    const fetcher = new FakeFetcher({ 'https://example.com/one': 'bytes one' });
    await pipeline(fetcher).ingest(pool, [remote('https://example.com/one')], ['1-1'], {
      forceDownload: false,
      scratchDir,
    });

    const local = path.join(root, 'copy');
    fs.writeFileSync(local, 'bytes one');
    const id = await hashFile(local);
    expect(listFiles(path.join(poolDir, '1-1'))).toEqual([`${id}.mp4`]);
  });

  it('skips downloading when every partition already has assets', async () => {
    seedPool(poolDir, '9-16', ['aaaaaaaaaa']);
    seedPool(poolDir, '1-1', ['aaaaaaaaaa']);
    const fetcher = new FakeFetcher({ 'https://example.com/one': 'bytes' });

    const report = await pipeline(fetcher).ingest(pool, [remote('https://example.com/one')], ['9-16', '1-1'], {
      forceDownload: false,
      scratchDir,
    });

    expect(report.fetchSkipped).toBe(true);
    expect(fetcher.calls).toEqual([]);
    expect(transcoder.transforms).toEqual([]);
  });

  it('downloads again when forced, reusing assets already in the pool', async () => {
    const urls = { 'https://example.com/one': 'bytes one' };
    await pipeline(new FakeFetcher(urls)).ingest(pool, [remote('https://example.com/one')], ['9-16'], {
      forceDownload: false,
      scratchDir,
    });

    const fetcher = new FakeFetcher(urls);
    const report = await pipeline(fetcher).ingest(pool, [remote('https://example.com/one')], ['9-16'], {
      forceDownload: true,
      scratchDir,
    });

    expect(fetcher.calls).toEqual(['https://example.com/one']);
    expect(report).toMatchObject({ fetchSkipped: false, fetched: 1, normalized: 0, reused: 1 });
    expect(transcoder.transforms).toHaveLength(1);
  });

  it('fills only the missing partition when the pool is partially populated', async () => {
    const urls = {
      'https://example.com/1': 'clip one',
      'https://example.com/2': 'clip two',
      'https://example.com/3': 'clip three',
    };
    const refs = Object.keys(urls).map(remote);

    await pipeline(new FakeFetcher(urls)).ingest(pool, refs, ['9-16'], { forceDownload: false, scratchDir });
    expect(transformsInto('9-16')).toBe(3);

    transcoder.transforms.length = 0;
    const report = await pipeline(new FakeFetcher(urls)).ingest(pool, refs, ['9-16', '1-1'], {
      forceDownload: false,
      scratchDir,
    });

    expect(report.fetchSkipped).toBe(false);
    expect(transformsInto('9-16')).toBe(0);
    expect(transformsInto('1-1')).toBe(3);
    expect(report).toMatchObject({ normalized: 3, reused: 3 });
    expect(await pool.count('1-1')).toBe(3);
  });

  it('skips a failed download and keeps going', async () => {
    const fetcher = new FakeFetcher({ 'https://example.com/ok': 'good bytes' });

    const report = await pipeline(fetcher).ingest(
      pool,
      [remote('https://example.com/broken'), remote('https://example.com/ok')],
      ['9-16'],
      { forceDownload: false, scratchDir },
    );

    expect(report).toMatchObject({ fetched: 1, fetchFailures: 1, normalized: 1 });
    expect(await pool.count('9-16')).toBe(1);
  });

  it('isolates a failed transcode to that file and ratio', async () => {
    const fetcher = new FakeFetcher({
      'https://example.com/a': 'bytes a',
      'https://example.com/b': 'bytes b',
    });
    transcoder.failTransform = req => req.inputPath.endsWith('download_1.webm') && req.outputPath.includes(`${path.sep}1-1${path.sep}`);

    const report = await pipeline(fetcher).ingest(
      pool,
      [remote('https://example.com/a'), remote('https://example.com/b')],
      ['9-16', '1-1'],
      { forceDownload: false, scratchDir },
    );

    expect(report).toMatchObject({ normalized: 3, transcodeFailures: 1 });
    expect(await pool.count('9-16')).toBe(2);
    expect(await pool.count('1-1')).toBe(1);
    expect(listFiles(path.join(poolDir, '1-1'))).toHaveLength(1);
  });

  it('clears scratch files but leaves local sources elsewhere alone', async () => {
    const outside = path.join(root, 'library', 'keep.mp4');
    fs.mkdirSync(path.dirname(outside), { recursive: true });
    fs.writeFileSync(outside, 'kept bytes');
    const dropped = path.join(scratchDir, 'dropped.mp4');
    fs.writeFileSync(dropped, 'dropped bytes');
    fs.mkdirSync(path.join(scratchDir, 'subdir'));

    const report = await pipeline(new FakeFetcher({})).ingest(
      pool,
      [{ kind: 'local', path: outside }, { kind: 'local', path: dropped }],
      ['1-1'],
      { forceDownload: false, scratchDir },
    );

    expect(report.normalized).toBe(2);
    expect(fs.existsSync(outside)).toBe(true);
    expect(listFiles(scratchDir)).toEqual(['subdir']);
  });

  it('normalizes local sources even when downloading is skipped', async () => {
    seedPool(poolDir, '1-1', ['aaaaaaaaaa']);
    const dropped = path.join(scratchDir, 'new.mp4');
    fs.writeFileSync(dropped, 'fresh bytes');

    const report = await pipeline(new FakeFetcher({})).ingest(pool, [{ kind: 'local', path: dropped }], ['1-1'], {
      forceDownload: false,
      scratchDir,
    });

    expect(report).toMatchObject({ fetchSkipped: true, normalized: 1 });
    expect(await pool.count('1-1')).toBe(2);
  });

  it('skips an unreadable local source', async () => {
    const report = await pipeline(new FakeFetcher({})).ingest(
      pool,
      [{ kind: 'local', path: path.join(root, 'missing.mp4') }],
      ['1-1'],
      { forceDownload: false, scratchDir },
    );

    expect(report.normalized).toBe(0);
    expect(transcoder.transforms).toEqual([]);
  });
});
