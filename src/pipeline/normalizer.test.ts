import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { TranscodeError } from '../errors.js';
import { buildFillFilterGraph } from '../media/aspect.js';
import { FakeTranscoder, listFiles, makeTempDir, removeDir } from '../test/fakes.js';
import { AspectRatioNormalizer } from './normalizer.js';

describe('AspectRatioNormalizer', () => {
  let dir: string;
  let sourcePath: string;
  let transcoder: FakeTranscoder;
  let normalizer: AspectRatioNormalizer;

  beforeEach(() => {
    dir = makeTempDir();
    sourcePath = path.join(dir, 'source.webm');
    fs.writeFileSync(sourcePath, 'raw video');
    transcoder = new FakeTranscoder();
    normalizer = new AspectRatioNormalizer(transcoder);
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('transcodes with the ratio fill graph and copies audio', async () => {
    const destination = path.join(dir, 'pool', '9-16', 'abcdef0123.mp4');
    const result = await normalizer.normalize({ path: sourcePath, contentId: 'abcdef0123' }, '9-16', destination);

    expect(result).toEqual({
      asset: { path: destination, contentId: 'abcdef0123', aspectRatio: '9-16' },
      transcoded: true,
    });
    expect(transcoder.transforms).toHaveLength(1);
    expect(transcoder.transforms[0]).toMatchObject({
      inputPath: sourcePath,
      filterGraph: buildFillFilterGraph('9-16'),
      audio: 'copy',
    });
    expect(fs.readFileSync(destination, 'utf-8')).toBe('transformed:source.webm');
  });

  it('writes to a hidden partial file and renames it into place', async () => {
    const destination = path.join(dir, '1-1', 'abcdef0123.mp4');
    await normalizer.normalize({ path: sourcePath, contentId: 'abcdef0123' }, '1-1', destination);

    const written = transcoder.transforms[0]?.outputPath ?? '';
    expect(path.dirname(written)).toBe(path.dirname(destination));
    expect(path.basename(written).startsWith('.abcdef0123.')).toBe(true);
    expect(listFiles(path.dirname(destination))).toEqual(['abcdef0123.mp4']);
  });

  it('is a no-op when the destination already exists', async () => {
    const destination = path.join(dir, '1-1', 'abcdef0123.mp4');
    const source = { path: sourcePath, contentId: 'abcdef0123' };

    await normalizer.normalize(source, '1-1', destination);
    const before = fs.statSync(destination).mtimeMs;
    const second = await normalizer.normalize(source, '1-1', destination);

    expect(second.transcoded).toBe(false);
    expect(transcoder.transforms).toHaveLength(1);
    expect(fs.statSync(destination).mtimeMs).toBe(before);
    expect(fs.readFileSync(destination, 'utf-8')).toBe('transformed:source.webm');
  });

  it('shares one transcode between concurrent calls for the same destination', async () => {
    const destination = path.join(dir, '9-16', 'abcdef0123.mp4');
    const source = { path: sourcePath, contentId: 'abcdef0123' };

    const [a, b] = await Promise.all([
      normalizer.normalize(source, '9-16', destination),
      normalizer.normalize(source, '9-16', destination),
    ]);

    expect(transcoder.transforms).toHaveLength(1);
    expect(a).toBe(b);
  });

  it('raises TranscodeError and leaves nothing behind when ffmpeg fails', async () => {
    transcoder.failTransform = () => true;
    const destination = path.join(dir, '9-16', 'abcdef0123.mp4');

    await expect(
      normalizer.normalize({ path: sourcePath, contentId: 'abcdef0123' }, '9-16', destination),
    ).rejects.toBeInstanceOf(TranscodeError);
    expect(listFiles(path.join(dir, '9-16'))).toEqual([]);
  });
});
