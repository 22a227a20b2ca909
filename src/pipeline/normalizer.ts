/**
 * Aspect-ratio normalization — fills a target canvas with a centered, fitted
 * copy of the source over a blurred stretch of itself.
 *
 * Idempotent by path: an existing destination is trusted as complete. New
 * output is transcoded to a hidden partial file beside the destination and
 * renamed into place, so the canonical path only ever holds finished files.
 */
import * as fs from 'fs';
import * as path from 'path';
import { TranscodeError, errorMessage } from '../errors.js';
import { buildFillFilterGraph, type AspectRatio } from '../media/aspect.js';
import type { MediaTranscoder } from '../media/ffmpeg.js';
import type { ContentId } from '../utils/hash.js';
import { logger } from '../utils/logger.js';
import type { MediaAsset } from './pool.js';

export interface SourceFile {
  path: string;
  contentId: ContentId;
}

export interface NormalizeResult {
  asset: MediaAsset;
  /** False when the destination already existed. */
  transcoded: boolean;
}

export class AspectRatioNormalizer {
  private readonly inFlight = new Map<string, Promise<NormalizeResult>>();

  constructor(private readonly transcoder: MediaTranscoder) {}

  /**
   * Calls for the same destination while a transcode is running share that
   * transcode instead of starting another.
   */
  async normalize(
    source: SourceFile,
    targetRatio: AspectRatio,
    destinationPath: string,
  ): Promise<NormalizeResult> {
    const key = path.resolve(destinationPath);
    const pending = this.inFlight.get(key);
    if (pending) return pending;

    const work = this.normalizeOnce(source, targetRatio, key);
    this.inFlight.set(key, work);
    try {
      return await work;
    } finally {
      this.inFlight.delete(key);
    }
  }

  private async normalizeOnce(
    source: SourceFile,
    targetRatio: AspectRatio,
    destinationPath: string,
  ): Promise<NormalizeResult> {
    const asset: MediaAsset = {
      path: destinationPath,
      contentId: source.contentId,
      aspectRatio: targetRatio,
    };

    if (fs.existsSync(destinationPath)) {
      logger.debug('Normalizer: already present, skipping', { destinationPath });
      return { asset, transcoded: false };
    }

    const dir = path.dirname(destinationPath);
    fs.mkdirSync(dir, { recursive: true });
    const partialPath = path.join(dir, `.${path.basename(destinationPath, '.mp4')}.${process.pid}.partial.mp4`);

    logger.info('Normalizer: transcoding', { source: source.path, targetRatio, destinationPath });
    try {
      await this.transcoder.transform({
        inputPath: source.path,
        outputPath: partialPath,
        filterGraph: buildFillFilterGraph(targetRatio),
        audio: 'copy',
      });
      await fs.promises.rename(partialPath, destinationPath);
    } catch (err) {
      await fs.promises.rm(partialPath, { force: true });
      if (err instanceof TranscodeError) throw err;
      throw new TranscodeError(`Normalization to ${targetRatio} failed: ${errorMessage(err)}`, 'normalize', { cause: err });
    }

    return { asset, transcoded: true };
  }
}
