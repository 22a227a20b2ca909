/**
 * Clip sampling — draws pool sources without replacement and cuts one short,
 * randomly placed clip from each until the accumulated duration exceeds the
 * target.
 *
 * Each source contributes at most one clip. Sources that fail to probe, are
 * shorter than MIN_SOURCE_SECONDS, or fail to extract are discarded for the
 * rest of the run. When every source has been tried before the target is
 * exceeded the run fails with InsufficientMaterialError.
 */
import * as fs from 'fs';
import * as path from 'path';
import {
  EmptyPoolError,
  InsufficientMaterialError,
  ProbeError,
  TranscodeError,
} from '../errors.js';
import type { AspectRatio } from '../media/aspect.js';
import { CLIP_PROFILE, type DurationProbe, type MediaTranscoder } from '../media/ffmpeg.js';
import { logger } from '../utils/logger.js';
import { randomIndex, uniform, type Rng } from '../utils/random.js';
import type { MediaAsset, MediaPool } from './pool.js';

// ── Constants ─────────────────────────────────────────────────────────────────

/** Shortest source that can yield a clip: start range is [0, duration - 2). */
export const MIN_SOURCE_SECONDS = 2;
export const MIN_CLIP_SECONDS = 1;
export const MAX_CLIP_SECONDS = 2;

/** Names the sampler gives the clips it writes into the work area. */
export const CLIP_FILE_PATTERN = /^clip_\d+\.mp4$/;

export function clipFileName(index: number): string {
  return `clip_${index}.mp4`;
}

// ── Types ─────────────────────────────────────────────────────────────────────

export interface ClipSelection {
  sourceAsset: MediaAsset;
  startOffsetSeconds: number;
  durationSeconds: number;
  outputPath: string;
  /** Probed duration of the source when the clip was cut. */
  sourceDurationSeconds: number;
}

export interface ClipSamplerDeps {
  transcoder: MediaTranscoder;
  probe: DurationProbe;
  rng: Rng;
}

// ── Sampler ───────────────────────────────────────────────────────────────────

export class ClipSampler {
  constructor(private readonly deps: ClipSamplerDeps) {}

  async sample(
    pool: MediaPool,
    ratio: AspectRatio,
    targetDurationSeconds: number,
    workDir: string,
  ): Promise<ClipSelection[]> {
    const candidates = await pool.list(ratio);
    if (candidates.length === 0) throw new EmptyPoolError(ratio);

    logger.info('Sampler: sampling clips', {
      ratio,
      candidates: candidates.length,
      targetDurationSeconds,
    });

    const untried = [...candidates];
    let tried = 0;
    let totalDuration = 0;
    const clips: ClipSelection[] = [];

    try {
      while (totalDuration <= targetDurationSeconds) {
        if (untried.length === 0) {
          throw new InsufficientMaterialError(
            `Pool ${ratio} exhausted after ${candidates.length} sources with ${totalDuration.toFixed(2)}s of ${targetDurationSeconds}s`,
            totalDuration,
            targetDurationSeconds,
          );
        }

        const [source] = untried.splice(randomIndex(this.deps.rng, untried.length), 1);
        if (!source) continue;
        tried++;

        const clip = await this.cutClip(source, path.join(workDir, clipFileName(tried)));
        if (!clip) continue;

        totalDuration += clip.durationSeconds;
        clips.push(clip);
        logger.debug('Sampler: clip added', {
          source: source.contentId,
          startOffsetSeconds: clip.startOffsetSeconds,
          durationSeconds: clip.durationSeconds,
          totalDuration,
        });
      }
    } catch (err) {
      await Promise.all(clips.map(c => fs.promises.rm(c.outputPath, { force: true })));
      throw err;
    }

    logger.info('Sampler: target reached', {
      clips: clips.length,
      sourcesTried: tried,
      totalDuration,
    });
    return clips;
  }

  /** Probe and extract one clip. Null means the source was discarded. */
  private async cutClip(source: MediaAsset, outputPath: string): Promise<ClipSelection | null> {
    let sourceDuration: number;
    try {
      sourceDuration = await this.deps.probe.probeDuration(source.path);
    } catch (err) {
      if (!(err instanceof ProbeError)) throw err;
      logger.warn('Sampler: probe failed — discarding source', { source: source.path, error: err.message });
      return null;
    }

    if (sourceDuration < MIN_SOURCE_SECONDS) {
      logger.info('Sampler: source too short — discarding', { source: source.path, sourceDuration });
      return null;
    }

    const { rng } = this.deps;
    const startOffsetSeconds = uniform(rng, 0, sourceDuration - MIN_SOURCE_SECONDS);
    const durationSeconds = uniform(rng, MIN_CLIP_SECONDS, MAX_CLIP_SECONDS);

    fs.mkdirSync(path.dirname(outputPath), { recursive: true });
    try {
      await this.deps.transcoder.transform({
        inputPath: source.path,
        outputPath,
        filterGraph: `fps=${CLIP_PROFILE.fps}`,
        startSeconds: startOffsetSeconds,
        durationSeconds,
        profile: CLIP_PROFILE,
        audio: 'drop',
      });
    } catch (err) {
      await fs.promises.rm(outputPath, { force: true });
      if (!(err instanceof TranscodeError)) throw err;
      logger.warn('Sampler: extraction failed — discarding source', { source: source.path, error: err.message });
      return null;
    }

    return {
      sourceAsset: source,
      startOffsetSeconds,
      durationSeconds,
      outputPath,
      sourceDurationSeconds: sourceDuration,
    };
  }
}
