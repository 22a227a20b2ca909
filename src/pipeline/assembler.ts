/**
 * Final assembly — shuffles the sampled clips, writes the concat manifest and
 * concatenates them into the output file.
 *
 * A failed concatenation aborts the run. Clip files and the manifest are
 * removed whether or not concatenation succeeds.
 */
import * as fs from 'fs';
import * as path from 'path';
import { InsufficientMaterialError } from '../errors.js';
import { CLIP_PROFILE, type MediaTranscoder } from '../media/ffmpeg.js';
import { logger } from '../utils/logger.js';
import { shuffle, type Rng } from '../utils/random.js';
import type { ClipSelection } from './sampler.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export const MANIFEST_NAME = 'concat_list.txt';

export interface AssemblyPlan {
  clips: ClipSelection[];
  totalDurationSeconds: number;
}

export interface OutputArtifact {
  path: string;
  clipCount: number;
  totalDurationSeconds: number;
  /** Clip paths in the order they were concatenated. */
  clipOrder: string[];
}

export interface AssemblerDeps {
  transcoder: MediaTranscoder;
  rng: Rng;
  /** Directory holding the manifest. */
  workDir: string;
}

// ── Helpers ───────────────────────────────────────────────────────────────────

export function buildPlan(rng: Rng, clips: readonly ClipSelection[]): AssemblyPlan {
  const shuffled = shuffle(rng, clips);
  return {
    clips: shuffled,
    totalDurationSeconds: shuffled.reduce((sum, c) => sum + c.durationSeconds, 0),
  };
}

/** Concat demuxer list: one `file '<absolute path>'` line per clip. */
export function renderManifest(plan: AssemblyPlan): string {
  return plan.clips
    .map(c => `file '${path.resolve(c.outputPath).replace(/'/g, "'\\''")}'\n`)
    .join('');
}

// ── Assembler ─────────────────────────────────────────────────────────────────

export class Assembler {
  constructor(private readonly deps: AssemblerDeps) {}

  get manifestPath(): string {
    return path.join(this.deps.workDir, MANIFEST_NAME);
  }

  async assemble(clips: readonly ClipSelection[], outputPath: string): Promise<OutputArtifact> {
    const manifestPath = this.manifestPath;
    try {
      if (clips.length === 0) {
        throw new InsufficientMaterialError('No clips to assemble', 0, 0);
      }

      const plan = buildPlan(this.deps.rng, clips);
      logger.info('Assembler: assembling output', {
        clips: plan.clips.length,
        totalDurationSeconds: plan.totalDurationSeconds,
        outputPath,
      });

      fs.mkdirSync(this.deps.workDir, { recursive: true });
      fs.mkdirSync(path.dirname(outputPath), { recursive: true });
      await fs.promises.writeFile(manifestPath, renderManifest(plan), 'utf-8');

      await this.deps.transcoder.concatenate(manifestPath, outputPath, CLIP_PROFILE);

      logger.info('Assembler: output written', { outputPath });
      return {
        path: outputPath,
        clipCount: plan.clips.length,
        totalDurationSeconds: plan.totalDurationSeconds,
        clipOrder: plan.clips.map(c => c.outputPath),
      };
    } finally {
      await Promise.all([
        ...clips.map(c => fs.promises.rm(c.outputPath, { force: true })),
        fs.promises.rm(manifestPath, { force: true }),
      ]);
    }
  }
}
