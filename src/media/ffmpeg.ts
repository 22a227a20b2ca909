/**
 * FFmpeg/FFprobe-backed transcoder and duration probe.
 *
 * Every invocation is synchronous and bounded by the configured timeout.
 * Non-zero ffmpeg exits raise TranscodeError; unreadable ffprobe output raises
 * ProbeError. Callers own cleanup of any paths they pass in.
 */
import { ProbeError, TranscodeError } from '../errors.js';
import { execTool, stderrOf, type ExecFileFn } from '../utils/exec.js';
import { logger } from '../utils/logger.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface EncodeProfile {
  codec: string;
  preset: string;
  crf: number;
  pixelFormat: string;
  fps: number;
}

/** Shared by clip extraction and final concatenation so concat stays frame-accurate. */
export const CLIP_PROFILE: EncodeProfile = Object.freeze({
  codec: 'libx264',
  preset: 'fast',
  crf: 23,
  pixelFormat: 'yuv420p',
  fps: 30,
});

export interface TransformRequest {
  inputPath: string;
  outputPath: string;
  /** Passed to `-vf`. */
  filterGraph: string;
  startSeconds?: number;
  durationSeconds?: number;
  /** Re-encode settings; ffmpeg defaults when omitted. */
  profile?: EncodeProfile;
  audio: 'copy' | 'drop';
}

export interface MediaTranscoder {
  transform(request: TransformRequest): Promise<void>;
  concatenate(manifestPath: string, outputPath: string, profile: EncodeProfile): Promise<void>;
}

export interface DurationProbe {
  probeDuration(filePath: string): Promise<number>;
}

export interface ToolRunnerOptions {
  ffmpegPath?: string;
  ffprobePath?: string;
  timeoutMs?: number;
  exec?: ExecFileFn;
}

// ── Helpers ────────────────────────────────────────────────────────────────────

/** Keeps stderr to errors only so long encodes stay within the pipe buffer. */
const QUIET_ARGS = ['-nostats', '-loglevel', 'error'] as const;

function encodeArgs(profile: EncodeProfile): string[] {
  return [
    '-c:v', profile.codec,
    '-preset', profile.preset,
    '-crf', String(profile.crf),
    '-pix_fmt', profile.pixelFormat,
  ];
}

export function buildTransformArgs(req: TransformRequest): string[] {
  const args: string[] = ['-y', ...QUIET_ARGS];
  // Input seeking: -ss before -i
  if (req.startSeconds !== undefined) args.push('-ss', String(req.startSeconds));
  args.push('-i', req.inputPath);
  if (req.durationSeconds !== undefined) args.push('-t', String(req.durationSeconds));
  if (req.audio === 'drop') args.push('-an');
  args.push('-vf', req.filterGraph);
  if (req.profile) args.push(...encodeArgs(req.profile));
  if (req.audio === 'copy') args.push('-c:a', 'copy');
  args.push(req.outputPath);
  return args;
}

export function buildConcatArgs(manifestPath: string, outputPath: string, profile: EncodeProfile): string[] {
  return [
    '-y', ...QUIET_ARGS, '-f', 'concat', '-safe', '0', '-i', manifestPath,
    ...encodeArgs(profile),
    '-an', outputPath,
  ];
}

export function parseProbedDuration(raw: string): number | null {
  const value = Number.parseFloat(raw.trim());
  return Number.isFinite(value) && value >= 0 ? value : null;
}

// ── Public API ─────────────────────────────────────────────────────────────────

export class FfmpegTranscoder implements MediaTranscoder {
  private readonly ffmpegPath: string;
  private readonly timeoutMs: number;
  private readonly exec: ExecFileFn;

  constructor(opts: ToolRunnerOptions = {}) {
    this.ffmpegPath = opts.ffmpegPath ?? 'ffmpeg';
    this.timeoutMs = opts.timeoutMs ?? 600_000;
    this.exec = opts.exec ?? execTool;
  }

  async transform(request: TransformRequest): Promise<void> {
    this.run(buildTransformArgs(request), 'transform');
  }

  async concatenate(manifestPath: string, outputPath: string, profile: EncodeProfile): Promise<void> {
    logger.info('FFmpeg: concatenating clips', { manifestPath, outputPath });
    this.run(buildConcatArgs(manifestPath, outputPath, profile), 'concatenate');
  }

  private run(args: string[], label: string): void {
    logger.debug(`FFmpeg [${label}]`, { args });
    try {
      this.exec(this.ffmpegPath, args, { timeout: this.timeoutMs });
    } catch (err) {
      throw new TranscodeError(`FFmpeg ${label} failed: ${stderrOf(err) || String(err)}`, label, { cause: err });
    }
  }
}

export class FfprobeDurationProbe implements DurationProbe {
  private readonly ffprobePath: string;
  private readonly timeoutMs: number;
  private readonly exec: ExecFileFn;

  constructor(opts: ToolRunnerOptions = {}) {
    this.ffprobePath = opts.ffprobePath ?? 'ffprobe';
    this.timeoutMs = opts.timeoutMs ?? 600_000;
    this.exec = opts.exec ?? execTool;
  }

  async probeDuration(filePath: string): Promise<number> {
    const args = [
      '-v', 'error',
      '-show_entries', 'format=duration',
      '-of', 'default=noprint_wrappers=1:nokey=1',
      filePath,
    ];
    logger.debug('FFprobe [duration]', { args });

    let out: string;
    try {
      out = this.exec(this.ffprobePath, args, { timeout: this.timeoutMs });
    } catch (err) {
      throw new ProbeError(`FFprobe failed for ${filePath}: ${stderrOf(err) || String(err)}`, filePath, { cause: err });
    }

    const duration = parseProbedDuration(out);
    if (duration === null) {
      throw new ProbeError(`FFprobe returned no duration for ${filePath}: "${out.trim()}"`, filePath);
    }
    return duration;
  }
}
