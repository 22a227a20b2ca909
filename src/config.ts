import * as path from 'path';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { ASPECT_RATIOS, parseAspectRatio, type AspectRatio } from './media/aspect.js';
import type { LogFormat, LogLevel } from './utils/logger.js';

// ── Env Schema ────────────────────────────────────────────────────────────────

const booleanFlag = z
  .string()
  .transform(v => ['true', '1', 'yes'].includes(v.trim().toLowerCase()));

/** A `KEY=` line in .env arrives as '' and means unset. */
const blankToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const EnvSchema = z.object({
  // Run shape
  OUTPUT_DURATION:  z.coerce.number().positive().default(8),
  ASPECT_RATIO:     z.string().default('9-16'),
  ASPECT_RATIOS:    z.string().default(ASPECT_RATIOS.join(',')),
  SEED:             z.preprocess(blankToUndefined, z.coerce.number().int().optional()),

  // Local storage
  INPUT_DIR:        z.string().min(1).default('./input'),
  TEMP_DIR:         z.string().min(1).default('./temp'),
  OUTPUT_DIR:       z.string().min(1).default('./output'),

  // Sources
  DOWNLOAD_URLS:    booleanFlag.default('false'),
  VIDEO_URLS:       z.string().min(1).default('./video-urls.txt'),

  // External tools
  FFMPEG_PATH:      z.string().min(1).default('ffmpeg'),
  FFPROBE_PATH:     z.string().min(1).default('ffprobe'),
  YT_DLP_PATH:      z.string().min(1).default('yt-dlp'),
  TOOL_TIMEOUT_MS:  z.coerce.number().int().positive().default(600_000),

  // Logging
  LOG_LEVEL:        z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT:       z.enum(['text', 'json']).default('text'),
});

// ── Config ────────────────────────────────────────────────────────────────────

export interface ToolPaths {
  ffmpeg: string;
  ffprobe: string;
  ytDlp: string;
}

export interface AppConfig {
  readonly outputDurationSeconds: number;
  /** Partition sampled for the output. Always a member of `aspectRatios`. */
  readonly aspectRatio: AspectRatio;
  /** Partitions populated during ingestion. */
  readonly aspectRatios: readonly AspectRatio[];
  readonly seed?: number;
  readonly inputDir: string;
  readonly tempDir: string;
  readonly outputDir: string;
  readonly forceDownload: boolean;
  readonly videoUrlsPath: string;
  readonly tools: Readonly<ToolPaths>;
  readonly toolTimeoutMs: number;
  readonly logLevel: LogLevel;
  readonly logFormat: LogFormat;
}

function parseRatioList(raw: string): AspectRatio[] {
  const ratios = raw
    .split(',')
    .map(s => s.trim())
    .filter(s => s.length > 0)
    .map(parseAspectRatio);
  if (ratios.length === 0) throw new ConfigurationError('ASPECT_RATIOS must name at least one ratio');
  return [...new Set(ratios)];
}

/**
 * Validate an environment-style map into an immutable config.
 * Relative directories are resolved against `cwd`.
 */
export function loadConfig(
  source: Record<string, string | undefined>,
  cwd: string = process.cwd(),
): AppConfig {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const invalid = parsed.error.issues.map(i => i.path.join('.')).join(', ');
    throw new ConfigurationError(`Missing or invalid environment variables: ${invalid}`);
  }
  const env = parsed.data;

  const aspectRatios = parseRatioList(env.ASPECT_RATIOS);
  const aspectRatio = parseAspectRatio(env.ASPECT_RATIO);
  if (!aspectRatios.includes(aspectRatio)) {
    throw new ConfigurationError(
      `ASPECT_RATIO ${aspectRatio} is not among the ingested ratios (${aspectRatios.join(', ')})`,
    );
  }

  return Object.freeze({
    outputDurationSeconds: env.OUTPUT_DURATION,
    aspectRatio,
    aspectRatios: Object.freeze(aspectRatios),
    seed: env.SEED,
    inputDir: path.resolve(cwd, env.INPUT_DIR),
    tempDir: path.resolve(cwd, env.TEMP_DIR),
    outputDir: path.resolve(cwd, env.OUTPUT_DIR),
    forceDownload: env.DOWNLOAD_URLS,
    videoUrlsPath: path.resolve(cwd, env.VIDEO_URLS),
    tools: Object.freeze({
      ffmpeg: env.FFMPEG_PATH,
      ffprobe: env.FFPROBE_PATH,
      ytDlp: env.YT_DLP_PATH,
    }),
    toolTimeoutMs: env.TOOL_TIMEOUT_MS,
    logLevel: env.LOG_LEVEL,
    logFormat: env.LOG_FORMAT,
  });
}
