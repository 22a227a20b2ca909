/**
 * One highlight run: ingest sources into the pool, sample clips from the
 * configured partition, assemble them into OUTPUT_DIR/output.mp4.
 */
import * as fs from 'fs';
import * as path from 'path';
import type { AppConfig } from '../config.js';
import {
  FfmpegTranscoder,
  FfprobeDurationProbe,
  type DurationProbe,
  type MediaTranscoder,
} from '../media/ffmpeg.js';
import { YtDlpFetcher, type VideoFetcher } from '../media/ytdlp.js';
import { logger } from '../utils/logger.js';
import { createRng, type Rng } from '../utils/random.js';
import { Assembler, type OutputArtifact } from './assembler.js';
import {
  MediaIngestPipeline,
  collectLocalSources,
  readVideoUrls,
  type IngestReport,
} from './ingest.js';
import { AspectRatioNormalizer } from './normalizer.js';
import { MediaPool } from './pool.js';
import { ClipSampler } from './sampler.js';

export const OUTPUT_FILENAME = 'output.mp4';

export interface PipelineServices {
  fetcher: VideoFetcher;
  transcoder: MediaTranscoder;
  probe: DurationProbe;
  rng: Rng;
}

export interface RunResult {
  ingest: IngestReport;
  artifact: OutputArtifact;
}

export function createServices(config: AppConfig): PipelineServices {
  const toolOpts = {
    ffmpegPath: config.tools.ffmpeg,
    ffprobePath: config.tools.ffprobe,
    timeoutMs: config.toolTimeoutMs,
  };
  return {
    fetcher: new YtDlpFetcher({ ytDlpPath: config.tools.ytDlp, timeoutMs: config.toolTimeoutMs }),
    transcoder: new FfmpegTranscoder(toolOpts),
    probe: new FfprobeDurationProbe(toolOpts),
    rng: createRng(config.seed),
  };
}

export async function runHighlightPipeline(
  config: AppConfig,
  overrides: Partial<PipelineServices> = {},
): Promise<RunResult> {
  const services = { ...createServices(config), ...overrides };

  for (const dir of [config.inputDir, config.tempDir, config.outputDir]) {
    fs.mkdirSync(dir, { recursive: true });
  }

  const pool = new MediaPool(config.inputDir);
  const sourceRefs = [
    ...(await readVideoUrls(config.videoUrlsPath)),
    ...(await collectLocalSources(config.tempDir)),
  ];

  const ingestPipeline = new MediaIngestPipeline({
    fetcher: services.fetcher,
    normalizer: new AspectRatioNormalizer(services.transcoder),
  });
  const ingest = await ingestPipeline.ingest(pool, sourceRefs, config.aspectRatios, {
    forceDownload: config.forceDownload,
    scratchDir: config.tempDir,
  });

  const sampler = new ClipSampler({
    transcoder: services.transcoder,
    probe: services.probe,
    rng: services.rng,
  });
  const clips = await sampler.sample(pool, config.aspectRatio, config.outputDurationSeconds, config.tempDir);

  const assembler = new Assembler({
    transcoder: services.transcoder,
    rng: services.rng,
    workDir: config.tempDir,
  });
  const artifact = await assembler.assemble(clips, path.join(config.outputDir, OUTPUT_FILENAME));

  logger.info('Pipeline: run complete', {
    output: artifact.path,
    clips: artifact.clipCount,
    totalDurationSeconds: artifact.totalDurationSeconds,
  });
  return { ingest, artifact };
}
