#!/usr/bin/env node
/**
 * One-shot command: build OUTPUT_DIR/output.mp4 from the configured pool.
 * Exit code 0 on success, 1 on any fatal error.
 */
import { config as dotenvConfig } from 'dotenv';
import { loadConfig } from './config.js';
import { errorMessage, PipelineError } from './errors.js';
import { runHighlightPipeline } from './pipeline/index.js';
import { configureLogger, logger } from './utils/logger.js';

async function main(): Promise<number> {
  dotenvConfig();
  try {
    const config = loadConfig(process.env);
    configureLogger({ level: config.logLevel, format: config.logFormat });
    logger.info('Highlight reel: starting', {
      aspectRatio: config.aspectRatio,
      outputDurationSeconds: config.outputDurationSeconds,
      forceDownload: config.forceDownload,
    });
    const { artifact } = await runHighlightPipeline(config);
    logger.info('Highlight reel: done', { output: artifact.path });
    return 0;
  } catch (err) {
    logger.error('Highlight reel: run failed', {
      kind: err instanceof PipelineError ? err.name : 'UnexpectedError',
      error: errorMessage(err),
    });
    return 1;
  }
}

process.exitCode = await main();
