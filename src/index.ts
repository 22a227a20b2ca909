/**
 * Highlight Reel — library entry point.
 *
 * Exported functions allow scripts and the CLI to run the whole pipeline or
 * drive individual stages against a pool directory.
 */
export { loadConfig, type AppConfig } from './config.js';
export * from './errors.js';
export * from './media/aspect.js';
export * from './media/ffmpeg.js';
export * from './media/ytdlp.js';
export * from './pipeline/assembler.js';
export * from './pipeline/ingest.js';
export * from './pipeline/normalizer.js';
export * from './pipeline/pool.js';
export * from './pipeline/sampler.js';
export { runHighlightPipeline, createServices, OUTPUT_FILENAME, type PipelineServices, type RunResult } from './pipeline/index.js';
export { hashFile, type ContentId } from './utils/hash.js';
export { createRng, type Rng } from './utils/random.js';
export { configureLogger, logger } from './utils/logger.js';
