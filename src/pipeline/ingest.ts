/**
 * Media ingestion — downloads remote sources, hashes every materialized file
 * and normalizes it into each configured aspect-ratio partition of the pool.
 *
 * Failures are isolated per source: a failed download or transcode is logged
 * and the batch continues. The scratch area is emptied once normalization is
 * done, whatever the outcome of individual items.
 */
import * as fs from 'fs';
import * as path from 'path';
import { FetchError, IOError, TranscodeError, errorMessage } from '../errors.js';
import type { AspectRatio } from '../media/aspect.js';
import type { VideoFetcher } from '../media/ytdlp.js';
import { hashFile, type ContentId } from '../utils/hash.js';
import { logger } from '../utils/logger.js';
import { MANIFEST_NAME } from './assembler.js';
import type { AspectRatioNormalizer } from './normalizer.js';
import { isMissing, type MediaPool } from './pool.js';
import { CLIP_FILE_PATTERN } from './sampler.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export type SourceReference =
  | { kind: 'remote'; url: string }
  | { kind: 'local'; path: string };

export interface IngestOptions {
  /** Fetch remote sources even when every partition already has assets. */
  forceDownload: boolean;
  /** Where downloads land; its files are removed when ingestion ends. */
  scratchDir: string;
}

export interface IngestReport {
  fetchSkipped: boolean;
  fetched: number;
  fetchFailures: number;
  /** Files whose content id was already seen earlier in the same run. */
  duplicates: number;
  normalized: number;
  reused: number;
  transcodeFailures: number;
}

export interface IngestDeps {
  fetcher: VideoFetcher;
  normalizer: AspectRatioNormalizer;
  hasher?: (filePath: string) => Promise<ContentId>;
}

const REMOTE_PREFIX = 'https://';

// ── Source discovery ──────────────────────────────────────────────────────────

/** Lines of the list file that start with https://. A missing file yields []. */
export async function readVideoUrls(listPath: string): Promise<SourceReference[]> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(listPath, 'utf-8');
  } catch (err) {
    if (isMissing(err)) {
      logger.warn('Ingest: URL list not found — no remote sources', { listPath });
      return [];
    }
    throw new IOError(`Unable to read URL list ${listPath}`, listPath, { cause: err });
  }
  return raw
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.startsWith(REMOTE_PREFIX))
    .map((url): SourceReference => ({ kind: 'remote', url }));
}

/** Clip and manifest files an interrupted run left in the shared work area. */
export function isWorkAreaLeftover(name: string): boolean {
  return name === MANIFEST_NAME || CLIP_FILE_PATTERN.test(name);
}

/**
 * Regular, non-hidden files sitting in `dir`, as local references. Leftover
 * clips and manifests are not sources; they are cleared with the scratch area.
 */
export async function collectLocalSources(dir: string): Promise<SourceReference[]> {
  let entries: fs.Dirent[];
  try {
    entries = await fs.promises.readdir(dir, { withFileTypes: true });
  } catch (err) {
    if (isMissing(err)) return [];
    throw new IOError(`Unable to list ${dir}`, dir, { cause: err });
  }
  return entries
    .filter(e => e.isFile() && !e.name.startsWith('.'))
    .map(e => e.name)
    .filter(name => !isWorkAreaLeftover(name))
    .sort()
    .map((name): SourceReference => ({ kind: 'local', path: path.join(dir, name) }));
}

async function clearScratch(dir: string): Promise<void> {
  let entries: fs.Dirent[];
  try {
    entries = await fs.promises.readdir(dir, { withFileTypes: true });
  } catch (err) {
    if (isMissing(err)) return;
    throw err;
  }
  for (const entry of entries) {
    if (entry.isFile()) await fs.promises.rm(path.join(dir, entry.name), { force: true });
  }
}

// ── Pipeline ──────────────────────────────────────────────────────────────────

export class MediaIngestPipeline {
  private readonly hasher: (filePath: string) => Promise<ContentId>;

  constructor(private readonly deps: IngestDeps) {
    this.hasher = deps.hasher ?? hashFile;
  }

  async ingest(
    pool: MediaPool,
    sourceRefs: readonly SourceReference[],
    ratios: readonly AspectRatio[],
    options: IngestOptions,
  ): Promise<IngestReport> {
    const report: IngestReport = {
      fetchSkipped: false,
      fetched: 0,
      fetchFailures: 0,
      duplicates: 0,
      normalized: 0,
      reused: 0,
      transcodeFailures: 0,
    };

    try {
      const materialized: string[] = [];
      for (const ref of sourceRefs) {
        if (ref.kind === 'local') materialized.push(path.resolve(ref.path));
      }

      const remotes = sourceRefs.filter(
        (ref): ref is Extract<SourceReference, { kind: 'remote' }> => ref.kind === 'remote',
      );
      if (!options.forceDownload && (await this.poolIsPopulated(pool, ratios))) {
        report.fetchSkipped = true;
        logger.info('Ingest: every partition has assets — skipping download', {
          ratios,
          remoteSources: remotes.length,
        });
      } else {
        for (const ref of remotes) {
          try {
            materialized.push(await this.deps.fetcher.fetch(ref.url, options.scratchDir));
            report.fetched++;
          } catch (err) {
            if (!(err instanceof FetchError)) throw err;
            report.fetchFailures++;
            logger.warn('Ingest: download failed — skipping', { url: ref.url, error: err.message });
          }
        }
      }

      const seen = new Set<ContentId>();
      for (const filePath of new Set(materialized)) {
        await this.ingestFile(pool, filePath, ratios, seen, report);
      }
    } finally {
      await clearScratch(options.scratchDir);
    }

    logger.info('Ingest: complete', { ...report });
    return report;
  }

  private async poolIsPopulated(pool: MediaPool, ratios: readonly AspectRatio[]): Promise<boolean> {
    for (const ratio of ratios) {
      if (!(await pool.hasAssets(ratio))) return false;
    }
    return true;
  }

  private async ingestFile(
    pool: MediaPool,
    filePath: string,
    ratios: readonly AspectRatio[],
    seen: Set<ContentId>,
    report: IngestReport,
  ): Promise<void> {
    let contentId: ContentId;
    try {
      contentId = await this.hasher(filePath);
    } catch (err) {
      if (!(err instanceof IOError)) throw err;
      logger.warn('Ingest: unreadable source — skipping', { filePath, error: err.message });
      return;
    }

    if (seen.has(contentId)) {
      report.duplicates++;
      logger.info('Ingest: duplicate content — skipping', { filePath, contentId });
      return;
    }
    seen.add(contentId);

    for (const ratio of ratios) {
      const destination = pool.pathFor(ratio, contentId);
      try {
        const { transcoded } = await this.deps.normalizer.normalize(
          { path: filePath, contentId },
          ratio,
          destination,
        );
        if (transcoded) report.normalized++;
        else report.reused++;
      } catch (err) {
        if (!(err instanceof TranscodeError)) throw err;
        report.transcodeFailures++;
        logger.error('Ingest: normalization failed — skipping', {
          filePath,
          contentId,
          ratio,
          error: errorMessage(err),
        });
      }
    }
  }
}
