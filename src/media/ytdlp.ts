/**
 * Remote video download through yt-dlp. This module is the only place that
 * talks to yt-dlp; ingestion goes through the VideoFetcher interface.
 */
import * as fs from 'fs';
import * as path from 'path';
import { FetchError } from '../errors.js';
import { logger } from '../utils/logger.js';
import { execTool, stderrOf, type ExecFileFn } from '../utils/exec.js';

export interface VideoFetcher {
  /** Download `locator` into `destinationDir`; resolves to the local file path. */
  fetch(locator: string, destinationDir: string): Promise<string>;
}

export interface YtDlpFetcherOptions {
  ytDlpPath?: string;
  timeoutMs?: number;
  exec?: ExecFileFn;
}

export function buildYtDlpArgs(locator: string, destinationDir: string): string[] {
  return [
    '-P', destinationDir,
    '--no-simulate',
    '--no-progress',
    '--no-playlist',
    '--print', 'after_move:filepath',
    locator,
  ];
}

export class YtDlpFetcher implements VideoFetcher {
  private readonly ytDlpPath: string;
  private readonly timeoutMs: number;
  private readonly exec: ExecFileFn;

  constructor(opts: YtDlpFetcherOptions = {}) {
    this.ytDlpPath = opts.ytDlpPath ?? 'yt-dlp';
    this.timeoutMs = opts.timeoutMs ?? 600_000;
    this.exec = opts.exec ?? execTool;
  }

  async fetch(locator: string, destinationDir: string): Promise<string> {
    logger.info('yt-dlp: downloading', { locator, destinationDir });
    fs.mkdirSync(destinationDir, { recursive: true });

    let out: string;
    try {
      out = this.exec(this.ytDlpPath, buildYtDlpArgs(locator, destinationDir), { timeout: this.timeoutMs });
    } catch (err) {
      const detail = stderrOf(err) || String(err);
      throw new FetchError(`Unable to download ${locator}: ${detail}`, locator, { cause: err });
    }

    // --no-playlist keeps this to one downloaded file; its path is the last line printed
    const lines = out.split('\n').map(l => l.trim()).filter(l => l.length > 0);
    const printed = lines[lines.length - 1];
    if (!printed) throw new FetchError(`yt-dlp reported no output file for ${locator}`, locator);

    const filePath = path.resolve(destinationDir, printed);
    if (!fs.existsSync(filePath)) {
      throw new FetchError(`yt-dlp output missing on disk: ${filePath}`, locator);
    }
    logger.info('yt-dlp: download complete', { locator, filePath });
    return filePath;
  }
}
