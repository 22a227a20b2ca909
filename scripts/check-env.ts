#!/usr/bin/env tsx
/**
 * Pre-flight check for Highlight Reel.
 * Validates the environment, the external tools on PATH, the URL list and the
 * storage directories.
 * Run: npm run check-env
 *
 * Exit codes:
 *   0 — all required checks pass
 *   1 — one or more required checks failed
 */
import { existsSync, readFileSync } from 'fs';
import { config as dotenvConfig } from 'dotenv';
import { loadConfig, type AppConfig } from '../src/config.js';
import { errorMessage } from '../src/errors.js';
import { execTool } from '../src/utils/exec.js';

dotenvConfig();

// ── ANSI color helpers ────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const BOLD   = '\x1b[1m';
const RESET  = '\x1b[0m';

const pass = (label: string, detail = '') =>
  console.log(`  ${GREEN}✓${RESET} ${label}${detail ? `  ${YELLOW}${detail}${RESET}` : ''}`);

const fail = (label: string, hint = '') => {
  console.error(`  ${RED}✗${RESET} ${label}${hint ? `\n    ${YELLOW}hint: ${hint}${RESET}` : ''}`);
};

const note = (label: string) => console.log(`  ${YELLOW}○${RESET} ${label}`);

let anyRequiredFailed = false;

// ── Section: Configuration ────────────────────────────────────────────────────

console.log(`\n${BOLD}=== Highlight Reel — Pre-flight Check ===${RESET}\n`);
console.log(`${BOLD}[ 1 ] Configuration${RESET}`);

let config: AppConfig | undefined;
try {
  config = loadConfig(process.env);
  pass('environment parsed');
  pass('ASPECT_RATIO', config.aspectRatio);
  pass('ASPECT_RATIOS', config.aspectRatios.join(', '));
  pass('OUTPUT_DURATION', `${config.outputDurationSeconds}s`);
  pass('DOWNLOAD_URLS', String(config.forceDownload));
  if (config.seed === undefined) note('SEED  (unset — runs are not reproducible)');
  else pass('SEED', String(config.seed));
} catch (err) {
  fail('environment parsed', errorMessage(err));
  anyRequiredFailed = true;
}

if (config) {
  // ── Section: External tools ─────────────────────────────────────────────────

  console.log(`\n${BOLD}[ 2 ] External tools${RESET}`);

  const tools: Array<[string, string, string[]]> = [
    ['ffmpeg',  config.tools.ffmpeg,  ['-version']],
    ['ffprobe', config.tools.ffprobe, ['-version']],
    ['yt-dlp',  config.tools.ytDlp,   ['--version']],
  ];
  for (const [label, binary, args] of tools) {
    try {
      const firstLine = execTool(binary, args, { timeout: 15_000 }).split('\n')[0] ?? '';
      pass(label, firstLine.trim());
    } catch {
      fail(label, `Install ${label} or set its *_PATH variable (tried "${binary}")`);
      anyRequiredFailed = true;
    }
  }

  // ── Section: Sources ────────────────────────────────────────────────────────

  console.log(`\n${BOLD}[ 3 ] Sources${RESET}`);

  if (existsSync(config.videoUrlsPath)) {
    const urls = readFileSync(config.videoUrlsPath, 'utf-8')
      .split('\n')
      .filter(l => l.trim().startsWith('https://'));
    if (urls.length > 0) pass('VIDEO_URLS', `${urls.length} https:// URL(s) in ${config.videoUrlsPath}`);
    else note(`VIDEO_URLS  (${config.videoUrlsPath} has no https:// lines)`);
  } else {
    note(`VIDEO_URLS  (${config.videoUrlsPath} not found — only the existing pool will be used)`);
  }

  // ── Section: Directories ────────────────────────────────────────────────────

  console.log(`\n${BOLD}[ 4 ] Directories${RESET}`);

  for (const [label, dir] of [
    ['INPUT_DIR', config.inputDir],
    ['TEMP_DIR', config.tempDir],
    ['OUTPUT_DIR', config.outputDir],
  ] as const) {
    if (existsSync(dir)) pass(label, dir);
    else note(`${label}  ${dir}  (will be created on first run)`);
  }
}

// ── Summary ───────────────────────────────────────────────────────────────────

console.log('');
if (anyRequiredFailed) {
  console.error(`${RED}${BOLD}Pre-flight failed.${RESET} Fix the items marked ✗ above.`);
  process.exit(1);
}
console.log(`${GREEN}${BOLD}All required checks passed.${RESET}`);
