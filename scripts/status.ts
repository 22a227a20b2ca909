#!/usr/bin/env tsx
/**
 * Pool status: assets per aspect-ratio partition, leftovers in the work area,
 * and the last output.
 * Run: npm run status
 */
import { existsSync, readdirSync, statSync } from 'fs';
import { join } from 'path';
import { config as dotenvConfig } from 'dotenv';
import { loadConfig } from '../src/config.js';
import { MANIFEST_NAME } from '../src/pipeline/assembler.js';
import { OUTPUT_FILENAME } from '../src/pipeline/index.js';
import { MediaPool } from '../src/pipeline/pool.js';

dotenvConfig();

// ── ANSI helpers ──────────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const YELLOW = '\x1b[33m';
const BOLD   = '\x1b[1m';
const DIM    = '\x1b[2m';
const RESET  = '\x1b[0m';

function green(s: string)  { return `${GREEN}${s}${RESET}`; }
function yellow(s: string) { return `${YELLOW}${s}${RESET}`; }
function bold(s: string)   { return `${BOLD}${s}${RESET}`; }
function dim(s: string)    { return `${DIM}${s}${RESET}`; }

function timeAgo(date: Date): string {
  const diff    = Date.now() - date.getTime();
  const minutes = Math.floor(diff / 60_000);
  const hours   = Math.floor(diff / 3_600_000);
  const days    = Math.floor(diff / 86_400_000);
  if (days > 0)    return `${days}d ago`;
  if (hours > 0)   return `${hours}h ago`;
  if (minutes > 0) return `${minutes}m ago`;
  return 'just now';
}

function megabytes(bytes: number): string {
  return `${(bytes / 1_048_576).toFixed(1)} MB`;
}

// ── Report ────────────────────────────────────────────────────────────────────

const config = loadConfig(process.env);
const pool = new MediaPool(config.inputDir);

console.log(`\n${bold('=== Highlight Reel — Status ===')}\n`);

console.log(bold('Pool'), dim(config.inputDir));
for (const ratio of config.aspectRatios) {
  const assets = await pool.list(ratio);
  const bytes = assets.reduce((sum, a) => sum + statSync(a.path).size, 0);
  const marker = ratio === config.aspectRatio ? ' (sampled)' : '';
  const count = assets.length > 0 ? green(String(assets.length)) : yellow('0');
  console.log(`  ${ratio.padEnd(6)} ${count} asset(s)  ${dim(megabytes(bytes))}${marker}`);
}

console.log(`\n${bold('Work area')}`, dim(config.tempDir));
if (existsSync(config.tempDir)) {
  const leftovers = readdirSync(config.tempDir).filter(n => !n.startsWith('.'));
  if (leftovers.length === 0) console.log(`  ${green('clean')}`);
  else {
    const manifest = leftovers.includes(MANIFEST_NAME) ? `, ${MANIFEST_NAME} present` : '';
    console.log(`  ${yellow(`${leftovers.length} file(s)`)} waiting for ingestion${manifest}`);
  }
} else {
  console.log(`  ${dim('not created yet')}`);
}

console.log(`\n${bold('Last output')}`);
const outputPath = join(config.outputDir, OUTPUT_FILENAME);
if (existsSync(outputPath)) {
  const stat = statSync(outputPath);
  console.log(`  ${outputPath}  ${dim(megabytes(stat.size))}  ${timeAgo(stat.mtime)}`);
} else {
  console.log(`  ${dim('none yet')}`);
}
console.log('');
