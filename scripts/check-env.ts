#!/usr/bin/env tsx
/**
 * Pre-flight check for montage-picker.
 * Validates the environment, confirms ffprobe is callable, and (optionally)
 * counts the video files an input directory would contribute.
 * Run: npm run check-env -- [input-dir]
 *
 * Exit codes:
 *   0 — all required checks pass
 *   1 — one or more required checks failed
 */
import { execFileSync } from 'child_process';
import { existsSync, readdirSync } from 'fs';
import { extname } from 'path';
import { config as dotenvConfig } from 'dotenv';

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

let anyRequiredFailed = false;

// ── Section: Configuration ────────────────────────────────────────────────────

console.log(`\n${BOLD}=== montage-picker — Pre-flight Check ===${RESET}\n`);
console.log(`${BOLD}[ 1 ] Configuration${RESET}`);

let ffprobePath = 'ffprobe';
let extensions: string[] = ['.mp4', '.mov'];

try {
  const { env } = await import('../src/config.js');
  ffprobePath = env.FFPROBE_PATH;
  extensions = env.VIDEO_EXTENSIONS;
  pass('environment', `clip ${env.CLIP_DURATION}s, total ${env.TOTAL_DURATION}s, policy ${env.SELECTION_POLICY}`);
  pass('extensions', extensions.join(', '));
} catch (err) {
  fail('environment', err instanceof Error ? err.message : String(err));
  anyRequiredFailed = true;
}

// ── Section: ffprobe ──────────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 2 ] ffprobe${RESET}`);

try {
  const version = execFileSync(ffprobePath, ['-version'], { encoding: 'utf-8', stdio: ['ignore', 'pipe', 'pipe'] });
  pass(ffprobePath, version.split('\n')[0] ?? '');
} catch {
  fail(`${ffprobePath} not runnable`, 'Install ffmpeg or set FFPROBE_PATH');
  anyRequiredFailed = true;
}

// ── Section: Input directory ──────────────────────────────────────────────────

const inputDir = process.argv[2];
console.log(`\n${BOLD}[ 3 ] Input directory${RESET}`);

if (!inputDir) {
  console.log(`  ${YELLOW}○${RESET} no input directory given  (skipped)`);
} else if (!existsSync(inputDir)) {
  fail(inputDir, 'Directory does not exist');
  anyRequiredFailed = true;
} else {
  const wanted = new Set(extensions);
  const videos = readdirSync(inputDir).filter((f) => wanted.has(extname(f).toLowerCase()));
  if (videos.length > 0) {
    pass(inputDir, `${videos.length} video file(s)`);
  } else {
    fail(inputDir, `No files with extensions ${extensions.join(', ')}`);
    anyRequiredFailed = true;
  }
}

// ── Summary ───────────────────────────────────────────────────────────────────

console.log('');
if (anyRequiredFailed) {
  console.error(`${RED}${BOLD}Pre-flight failed.${RESET}`);
  process.exit(1);
}
console.log(`${GREEN}${BOLD}All required checks passed.${RESET}`);
