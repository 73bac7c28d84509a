#!/usr/bin/env tsx
/**
 * Pre-flight environment validation for Stillwater.
 * Checks the media toolchain, the filters the engine relies on, overlay fonts
 * and the writable directories.
 * Run: npm run check-env
 *
 * Exit codes:
 *   0: all required checks pass
 *   1: one or more required checks failed
 */
import { accessSync, constants, existsSync, mkdirSync } from 'fs';
import { resolve } from 'path';
import { env } from '../src/config.js';
import { listFilters } from '../src/media/ffmpeg.js';
import { runProcess } from '../src/media/process.js';

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

const warn = (label: string, hint = '') =>
  console.log(`  ${YELLOW}!${RESET} ${label}${hint ? `  ${YELLOW}${hint}${RESET}` : ''}`);

// ── Result tracking ───────────────────────────────────────────────────────────

let anyRequiredFailed = false;

const REQUIRED_FILTERS = [
  'drawtext', 'drawbox', 'overlay', 'scale', 'crop', 'pad',
  'trim', 'atrim', 'aresample', 'volume', 'alimiter', 'volumedetect',
];

async function toolVersion(command: string): Promise<string> {
  const { stdout } = await runProcess(command, ['-version'], { label: `${command} -version`, timeoutMs: 10_000 });
  return stdout.toString('utf-8').split('\n')[0] ?? '';
}

// ── Section: Media toolchain ──────────────────────────────────────────────────

console.log(`\n${BOLD}=== Stillwater: Pre-flight Check ===${RESET}\n`);
console.log(`${BOLD}[ 1 ] Media toolchain${RESET}`);

for (const tool of [env.FFMPEG_PATH, env.FFPROBE_PATH]) {
  try {
    pass(tool, await toolVersion(tool));
  } catch (err) {
    fail(tool, `not runnable (${err instanceof Error ? err.message : String(err)}). Install ffmpeg or set FFMPEG_PATH/FFPROBE_PATH`);
    anyRequiredFailed = true;
  }
}

// ── Section: Filters ──────────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 2 ] FFmpeg filters${RESET}`);

try {
  const available = await listFilters();
  for (const name of REQUIRED_FILTERS) {
    if (available.has(name)) {
      pass(name);
    } else {
      fail(name, name === 'drawtext' ? 'ffmpeg must be built with libfreetype' : 'use a full ffmpeg build');
      anyRequiredFailed = true;
    }
  }
} catch (err) {
  fail('filter list', err instanceof Error ? err.message : String(err));
  anyRequiredFailed = true;
}

// ── Section: Fonts (optional, fall back to the built-in face) ────────────────

console.log(`\n${BOLD}[ 3 ] Overlay fonts${RESET}`);

for (const [name, fontPath] of [
  ['OVERLAY_FONT_PATH', env.OVERLAY_FONT_PATH],
  ['OVERLAY_REFERENCE_FONT_PATH', env.OVERLAY_REFERENCE_FONT_PATH],
] as const) {
  if (existsSync(fontPath)) pass(name, fontPath);
  else warn(name, `${fontPath} missing, a fallback font will be used`);
}

// ── Section: Directories ──────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 4 ] Writable directories${RESET}`);

for (const [name, dir] of [['WORK_DIR', env.WORK_DIR], ['OUTPUT_DIR', env.OUTPUT_DIR]] as const) {
  const full = resolve(dir);
  try {
    mkdirSync(full, { recursive: true });
    accessSync(full, constants.W_OK);
    pass(name, full);
  } catch (err) {
    fail(name, `${full} is not writable (${err instanceof Error ? err.message : String(err)})`);
    anyRequiredFailed = true;
  }
}

// ── Summary ───────────────────────────────────────────────────────────────────

console.log('');
if (anyRequiredFailed) {
  console.error(`${RED}${BOLD}Pre-flight FAILED${RESET}: fix the items above before running the engine.\n`);
  process.exit(1);
}
console.log(`${GREEN}${BOLD}Pre-flight passed.${RESET}\n`);
