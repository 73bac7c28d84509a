#!/usr/bin/env tsx
/**
 * End-to-end smoke test for Stillwater.
 * Generates synthetic background and music with ffmpeg's lavfi sources, runs a
 * complete assembly on them and checks the result. Needs a local ffmpeg; uses
 * no network and no real assets.
 * Run: npm run smoke-test
 *
 * Exit codes:
 *   0: all tests pass
 *   1: one or more tests failed
 */
import { existsSync, mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { formatSeconds, probeMedia, runFfmpeg } from '../src/media/ffmpeg.js';
import { assertPublishable } from '../src/gates/index.js';
import { runAssembly } from '../src/pipeline/index.js';
import { parseManifest, toAssemblyRequest } from '../src/pipeline/manifest.js';
import type { AssemblyResult } from '../src/types.js';

// ── ANSI helpers ──────────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const BOLD   = '\x1b[1m';
const RESET  = '\x1b[0m';

// ── Test runner ───────────────────────────────────────────────────────────────

let allPass = true;
let testNumber = 0;

async function test(name: string, fn: () => Promise<void>): Promise<void> {
  testNumber++;
  const label = `Test ${testNumber.toString().padStart(2, ' ')}: ${name}`;
  process.stdout.write(`  ${label}… `);
  try {
    await fn();
    console.log(`${GREEN}PASS${RESET}`);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    console.log(`${RED}FAIL${RESET}`);
    console.error(`           ${YELLOW}${msg}${RESET}`);
    allPass = false;
  }
}

// ── Fixtures ──────────────────────────────────────────────────────────────────

const CANVAS = { width: 640, height: 360 };
const TOTAL = 12;
const BACKGROUND_SECONDS = 4;
const MUSIC_SECONDS = 5;

const scratch = mkdtempSync(join(tmpdir(), 'stillwater-smoke-'));
const backgroundPath = join(scratch, 'background.mp4');
const musicPath = join(scratch, 'music.m4a');
const outputPath = join(scratch, 'out', 'smoke.mp4');
let result: AssemblyResult | undefined;

console.log(`\n${BOLD}=== Stillwater: Smoke Tests ===${RESET}\n`);

// Test 1: synthetic inputs
await test('Generate synthetic background and music', async () => {
  await runFfmpeg([
    '-f', 'lavfi', '-i', `testsrc2=s=${CANVAS.width}x${CANVAS.height}:r=25:d=${BACKGROUND_SECONDS}`,
    '-c:v', 'libx264', '-pix_fmt', 'yuv420p', backgroundPath,
  ], 'smoke background');
  await runFfmpeg([
    '-f', 'lavfi', '-i', `sine=frequency=220:sample_rate=48000:duration=${MUSIC_SECONDS}`,
    '-af', 'volume=-12dB', '-c:a', 'aac', musicPath,
  ], 'smoke music');
  const bg = await probeMedia(backgroundPath, 'video');
  if (Math.abs(bg.duration - BACKGROUND_SECONDS) > 0.1) {
    throw new Error(`background is ${formatSeconds(bg.duration)}s, expected ${BACKGROUND_SECONDS}s`);
  }
});

// Test 2: full assembly
await test('Assemble a looping 12s video with three overlays', async () => {
  const manifest = parseManifest({
    totalDuration: TOTAL,
    canvas: CANVAS,
    background: backgroundPath,
    music: musicPath,
    output: outputPath,
    segments: [
      { text: 'Be still, and know.' },
      { text: 'Peace I leave with you; my peace I give you.', reference: 'Test 1:1' },
      { text: 'Rest here a while.' },
    ],
  }, 'smoke');
  result = await runAssembly(toAssemblyRequest(manifest, scratch));
  if (!existsSync(result.outputPath)) throw new Error('output file missing');
});

// Test 3: verification verdict
await test('Output passes all integrity gates', async () => {
  if (!result) throw new Error('no result, assembly failed');
  assertPublishable(result);
});

// Test 4: duration law
await test('Probed duration within one frame of the total', async () => {
  if (!result) throw new Error('no result, assembly failed');
  const drift = Math.abs(result.totalDuration - TOTAL);
  if (drift > 1 / result.timeline.fps) throw new Error(`drift ${formatSeconds(drift)}s`);
});

// Test 5: looping plan
await test('Background and music loop natively', async () => {
  if (!result) throw new Error('no result, assembly failed');
  const { background, audio } = result.timeline;
  if (!background.loop || background.iterations !== 3) {
    throw new Error(`background loop=${background.loop} iterations=${background.iterations}`);
  }
  if (audio.mode !== 'loop' || audio.iterations !== 3) {
    throw new Error(`audio mode=${audio.mode} iterations=${audio.iterations}`);
  }
});

// ── Summary ───────────────────────────────────────────────────────────────────

rmSync(scratch, { recursive: true, force: true });

console.log('');
if (!allPass) {
  console.error(`${RED}${BOLD}Smoke tests FAILED${RESET}\n`);
  process.exit(1);
}
console.log(`${GREEN}${BOLD}All ${testNumber} smoke tests passed.${RESET}\n`);
