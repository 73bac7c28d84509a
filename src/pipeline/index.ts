/**
 * Assembly run orchestrator.
 *
 * One run is strictly sequential (validate, probe, render overlays, plan,
 * compose, verify) and every stage reads only what the previous one
 * produced. Runs share nothing: each gets its own id and working directory,
 * so several may execute at once.
 */
import { randomUUID } from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { env } from '../config.js';
import { logger, type Logger } from '../utils/logger.js';
import { AssemblyError, InputError } from '../utils/errors.js';
import { hashFile } from '../utils/hash.js';
import { probeMedia } from '../media/ffmpeg.js';
import { overlayBaseName, renderOverlays } from '../media/overlay.js';
import { toVerificationStatus, verifyAssembly } from '../gates/index.js';
import type { AssemblyResult, MediaAsset, MediaKind, RenderedOverlay, Timeline } from '../types.js';
import { planTimeline, scheduleWindows, validateCanvas } from './planner.js';
import { composeVideo } from './assembler.js';
import type { AssemblyRequest } from './manifest.js';

export type { AssemblyRequest } from './manifest.js';

// ── Helpers ───────────────────────────────────────────────────────────────────

function defaultOutputPath(label: string, runId: string): string {
  const date = new Date().toISOString().slice(0, 10);
  return path.resolve(env.OUTPUT_DIR, `${date}_${label}_${runId.slice(0, 8)}.mp4`);
}

async function probeInput(filePath: string, kind: MediaKind, role: string): Promise<MediaAsset> {
  if (!fs.existsSync(filePath)) {
    throw new InputError(`The ${role} file does not exist`, { asset: filePath });
  }
  try {
    return await probeMedia(filePath, kind);
  } catch (err) {
    throw new InputError(`The ${role} file could not be probed`, { asset: filePath }, { cause: err });
  }
}

/** Every input check that needs no probing; scheduling throws on bad durations. */
function validateRequest(request: AssemblyRequest): void {
  validateCanvas(request.canvas);
  scheduleWindows(request.totalDuration, request.segments);
}

async function probeInputs(request: AssemblyRequest): Promise<{ background: MediaAsset; audio: MediaAsset }> {
  const background = await probeInput(request.backgroundPath, 'video', 'background');
  const audio = await probeInput(request.musicPath, 'audio', 'music');
  return { background, audio };
}

// ── Public API ────────────────────────────────────────────────────────────────

/**
 * Plan a request without rendering anything: assets are probed and overlay
 * paths are the ones a real run would write. Used by the `plan` and `verify`
 * commands.
 */
export async function previewTimeline(request: AssemblyRequest, workDir = env.WORK_DIR): Promise<Timeline> {
  validateRequest(request);
  const { background, audio } = await probeInputs(request);
  const overlays: RenderedOverlay[] = request.segments.map(s => ({
    segmentIndex: s.index,
    imagePath: path.join(workDir, `${overlayBaseName(s.index)}.png`),
    width: request.canvas.width,
    height: request.canvas.height,
  }));
  return planTimeline({
    totalDuration: request.totalDuration,
    canvas: request.canvas,
    segments: request.segments,
    overlays,
    background,
    audio,
  });
}

/**
 * Run one assembly end to end.
 *
 * Input, render and composition failures throw (AssemblyError subclasses).
 * A verification failure does not throw: the file exists and the returned
 * result says why it must not be published.
 */
export async function runAssembly(request: AssemblyRequest): Promise<AssemblyResult> {
  const runId = randomUUID();
  const log: Logger = logger.child({ runId });
  const outputPath = request.outputPath ?? defaultOutputPath(request.label ?? 'meditation', runId);
  const workDir = path.join(env.WORK_DIR, runId);

  log.info('Pipeline: starting assembly run', {
    totalDuration: request.totalDuration,
    canvas: `${request.canvas.width}x${request.canvas.height}`,
    segments: request.segments.length,
    outputPath,
  });

  // ── Step 1: Validate (no media work yet) ───────────────────────────────────
  validateRequest(request);

  // ── Step 2: Probe assets ───────────────────────────────────────────────────
  const { background, audio } = await probeInputs(request);
  log.info('Pipeline: assets probed', {
    background: { path: background.path, duration: background.duration, size: `${background.width}x${background.height}` },
    audio: { path: audio.path, duration: audio.duration },
  });

  fs.mkdirSync(workDir, { recursive: true });
  try {
    // ── Step 3: Render overlays ──────────────────────────────────────────────
    const overlays = await renderOverlays(request.segments, request.canvas, workDir);

    // ── Step 4: Plan ─────────────────────────────────────────────────────────
    const timeline = planTimeline({
      totalDuration: request.totalDuration,
      canvas: request.canvas,
      segments: request.segments,
      overlays,
      background,
      audio,
    });

    // ── Step 5: Compose ──────────────────────────────────────────────────────
    await composeVideo(timeline, outputPath, {
      runId,
      workDir,
      timeoutMs: request.compositionTimeoutMs,
    });

    // ── Step 6: Verify ───────────────────────────────────────────────────────
    const report = await verifyAssembly(outputPath, timeline, request.sampling);
    const verification = toVerificationStatus(report);
    const outputSha256 = await hashFile(outputPath);

    const result: AssemblyResult = {
      runId,
      outputPath,
      totalDuration: report.duration,
      outputSha256,
      timeline,
      verification,
    };

    if (verification.status === 'pass') {
      log.info('Pipeline: run complete - output is publishable', { outputPath, duration: report.duration });
    } else {
      log.warn('Pipeline: run complete - output is NOT publishable', {
        outputPath,
        code: verification.code,
        reason: verification.reason,
      });
    }
    return result;
  } catch (err) {
    if (err instanceof AssemblyError) {
      log.error('Pipeline: run failed', { stage: err.stage, error: err.message, ...err.details });
    } else {
      log.error('Pipeline: run failed unexpectedly', { err });
    }
    throw err;
  } finally {
    if (env.KEEP_WORK_DIR) {
      log.info('Pipeline: keeping work directory', { workDir });
    } else {
      await fs.promises.rm(workDir, { recursive: true, force: true });
    }
  }
}
