/**
 * Composition engine. Executes a Timeline as one FFmpeg invocation.
 *
 * Stages inside the single filtergraph:
 * 1. Background: native input loop (-stream_loop), scale to canvas, constant fps, trim.
 * 2. Overlays: chained overlay filters, each gated to its [start, end) window.
 * 3. Music: native input loop or plain trim, fixed gain, peak limiter.
 * 4. Encode to H.264/AAC MP4.
 *
 * Duration is only ever extended by re-reading the source from its start.
 * Frame-repeating filters (loop, aloop, tpad) and concatenation are never
 * used: each join they create shows up as a frozen frame at playback.
 */
import * as fs from 'fs';
import * as path from 'path';
import { ENCODE, TIMEOUTS } from '../config.js';
import { logger } from '../utils/logger.js';
import { CompositionError, InputError } from '../utils/errors.js';
import { ProcessError } from '../media/process.js';
import { formatSeconds, runFfmpeg } from '../media/ffmpeg.js';
import { enableWindow, scaleFilter } from '../media/filters.js';
import type { Timeline } from '../types.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface CompositionPaths {
  /** File the filtergraph is written to (argv cannot hold thousands of windows). */
  filterScriptPath: string;
  /** Where FFmpeg writes; renamed to the final path only on success. */
  partialPath: string;
}

export interface ComposeOptions {
  runId: string;
  /** Run-scoped directory for the filter script. */
  workDir: string;
  /** Overrides the duration-proportional deadline. */
  timeoutMs?: number;
}

// ── Filtergraph ───────────────────────────────────────────────────────────────

export function buildFilterGraph(timeline: Timeline): string {
  const { totalDuration, fps, windows, background, audio } = timeline;
  const total = formatSeconds(totalDuration);
  const audioInput = windows.length + 1;
  const chains: string[] = [];

  chains.push(
    `[0:v]${scaleFilter(background.scale)},fps=${fps},trim=duration=${total},setpts=PTS-STARTPTS[bg]`,
  );

  const overlaySteps = timeline.scaleSteps.filter(s => s.input === 'overlay');
  windows.forEach((window, i) => {
    const step = overlaySteps.find(s => s.segmentIndex === window.overlay.segmentIndex);
    const scale = step ? `${scaleFilter(step)},` : '';
    chains.push(`[${i + 1}:v]${scale}format=rgba[ov${i}]`);
  });

  let current = 'bg';
  windows.forEach((window, i) => {
    const next = `v${i}`;
    chains.push(`[${current}][ov${i}]overlay=x=0:y=0:enable='${enableWindow(window.start, window.end)}'[${next}]`);
    current = next;
  });
  chains.push(`[${current}]format=${ENCODE.pixelFormat}[vout]`);

  chains.push(
    `[${audioInput}:a]atrim=duration=${total},asetpts=PTS-STARTPTS,` +
    `aresample=${ENCODE.sampleRate},volume=${audio.gainDb}dB,alimiter=limit=${ENCODE.limiterPeak}:level=disabled[aout]`,
  );

  return chains.join(';\n');
}

export function buildCompositionArgs(timeline: Timeline, paths: CompositionPaths): string[] {
  const { background, audio, windows, totalDuration, fps } = timeline;
  const args: string[] = ['-v', 'error'];

  if (background.loop) args.push('-stream_loop', '-1');
  args.push('-i', background.source.path);

  for (const window of windows) {
    args.push('-i', window.overlay.imagePath);
  }

  if (audio.mode === 'loop') args.push('-stream_loop', '-1');
  args.push('-i', audio.source.path);

  args.push(
    '-filter_complex_script', paths.filterScriptPath,
    '-map', '[vout]',
    '-map', '[aout]',
    '-t', formatSeconds(totalDuration),
    '-r', String(fps),
    '-c:v', ENCODE.videoCodec,
    '-preset', ENCODE.preset,
    '-crf', String(ENCODE.crf),
    '-pix_fmt', ENCODE.pixelFormat,
    '-c:a', ENCODE.audioCodec,
    '-b:a', ENCODE.audioBitrate,
    '-ar', String(ENCODE.sampleRate),
    '-map_metadata', '-1',
    '-fflags', '+bitexact',
    '-flags:v', '+bitexact',
    '-flags:a', '+bitexact',
    '-movflags', '+faststart',
    '-f', 'mp4',
    paths.partialPath,
  );
  return args;
}

/** Deadline for the encode: a fixed allowance plus a per-output-second budget. */
export function compositionTimeoutMs(totalDuration: number): number {
  return TIMEOUTS.composeBaseMs + Math.ceil(totalDuration * TIMEOUTS.composeMsPerSecond);
}

export function partialPathFor(outputPath: string, runId: string): string {
  return path.join(path.dirname(outputPath), `.${path.basename(outputPath)}.${runId}.partial`);
}

// ── Public API ─────────────────────────────────────────────────────────────────

/**
 * Render `timeline` to `outputPath`. Either the complete file appears at
 * `outputPath` or nothing does: FFmpeg writes a run-scoped partial file that is
 * renamed on success and deleted on failure or timeout.
 */
export async function composeVideo(
  timeline: Timeline,
  outputPath: string,
  options: ComposeOptions,
): Promise<string> {
  const log = logger.child({ runId: options.runId, stage: 'compose' });
  const inputs = [
    timeline.background.source.path,
    timeline.audio.source.path,
    ...timeline.windows.map(w => w.overlay.imagePath),
  ];
  const missing = inputs.filter(p => !fs.existsSync(p));
  if (missing.length > 0) {
    throw new InputError('Composition inputs are missing', { missing });
  }

  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  fs.mkdirSync(options.workDir, { recursive: true });

  const paths: CompositionPaths = {
    filterScriptPath: path.join(options.workDir, 'filtergraph.txt'),
    partialPath: partialPathFor(outputPath, options.runId),
  };
  await fs.promises.writeFile(paths.filterScriptPath, buildFilterGraph(timeline), 'utf-8');

  const timeoutMs = options.timeoutMs ?? compositionTimeoutMs(timeline.totalDuration);
  log.info('Assembler: composing', {
    outputPath,
    totalDuration: timeline.totalDuration,
    windows: timeline.windows.length,
    backgroundLoop: timeline.background.loop,
    audioMode: timeline.audio.mode,
    timeoutMs,
  });

  const startedAt = Date.now();
  try {
    await runFfmpeg(buildCompositionArgs(timeline, paths), 'compose', timeoutMs);
  } catch (err) {
    await fs.promises.rm(paths.partialPath, { force: true });
    const failure = err instanceof ProcessError
      ? { diagnostic: err.stderr, exitCode: err.exitCode, timedOut: err.timedOut }
      : { diagnostic: String(err), exitCode: null, timedOut: false };
    log.error('Assembler: composition failed', { outputPath, ...failure });
    throw new CompositionError(
      failure.timedOut ? `Composition timed out after ${timeoutMs}ms` : 'Composition failed',
      failure,
      { outputPath },
      { cause: err },
    );
  }

  try {
    await fs.promises.rename(paths.partialPath, outputPath);
  } catch (err) {
    await fs.promises.rm(paths.partialPath, { force: true });
    throw new CompositionError(
      'Finished render could not be moved into place',
      { diagnostic: String(err), exitCode: 0, timedOut: false },
      { outputPath, partialPath: paths.partialPath },
      { cause: err },
    );
  }
  log.info('Assembler: composition complete', { outputPath, elapsedMs: Date.now() - startedAt });
  return outputPath;
}
