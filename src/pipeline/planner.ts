/**
 * Timing planner. Computes the authoritative Timeline for one run: overlay
 * windows, background loop, audio loop/trim and the per-input scale steps.
 *
 * Pure: takes already-probed assets and already-rendered overlays, touches no
 * files, and either returns a frozen Timeline or throws InputError before
 * computing anything.
 */
import { ENCODE, env, type BackgroundFit, type Canvas } from '../config.js';
import { logger } from '../utils/logger.js';
import { InputError } from '../utils/errors.js';
import type {
  AudioInstruction,
  BackgroundInstruction,
  MediaAsset,
  OverlaySegment,
  OverlayWindow,
  RenderedOverlay,
  ScaleStep,
  Timeline,
} from '../types.js';

// Tolerance for float comparisons on durations (seconds)
const EPSILON = 1e-6;

// ── Types ─────────────────────────────────────────────────────────────────────

export interface ScheduledWindow {
  segmentIndex: number;
  start: number;
  end: number;
}

export interface PlanInput {
  totalDuration: number;
  canvas: Canvas;
  segments: readonly OverlaySegment[];
  overlays: readonly RenderedOverlay[];
  background: MediaAsset;
  audio: MediaAsset;
  fps?: number;
  backgroundFit?: BackgroundFit;
  musicGainDb?: number;
}

// ── Validation ────────────────────────────────────────────────────────────────

export function validateTotalDuration(totalDuration: number): void {
  if (!Number.isFinite(totalDuration) || totalDuration <= 0) {
    throw new InputError('Total duration must be a positive number of seconds', { totalDuration });
  }
}

export function validateSegments(segments: readonly OverlaySegment[]): void {
  if (segments.length === 0) {
    throw new InputError('At least one overlay segment is required', { segmentCount: 0 });
  }

  let previous = -Infinity;
  for (const segment of segments) {
    if (!Number.isInteger(segment.index) || segment.index <= previous) {
      throw new InputError('Segment indices must be strictly increasing integers', {
        segmentIndex: segment.index,
        previousIndex: previous,
      });
    }
    previous = segment.index;

    if (segment.text.trim().length === 0) {
      throw new InputError('Segment text is empty', { segmentIndex: segment.index });
    }

    const requested = segment.requestedDuration;
    if (requested !== undefined && (!Number.isFinite(requested) || requested <= 0)) {
      throw new InputError('Requested segment duration must be positive', {
        segmentIndex: segment.index,
        requestedDuration: requested,
      });
    }
  }
}

function validateAsset(asset: MediaAsset, role: 'background' | 'audio'): void {
  if (!Number.isFinite(asset.duration) || asset.duration <= 0) {
    throw new InputError(`The ${role} asset has no usable duration`, {
      asset: asset.path,
      duration: asset.duration,
    });
  }
}

export function validateCanvas(canvas: Canvas): void {
  if (!Number.isInteger(canvas.width) || !Number.isInteger(canvas.height) || canvas.width <= 0 || canvas.height <= 0) {
    throw new InputError('Canvas dimensions must be positive integers', { ...canvas });
  }
  if (canvas.width % 2 !== 0 || canvas.height % 2 !== 0) {
    throw new InputError('Canvas dimensions must be even for yuv420p output', { ...canvas });
  }
}

// ── Scheduling ────────────────────────────────────────────────────────────────

/**
 * Split [0, totalDuration) into one window per segment.
 *
 * Segments with a requested duration keep it; the rest share the remainder
 * equally. Windows are chained (each start is the previous end) and the last
 * end is pinned to totalDuration, so accumulated float error never leaves a
 * gap or an overlap at the tail.
 */
export function scheduleWindows(totalDuration: number, segments: readonly OverlaySegment[]): ScheduledWindow[] {
  validateTotalDuration(totalDuration);
  validateSegments(segments);

  const explicitTotal = segments.reduce((sum, s) => sum + (s.requestedDuration ?? 0), 0);
  const unspecified = segments.filter(s => s.requestedDuration === undefined).length;

  if (explicitTotal > totalDuration + EPSILON) {
    throw new InputError('Requested segment durations exceed the total duration', {
      totalDuration,
      requestedTotal: explicitTotal,
    });
  }

  const remainder = totalDuration - explicitTotal;
  const share = unspecified > 0 ? remainder / unspecified : 0;

  if (unspecified > 0 && share <= EPSILON) {
    throw new InputError('No time left for segments without a requested duration', {
      totalDuration,
      requestedTotal: explicitTotal,
      unspecifiedCount: unspecified,
    });
  }
  if (unspecified === 0 && remainder > EPSILON) {
    logger.warn('Planner: requested durations fall short - last window absorbs the remainder', {
      totalDuration,
      requestedTotal: explicitTotal,
    });
  }

  const lastPosition = segments.length - 1;
  let cursor = 0;

  return segments.map((segment, position) => {
    const start = cursor;
    const end = position === lastPosition ? totalDuration : start + (segment.requestedDuration ?? share);
    if (!(end - start > 0)) {
      throw new InputError('Segment window has no duration', {
        segmentIndex: segment.index,
        start,
        end,
      });
    }
    cursor = end;
    return { segmentIndex: segment.index, start, end };
  });
}

/** Passes through the source needed to cover the total; 1 when no loop is needed. */
export function loopIterations(sourceDuration: number, totalDuration: number): number {
  return Math.max(1, Math.ceil(totalDuration / sourceDuration - EPSILON));
}

// ── Planning ──────────────────────────────────────────────────────────────────

export function planTimeline(input: PlanInput): Timeline {
  const {
    totalDuration,
    canvas,
    segments,
    overlays,
    background,
    audio,
    fps = ENCODE.fps,
    backgroundFit = env.BACKGROUND_FIT,
    musicGainDb = env.MUSIC_GAIN_DB,
  } = input;

  validateTotalDuration(totalDuration);
  validateSegments(segments);
  validateAsset(background, 'background');
  validateAsset(audio, 'audio');

  validateCanvas(canvas);

  const overlaysByIndex = new Map(overlays.map(o => [o.segmentIndex, o]));
  for (const segment of segments) {
    const overlay = overlaysByIndex.get(segment.index);
    if (!overlay) {
      throw new InputError('Segment has no rendered overlay', { segmentIndex: segment.index });
    }
    if (overlay.width !== canvas.width || overlay.height !== canvas.height) {
      throw new InputError('Overlay size does not match the canvas', {
        segmentIndex: segment.index,
        overlay: `${overlay.width}x${overlay.height}`,
        canvas: `${canvas.width}x${canvas.height}`,
      });
    }
  }

  const windows: OverlayWindow[] = scheduleWindows(totalDuration, segments).map(w => {
    const overlay = overlaysByIndex.get(w.segmentIndex);
    if (!overlay) throw new InputError('Segment has no rendered overlay', { segmentIndex: w.segmentIndex });
    return Object.freeze({ overlay, start: w.start, end: w.end });
  });

  if ((background.width ?? 0) < canvas.width || (background.height ?? 0) < canvas.height) {
    logger.warn('Planner: background is smaller than the canvas and will be upscaled', {
      background: background.path,
      source: `${background.width}x${background.height}`,
      canvas: `${canvas.width}x${canvas.height}`,
    });
  }

  const backgroundScale: ScaleStep = Object.freeze({
    input: 'background',
    width: canvas.width,
    height: canvas.height,
    fit: backgroundFit,
  });

  const scaleSteps: ScaleStep[] = [
    backgroundScale,
    ...windows.map(w => Object.freeze({
      input: 'overlay' as const,
      segmentIndex: w.overlay.segmentIndex,
      width: canvas.width,
      height: canvas.height,
      fit: 'exact' as const,
    })),
  ];

  const backgroundInstruction: BackgroundInstruction = Object.freeze({
    source: background,
    loop: background.duration < totalDuration - EPSILON,
    iterations: loopIterations(background.duration, totalDuration),
    scale: backgroundScale,
  });

  const audioInstruction: AudioInstruction = Object.freeze({
    source: audio,
    mode: audio.duration < totalDuration - EPSILON ? 'loop' : 'trim',
    iterations: loopIterations(audio.duration, totalDuration),
    gainDb: musicGainDb,
  });

  const timeline: Timeline = Object.freeze({
    totalDuration,
    canvas: Object.freeze({ width: canvas.width, height: canvas.height }),
    fps,
    windows: Object.freeze(windows),
    background: backgroundInstruction,
    audio: audioInstruction,
    scaleSteps: Object.freeze(scaleSteps),
  });

  logger.info('Planner: timeline computed', {
    totalDuration,
    windows: windows.length,
    backgroundLoops: backgroundInstruction.iterations,
    audioMode: audioInstruction.mode,
    audioIterations: audioInstruction.iterations,
  });
  return timeline;
}
