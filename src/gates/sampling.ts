/**
 * Where the freeze gate looks. Checkpoints sit on the join points a
 * multi-clip assembly would have had (every loop length, or every N seconds),
 * plus one point inside the first background pass and one inside the last.
 * Each checkpoint is straddled by two samples `probeGap` apart.
 */
import { VERIFY_DEFAULTS } from '../config.js';
import type { Timeline } from '../types.js';

const EPSILON = 1e-6;

export interface SamplingOptions {
  /** Seconds between boundary checkpoints. Defaults to the loop length. */
  checkpointInterval?: number;
  /** Seconds between the two samples of a checkpoint. */
  probeGap: number;
  maxCheckpoints: number;
}

export type CheckpointKind = 'boundary' | 'first-pass' | 'later-pass';

export interface Checkpoint {
  time: number;
  kind: CheckpointKind;
}

export interface SamplePoint {
  time: number;
  /** Time of the checkpoint this sample belongs to. */
  checkpoint: number;
  /** Position inside the background clip at `time`. */
  backgroundOffset: number;
  /** Zero-based pass through the background clip. */
  iteration: number;
  /** Segment whose overlay is visible at `time`. */
  segmentIndex: number;
}

export const DEFAULT_SAMPLING: SamplingOptions = {
  checkpointInterval: VERIFY_DEFAULTS.checkpointInterval,
  probeGap: VERIFY_DEFAULTS.probeGap,
  maxCheckpoints: VERIFY_DEFAULTS.maxCheckpoints,
};

const round = (t: number) => Number(t.toFixed(6));

function evenlyPick<T>(items: T[], count: number): T[] {
  if (count <= 0) return [];
  if (items.length <= count) return items;
  if (count === 1) return items.slice(0, 1);
  const picked = new Set<number>();
  for (let i = 0; i < count; i++) {
    picked.add(Math.round((i * (items.length - 1)) / (count - 1)));
  }
  return [...picked].sort((a, b) => a - b).flatMap(i => items.slice(i, i + 1));
}

export function planCheckpoints(timeline: Timeline, options: SamplingOptions = DEFAULT_SAMPLING): Checkpoint[] {
  const total = timeline.totalDuration;
  const clip = timeline.background.source.duration;
  const loops = timeline.background.loop;

  const interior: Checkpoint[] = [
    { time: round(Math.min(clip, total) / 2), kind: 'first-pass' },
  ];
  if (loops) {
    let last = timeline.background.iterations - 1;
    // A sliver of a final pass is too short to straddle; use the one before it
    if (total - last * clip < 2 * options.probeGap && last >= 2) last -= 1;
    const start = last * clip;
    const end = Math.min(total, start + clip);
    interior.push({ time: round((start + end) / 2), kind: 'later-pass' });
  }

  const interval = options.checkpointInterval ?? (loops ? clip : VERIFY_DEFAULTS.fallbackInterval);
  const boundaries: Checkpoint[] = [];
  for (let k = 1; k * interval < total - EPSILON; k++) {
    boundaries.push({ time: round(k * interval), kind: 'boundary' });
  }

  const kept = evenlyPick(boundaries, options.maxCheckpoints - interior.length);
  const all = [...interior, ...kept].sort((a, b) => a.time - b.time);
  return all.filter((c, i) => i === 0 || Math.abs(c.time - (all[i - 1]?.time ?? -1)) > EPSILON);
}

/** Locate `time` on the timeline: background pass/offset and visible overlay. */
export function locate(timeline: Timeline, time: number): Omit<SamplePoint, 'time' | 'checkpoint'> {
  const clip = timeline.background.source.duration;
  const iteration = timeline.background.loop ? Math.floor(time / clip) : 0;
  const backgroundOffset = timeline.background.loop ? round(time - iteration * clip) : time;
  const window = timeline.windows.find(w => time >= w.start && time < w.end)
    ?? timeline.windows[timeline.windows.length - 1];
  return { backgroundOffset, iteration, segmentIndex: window?.overlay.segmentIndex ?? -1 };
}

export function planSamplePoints(timeline: Timeline, options: SamplingOptions = DEFAULT_SAMPLING): SamplePoint[] {
  const latest = timeline.totalDuration - 1 / timeline.fps;
  const gap = Math.min(options.probeGap, latest);
  const samples: SamplePoint[] = [];

  for (const { time: c } of planCheckpoints(timeline, options)) {
    let a = c - gap / 2;
    let b = c + gap / 2;
    if (b > latest) {
      b = latest;
      a = latest - gap;
    }
    if (a < 0) {
      a = 0;
      b = gap;
    }
    for (const t of [round(a), round(b)]) {
      samples.push({ time: t, checkpoint: c, ...locate(timeline, t) });
    }
  }
  return samples;
}

/**
 * Whether two samples should show different pictures: a different overlay,
 * or background offsets at least half a frame apart (wrapping at the loop).
 */
export function expectedDistinct(timeline: Timeline, a: SamplePoint, b: SamplePoint): boolean {
  if (a.segmentIndex !== b.segmentIndex) return true;
  let delta = Math.abs(a.backgroundOffset - b.backgroundOffset);
  if (timeline.background.loop) {
    delta = Math.min(delta, timeline.background.source.duration - delta);
  }
  return delta >= 0.5 / timeline.fps;
}
