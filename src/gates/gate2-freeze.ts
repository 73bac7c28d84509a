/**
 * Gate 2: Frozen / Duplicated Frames
 * Fingerprints raw frames at the planned sample points and rejects the video
 * when two samples that should show different pictures are pixel-identical.
 *
 * Heuristic: a pass means no duplicate was found at the sampled points, not
 * that none exists.
 */
import { extractFrameRgb } from '../media/frames.js';
import { hashBuffer } from '../utils/hash.js';
import { logger } from '../utils/logger.js';
import type { IntegrityDefect } from '../utils/errors.js';
import type { Timeline } from '../types.js';
import {
  DEFAULT_SAMPLING,
  expectedDistinct,
  planSamplePoints,
  type SamplePoint,
  type SamplingOptions,
} from './sampling.js';

export interface FrameSample extends SamplePoint {
  sha256: string;
}

export interface Gate2Result {
  pass: boolean;
  samples: FrameSample[];
  /** The first offending pair, earliest first. */
  duplicate?: [FrameSample, FrameSample];
  code?: IntegrityDefect;
  reason?: string;
}

/** First pair of samples that should differ but hash the same. */
export function findDuplicateFrames(
  timeline: Timeline,
  samples: readonly FrameSample[],
): [FrameSample, FrameSample] | undefined {
  for (let i = 0; i < samples.length; i++) {
    for (let j = i + 1; j < samples.length; j++) {
      const a = samples[i];
      const b = samples[j];
      if (!a || !b || a.sha256 !== b.sha256) continue;
      if (expectedDistinct(timeline, a, b)) return a.time <= b.time ? [a, b] : [b, a];
    }
  }
  return undefined;
}

export async function runGate2(
  videoPath: string,
  timeline: Timeline,
  options: SamplingOptions = DEFAULT_SAMPLING,
): Promise<Gate2Result> {
  const points = planSamplePoints(timeline, options);
  logger.info('Gate 2: frame fingerprinting starting', {
    videoPath,
    samples: points.length,
    checkpoints: [...new Set(points.map(p => p.checkpoint))],
  });

  const samples: FrameSample[] = [];
  for (const point of points) {
    try {
      const frame = await extractFrameRgb(videoPath, point.time, timeline.canvas);
      samples.push({ ...point, sha256: hashBuffer(frame) });
    } catch (err) {
      const reason = `frame at ${point.time}s could not be sampled: ${err instanceof Error ? err.message : String(err)}`;
      logger.warn('Gate 2: FAIL - sampling failed', { time: point.time, reason });
      return { pass: false, samples, code: 'sampling-failed', reason };
    }
  }

  const duplicate = findDuplicateFrames(timeline, samples);
  if (duplicate) {
    const [a, b] = duplicate;
    const reason =
      `frames at ${a.time}s and ${b.time}s are identical (sha256 ${a.sha256.slice(0, 12)}) ` +
      `but should differ: frozen or duplicated frame near ${a.checkpoint}s`;
    logger.warn('Gate 2: FAIL - duplicate frame detected', { a: a.time, b: b.time, sha256: a.sha256 });
    return { pass: false, samples, duplicate, code: 'frozen-frame', reason };
  }

  logger.info('Gate 2: PASS', { samples: samples.length });
  return { pass: true, samples };
}
