/**
 * Gate 1: Duration & Streams
 * The produced file must last the planned duration to within one frame and
 * carry a canvas-sized video stream plus an audio stream.
 */
import { probeMedia } from '../media/ffmpeg.js';
import { logger } from '../utils/logger.js';
import type { IntegrityDefect } from '../utils/errors.js';
import type { MediaAsset, Timeline } from '../types.js';

export interface Gate1Result {
  pass: boolean;
  /** Probed seconds; NaN when the file could not be probed. */
  duration: number;
  code?: IntegrityDefect;
  reason?: string;
}

export async function runGate1(videoPath: string, timeline: Timeline): Promise<Gate1Result> {
  logger.info('Gate 1: duration check starting', { videoPath, expected: timeline.totalDuration });

  let probed: MediaAsset;
  try {
    probed = await probeMedia(videoPath, 'video');
  } catch (err) {
    const reason = `output could not be probed: ${err instanceof Error ? err.message : String(err)}`;
    logger.warn('Gate 1: FAIL - probe failed', { videoPath, reason });
    return { pass: false, duration: NaN, code: 'sampling-failed', reason };
  }

  const { duration } = probed;
  const tolerance = 1 / timeline.fps;
  const drift = Math.abs(duration - timeline.totalDuration);

  if (!Number.isFinite(duration) || drift > tolerance + 1e-9) {
    const reason =
      `duration ${duration.toFixed(3)}s differs from planned ${timeline.totalDuration}s ` +
      `by more than one frame (${tolerance.toFixed(3)}s)`;
    logger.warn('Gate 1: FAIL - duration mismatch', { duration, drift, tolerance });
    return { pass: false, duration, code: 'duration-mismatch', reason };
  }

  const { width, height } = timeline.canvas;
  if (probed.width !== width || probed.height !== height) {
    const reason = `video is ${probed.width}x${probed.height}, expected ${width}x${height}`;
    logger.warn('Gate 1: FAIL - frame size mismatch', { reason });
    return { pass: false, duration, code: 'stream-mismatch', reason };
  }

  if (!probed.hasAudio) {
    const reason = 'output has no audio stream';
    logger.warn('Gate 1: FAIL - audio stream missing');
    return { pass: false, duration, code: 'stream-mismatch', reason };
  }

  logger.info('Gate 1: PASS', { duration, drift });
  return { pass: true, duration };
}
