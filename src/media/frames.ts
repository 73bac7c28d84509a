/**
 * Frame extraction for integrity checks. Decodes single frames straight to
 * raw RGB over stdout, so fingerprints are taken over pixel data rather than
 * over a lossy re-encode.
 */
import { TIMEOUTS, type Canvas } from '../config.js';
import { logger } from '../utils/logger.js';
import { formatSeconds, runFfmpeg } from './ffmpeg.js';

const BYTES_PER_PIXEL = 3; // rgb24

/**
 * Decode the frame displayed at `timeSeconds`.
 * Rejects when the decoder produces nothing or a truncated frame.
 *
 * @param videoPath    Absolute path to the finished video.
 * @param timeSeconds  Seek position; accurate seek, not keyframe-snapped.
 * @param canvas       Expected frame size, used to validate the byte count.
 */
export async function extractFrameRgb(
  videoPath: string,
  timeSeconds: number,
  canvas: Canvas,
): Promise<Buffer> {
  logger.debug('Frames: extracting raw frame', { videoPath, timeSeconds });

  const { stdout } = await runFfmpeg(
    [
      '-v', 'error',
      '-ss', formatSeconds(timeSeconds),
      '-i', videoPath,
      '-map', '0:v:0',
      '-frames:v', '1',
      '-f', 'rawvideo',
      '-pix_fmt', 'rgb24',
      'pipe:1',
    ],
    `extractFrame@${formatSeconds(timeSeconds)}`,
    TIMEOUTS.frameMs,
  );

  const expected = canvas.width * canvas.height * BYTES_PER_PIXEL;
  if (stdout.length !== expected) {
    throw new Error(
      `extractFrameRgb: got ${stdout.length} bytes at t=${formatSeconds(timeSeconds)}, expected ${expected}`,
    );
  }
  return stdout;
}
