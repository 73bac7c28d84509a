/**
 * Gate 3: Audio Levels
 * The music must be present and must not clip: peak below 0 dBFS, mean above
 * the silence floor.
 */
import { AUDIO_THRESHOLDS } from '../config.js';
import { detectVolume, type VolumeStats } from '../media/ffmpeg.js';
import { logger } from '../utils/logger.js';
import type { IntegrityDefect } from '../utils/errors.js';

export interface Gate3Result {
  pass: boolean;
  meanVolumeDb: number;
  maxVolumeDb: number;
  code?: IntegrityDefect;
  reason?: string;
}

export async function runGate3(videoPath: string): Promise<Gate3Result> {
  logger.info('Gate 3: audio level check starting', { videoPath });

  let stats: VolumeStats;
  try {
    stats = await detectVolume(videoPath);
  } catch (err) {
    const reason = `audio could not be analysed: ${err instanceof Error ? err.message : String(err)}`;
    logger.warn('Gate 3: FAIL - volumedetect failed', { reason });
    return { pass: false, meanVolumeDb: -99, maxVolumeDb: -99, code: 'sampling-failed', reason };
  }

  const { meanVolumeDb, maxVolumeDb } = stats;

  if (maxVolumeDb >= AUDIO_THRESHOLDS.maxPeakDb) {
    const reason = `peak ${maxVolumeDb.toFixed(1)}dB reaches full scale, audio is clipping`;
    logger.warn('Gate 3: FAIL - clipping', { maxVolumeDb });
    return { pass: false, meanVolumeDb, maxVolumeDb, code: 'audio-clipping', reason };
  }

  if (meanVolumeDb < AUDIO_THRESHOLDS.silenceDb) {
    const reason = `mean ${meanVolumeDb.toFixed(1)}dB is below ${AUDIO_THRESHOLDS.silenceDb}dB, audio is silent`;
    logger.warn('Gate 3: FAIL - silent', { meanVolumeDb });
    return { pass: false, meanVolumeDb, maxVolumeDb, code: 'audio-silent', reason };
  }

  logger.info('Gate 3: PASS', { meanVolumeDb, maxVolumeDb });
  return { pass: true, meanVolumeDb, maxVolumeDb };
}
