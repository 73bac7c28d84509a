/**
 * Gate runner: the integrity check a render must pass before it may be
 * published. Gates run in order and the first failure decides the verdict:
 *   1. duration & streams
 *   2. frozen / duplicated frames
 *   3. audio levels
 */
import { logger } from '../utils/logger.js';
import { IntegrityError, type IntegrityDefect } from '../utils/errors.js';
import type { AssemblyResult, Timeline, VerificationStatus } from '../types.js';
import { runGate1, type Gate1Result } from './gate1-duration.js';
import { runGate2, type Gate2Result } from './gate2-freeze.js';
import { runGate3, type Gate3Result } from './gate3-audio.js';
import { DEFAULT_SAMPLING, type SamplingOptions } from './sampling.js';

export type { Gate1Result, Gate2Result, Gate3Result };

export interface VerificationReport {
  pass: boolean;
  /** Probed output duration (NaN if the file could not be probed). */
  duration: number;
  code?: IntegrityDefect;
  reason?: string;
  failedGate?: 1 | 2 | 3;
  gate1?: Gate1Result;
  gate2?: Gate2Result;
  gate3?: Gate3Result;
}

function failure(
  gate: 1 | 2 | 3,
  result: { code?: IntegrityDefect; reason?: string },
): Pick<VerificationReport, 'pass' | 'failedGate' | 'code' | 'reason'> {
  return {
    pass: false,
    failedGate: gate,
    code: result.code ?? 'sampling-failed',
    reason: result.reason ?? `gate ${gate} failed`,
  };
}

export async function verifyAssembly(
  videoPath: string,
  timeline: Timeline,
  sampling: Partial<SamplingOptions> = {},
): Promise<VerificationReport> {
  const options: SamplingOptions = { ...DEFAULT_SAMPLING, ...sampling };
  logger.info('Gate runner: starting integrity gates', { videoPath });

  // ─── Gate 1: Duration & Streams ────────────────────────────────────────────
  const gate1 = await runGate1(videoPath, timeline);
  if (!gate1.pass) {
    logger.warn('Gate runner: Gate 1 FAIL', { code: gate1.code });
    return { ...failure(1, gate1), duration: gate1.duration, gate1 };
  }

  // ─── Gate 2: Frozen Frames ─────────────────────────────────────────────────
  const gate2 = await runGate2(videoPath, timeline, options);
  if (!gate2.pass) {
    logger.warn('Gate runner: Gate 2 FAIL', { code: gate2.code });
    return { ...failure(2, gate2), duration: gate1.duration, gate1, gate2 };
  }

  // ─── Gate 3: Audio Levels ──────────────────────────────────────────────────
  const gate3 = await runGate3(videoPath);
  if (!gate3.pass) {
    logger.warn('Gate runner: Gate 3 FAIL', { code: gate3.code });
    return { ...failure(3, gate3), duration: gate1.duration, gate1, gate2, gate3 };
  }

  logger.info('Gate runner: all gates passed', { videoPath, duration: gate1.duration });
  return { pass: true, duration: gate1.duration, gate1, gate2, gate3 };
}

export function toVerificationStatus(report: VerificationReport): VerificationStatus {
  if (report.pass) return { status: 'pass' };
  return {
    status: 'fail',
    code: report.code ?? 'sampling-failed',
    reason: report.reason ?? 'verification failed',
  };
}

/** Guard for the publish hand-off: throws unless the result passed verification. */
export function assertPublishable(result: AssemblyResult): void {
  const { verification } = result;
  if (verification.status === 'fail') {
    throw new IntegrityError(`Output is not publishable: ${verification.reason}`, verification.code, {
      runId: result.runId,
      outputPath: result.outputPath,
    });
  }
}
