/**
 * Core FFmpeg operations: invocation, metadata probing, loudness analysis and
 * filter discovery.
 *
 * All functions reject with ProcessError on non-zero FFmpeg/FFprobe exit.
 * Stage modules wrap those into the run's error taxonomy.
 */
import { z } from 'zod';
import { env, TIMEOUTS } from '../config.js';
import { logger } from '../utils/logger.js';
import type { MediaAsset, MediaKind } from '../types.js';
import { runProcess, type ProcessResult } from './process.js';

// ── Helpers ────────────────────────────────────────────────────────────────────

export function runFfmpeg(args: readonly string[], label: string, timeoutMs?: number): Promise<ProcessResult> {
  return runProcess(env.FFMPEG_PATH, ['-hide_banner', '-nostdin', '-y', ...args], { label, timeoutMs });
}

export function runFfprobe(args: readonly string[], label: string): Promise<ProcessResult> {
  return runProcess(env.FFPROBE_PATH, ['-v', 'error', ...args], { label, timeoutMs: TIMEOUTS.probeMs });
}

/** Seconds formatted for FFmpeg arguments and filter expressions: no exponent, no float noise. */
export function formatSeconds(seconds: number): string {
  return String(Number(seconds.toFixed(6)));
}

// r_frame_rate is returned as "N/D"
function parseRate(rate: string | undefined): number | undefined {
  if (!rate) return undefined;
  const [num, den] = rate.split('/');
  const value = den ? parseFloat(num ?? '0') / parseFloat(den) : parseFloat(num ?? '0');
  return Number.isFinite(value) && value > 0 ? value : undefined;
}

function parseDuration(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = parseFloat(raw);
  return Number.isFinite(value) ? value : undefined;
}

// ── Probe ──────────────────────────────────────────────────────────────────────

const ProbeSchema = z.object({
  streams: z.array(z.object({
    codec_type:   z.string(),
    width:        z.number().optional(),
    height:       z.number().optional(),
    r_frame_rate: z.string().optional(),
    duration:     z.string().optional(),
  })).default([]),
  format: z.object({
    duration: z.string().optional(),
  }).default({}),
});

/**
 * Probe a media file. The duration prefers the container value and falls back
 * to the first stream that reports one; still images report 0.
 */
export async function probeMedia(filePath: string, kind: MediaKind): Promise<MediaAsset> {
  logger.debug('FFprobe: probing', { filePath, kind });

  const { stdout } = await runFfprobe(
    [
      '-show_entries', 'format=duration:stream=codec_type,width,height,r_frame_rate,duration',
      '-of', 'json',
      filePath,
    ],
    `probe:${kind}`,
  );

  let json: unknown;
  try {
    json = JSON.parse(stdout.toString('utf-8'));
  } catch (err) {
    throw new Error(`FFprobe returned unreadable output for ${filePath}`, { cause: err });
  }
  const probe = ProbeSchema.parse(json);

  const video = probe.streams.find(s => s.codec_type === 'video');
  const audio = probe.streams.find(s => s.codec_type === 'audio');

  if (kind !== 'audio' && !video) throw new Error(`No video stream in ${filePath}`);
  if (kind === 'audio' && !audio) throw new Error(`No audio stream in ${filePath}`);

  const streamDuration = probe.streams
    .map(s => parseDuration(s.duration))
    .find((d): d is number => d !== undefined);
  const duration = kind === 'image'
    ? 0
    : parseDuration(probe.format.duration) ?? streamDuration ?? NaN;

  const asset: MediaAsset = {
    path: filePath,
    kind,
    duration,
    width: video?.width,
    height: video?.height,
    fps: kind === 'video' ? parseRate(video?.r_frame_rate) : undefined,
    hasAudio: audio !== undefined,
  };
  logger.debug('FFprobe: probed', { ...asset });
  return asset;
}

// ── Loudness ───────────────────────────────────────────────────────────────────

export interface VolumeStats {
  meanVolumeDb: number;
  maxVolumeDb: number;
}

/** Parse the volumedetect summary; missing values read as -99 dB (silence). */
export function parseVolumeStats(output: string): VolumeStats {
  const mean = output.match(/mean_volume:\s*(-?[\d.]+|-inf)\s*dB/);
  const max = output.match(/max_volume:\s*(-?[\d.]+|-inf)\s*dB/);
  const toDb = (raw: string | undefined) =>
    raw === undefined || raw === '-inf' ? -99 : parseFloat(raw);
  return { meanVolumeDb: toDb(mean?.[1]), maxVolumeDb: toDb(max?.[1]) };
}

/** volumedetect over the first audio stream. Decodes the whole track. */
export async function detectVolume(filePath: string): Promise<VolumeStats> {
  const { stderr } = await runFfmpeg(
    ['-v', 'info', '-nostats', '-i', filePath, '-map', '0:a:0', '-af', 'volumedetect', '-f', 'null', '-'],
    'detectVolume',
    TIMEOUTS.volumeMs,
  );
  const stats = parseVolumeStats(stderr);
  logger.debug('FFmpeg: volume detected', { filePath, ...stats });
  return stats;
}

// ── Capabilities ───────────────────────────────────────────────────────────────

/** Names of the filters compiled into the local FFmpeg build. */
export async function listFilters(): Promise<Set<string>> {
  const { stdout } = await runProcess(env.FFMPEG_PATH, ['-hide_banner', '-filters'], {
    label: 'listFilters',
    timeoutMs: TIMEOUTS.probeMs,
  });
  const names = stdout
    .toString('utf-8')
    .split('\n')
    .map(line => line.trim().split(/\s+/))
    // Rows look like " T.C drawtext  V->V  Draw text ..."; the legend above them has no "->"
    .filter(parts => /^[TSC.]{3}$/.test(parts[0] ?? '') && /->/.test(parts[2] ?? ''))
    .map(parts => parts[1] ?? '');
  return new Set(names.filter(Boolean));
}
