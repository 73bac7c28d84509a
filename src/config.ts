import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import * as os from 'os';
import * as path from 'path';

dotenvConfig();

// ── Env Schema ────────────────────────────────────────────────────────────────

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform(v => v === 'true' || v === '1');

const EnvSchema = z.object({
  // Local storage
  WORK_DIR:                      z.string().default(path.join(os.tmpdir(), 'stillwater')),
  OUTPUT_DIR:                    z.string().default('output/videos'),
  KEEP_WORK_DIR:                 booleanFlag.default('false'),

  // Media tooling
  FFMPEG_PATH:                   z.string().min(1).default('ffmpeg'),
  FFPROBE_PATH:                  z.string().min(1).default('ffprobe'),

  // Overlay fonts (missing files fall back, see media/overlay.ts)
  OVERLAY_FONT_PATH:             z.string().default('/usr/share/fonts/truetype/dejavu/DejaVuSerif.ttf'),
  OVERLAY_REFERENCE_FONT_PATH:   z.string().default('/usr/share/fonts/truetype/dejavu/DejaVuSerif-Italic.ttf'),

  // Composition
  BACKGROUND_FIT:                z.enum(['cover', 'contain']).default('cover'),
  MUSIC_GAIN_DB:                 z.coerce.number().max(0).default(0),
  X264_PRESET:                   z.enum(['ultrafast', 'veryfast', 'faster', 'fast', 'medium', 'slow']).default('medium'),
  X264_CRF:                      z.coerce.number().int().min(0).max(51).default(23),
  COMPOSE_TIMEOUT_BASE_MS:       z.coerce.number().int().positive().default(120_000),
  COMPOSE_TIMEOUT_MS_PER_SECOND: z.coerce.number().int().positive().default(1_000),

  // Verification
  VERIFY_CHECKPOINT_INTERVAL:    z.coerce.number().positive().optional(),
  VERIFY_PROBE_GAP:              z.coerce.number().positive().default(0.5),
  VERIFY_MAX_CHECKPOINTS:        z.coerce.number().int().min(2).default(16),

  // Logging
  LOG_LEVEL:                     z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT:                    z.enum(['text', 'json']).default('text'),
});

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
  const invalid = parsed.error.issues.map(i => `${i.path.join('.')} (${i.message})`).join(', ');
  throw new Error(`Invalid environment variables: ${invalid}`);
}

export const env = parsed.data;

// ── Domain Types ─────────────────────────────────────────────────────────────

export type VideoFormat = 'shorts' | 'medium' | 'extended' | 'sleep';

export type BackgroundFit = 'cover' | 'contain';

export interface Canvas {
  width: number;
  height: number;
}

// ── Format Presets ────────────────────────────────────────────────────────────
// One preset per daily runner: duration in seconds, canvas in pixels.

export const FORMAT_PRESETS: Record<VideoFormat, { totalDuration: number; canvas: Canvas }> = {
  shorts:   { totalDuration: 60,     canvas: { width: 1080, height: 1080 } },
  medium:   { totalDuration: 600,    canvas: { width: 1920, height: 1080 } },
  extended: { totalDuration: 3_600,  canvas: { width: 1920, height: 1080 } },
  sleep:    { totalDuration: 28_800, canvas: { width: 1920, height: 1080 } },
};

// ── Encoding ──────────────────────────────────────────────────────────────────

export const ENCODE = {
  fps:          25,
  videoCodec:   'libx264',
  preset:       env.X264_PRESET,
  crf:          env.X264_CRF,
  pixelFormat:  'yuv420p',
  audioCodec:   'aac',
  audioBitrate: '192k',
  sampleRate:   48_000,
  limiterPeak:  0.89,   // linear, about -1 dBFS; AAC overshoots the limiter ceiling
} as const;

// ── Overlay Style ─────────────────────────────────────────────────────────────
// Reference values are for a 1920×1080 canvas; see media/overlay.ts for scaling.

export const OVERLAY_STYLE = {
  fontSize:          52,
  lineHeight:        60,
  referenceFontSize: 36,
  referenceGap:      20,
  maxLineChars:      50,
  panelPadding:      50,
  panelAlpha:        120 / 255,
  textColor:         'white',
  referenceColor:    '0xC8C8C8',
} as const;

// ── Verification ──────────────────────────────────────────────────────────────

export const VERIFY_DEFAULTS = {
  checkpointInterval: env.VERIFY_CHECKPOINT_INTERVAL,
  fallbackInterval:   10,    // seconds, when the background does not loop
  probeGap:           env.VERIFY_PROBE_GAP,
  maxCheckpoints:     env.VERIFY_MAX_CHECKPOINTS,
} as const;

export const AUDIO_THRESHOLDS = {
  maxPeakDb:   0,     // at or above this the track is clipping
  silenceDb:  -60,    // mean volume below this is treated as silence
} as const;

// ── Timeouts ──────────────────────────────────────────────────────────────────

export const TIMEOUTS = {
  composeBaseMs:      env.COMPOSE_TIMEOUT_BASE_MS,
  composeMsPerSecond: env.COMPOSE_TIMEOUT_MS_PER_SECOND,
  probeMs:            30_000,
  renderMs:           60_000,
  frameMs:            60_000,
  volumeMs:           30 * 60_000,
} as const;
