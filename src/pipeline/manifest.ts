/**
 * Job manifest: the hand-off from asset resolution: resolved file paths,
 * the verse segments and the run parameters, as one JSON document.
 */
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { FORMAT_PRESETS, type Canvas, type VideoFormat } from '../config.js';
import { InputError } from '../utils/errors.js';
import type { OverlaySegment } from '../types.js';
import type { SamplingOptions } from '../gates/sampling.js';

// ── Schema ────────────────────────────────────────────────────────────────────

const SegmentSchema = z.object({
  index:             z.number().int().nonnegative().optional(),
  text:              z.string(),
  reference:         z.string().optional(),
  requestedDuration: z.number().optional(),
});

export const ManifestSchema = z.object({
  format:        z.enum(['shorts', 'medium', 'extended', 'sleep']).optional(),
  // Range checks on duration and segments belong to the planner
  totalDuration: z.number().optional(),
  canvas:        z.object({
    width:  z.number().int().positive(),
    height: z.number().int().positive(),
  }).optional(),
  background:    z.string().min(1),
  music:         z.string().min(1),
  segments:      z.array(SegmentSchema),
  output:        z.string().min(1).optional(),
  verify:        z.object({
    checkpointInterval: z.number().positive().optional(),
    probeGap:           z.number().positive().optional(),
    maxCheckpoints:     z.number().int().min(2).optional(),
  }).optional(),
});

export type Manifest = z.infer<typeof ManifestSchema>;

// ── Request ───────────────────────────────────────────────────────────────────

export interface AssemblyRequest {
  totalDuration: number;
  canvas: Canvas;
  backgroundPath: string;
  musicPath: string;
  segments: OverlaySegment[];
  /** Defaults to OUTPUT_DIR/<date>_<label>_<run>.mp4 */
  outputPath?: string;
  /** Used in the default output name, e.g. the format. */
  label?: string;
  sampling?: Partial<SamplingOptions>;
  compositionTimeoutMs?: number;
}

/**
 * Turn a manifest into a request. Relative paths resolve against `baseDir`
 * (the manifest's directory); a `format` preset fills in duration and canvas
 * unless they are given explicitly.
 */
export function toAssemblyRequest(manifest: Manifest, baseDir: string): AssemblyRequest {
  const preset = manifest.format ? FORMAT_PRESETS[manifest.format] : undefined;
  const totalDuration = manifest.totalDuration ?? preset?.totalDuration;
  const canvas = manifest.canvas ?? preset?.canvas;

  if (totalDuration === undefined || canvas === undefined) {
    throw new InputError('Manifest needs a format or both totalDuration and canvas', {
      format: manifest.format,
      totalDuration: manifest.totalDuration,
      canvas: manifest.canvas,
    });
  }

  const resolve = (p: string) => path.resolve(baseDir, p);
  const label: VideoFormat | 'custom' = manifest.format ?? 'custom';

  return {
    totalDuration,
    canvas: { ...canvas },
    backgroundPath: resolve(manifest.background),
    musicPath: resolve(manifest.music),
    segments: manifest.segments.map((s, position) => ({
      index: s.index ?? position,
      text: s.text,
      reference: s.reference,
      requestedDuration: s.requestedDuration,
    })),
    outputPath: manifest.output ? resolve(manifest.output) : undefined,
    label,
    sampling: manifest.verify,
  };
}

export function parseManifest(raw: unknown, source = 'manifest'): Manifest {
  const parsed = ManifestSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new InputError(`Invalid manifest ${source}`, { source, issues });
  }
  return parsed.data;
}

export async function loadManifest(manifestPath: string): Promise<AssemblyRequest> {
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.promises.readFile(manifestPath, 'utf-8'));
  } catch (err) {
    throw new InputError('Manifest could not be read', { manifestPath }, { cause: err });
  }
  return toAssemblyRequest(parseManifest(raw, manifestPath), path.dirname(path.resolve(manifestPath)));
}
