/**
 * Filtergraph building blocks shared by the overlay renderer and the
 * composition engine. Arguments go to FFmpeg without a shell, so only
 * FFmpeg's own two escaping levels apply: option values, then the graph.
 */
import type { ScaleStep } from '../types.js';
import { formatSeconds } from './ffmpeg.js';

/** Escape a free-form option value (file path, colour) for use inside a filtergraph. */
export function escapeFilterValue(value: string): string {
  const optionLevel = value.replace(/[\\':]/g, '\\$&');
  return optionLevel.replace(/[\\'[\],;]/g, '\\$&');
}

/**
 * Timeline-editing expression that is true on the half-open window
 * [start, end). `between()` is closed on both ends and would show two
 * overlays on the frame at a shared boundary.
 */
export function enableWindow(start: number, end: number): string {
  return `gte(t,${formatSeconds(start)})*lt(t,${formatSeconds(end)})`;
}

/** Normalise a visual input to the canvas according to its planned scale step. */
export function scaleFilter(step: ScaleStep): string {
  const { width: w, height: h } = step;
  switch (step.fit) {
    case 'cover':
      return `scale=${w}:${h}:force_original_aspect_ratio=increase,crop=${w}:${h},setsar=1`;
    case 'contain':
      return `scale=${w}:${h}:force_original_aspect_ratio=decrease,pad=${w}:${h}:(ow-iw)/2:(oh-ih)/2:black,setsar=1`;
    case 'exact':
      return `scale=${w}:${h},setsar=1`;
  }
}
