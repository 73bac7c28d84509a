import { planTimeline } from '../../src/pipeline/planner.js';
import type { Canvas } from '../../src/config.js';
import type { MediaAsset, OverlaySegment, RenderedOverlay, Timeline } from '../../src/types.js';

export const HD: Canvas = { width: 1920, height: 1080 };

export function videoAsset(duration: number, overrides: Partial<MediaAsset> = {}): MediaAsset {
  return {
    path: '/assets/background.mp4',
    kind: 'video',
    duration,
    width: 1920,
    height: 1080,
    fps: 25,
    hasAudio: false,
    ...overrides,
  };
}

export function audioAsset(duration: number, overrides: Partial<MediaAsset> = {}): MediaAsset {
  return {
    path: '/assets/music.m4a',
    kind: 'audio',
    duration,
    hasAudio: true,
    ...overrides,
  };
}

export function segments(count: number, durations: (number | undefined)[] = []): OverlaySegment[] {
  return Array.from({ length: count }, (_, i) => ({
    index: i,
    text: `Verse number ${i + 1}`,
    requestedDuration: durations[i],
  }));
}

export function overlaysFor(segs: readonly OverlaySegment[], canvas: Canvas = HD): RenderedOverlay[] {
  return segs.map(s => ({
    segmentIndex: s.index,
    imagePath: `/work/overlay_${String(s.index).padStart(4, '0')}.png`,
    width: canvas.width,
    height: canvas.height,
  }));
}

/** Scenario A: 10 s background and music, 60 s total, three equal windows. */
export function scenarioTimeline(
  overrides: { background?: number; audio?: number; total?: number; count?: number; canvas?: Canvas } = {},
): Timeline {
  const segs = segments(overrides.count ?? 3);
  const canvas = overrides.canvas ?? HD;
  return planTimeline({
    totalDuration: overrides.total ?? 60,
    canvas,
    segments: segs,
    overlays: overlaysFor(segs, canvas),
    background: videoAsset(overrides.background ?? 10),
    audio: audioAsset(overrides.audio ?? 10),
    backgroundFit: 'cover',
    musicGainDb: 0,
  });
}
