import type { BackgroundFit, Canvas } from './config.js';
import type { IntegrityDefect } from './utils/errors.js';

// ── Assets ────────────────────────────────────────────────────────────────────

export type MediaKind = 'video' | 'audio' | 'image';

/** A resolved input file. Produced once by probing; never mutated downstream. */
export interface MediaAsset {
  readonly path: string;
  readonly kind: MediaKind;
  /** Seconds. Zero for still images. */
  readonly duration: number;
  readonly width?: number;
  readonly height?: number;
  readonly fps?: number;
  readonly hasAudio: boolean;
}

// ── Overlays ──────────────────────────────────────────────────────────────────

export interface OverlaySegment {
  /** Position in the script; strictly increasing across a run. */
  index: number;
  text: string;
  /** Verse reference drawn under the text, e.g. "Psalm 23:1". */
  reference?: string;
  /** Seconds on screen. Omitted segments share whatever time is left equally. */
  requestedDuration?: number;
}

export interface RenderedOverlay {
  /** Lookup key back to the OverlaySegment, not ownership. */
  readonly segmentIndex: number;
  readonly imagePath: string;
  readonly width: number;
  readonly height: number;
}

// ── Timeline ──────────────────────────────────────────────────────────────────

export interface OverlayWindow {
  readonly overlay: RenderedOverlay;
  /** Inclusive, seconds. */
  readonly start: number;
  /** Exclusive, seconds. */
  readonly end: number;
}

export type ScaleFit = BackgroundFit | 'exact';

export interface ScaleStep {
  readonly input: 'background' | 'overlay';
  readonly segmentIndex?: number;
  readonly width: number;
  readonly height: number;
  readonly fit: ScaleFit;
}

export interface BackgroundInstruction {
  readonly source: MediaAsset;
  /** True when the clip is shorter than the video and must be looped in place. */
  readonly loop: boolean;
  /** Number of (possibly partial) passes through the clip. */
  readonly iterations: number;
  readonly scale: ScaleStep;
}

export interface AudioInstruction {
  readonly source: MediaAsset;
  readonly mode: 'loop' | 'trim';
  readonly iterations: number;
  readonly gainDb: number;
}

export interface Timeline {
  readonly totalDuration: number;
  readonly canvas: Readonly<Canvas>;
  readonly fps: number;
  readonly windows: readonly OverlayWindow[];
  readonly background: BackgroundInstruction;
  readonly audio: AudioInstruction;
  readonly scaleSteps: readonly ScaleStep[];
}

// ── Results ───────────────────────────────────────────────────────────────────

export type VerificationStatus =
  | { status: 'pass' }
  | { status: 'fail'; code: IntegrityDefect; reason: string };

export interface AssemblyResult {
  runId: string;
  outputPath: string;
  /** Probed from the produced file, not copied from the request. */
  totalDuration: number;
  outputSha256: string;
  timeline: Timeline;
  verification: VerificationStatus;
}
