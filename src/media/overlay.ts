/**
 * Overlay rendering. Rasterises each verse into a transparent, canvas-sized
 * PNG: a semi-transparent full-width panel with the wrapped verse centred on
 * it and the reference beneath.
 *
 * Drawing is done by FFmpeg (lavfi colour source + drawbox + drawtext), so
 * text is measured with the same font engine that the rest of the pipeline
 * relies on. Output paths are derived from the segment index; reruns overwrite.
 */
import * as fs from 'fs';
import * as path from 'path';
import { env, OVERLAY_STYLE, TIMEOUTS, type Canvas } from '../config.js';
import { logger } from '../utils/logger.js';
import { RenderError } from '../utils/errors.js';
import type { OverlaySegment, RenderedOverlay } from '../types.js';
import { probeMedia, runFfmpeg } from './ffmpeg.js';
import { escapeFilterValue } from './filters.js';
import { layoutBlock, wrapText } from './text-layout.js';
import { ProcessError } from './process.js';

// ── Style ──────────────────────────────────────────────────────────────────────

export interface OverlayStyle {
  fontSize: number;
  lineHeight: number;
  referenceFontSize: number;
  referenceGap: number;
  maxLineChars: number;
  panelPadding: number;
  panelAlpha: number;
  textColor: string;
  referenceColor: string;
  /** Undefined means FFmpeg's built-in default face (fontconfig "Sans"). */
  fontFile?: string;
  referenceFontFile?: string;
}

const FALLBACK_FONTS = [
  '/usr/share/fonts/truetype/dejavu/DejaVuSerif.ttf',
  '/usr/share/fonts/truetype/liberation/LiberationSerif-Regular.ttf',
  '/usr/share/fonts/dejavu/DejaVuSerif.ttf',
  '/Library/Fonts/Georgia.ttf',
  '/System/Library/Fonts/Supplemental/Georgia.ttf',
];

const BUILTIN_FONT = 'Sans';

/** First existing font file among the preferred path and the known system fonts. */
export function resolveFont(
  preferred: string | undefined,
  fallbacks: readonly string[] = FALLBACK_FONTS,
): string | undefined {
  const candidates = preferred ? [preferred, ...fallbacks] : fallbacks;
  const found = candidates.find(p => fs.existsSync(p));
  if (found !== preferred) {
    logger.warn('Overlay: font not found - falling back', {
      preferred,
      using: found ?? `${BUILTIN_FONT} (built-in)`,
    });
  }
  return found;
}

/**
 * Style scaled from the 1920×1080 reference: type follows canvas height,
 * wrap width follows aspect ratio (50 characters at 16:9, 28 at 1:1).
 */
export function styleForCanvas(
  canvas: Canvas,
  fonts: { fontFile?: string; referenceFontFile?: string } = {
    fontFile: resolveFont(env.OVERLAY_FONT_PATH),
    referenceFontFile: resolveFont(env.OVERLAY_REFERENCE_FONT_PATH),
  },
): OverlayStyle {
  const k = canvas.height / 1080;
  const aspect = canvas.width / canvas.height / (16 / 9);
  return {
    fontSize:          Math.round(OVERLAY_STYLE.fontSize * k),
    lineHeight:        Math.round(OVERLAY_STYLE.lineHeight * k),
    referenceFontSize: Math.round(OVERLAY_STYLE.referenceFontSize * k),
    referenceGap:      Math.round(OVERLAY_STYLE.referenceGap * k),
    maxLineChars:      Math.max(12, Math.floor(OVERLAY_STYLE.maxLineChars * aspect)),
    panelPadding:      Math.round(OVERLAY_STYLE.panelPadding * k),
    panelAlpha:        OVERLAY_STYLE.panelAlpha,
    textColor:         OVERLAY_STYLE.textColor,
    referenceColor:    OVERLAY_STYLE.referenceColor,
    ...fonts,
  };
}

// ── Helpers ────────────────────────────────────────────────────────────────────

export function overlayBaseName(segmentIndex: number): string {
  return `overlay_${String(segmentIndex).padStart(4, '0')}`;
}

function fontOption(fontFile: string | undefined): string {
  return fontFile ? `fontfile=${escapeFilterValue(fontFile)}` : `font=${BUILTIN_FONT}`;
}

function drawLine(textFile: string, fontFile: string | undefined, size: number, color: string, y: number): string {
  return [
    `drawtext=textfile=${escapeFilterValue(textFile)}`,
    'expansion=none',
    fontOption(fontFile),
    `fontsize=${size}`,
    `fontcolor=${color}`,
    'x=(w-text_w)/2',
    `y=${y}`,
  ].join(':');
}

// Quotes around a whole verse are dropped, the panel already frames it
function cleanVerse(text: string): string {
  return text.trim().replace(/^["'“]+|["'”]+$/g, '').trim();
}

// ── Public API ─────────────────────────────────────────────────────────────────

/**
 * Build the drawing filter chain for one segment and write the per-line text
 * files it reads. Returned separately from rendering so layout can be checked
 * without running FFmpeg.
 */
export async function buildOverlayFilter(
  segment: OverlaySegment,
  canvas: Canvas,
  workDir: string,
  style: OverlayStyle,
): Promise<string> {
  const text = cleanVerse(segment.text);
  if (!text) {
    throw new RenderError('Overlay text is empty', { segmentIndex: segment.index });
  }

  const lines = wrapText(text, style.maxLineChars);
  const reference = segment.reference?.trim();
  const block = layoutBlock(lines.length, canvas.height, {
    lineHeight: style.lineHeight,
    referenceHeight: reference ? style.referenceFontSize : 0,
    referenceGap: style.referenceGap,
  });

  const base = path.join(workDir, overlayBaseName(segment.index));
  const draws: string[] = [];

  for (const [i, line] of lines.entries()) {
    const lineFile = `${base}.line${String(i + 1).padStart(2, '0')}.txt`;
    await fs.promises.writeFile(lineFile, line, 'utf-8');
    draws.push(drawLine(lineFile, style.fontFile, style.fontSize, style.textColor, block.lineYs[i] ?? block.top));
  }

  if (reference && block.referenceY !== undefined) {
    const refFile = `${base}.ref.txt`;
    await fs.promises.writeFile(refFile, reference, 'utf-8');
    draws.push(drawLine(refFile, style.referenceFontFile, style.referenceFontSize, style.referenceColor, block.referenceY));
  }

  const panelY = Math.max(0, block.top - style.panelPadding);
  const panelH = Math.min(canvas.height - panelY, block.height + 2 * style.panelPadding);
  const alpha = Number(style.panelAlpha.toFixed(3));
  // replace=1 writes the panel's alpha into the transparent canvas instead of blending onto it
  const panel = `drawbox=x=0:y=${panelY}:w=iw:h=${panelH}:color=black@${alpha}:t=fill:replace=1`;

  return [panel, ...draws].join(',');
}

/**
 * Render one segment to `<workDir>/overlay_NNNN.png` and confirm the image is
 * exactly canvas-sized.
 */
export async function renderOverlay(
  segment: OverlaySegment,
  canvas: Canvas,
  workDir: string,
  style: OverlayStyle = styleForCanvas(canvas),
): Promise<RenderedOverlay> {
  fs.mkdirSync(workDir, { recursive: true });
  const imagePath = path.join(workDir, `${overlayBaseName(segment.index)}.png`);
  const filter = await buildOverlayFilter(segment, canvas, workDir, style);

  try {
    await runFfmpeg(
      [
        '-v', 'error',
        '-f', 'lavfi',
        '-i', `color=c=black@0:s=${canvas.width}x${canvas.height}:d=1:r=1,format=rgba`,
        '-vf', filter,
        '-frames:v', '1',
        '-update', '1',
        imagePath,
      ],
      `renderOverlay:${segment.index}`,
      TIMEOUTS.renderMs,
    );
  } catch (err) {
    const diagnostic = err instanceof ProcessError ? err.stderr : String(err);
    throw new RenderError(
      `Overlay ${segment.index} could not be drawn`,
      { segmentIndex: segment.index, imagePath, diagnostic },
      { cause: err },
    );
  }

  const image = await probeMedia(imagePath, 'image').catch((err: unknown) => {
    throw new RenderError(`Overlay ${segment.index} was not written`, { segmentIndex: segment.index, imagePath }, { cause: err });
  });
  if (image.width !== canvas.width || image.height !== canvas.height) {
    throw new RenderError(`Overlay ${segment.index} has the wrong size`, {
      segmentIndex: segment.index,
      expected: `${canvas.width}x${canvas.height}`,
      actual: `${image.width}x${image.height}`,
    });
  }

  return { segmentIndex: segment.index, imagePath, width: canvas.width, height: canvas.height };
}

/** Render every segment in order with one shared style. */
export async function renderOverlays(
  segments: readonly OverlaySegment[],
  canvas: Canvas,
  workDir: string,
): Promise<RenderedOverlay[]> {
  logger.info('Overlay: rendering overlays', { count: segments.length, canvas: `${canvas.width}x${canvas.height}` });
  const style = styleForCanvas(canvas);
  const rendered: RenderedOverlay[] = [];

  for (const segment of segments) {
    rendered.push(await renderOverlay(segment, canvas, workDir, style));
    if (rendered.length % 100 === 0) {
      logger.info('Overlay: progress', { rendered: rendered.length, total: segments.length });
    }
  }

  logger.info('Overlay: all overlays rendered', { count: rendered.length });
  return rendered;
}
