/**
 * Text layout for overlay cards: character-width wrapping and vertical
 * placement of the whole text block. Horizontal placement is left to the
 * drawing step, which centres each line by its measured pixel width.
 */

export interface BlockMetrics {
  lineHeight: number;
  /** Height of the optional reference line, 0 when there is none. */
  referenceHeight: number;
  /** Space between the last text line and the reference line. */
  referenceGap: number;
}

export interface BlockLayout {
  /** Top y of each wrapped text line. */
  lineYs: number[];
  /** Top y of the reference line, when present. */
  referenceY?: number;
  /** Top of the block (first line). */
  top: number;
  height: number;
}

/**
 * Greedy word wrap. Existing newlines are kept as paragraph breaks, runs of
 * whitespace collapse, and a single word longer than `maxChars` is hard-split.
 */
export function wrapText(text: string, maxChars: number): string[] {
  if (!Number.isInteger(maxChars) || maxChars < 1) {
    throw new RangeError(`wrapText: maxChars must be a positive integer, got ${maxChars}`);
  }

  const lines: string[] = [];
  for (const paragraph of text.split(/\r?\n/)) {
    const words = paragraph.trim().split(/\s+/).filter(Boolean);
    let current = '';

    let currentWidth = 0;

    for (const word of words) {
      // Counted and split by code point, never inside a surrogate pair
      let rest = Array.from(word);
      while (rest.length > maxChars) {
        if (current) {
          lines.push(current);
          current = '';
          currentWidth = 0;
        }
        lines.push(rest.slice(0, maxChars).join(''));
        rest = rest.slice(maxChars);
      }
      if (rest.length === 0) continue;

      const piece = rest.join('');
      if (!current) {
        current = piece;
        currentWidth = rest.length;
      } else if (currentWidth + 1 + rest.length <= maxChars) {
        current = `${current} ${piece}`;
        currentWidth += 1 + rest.length;
      } else {
        lines.push(current);
        current = piece;
        currentWidth = rest.length;
      }
    }
    if (current) lines.push(current);
  }
  return lines;
}

/** Place `lineCount` lines (plus the reference, if any) centred on a canvas of `canvasHeight`. */
export function layoutBlock(lineCount: number, canvasHeight: number, metrics: BlockMetrics): BlockLayout {
  const textHeight = lineCount * metrics.lineHeight;
  const hasReference = metrics.referenceHeight > 0;
  const height = textHeight + (hasReference ? metrics.referenceGap + metrics.referenceHeight : 0);
  const top = Math.round((canvasHeight - height) / 2);

  const lineYs = Array.from({ length: lineCount }, (_, i) => top + i * metrics.lineHeight);
  return {
    lineYs,
    referenceY: hasReference ? top + textHeight + metrics.referenceGap : undefined,
    top,
    height,
  };
}
