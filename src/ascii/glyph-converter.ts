import { FrameFormatError } from "../errors.ts";
import { frameByteLength, type Frame } from "../camera/types.ts";
import type { CharacterSet } from "./charsets.ts";

export type Rgb = readonly [r: number, g: number, b: number];

export interface GlyphCell {
  readonly glyph: string;
  readonly color?: Rgb;
}

export type GlyphRow = readonly GlyphCell[];

/** Rows of cells, top to bottom. Replaced wholesale, never patched. */
export type GlyphGrid = readonly GlyphRow[];

export const EMPTY_GRID: GlyphGrid = [];

/** Rec. 601 luma weights, in thousandths. */
export const LUMA_WEIGHTS = { r: 299, g: 587, b: 114 } as const;

// Must be the exact weight sum, or white stops reaching 255 and the upper
// glyphs of every set go unused.
export const LUMA_DIVISOR = LUMA_WEIGHTS.r + LUMA_WEIGHTS.g + LUMA_WEIGHTS.b;

/** Luminance on the 0–255 scale. */
export function luminance(r: number, g: number, b: number): number {
  return (r * LUMA_WEIGHTS.r + g * LUMA_WEIGHTS.g + b * LUMA_WEIGHTS.b) / LUMA_DIVISOR;
}

export function glyphIndex(lum: number, setLength: number): number {
  const maxIdx = setLength - 1;
  const idx = Math.floor((lum * maxIdx) / 255);
  return Math.min(maxIdx, Math.max(0, idx));
}

export function validateFrame(frame: Frame): void {
  const { width, height, channels, data } = frame;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new FrameFormatError(`invalid frame size ${width}x${height}`);
  }
  if (channels !== 1 && channels !== 3 && channels !== 4) {
    throw new FrameFormatError(`unsupported channel count ${String(channels)}`);
  }
  const expected = frameByteLength(width, height, channels);
  if (data.length !== expected) {
    throw new FrameFormatError(
      `frame buffer holds ${data.length} bytes, ${width}x${height}x${channels} needs ${expected}`,
    );
  }
}

/**
 * Source span [start, end) covered by each of `count` output cells along an
 * axis of `size` pixels. Every span holds at least one pixel and stays inside
 * the axis.
 */
export function sampleSpans(size: number, count: number): Int32Array {
  const spans = new Int32Array(count * 2);
  for (let i = 0; i < count; i++) {
    const start = Math.min(size - 1, Math.floor((i * size) / count));
    const end = Math.min(size, Math.max(start + 1, Math.floor(((i + 1) * size) / count)));
    spans[i * 2] = start;
    spans[i * 2 + 1] = end;
  }
  return spans;
}

/**
 * Converts a frame into a `rows` x `cols` glyph grid. Each cell averages the
 * block of source pixels it covers, maps the block's luminance onto the
 * character set, and keeps the block's mean color when `colorEnabled` is set.
 *
 * Throws `FrameFormatError` when the buffer does not match its dimensions.
 */
export function convertFrame(
  frame: Frame,
  rows: number,
  cols: number,
  charset: CharacterSet,
  colorEnabled: boolean,
): GlyphGrid {
  if (rows <= 0 || cols <= 0) return EMPTY_GRID;
  validateFrame(frame);

  const { width, height, channels, data } = frame;
  const glyphs = charset.glyphs;
  const xSpans = sampleSpans(width, cols);
  const ySpans = sampleSpans(height, rows);
  const grid: GlyphRow[] = [];

  for (let cy = 0; cy < rows; cy++) {
    const y0 = ySpans[cy * 2]!;
    const y1 = ySpans[cy * 2 + 1]!;
    const row: GlyphCell[] = [];

    for (let cx = 0; cx < cols; cx++) {
      const x0 = xSpans[cx * 2]!;
      const x1 = xSpans[cx * 2 + 1]!;

      let rSum = 0;
      let gSum = 0;
      let bSum = 0;
      for (let y = y0; y < y1; y++) {
        let i = (y * width + x0) * channels;
        for (let x = x0; x < x1; x++) {
          if (channels === 1) {
            const v = data[i]!;
            rSum += v;
            gSum += v;
            bSum += v;
          } else {
            rSum += data[i]!;
            gSum += data[i + 1]!;
            bSum += data[i + 2]!;
          }
          i += channels;
        }
      }

      const count = (y1 - y0) * (x1 - x0);
      const r = rSum / count;
      const g = gSum / count;
      const b = bSum / count;
      const glyph = glyphs[glyphIndex(luminance(r, g, b), glyphs.length)] ?? " ";

      row.push(
        colorEnabled
          ? { glyph, color: [Math.round(r), Math.round(g), Math.round(b)] }
          : { glyph },
      );
    }

    grid.push(row);
  }

  return grid;
}
