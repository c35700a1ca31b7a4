import type { GlyphGrid, GlyphRow, Rgb } from "../ascii/glyph-converter.ts";

export const RESET = "\x1b[0m";
export const INVERSE = "\x1b[7m";

export function fgColor([r, g, b]: Rgb): string {
  return `\x1b[38;2;${r};${g};${b}m`;
}

function sameColor(a: Rgb | undefined, b: Rgb | undefined): boolean {
  if (a === b) return true;
  if (!a || !b) return false;
  return a[0] === b[0] && a[1] === b[1] && a[2] === b[2];
}

/**
 * One terminal line for a grid row, clipped or space-padded to `width`.
 * Color escapes are only emitted when the color changes between cells.
 */
export function composeRow(row: GlyphRow | undefined, width: number): string {
  if (width <= 0) return "";

  let line = "";
  let current: Rgb | undefined;
  const count = row ? Math.min(width, row.length) : 0;

  for (let x = 0; x < count; x++) {
    const cell = row?.[x];
    if (!cell) continue;
    if (!sameColor(cell.color, current)) {
      line += cell.color ? fgColor(cell.color) : RESET;
      current = cell.color;
    }
    line += cell.glyph;
  }

  if (current) line += RESET;
  return line + " ".repeat(width - count);
}

/** Lines for the glyph area, centered vertically when the grid is shorter than the area. */
export function composeViewport(grid: GlyphGrid, width: number, height: number): string[] {
  const lines: string[] = [];
  const top = Math.max(0, Math.floor((height - grid.length) / 2));
  const left = grid.length > 0 ? Math.max(0, Math.floor((width - (grid[0]?.length ?? 0)) / 2)) : 0;
  const pad = " ".repeat(left);

  for (let y = 0; y < height; y++) {
    const row = grid[y - top];
    lines.push(pad + composeRow(row, width - left));
  }
  return lines;
}

/** Box lines for an overlay listing `body`, titled `title`. */
export function composeBox(title: string, body: readonly string[]): string[] {
  const inner = Math.max(title.length + 2, ...body.map((line) => line.length)) + 2;
  const heading = ` ${title} `;
  const left = Math.floor((inner - heading.length) / 2);
  const top = "╭" + "─".repeat(left) + heading + "─".repeat(inner - left - heading.length) + "╮";
  const bottom = "╰" + "─".repeat(inner) + "╯";
  return [top, ...body.map((line) => "│ " + line.padEnd(inner - 2) + " │"), bottom];
}
