import type { GlyphGrid } from "../ascii/glyph-converter.ts";
import type { GridSize } from "./settings.ts";

export interface RendererHandlers {
  onKey(name: string): void;
  /** Receives the new glyph area, status line excluded. */
  onResize(size: GridSize): void;
}

/**
 * Paints a glyph grid plus one line of status text. `render` is synchronous
 * and returns nothing; the caller throttles how often it is called.
 */
export interface Renderer {
  start(handlers: RendererHandlers): void;
  /** Glyph area available for the grid. */
  viewport(): GridSize;
  render(grid: GlyphGrid, status: string, help?: readonly string[]): void;
  destroy(): void;
}
