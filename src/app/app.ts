import termKit from "terminal-kit";
import type { GlyphGrid } from "../ascii/glyph-converter.ts";
import type { Renderer, RendererHandlers } from "./renderer.ts";
import type { GridSize } from "./settings.ts";
import { layoutStatusLine } from "./status-bar.ts";
import { composeBox, composeViewport, INVERSE, RESET } from "./viewport.ts";

const STATUS_ROWS = 1;
const HELP_LEFT = 3;
const HELP_TOP = 2;

/** Full-screen terminal renderer on terminal-kit. */
export class TerminalApp implements Renderer {
  private readonly term = termKit.terminal;
  private started = false;

  start(handlers: RendererHandlers): void {
    const { term } = this;
    term.fullscreen(true);
    term.hideCursor();
    term.grabInput(true);

    term.on("key", (name: string) => {
      handlers.onKey(name);
    });
    term.on("resize", (width: number, height: number) => {
      handlers.onResize({ cols: width, rows: Math.max(0, height - STATUS_ROWS) });
    });

    this.started = true;
  }

  viewport(): GridSize {
    const cols = Number.isFinite(this.term.width) && this.term.width > 0 ? this.term.width : 80;
    const rows = Number.isFinite(this.term.height) && this.term.height > 0 ? this.term.height : 24;
    return { cols, rows: Math.max(0, rows - STATUS_ROWS) };
  }

  render(grid: GlyphGrid, status: string, help?: readonly string[]): void {
    if (!this.started) return;
    const { cols, rows } = this.viewport();

    const lines = composeViewport(grid, cols, rows);
    for (let y = 0; y < lines.length; y++) {
      this.term.moveTo(1, y + 1);
      process.stdout.write(lines[y] ?? "");
    }

    this.term.moveTo(1, rows + 1);
    process.stdout.write(INVERSE + layoutStatusLine(status, cols) + RESET);

    if (help) {
      const box = composeBox("Controls", help);
      for (let i = 0; i < box.length; i++) {
        this.term.moveTo(HELP_LEFT, HELP_TOP + i);
        process.stdout.write(box[i] ?? "");
      }
    }
  }

  destroy(): void {
    if (!this.started) return;
    this.started = false;
    const { term } = this;
    term.grabInput(false);
    term.hideCursor(false);
    term.styleReset();
    term.fullscreen(false);
  }
}
