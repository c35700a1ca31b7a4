import { getNextCharacterSet, getPreviousCharacterSet, type CharacterSetName } from "../ascii/charsets.ts";
import type { Command } from "./controls.ts";

/**
 * Conversion settings. Only the event router replaces them, in response to
 * commands; the converter reads a snapshot per frame.
 */
export interface Settings {
  readonly charset: CharacterSetName;
  readonly scale: number;
  readonly color: boolean;
}

export interface GridSize {
  readonly cols: number;
  readonly rows: number;
}

export const MIN_SCALE = 0.1;
export const MAX_SCALE = 2.0;
export const SCALE_STEP = 0.1;

/** Clamps to the scale range and rounds to one decimal so steps do not drift. */
export function clampScale(value: number): number {
  const rounded = Math.round(value * 10) / 10;
  return Math.min(MAX_SCALE, Math.max(MIN_SCALE, rounded));
}

/** Returns the updated settings, or the same object when `command` does not touch them. */
export function applyCommand(settings: Settings, command: Command): Settings {
  switch (command) {
    case "toggle-color":
      return { ...settings, color: !settings.color };
    case "next-charset":
      return { ...settings, charset: getNextCharacterSet(settings.charset) };
    case "previous-charset":
      return { ...settings, charset: getPreviousCharacterSet(settings.charset) };
    case "increase-scale":
      return { ...settings, scale: clampScale(settings.scale + SCALE_STEP) };
    case "decrease-scale":
      return { ...settings, scale: clampScale(settings.scale - SCALE_STEP) };
    default:
      return settings;
  }
}

/** Glyph grid size for a viewport at the given scale. An empty viewport gives an empty grid. */
export function targetGrid(viewport: GridSize, scale: number): GridSize {
  // The epsilon keeps products like 30 * 0.7 from flooring to one below.
  const axis = (size: number): number => (size <= 0 ? 0 : Math.max(1, Math.floor(size * scale + 1e-9)));
  return { cols: axis(viewport.cols), rows: axis(viewport.rows) };
}
