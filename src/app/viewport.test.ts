import { describe, it, expect } from "vitest";
import { RESET, composeBox, composeRow, composeViewport } from "./viewport.ts";

describe("composeRow", () => {
  it("pads a plain row to the width", () => {
    expect(composeRow([{ glyph: "a" }, { glyph: "b" }], 4)).toBe("ab  ");
  });

  it("clips a row wider than the width", () => {
    expect(composeRow([{ glyph: "a" }, { glyph: "b" }, { glyph: "c" }], 2)).toBe("ab");
  });

  it("emits a color escape only when the color changes", () => {
    const row = [
      { glyph: "a", color: [1, 2, 3] as const },
      { glyph: "b", color: [1, 2, 3] as const },
      { glyph: "c", color: [4, 5, 6] as const },
    ];
    expect(composeRow(row, 3)).toBe("\x1b[38;2;1;2;3mab\x1b[38;2;4;5;6mc" + RESET);
  });

  it("resets before an uncolored cell", () => {
    expect(composeRow([{ glyph: "a", color: [9, 9, 9] }, { glyph: "b" }], 2)).toBe("\x1b[38;2;9;9;9ma" + RESET + "b");
  });

  it("fills a missing row with spaces", () => {
    expect(composeRow(undefined, 3)).toBe("   ");
  });
});

describe("composeViewport", () => {
  it("centers the grid", () => {
    expect(composeViewport([[{ glyph: "a" }, { glyph: "b" }]], 6, 3)).toEqual(["      ", "  ab  ", "      "]);
  });

  it("fills an empty grid with blank lines", () => {
    expect(composeViewport([], 2, 2)).toEqual(["  ", "  "]);
  });
});

describe("composeBox", () => {
  it("draws a titled box around the lines", () => {
    expect(composeBox("Keys", ["a", "bcd"])).toEqual([
      "╭─ Keys ─╮",
      "│ a      │",
      "│ bcd    │",
      "╰────────╯",
    ]);
  });
});
