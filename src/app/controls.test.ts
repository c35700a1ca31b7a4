import { describe, it, expect } from "vitest";
import { KEY_BINDINGS, getCommand, helpLines, keyLabel } from "./controls.ts";

describe("controls", () => {
  it("maps terminal key names to commands", () => {
    expect(getCommand(" ")).toBe("toggle-camera");
    expect(getCommand("+")).toBe("increase-scale");
    expect(getCommand("=")).toBe("increase-scale");
    expect(getCommand("q")).toBe("quit");
    expect(getCommand("CTRL_C")).toBe("quit");
    expect(getCommand("z")).toBeUndefined();
  });

  it("binds every key once", () => {
    const keys = KEY_BINDINGS.map((binding) => binding.key);
    expect(new Set(keys).size).toBe(keys.length);
  });

  it("labels keys for the help overlay", () => {
    expect(keyLabel(" ")).toBe("SPACE");
    expect(keyLabel("x")).toBe("X");
  });

  it("lists visible bindings in the help overlay", () => {
    const lines = helpLines();
    expect(lines).toHaveLength(11);
    expect(lines[0]).toBe("SPACE    Start/stop camera");
    expect(lines.at(-1)).toBe("Q        Quit");
  });
});
