import { describe, it, expect, vi, afterEach } from "vitest";
import type { Frame } from "./types.ts";
import { MockCamera, PATTERNS, getNextPattern, isPatternName } from "./mock-camera.ts";

describe("MockCamera", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("emits a frame on open and then one per interval", async () => {
    vi.useFakeTimers();
    const cam = new MockCamera(40, 20, 10, "gradient");
    const frames: Frame[] = [];
    cam.onFrame((frame) => frames.push(frame));

    await cam.open();
    expect(frames).toHaveLength(1);
    expect(frames[0]?.width).toBe(40);
    expect(frames[0]?.height).toBe(20);
    expect(frames[0]?.channels).toBe(3);
    expect(frames[0]?.data.length).toBe(40 * 20 * 3);

    vi.advanceTimersByTime(250);
    expect(frames).toHaveLength(3);

    await cam.close();
    vi.advanceTimersByTime(500);
    expect(frames).toHaveLength(3);
    expect(cam.isRunning()).toBe(false);
  });

  it("rejects close when it is not running", async () => {
    const cam = new MockCamera(4, 4, 30);
    await expect(cam.close()).rejects.toMatchObject({ kind: "not-running" });
  });

  it("rejects a second open", async () => {
    vi.useFakeTimers();
    const cam = new MockCamera(4, 4, 30);
    await cam.open();
    await expect(cam.open()).rejects.toMatchObject({ kind: "unavailable" });
    cam.dispose();
    expect(cam.isRunning()).toBe(false);
  });

  it("draws a checkerboard with four pixel cells at the first step", () => {
    const cam = new MockCamera(8, 1, 30, "checkerboard");
    const { data } = cam.generateFrame(0);
    expect(Array.from(data.subarray(0, 3))).toEqual([240, 240, 240]);
    expect(Array.from(data.subarray(12, 15))).toEqual([15, 15, 15]);
  });

  it("draws colored bars brightest first", () => {
    const cam = new MockCamera(16, 1, 30, "bars");
    const { data } = cam.generateFrame(0);
    expect(Array.from(data.subarray(0, 3))).toEqual([235, 235, 235]);
    expect(Array.from(data.subarray(2 * 3, 3 * 3))).toEqual([235, 235, 16]);
    expect(Array.from(data.subarray(15 * 3, 16 * 3))).toEqual([16, 16, 16]);
  });

  it("produces different images for different patterns", () => {
    const gradient = new MockCamera(10, 10, 30, "gradient").generateFrame(0);
    const checker = new MockCamera(10, 10, 30, "checkerboard").generateFrame(0);
    expect(gradient.data).not.toEqual(checker.data);
  });

  it("switches pattern while running", () => {
    const cam = new MockCamera(8, 1, 30, "bars");
    cam.pattern = "checkerboard";
    expect(cam.generateFrame(0).data[0]).toBe(240);
  });
});

describe("patterns", () => {
  it("cycles through every pattern and wraps", () => {
    let current = PATTERNS[0] ?? "gradient";
    const seen = [current];
    for (let i = 1; i < PATTERNS.length; i++) {
      current = getNextPattern(current);
      seen.push(current);
    }
    expect(seen).toEqual([...PATTERNS]);
    expect(getNextPattern("circle")).toBe("gradient");
  });

  it("recognizes pattern names", () => {
    expect(isPatternName("noise")).toBe(true);
    expect(isPatternName("plasma")).toBe(false);
  });
});
