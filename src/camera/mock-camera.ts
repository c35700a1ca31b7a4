import { CameraError } from "../errors.ts";
import type { CameraDevice, FaultListener, Frame, FrameListener } from "./types.ts";

export type PatternName = "gradient" | "checkerboard" | "sinewave" | "noise" | "bars" | "circle";

export const PATTERNS: readonly PatternName[] = ["gradient", "checkerboard", "sinewave", "noise", "bars", "circle"];

export function isPatternName(value: string): value is PatternName {
  return PATTERNS.some((name) => name === value);
}

export function getNextPattern(current: PatternName): PatternName {
  const idx = PATTERNS.indexOf(current);
  return PATTERNS[(idx + 1) % PATTERNS.length] ?? "gradient";
}

// Color bars, brightest first like a test card.
const BAR_COLORS: readonly (readonly [number, number, number])[] = [
  [235, 235, 235],
  [235, 235, 16],
  [16, 235, 235],
  [16, 235, 16],
  [235, 16, 235],
  [235, 16, 16],
  [16, 16, 235],
  [16, 16, 16],
];

/** Synthetic camera that animates test patterns on a timer. */
export class MockCamera implements CameraDevice {
  readonly label = "mock";
  private readonly width: number;
  private readonly height: number;
  private readonly fps: number;
  private timer: ReturnType<typeof setInterval> | null = null;
  private listeners = new Set<FrameListener>();
  private t = 0;
  pattern: PatternName;

  constructor(width: number, height: number, fps: number, pattern: PatternName = "gradient") {
    this.width = width;
    this.height = height;
    this.fps = fps;
    this.pattern = pattern;
  }

  onFrame(listener: FrameListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  onFault(_listener: FaultListener): () => void {
    // Synthetic frames never fault.
    return () => undefined;
  }

  async open(): Promise<void> {
    if (this.timer) {
      throw new CameraError("unavailable", "mock camera is already running");
    }
    this.t = 0;
    this.timer = setInterval(() => this.emit(), 1000 / this.fps);
    this.emit();
  }

  async close(): Promise<void> {
    if (!this.timer) {
      throw new CameraError("not-running", "mock camera is not running");
    }
    clearInterval(this.timer);
    this.timer = null;
  }

  dispose(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  /** Renders the current pattern at animation step `t`. */
  generateFrame(t: number): Frame {
    const { width, height } = this;
    const data = new Uint8Array(width * height * 3);

    switch (this.pattern) {
      case "gradient":
        drawGradient(data, width, height, t);
        break;
      case "checkerboard":
        drawCheckerboard(data, width, height, t);
        break;
      case "sinewave":
        drawSinewave(data, width, height, t);
        break;
      case "noise":
        drawNoise(data, width, height);
        break;
      case "bars":
        drawBars(data, width, height, t);
        break;
      case "circle":
        drawCircle(data, width, height, t);
        break;
    }

    return { width, height, channels: 3, data, timestamp: performance.now() };
  }

  private emit(): void {
    const frame = this.generateFrame(this.t++);
    for (const listener of this.listeners) listener(frame);
  }
}

function put(data: Uint8Array, i: number, r: number, g: number, b: number): void {
  data[i] = r;
  data[i + 1] = g;
  data[i + 2] = b;
}

function drawGradient(data: Uint8Array, w: number, h: number, t: number): void {
  const speed = t * 0.02;
  for (let y = 0; y < h; y++) {
    for (let x = 0; x < w; x++) {
      const v = (Math.sin((x / w) * Math.PI + speed) + Math.sin((y / h) * Math.PI + speed * 0.7)) * 0.5;
      const bright = Math.floor(((v + 1) / 2) * 255);
      put(data, (y * w + x) * 3, bright, Math.floor(bright * 0.8), 255 - bright);
    }
  }
}

function drawCheckerboard(data: Uint8Array, w: number, h: number, t: number): void {
  const size = 4 + Math.floor(Math.sin(t * 0.05) * 2);
  const offset = Math.floor(t * 0.3);
  for (let y = 0; y < h; y++) {
    for (let x = 0; x < w; x++) {
      const cx = Math.floor((x + offset) / size);
      const cy = Math.floor((y + offset) / size);
      const bright = (cx + cy) % 2 === 0 ? 240 : 15;
      put(data, (y * w + x) * 3, bright, bright, bright);
    }
  }
}

function drawSinewave(data: Uint8Array, w: number, h: number, t: number): void {
  const speed = t * 0.08;
  for (let y = 0; y < h; y++) {
    for (let x = 0; x < w; x++) {
      const nx = x / w;
      const ny = y / h;
      const v1 = Math.sin(nx * 6 + speed);
      const v2 = Math.sin(ny * 6 + speed * 1.3);
      const v3 = Math.sin((nx + ny) * 4 + speed * 0.7);
      const bright = Math.floor((((v1 + v2 + v3) / 3 + 1) / 2) * 255);
      put(data, (y * w + x) * 3, bright, bright, bright);
    }
  }
}

function drawNoise(data: Uint8Array, w: number, h: number): void {
  for (let i = 0; i < w * h; i++) {
    const bright = Math.floor(Math.random() * 256);
    put(data, i * 3, bright, bright, bright);
  }
}

function drawBars(data: Uint8Array, w: number, h: number, t: number): void {
  const barWidth = Math.max(1, Math.floor(w / BAR_COLORS.length));
  const offset = Math.floor(t * 0.5) % w;
  for (let y = 0; y < h; y++) {
    for (let x = 0; x < w; x++) {
      const bx = (x + offset) % w;
      const [r, g, b] = BAR_COLORS[Math.min(BAR_COLORS.length - 1, Math.floor(bx / barWidth))] ?? [0, 0, 0];
      put(data, (y * w + x) * 3, r, g, b);
    }
  }
}

function drawCircle(data: Uint8Array, w: number, h: number, t: number): void {
  const cx = w / 2;
  const cy = h / 2;
  const maxR = Math.min(w, h) / 2;
  const pulse = Math.sin(t * 0.05) * 0.3 + 0.7;
  for (let y = 0; y < h; y++) {
    for (let x = 0; x < w; x++) {
      const dx = x - cx;
      const dy = y - cy;
      const dist = Math.sqrt(dx * dx + dy * dy) / maxR;
      const bright = Math.floor(Math.max(0, 1 - dist / pulse) * 255);
      put(data, (y * w + x) * 3, bright, bright, bright);
    }
  }
}
