import { getCharacterSet, displayName } from "../ascii/charsets.ts";
import { convertFrame, EMPTY_GRID, type GlyphGrid } from "../ascii/glyph-converter.ts";
import type { DeviceEvent, DeviceOutcome, DeviceStateController } from "../camera/device-controller.ts";
import type { Frame } from "../camera/types.ts";
import { errorMessage, FrameFormatError, withTimeout } from "../errors.ts";
import { silentLogger, type Logger } from "../logger.ts";
import { helpLines, type Command } from "./controls.ts";
import type { AppEvent, EventQueue } from "./event-queue.ts";
import type { Renderer } from "./renderer.ts";
import { applyCommand, targetGrid, type GridSize, type Settings } from "./settings.ts";
import { buildStatusText, type StatusInfo } from "./status-bar.ts";

/** The slice of the device controller the router drives. */
export type CameraControl = Pick<
  DeviceStateController,
  "current" | "isActive" | "toggle" | "forceStop" | "reset"
>;

export interface EventRouterOptions {
  queue: EventQueue;
  camera: CameraControl;
  renderer: Renderer;
  settings: Settings;
  viewport: GridSize;
  tickIntervalMs: number;
  renderIntervalMs: number;
  /** Shown in the status line, e.g. "cam0" or "mock:bars". */
  sourceLabel: () => string;
  resolution: string;
  /** Switches the mock pattern; absent when running on a real camera. */
  cyclePattern?: () => string;
  debugInfo?: () => string;
  /** Status message shown until the first command or device event replaces it. */
  initialMessage?: string;
  now?: () => number;
  logger?: Logger;
}

export interface RouterStats {
  /** Grids produced by conversion. */
  conversions: number;
  /** Frames superseded by a newer one before conversion. */
  coalesced: number;
  /** Frames rejected as malformed. */
  malformed: number;
}

/**
 * The single control loop. Each iteration drains the queue, applies every
 * control event in arrival order, then considers only the newest frame. The
 * frame is converted when the render interval has elapsed and otherwise waits
 * in a one-slot buffer, where a newer frame replaces it.
 */
export class EventRouter {
  private readonly queue: EventQueue;
  private readonly camera: CameraControl;
  private readonly renderer: Renderer;
  private readonly tickIntervalMs: number;
  private readonly renderIntervalMs: number;
  /** How early a render may run so a tick just short of the interval still renders. */
  private readonly renderSlackMs: number;
  private readonly opts: EventRouterOptions;
  private readonly now: () => number;
  private readonly logger: Logger;

  private _settings: Settings;
  private viewport: GridSize;
  private grid: GlyphGrid = EMPTY_GRID;
  private pending: Frame | null = null;
  /** Whether `pending` came from the camera rather than a re-conversion. */
  private pendingIsNew = false;
  private lastFrame: Frame | null = null;
  private nextRenderAt = Number.NEGATIVE_INFINITY;
  private dirty = true;
  private message: string;
  private helpVisible = false;
  private quitRequested = false;
  private operations = new Set<Promise<void>>();

  private fps = 0;
  private fpsCount = 0;
  private fpsWindowStart: number;
  private counters: RouterStats = { conversions: 0, coalesced: 0, malformed: 0 };

  constructor(options: EventRouterOptions) {
    this.opts = options;
    this.queue = options.queue;
    this.camera = options.camera;
    this.renderer = options.renderer;
    this._settings = options.settings;
    this.viewport = options.viewport;
    this.tickIntervalMs = options.tickIntervalMs;
    this.renderIntervalMs = options.renderIntervalMs;
    this.renderSlackMs = Math.min(options.tickIntervalMs, options.renderIntervalMs) / 2;
    this.message = options.initialMessage ?? "Starting camera...";
    this.now = options.now ?? (() => performance.now());
    this.logger = options.logger ?? silentLogger;
    this.fpsWindowStart = this.now();
  }

  get settings(): Settings {
    return this._settings;
  }

  get currentGrid(): GlyphGrid {
    return this.grid;
  }

  get pendingFrame(): Frame | null {
    return this.pending;
  }

  get statusMessage(): string {
    return this.message;
  }

  get stats(): RouterStats {
    return { ...this.counters };
  }

  isQuitting(): boolean {
    return this.quitRequested;
  }

  async run(): Promise<void> {
    const ticker = setInterval(() => {
      this.queue.push({ kind: "tick", at: this.now() });
    }, this.tickIntervalMs);

    try {
      while (!this.quitRequested) {
        const events = await this.queue.drain(this.tickIntervalMs);
        this.step(events);
      }
    } finally {
      clearInterval(ticker);
      this.queue.close();
    }
  }

  /** One loop iteration over a drained batch. */
  step(events: readonly AppEvent[], now: number = this.now()): void {
    let latest: Frame | null = null;

    for (const event of events) {
      if (event.kind === "frame") {
        if (latest) this.counters.coalesced++;
        latest = event.frame;
      } else {
        this.handleControl(event);
      }
    }

    if (this.quitRequested) return;

    if (latest && this.camera.isActive()) {
      if (this.pending && this.pendingIsNew) this.counters.coalesced++;
      this.pending = latest;
      this.pendingIsNew = true;
    }

    this.updateFps(now);

    if (now >= this.nextRenderAt - this.renderSlackMs) {
      this.renderNow(now);
    }
  }

  /** Waits for camera operations started by commands, up to `timeoutMs`. */
  async settle(timeoutMs = 5000): Promise<void> {
    if (this.operations.size === 0) return;
    try {
      await withTimeout(Promise.all(this.operations).then(() => undefined), timeoutMs, "camera operations");
    } catch (err) {
      this.logger.warn("camera operations still running", { error: errorMessage(err) });
    }
  }

  private handleControl(event: Exclude<AppEvent, { kind: "frame" }>): void {
    switch (event.kind) {
      case "command":
        this.handleCommand(event.command);
        break;
      case "device":
        this.handleDeviceEvent(event.event);
        break;
      case "resize":
        this.viewport = { cols: event.cols, rows: event.rows };
        this.requestReconvert();
        break;
      case "tick":
        break;
    }
  }

  private handleCommand(command: Command): void {
    this.logger.debug("command", { command });
    this.dirty = true;

    switch (command) {
      case "quit":
        this.quitRequested = true;
        this.pending = null;
        return;
      case "toggle-camera":
        this.dispatch(this.camera.toggle());
        return;
      case "force-stop":
        this.dispatch(this.camera.forceStop());
        return;
      case "reset-camera":
        this.dispatch(this.camera.reset());
        return;
      case "toggle-help":
        this.helpVisible = !this.helpVisible;
        return;
      case "cycle-pattern":
        this.message = this.opts.cyclePattern
          ? `Pattern: ${this.opts.cyclePattern()}`
          : "Patterns are only available with --mock";
        return;
      case "toggle-color":
      case "next-charset":
      case "previous-charset":
      case "increase-scale":
      case "decrease-scale":
        this._settings = applyCommand(this._settings, command);
        this.message = describeSettingChange(command, this._settings);
        this.requestReconvert();
        return;
    }
  }

  private handleDeviceEvent(event: DeviceEvent): void {
    if (event.message) this.message = event.message;
    if (event.state.status === "stopped" || event.state.status === "failed") {
      this.grid = EMPTY_GRID;
      this.pending = null;
      this.lastFrame = null;
    }
    this.dirty = true;
  }

  /**
   * Hands a camera operation off without awaiting it. Its outcome comes back
   * through the queue, so hardware latency never blocks this loop.
   */
  private dispatch(operation: Promise<DeviceOutcome>): void {
    const tracked: Promise<void> = operation.then((outcome) => {
      this.operations.delete(tracked);
      this.queue.push({ kind: "device", event: { state: outcome.state, message: outcome.message } });
    });
    this.operations.add(tracked);
  }

  /** Re-convert the last frame so a settings change shows without waiting for the camera. */
  private requestReconvert(): void {
    if (!this.pending && this.lastFrame) {
      this.pending = this.lastFrame;
      this.pendingIsNew = false;
    }
    this.dirty = true;
  }

  private renderNow(now: number): void {
    const frame = this.pending;
    this.pending = null;

    if (frame) {
      this.convert(frame);
    }

    if (this.dirty) {
      this.dirty = false;
      try {
        this.renderer.render(this.grid, buildStatusText(this.statusInfo()), this.helpVisible ? helpLines() : undefined);
      } catch (err) {
        this.logger.error("render failed", err);
      }
    }

    // Renders follow a fixed schedule; after a stall the schedule restarts at now.
    const base = now - this.nextRenderAt < this.renderIntervalMs ? this.nextRenderAt : now;
    this.nextRenderAt = base + this.renderIntervalMs;
  }

  private convert(frame: Frame): void {
    const { rows, cols } = targetGrid(this.viewport, this._settings.scale);
    try {
      this.grid = convertFrame(frame, rows, cols, getCharacterSet(this._settings.charset), this._settings.color);
    } catch (err) {
      if (!(err instanceof FrameFormatError)) throw err;
      this.counters.malformed++;
      this.logger.warn("dropped malformed frame", { error: err.message });
      return;
    }
    this.lastFrame = frame;
    this.counters.conversions++;
    this.fpsCount++;
    this.dirty = true;
  }

  private updateFps(now: number): void {
    if (now - this.fpsWindowStart < 1000) return;
    if (this.fps !== this.fpsCount) this.dirty = true;
    this.fps = this.fpsCount;
    this.fpsCount = 0;
    this.fpsWindowStart = now;
  }

  statusInfo(): StatusInfo {
    return {
      camera: this.camera.current,
      fps: this.fps,
      source: this.opts.sourceLabel(),
      resolution: this.opts.resolution,
      charset: this._settings.charset,
      color: this._settings.color,
      scale: this._settings.scale,
      message: this.message,
      debugInfo: this.opts.debugInfo?.(),
    };
  }
}

function describeSettingChange(command: Command, settings: Settings): string {
  switch (command) {
    case "toggle-color":
      return `Color mode: ${settings.color ? "ON" : "OFF"}`;
    case "increase-scale":
    case "decrease-scale":
      return `Scale: ${settings.scale.toFixed(1)}x`;
    default:
      return `Character set: ${displayName(settings.charset)}`;
  }
}
