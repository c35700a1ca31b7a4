import { setTimeout as delay } from "node:timers/promises";
import { CameraError, errorMessage, isCameraError, withTimeout } from "../errors.ts";
import { silentLogger, type Logger } from "../logger.ts";
import type { CameraDevice, DeviceFactory, FaultListener, Frame, FrameListener } from "./types.ts";

/** What the device state controller needs from a capture source. */
export interface CaptureHandle {
  start(): Promise<void>;
  stop(): Promise<void>;
  forceStop(): Promise<void>;
  reset(): Promise<void>;
  dispose(): void;
  onFault(listener: FaultListener): void;
}

export interface CaptureSourceOptions {
  createDevice: DeviceFactory;
  /** Minimum time between two accepted frames. */
  frameSkipThresholdMs: number;
  openTimeoutMs?: number;
  stopTimeoutMs?: number;
  forceStopRetries?: number;
  forceStopDelayMs?: number;
  now?: () => number;
  logger?: Logger;
}

export interface CaptureStats {
  accepted: number;
  dropped: number;
}

/**
 * Owns one camera device and gates its output. Frames arriving sooner than
 * the frame-skip threshold after the last accepted one are dropped here, so
 * nothing downstream ever queues behind the device.
 */
export class CaptureSource implements CaptureHandle {
  private readonly createDevice: DeviceFactory;
  private readonly frameSkipThresholdMs: number;
  private readonly openTimeoutMs: number;
  private readonly stopTimeoutMs: number;
  private readonly forceStopRetries: number;
  private readonly forceStopDelayMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  private device: CameraDevice;
  private detach: (() => void)[] = [];
  private running = false;
  private lastAccepted = Number.NEGATIVE_INFINITY;
  private frameSink: FrameListener | null = null;
  private faultSink: FaultListener | null = null;
  private counters: CaptureStats = { accepted: 0, dropped: 0 };

  constructor(options: CaptureSourceOptions) {
    this.createDevice = options.createDevice;
    this.frameSkipThresholdMs = options.frameSkipThresholdMs;
    this.openTimeoutMs = options.openTimeoutMs ?? 5000;
    this.stopTimeoutMs = options.stopTimeoutMs ?? 3000;
    this.forceStopRetries = options.forceStopRetries ?? 3;
    this.forceStopDelayMs = options.forceStopDelayMs ?? 100;
    this.now = options.now ?? (() => performance.now());
    this.logger = options.logger ?? silentLogger;

    this.device = this.createDevice();
    this.attach();
  }

  get deviceLabel(): string {
    return this.device.label;
  }

  get stats(): CaptureStats {
    return { ...this.counters };
  }

  isRunning(): boolean {
    return this.running;
  }

  /** Single consumer: the event router's queue. */
  onFrame(listener: FrameListener): void {
    this.frameSink = listener;
  }

  onFault(listener: FaultListener): void {
    this.faultSink = listener;
  }

  async start(): Promise<void> {
    // A previous stop may have failed and left a stream open.
    try {
      await withTimeout(this.device.close(), this.stopTimeoutMs, "releasing previous stream");
      this.logger.warn("released a lingering camera stream", { device: this.device.label });
    } catch (err) {
      if (!isCameraError(err, "not-running")) {
        throw new CameraError("unavailable", `could not release previous stream: ${errorMessage(err)}`, {
          cause: err,
        });
      }
    }

    try {
      await withTimeout(this.device.open(), this.openTimeoutMs, "opening camera");
    } catch (err) {
      this.device.dispose();
      throw isCameraError(err, "unavailable")
        ? err
        : new CameraError("unavailable", `could not open camera: ${errorMessage(err)}`, { cause: err });
    }

    this.lastAccepted = Number.NEGATIVE_INFINITY;
    this.running = true;
    this.logger.info("capture started", { device: this.device.label });
  }

  /**
   * Two-phase stop: the source only counts as stopped once the device has
   * acknowledged. On failure it stays running and the error is rethrown.
   */
  async stop(): Promise<void> {
    if (!this.running) return;

    try {
      await withTimeout(this.device.close(), this.stopTimeoutMs, "stopping camera");
    } catch (err) {
      if (!isCameraError(err, "not-running")) {
        throw new CameraError("stop-failed", `camera did not stop: ${errorMessage(err)}`, { cause: err });
      }
    }

    this.running = false;
    this.logger.info("capture stopped", { device: this.device.label });
  }

  async forceStop(): Promise<void> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.forceStopRetries; attempt++) {
      try {
        await withTimeout(this.device.close(), this.stopTimeoutMs, "force-stopping camera");
        this.running = false;
        return;
      } catch (err) {
        if (isCameraError(err, "not-running")) {
          this.running = false;
          return;
        }
        lastError = err;
        this.logger.warn("force stop attempt failed", { attempt, error: errorMessage(err) });
      }
      if (attempt < this.forceStopRetries) {
        await delay(this.forceStopDelayMs);
      }
    }

    throw new CameraError(
      "unrecoverable",
      `camera did not stop after ${this.forceStopRetries} attempts: ${errorMessage(lastError)}`,
      { cause: lastError },
    );
  }

  /** Tears the device down and builds a fresh one. */
  async reset(): Promise<void> {
    this.dispose();
    this.device = this.createDevice();
    this.attach();
    this.counters = { accepted: 0, dropped: 0 };
    this.logger.info("capture device reset", { device: this.device.label });
  }

  dispose(): void {
    for (const off of this.detach) off();
    this.detach = [];
    this.device.dispose();
    this.running = false;
  }

  private attach(): void {
    this.detach = [
      this.device.onFrame((frame) => this.handleFrame(frame)),
      this.device.onFault((reason) => this.handleFault(reason)),
    ];
  }

  private handleFrame(frame: Frame): void {
    if (!this.running) return;

    const now = this.now();
    if (now - this.lastAccepted < this.frameSkipThresholdMs) {
      this.counters.dropped++;
      return;
    }

    this.lastAccepted = now;
    this.counters.accepted++;
    this.frameSink?.(frame);
  }

  private handleFault(reason: string): void {
    if (!this.running) return;
    this.running = false;
    this.logger.error("capture ended unexpectedly", undefined, { reason });
    this.faultSink?.(reason);
  }
}
