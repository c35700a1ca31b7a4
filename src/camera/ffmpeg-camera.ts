import { spawn, type ChildProcess } from "node:child_process";
import { CameraError, errorMessage, withTimeout } from "../errors.ts";
import { silentLogger, type Logger } from "../logger.ts";
import type { CameraDevice, FaultListener, Frame, FrameListener } from "./types.ts";

export interface FfmpegCameraOptions {
  width: number;
  height: number;
  fps: number;
  cameraIndex: number;
  ffmpegPath?: string;
  platform?: NodeJS.Platform;
  /** How long `close()` waits for ffmpeg to exit before reporting failure. */
  stopTimeoutMs?: number;
  logger?: Logger;
}

const CHANNELS = 3;
const STDERR_TAIL_LINES = 5;

/**
 * ffmpeg input arguments for the platform's capture API. Throws
 * `CameraError("unavailable")` where no capture API is wired up.
 */
export function captureInputArgs(platform: NodeJS.Platform, cameraIndex: number, fps: number): string[] {
  switch (platform) {
    case "darwin":
      return ["-f", "avfoundation", "-framerate", String(fps), "-i", String(cameraIndex)];
    case "linux":
      return ["-f", "v4l2", "-framerate", String(fps), "-i", `/dev/video${cameraIndex}`];
    default:
      throw new CameraError("unavailable", `no ffmpeg capture input for platform "${platform}"`);
  }
}

export function buildFfmpegArgs(options: FfmpegCameraOptions, platform: NodeJS.Platform): string[] {
  const { width, height, fps, cameraIndex } = options;
  // Scale inside ffmpeg so the camera can run at its native mode and the
  // pipe only carries output-sized frames.
  return [
    ...captureInputArgs(platform, cameraIndex, fps),
    "-vf", `scale=${width}:${height}`,
    "-pix_fmt", "rgb24",
    "-f", "rawvideo",
    "-v", "error",
    "pipe:1",
  ];
}

/**
 * Camera driven by an ffmpeg child process writing raw rgb24 frames to stdout.
 * The process exiting is the hardware acknowledgment that capture stopped.
 */
export class FfmpegCamera implements CameraDevice {
  readonly label: string;
  private readonly width: number;
  private readonly height: number;
  private readonly frameSize: number;
  private readonly ffmpegPath: string;
  private readonly args: string[];
  private readonly stopTimeoutMs: number;
  private readonly logger: Logger;

  private proc: ChildProcess | null = null;
  private exited: Promise<void> = Promise.resolve();
  private listeners = new Set<FrameListener>();
  private faultListeners = new Set<FaultListener>();
  /** Set while a `close()` waits for the process to exit. */
  private closing = false;
  private termSent = false;
  private firstFrame: (() => void) | null = null;
  private stderrTail: string[] = [];

  private buffer: Uint8Array;
  private offset = 0;

  constructor(options: FfmpegCameraOptions) {
    const platform = options.platform ?? process.platform;
    this.width = options.width;
    this.height = options.height;
    this.frameSize = options.width * options.height * CHANNELS;
    this.ffmpegPath = options.ffmpegPath ?? "ffmpeg";
    this.args = buildFfmpegArgs(options, platform);
    this.stopTimeoutMs = options.stopTimeoutMs ?? 2000;
    this.logger = options.logger ?? silentLogger;
    this.label = `cam${options.cameraIndex}`;
    this.buffer = new Uint8Array(this.frameSize * 2);
  }

  onFrame(listener: FrameListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  onFault(listener: FaultListener): () => void {
    this.faultListeners.add(listener);
    return () => this.faultListeners.delete(listener);
  }

  async open(): Promise<void> {
    if (this.proc) {
      throw new CameraError("unavailable", "ffmpeg capture is already running");
    }

    this.offset = 0;
    this.stderrTail = [];
    this.closing = false;
    this.termSent = false;
    this.logger.debug("spawning ffmpeg", { args: this.args.join(" ") });

    const proc = spawn(this.ffmpegPath, this.args, { stdio: ["ignore", "pipe", "pipe"] });
    this.proc = proc;
    this.exited = new Promise<void>((resolve) => {
      proc.once("close", () => resolve());
    });

    proc.stdout?.on("data", (chunk: Buffer) => this.handleChunk(chunk));
    proc.stderr?.on("data", (chunk: Buffer) => this.handleStderr(chunk));
    proc.stdout?.on("error", (err) => this.logger.error("ffmpeg stdout failed", err));
    proc.stderr?.on("error", (err) => this.logger.error("ffmpeg stderr failed", err));

    await new Promise<void>((resolve, reject) => {
      let settled = false;
      const settle = (err?: CameraError): void => {
        if (settled) return;
        settled = true;
        this.firstFrame = null;
        if (err) reject(err);
        else resolve();
      };

      this.firstFrame = () => settle();
      proc.on("error", (err) => {
        if (settled) {
          this.logger.error("ffmpeg process error", err);
          return;
        }
        if (this.proc === proc) this.proc = null;
        settle(new CameraError("unavailable", `failed to start ffmpeg: ${err.message}`, { cause: err }));
      });
      proc.once("exit", (code, signal) => {
        const current = this.proc === proc;
        if (current) this.proc = null;
        const reason = this.describeExit(code, signal);
        if (!settled) {
          settle(new CameraError("unavailable", `camera did not produce a frame: ${reason}`));
        } else if (current && !this.closing) {
          this.reportFault(reason);
        }
      });
    });
  }

  async close(): Promise<void> {
    const proc = this.proc;
    if (!proc) {
      throw new CameraError("not-running", "camera is not running");
    }

    this.closing = true;
    try {
      if (proc.exitCode === null && proc.signalCode === null) {
        // A repeated close means SIGTERM was already ignored once.
        proc.kill(this.termSent ? "SIGKILL" : "SIGTERM");
        this.termSent = true;
      }
      await withTimeout(this.exited, this.stopTimeoutMs, "ffmpeg shutdown");
    } catch (err) {
      throw new CameraError("stop-failed", `camera did not stop: ${errorMessage(err)}`, { cause: err });
    } finally {
      this.closing = false;
    }

    if (this.proc === proc) this.proc = null;
  }

  dispose(): void {
    if (this.proc) {
      this.proc.kill("SIGKILL");
      this.proc = null;
    }
    this.firstFrame = null;
    this.offset = 0;
  }

  isRunning(): boolean {
    return this.proc !== null;
  }

  private handleChunk(chunk: Uint8Array): void {
    const { frameSize } = this;

    if (this.offset + chunk.length > this.buffer.length) {
      const grown = new Uint8Array(Math.max(this.buffer.length * 2, this.offset + chunk.length));
      grown.set(this.buffer.subarray(0, this.offset));
      this.buffer = grown;
    }

    this.buffer.set(chunk, this.offset);
    this.offset += chunk.length;

    while (this.offset >= frameSize) {
      // Each frame owns its bytes; the accumulation buffer is reused.
      const frame: Frame = {
        width: this.width,
        height: this.height,
        channels: CHANNELS,
        data: this.buffer.slice(0, frameSize),
        timestamp: performance.now(),
      };

      this.buffer.copyWithin(0, frameSize, this.offset);
      this.offset -= frameSize;

      this.firstFrame?.();
      for (const listener of this.listeners) listener(frame);
    }
  }

  private handleStderr(chunk: Buffer): void {
    for (const line of chunk.toString("utf8").split("\n")) {
      const text = line.trim();
      if (!text) continue;
      this.logger.warn("ffmpeg", { line: text });
      this.stderrTail.push(text);
      if (this.stderrTail.length > STDERR_TAIL_LINES) this.stderrTail.shift();
    }
  }

  /**
   * An exit nobody is waiting for. After a timed-out stop this is the late
   * acknowledgment; either way capture is over.
   */
  private reportFault(reason: string): void {
    const message = this.termSent ? `ffmpeg exited after its stop timed out (${reason})` : reason;
    this.logger.warn("ffmpeg exited unexpectedly", { reason: message });
    for (const listener of this.faultListeners) listener(message);
  }

  private describeExit(code: number | null, signal: NodeJS.Signals | null): string {
    const status = signal ? `signal ${signal}` : `exit code ${code ?? "unknown"}`;
    const tail = this.stderrTail.at(-1);
    return tail ? `${status}: ${tail}` : status;
  }
}
