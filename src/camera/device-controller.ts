import { errorMessage, withTimeout } from "../errors.ts";
import { silentLogger, type Logger } from "../logger.ts";
import type { CaptureHandle } from "./capture-source.ts";

export type CameraState =
  | { status: "stopped" }
  | { status: "starting" }
  | { status: "active" }
  | { status: "stopping" }
  | { status: "failed"; reason: string };

export type CameraStatus = CameraState["status"];

export interface DeviceOutcome {
  ok: boolean;
  state: CameraState;
  message: string;
}

export interface DeviceEvent {
  state: CameraState;
  message?: string;
}

export type DeviceListener = (event: DeviceEvent) => void;

const STOPPED: CameraState = { status: "stopped" };
const STARTING: CameraState = { status: "starting" };
const ACTIVE: CameraState = { status: "active" };
const STOPPING: CameraState = { status: "stopping" };

export function describeState(state: CameraState): string {
  return state.status === "failed" ? `failed (${state.reason})` : state.status;
}

/**
 * Sole owner of the camera state. Hardware calls go through the capture
 * handle, and the state only becomes `active` or `stopped` after the handle's
 * promise has resolved.
 *
 * ```
 * stopped --start--> starting --ack--> active
 * active --stop--> stopping --ack--> stopped
 * stopping --fail--> active
 * any --forceStop exhausted--> failed --reset--> stopped
 * ```
 */
export class DeviceStateController {
  private state: CameraState = STOPPED;
  private readonly source: CaptureHandle;
  private readonly logger: Logger;
  private readonly listeners = new Set<DeviceListener>();
  private tail: Promise<unknown> = Promise.resolve();
  private inFlight = 0;

  constructor(source: CaptureHandle, logger: Logger = silentLogger) {
    this.source = source;
    this.logger = logger;
    source.onFault((reason) => this.handleFault(reason));
  }

  get current(): CameraState {
    return this.state;
  }

  isActive(): boolean {
    return this.state.status === "active";
  }

  isBusy(): boolean {
    return this.inFlight > 0;
  }

  subscribe(listener: DeviceListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  start(): Promise<DeviceOutcome> {
    const { state } = this;
    if (state.status === "active") return this.settled(true, "Camera already active");
    if (state.status === "failed") return this.settled(false, `Camera failed (${state.reason}); press r to reset`);
    if (this.isBusy()) return this.settled(false, `Camera is ${state.status}, try again`);

    this.transition(STARTING);
    return this.serialize(async () => {
      try {
        await this.source.start();
        return this.complete(ACTIVE, true, "Camera active");
      } catch (err) {
        this.logger.error("camera start failed", err);
        return this.complete(STOPPED, false, `Camera unavailable: ${errorMessage(err)}`);
      }
    });
  }

  stop(): Promise<DeviceOutcome> {
    const { state } = this;
    if (state.status === "stopped") return this.settled(true, "Camera already stopped");
    if (state.status === "failed") return this.settled(false, `Camera failed (${state.reason}); press r to reset`);
    if (this.isBusy()) return this.settled(false, `Camera is ${state.status}, try again`);

    this.transition(STOPPING);
    return this.serialize(async () => {
      try {
        await this.source.stop();
        return this.complete(STOPPED, true, "Camera stopped");
      } catch (err) {
        this.logger.error("camera stop failed", err);
        return this.complete(ACTIVE, false, `Stop failed, camera still on: ${errorMessage(err)}`);
      }
    });
  }

  toggle(): Promise<DeviceOutcome> {
    return this.state.status === "active" ? this.stop() : this.start();
  }

  /**
   * Emergency stop with bounded retries. Waits behind any transition already in
   * flight; exhausting the retries leaves the controller `failed`.
   */
  forceStop(): Promise<DeviceOutcome> {
    return this.serialize(async () => {
      const { state } = this;
      if (state.status === "failed") {
        return this.outcome(false, `Camera failed (${state.reason}); press r to reset`);
      }

      const wasActive = state.status === "active";
      if (wasActive) this.transition(STOPPING);
      try {
        await this.source.forceStop();
        return this.complete(STOPPED, true, "Camera force-stopped");
      } catch (err) {
        const reason = errorMessage(err);
        this.logger.error("camera force stop exhausted retries", err);
        return this.complete({ status: "failed", reason }, false, `Camera unrecoverable: ${reason}`);
      }
    });
  }

  reset(): Promise<DeviceOutcome> {
    return this.serialize(async () => {
      if (this.state.status !== "failed") {
        return this.outcome(false, "Camera has not failed, nothing to reset");
      }
      try {
        await this.source.reset();
        return this.complete(STOPPED, true, "Camera reset");
      } catch (err) {
        const reason = errorMessage(err);
        this.logger.error("camera reset failed", err);
        return this.complete({ status: "failed", reason }, false, `Reset failed: ${reason}`);
      }
    });
  }

  /**
   * Final best-effort stop for process exit. Resolves within `timeoutMs` even
   * when the hardware never answers.
   */
  async shutdown(timeoutMs: number): Promise<DeviceOutcome> {
    let result: DeviceOutcome;
    try {
      result = await withTimeout(this.forceStop(), timeoutMs, "camera shutdown");
    } catch (err) {
      this.logger.warn("camera shutdown timed out", { error: errorMessage(err) });
      result = this.outcome(false, errorMessage(err));
    }
    this.source.dispose();
    return result;
  }

  private handleFault(reason: string): void {
    if (this.state.status !== "active") return;
    this.transition(STOPPED, `Camera lost: ${reason}`);
  }

  private serialize(job: () => Promise<DeviceOutcome>): Promise<DeviceOutcome> {
    this.inFlight++;
    const run = this.tail.then(job).finally(() => {
      this.inFlight--;
    });
    this.tail = run;
    return run;
  }

  private complete(next: CameraState, ok: boolean, message: string): DeviceOutcome {
    this.transition(next, message);
    return this.outcome(ok, message);
  }

  private settled(ok: boolean, message: string): Promise<DeviceOutcome> {
    if (!ok) this.logger.warn("camera request rejected", { state: this.state.status, message });
    return Promise.resolve(this.outcome(ok, message));
  }

  private outcome(ok: boolean, message: string): DeviceOutcome {
    return { ok, state: this.state, message };
  }

  private transition(next: CameraState, message?: string): void {
    const prev = this.state;
    this.state = next;
    this.logger.info("camera state", { from: describeState(prev), to: describeState(next) });
    for (const listener of this.listeners) {
      try {
        listener({ state: next, message });
      } catch (err) {
        this.logger.error("device listener threw", err);
      }
    }
  }
}
