import { CameraError } from "../errors.ts";
import {
  frameByteLength,
  type CameraDevice,
  type Channels,
  type FaultListener,
  type Frame,
  type FrameListener,
} from "../camera/types.ts";

/** In-process stand-in for camera hardware with scriptable failures. */
export class FakeCamera implements CameraDevice {
  readonly label: string;
  opened = false;
  openCalls = 0;
  closeCalls = 0;
  disposeCalls = 0;
  /** When set, `close()` never settles, like a wedged driver. */
  hangOnClose = false;

  private openFailures: Error[] = [];
  private closeFailures: Error[] = [];
  private listeners = new Set<FrameListener>();
  private faultListeners = new Set<FaultListener>();

  constructor(label = "fake") {
    this.label = label;
  }

  failNextOpen(err: Error = new CameraError("unavailable", "device busy")): void {
    this.openFailures.push(err);
  }

  failCloses(count: number, err: Error = new CameraError("stop-failed", "device did not acknowledge stop")): void {
    for (let i = 0; i < count; i++) this.closeFailures.push(err);
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
    this.openCalls++;
    const failure = this.openFailures.shift();
    if (failure) throw failure;
    if (this.opened) throw new CameraError("unavailable", "already open");
    this.opened = true;
  }

  close(): Promise<void> {
    this.closeCalls++;
    if (!this.opened) return Promise.reject(new CameraError("not-running", "not running"));
    if (this.hangOnClose) return new Promise<void>(() => undefined);
    const failure = this.closeFailures.shift();
    if (failure) return Promise.reject(failure);
    this.opened = false;
    return Promise.resolve();
  }

  dispose(): void {
    this.disposeCalls++;
    this.opened = false;
  }

  emit(frame: Frame): void {
    for (const listener of this.listeners) listener(frame);
  }

  fault(reason: string): void {
    this.opened = false;
    for (const listener of this.faultListeners) listener(reason);
  }
}

export function solidFrame(width: number, height: number, value: number, channels: Channels = 3): Frame {
  return {
    width,
    height,
    channels,
    data: new Uint8Array(frameByteLength(width, height, channels)).fill(value),
    timestamp: 0,
  };
}
