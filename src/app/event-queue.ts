import type { Frame } from "../camera/types.ts";
import type { DeviceEvent } from "../camera/device-controller.ts";
import type { Command } from "./controls.ts";

/** Everything the control loop reacts to, in arrival order. */
export type AppEvent =
  | { kind: "command"; command: Command }
  | { kind: "frame"; frame: Frame }
  | { kind: "tick"; at: number }
  | { kind: "device"; event: DeviceEvent }
  | { kind: "resize"; cols: number; rows: number };

/**
 * Multi-producer, single-consumer event channel. Producers push from device
 * callbacks, key handlers and timers; the router drains everything at once.
 */
export class EventQueue {
  private items: AppEvent[] = [];
  private wake: (() => void) | null = null;
  private closed = false;

  get size(): number {
    return this.items.length;
  }

  push(event: AppEvent): void {
    if (this.closed) return;
    this.items.push(event);
    this.wake?.();
  }

  /**
   * Resolves with every queued event. When the queue is empty, waits up to
   * `maxWaitMs` for the first one and may resolve with an empty batch.
   */
  async drain(maxWaitMs: number): Promise<AppEvent[]> {
    if (this.items.length === 0 && !this.closed) {
      await new Promise<void>((resolve) => {
        const done = (): void => {
          clearTimeout(timer);
          this.wake = null;
          resolve();
        };
        const timer = setTimeout(done, maxWaitMs);
        this.wake = done;
      });
    }

    const batch = this.items;
    this.items = [];
    return batch;
  }

  close(): void {
    this.closed = true;
    this.wake?.();
  }
}
