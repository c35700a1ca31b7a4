import { describe, it, expect, beforeEach } from "vitest";
import { parseConfig } from "../config.ts";
import { CameraError } from "../errors.ts";
import { FakeCamera, solidFrame } from "../testing/fake-camera.ts";
import { CaptureSource } from "./capture-source.ts";
import type { Frame } from "./types.ts";

describe("CaptureSource", () => {
  let devices: FakeCamera[];
  let device: FakeCamera;
  let clock: number;
  let received: Frame[];
  let source: CaptureSource;

  beforeEach(() => {
    devices = [];
    clock = 0;
    received = [];
    source = new CaptureSource({
      createDevice: () => {
        device = new FakeCamera(`fake${devices.length}`);
        devices.push(device);
        return device;
      },
      frameSkipThresholdMs: 33,
      forceStopRetries: 3,
      forceStopDelayMs: 0,
      now: () => clock,
    });
    source.onFrame((frame) => received.push(frame));
  });

  it("drops frames that arrive faster than the skip threshold", async () => {
    await source.start();
    const f1 = solidFrame(2, 2, 1);
    const f4 = solidFrame(2, 2, 4);

    clock = 0;
    device.emit(f1);
    clock = 10;
    device.emit(solidFrame(2, 2, 2));
    clock = 32;
    device.emit(solidFrame(2, 2, 3));
    clock = 33;
    device.emit(f4);

    expect(received).toEqual([f1, f4]);
    expect(source.stats).toEqual({ accepted: 2, dropped: 2 });
  });

  it("keeps every frame of a jittery camera at the configured rate", async () => {
    const config = parseConfig([]);
    const jittery = new CaptureSource({
      createDevice: () => (device = new FakeCamera("jittery")),
      frameSkipThresholdMs: config.frameSkipThresholdMs,
      now: () => clock,
    });
    await jittery.start();

    const period = 1000 / config.fps;
    for (let i = 0; i < 60; i++) {
      clock = i * period + (i % 2 === 0 ? 0.3 : -0.3);
      device.emit(solidFrame(1, 1, i));
    }

    expect(jittery.stats).toEqual({ accepted: 60, dropped: 0 });
  });

  it("ignores frames while stopped", () => {
    device.emit(solidFrame(2, 2, 9));
    expect(received).toEqual([]);
  });

  it("tolerates a not-running device when clearing a lingering stream", async () => {
    await source.start();
    expect(device.closeCalls).toBe(1);
    expect(device.openCalls).toBe(1);
    expect(source.isRunning()).toBe(true);
  });

  it("closes a stream left open by an earlier failure before reopening", async () => {
    device.opened = true;
    await source.start();
    expect(device.closeCalls).toBe(1);
    expect(device.openCalls).toBe(1);
    expect(device.opened).toBe(true);
  });

  it("refuses to start when the lingering stream cannot be released", async () => {
    device.opened = true;
    device.failCloses(1);
    await expect(source.start()).rejects.toMatchObject({ kind: "unavailable" });
    expect(device.openCalls).toBe(0);
    expect(source.isRunning()).toBe(false);
  });

  it("reports open failures as unavailable and releases the device", async () => {
    device.failNextOpen(new Error("permission denied"));
    const err: unknown = await source.start().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(CameraError);
    expect(err).toMatchObject({ kind: "unavailable", message: "could not open camera: permission denied" });
    expect(device.disposeCalls).toBe(1);
    expect(source.isRunning()).toBe(false);
  });

  it("stays running when the hardware does not acknowledge a stop", async () => {
    await source.start();
    device.failCloses(1);

    await expect(source.stop()).rejects.toMatchObject({ kind: "stop-failed" });
    expect(source.isRunning()).toBe(true);

    await source.stop();
    expect(source.isRunning()).toBe(false);
    expect(device.opened).toBe(false);
  });

  it("makes a second stop a no-op", async () => {
    await source.start();
    await source.stop();
    const closes = device.closeCalls;
    await source.stop();
    expect(device.closeCalls).toBe(closes);
  });

  it("retries a force stop until the device gives in", async () => {
    await source.start();
    device.failCloses(2);
    await source.forceStop();
    // One defensive close on start, then three attempts.
    expect(device.closeCalls).toBe(4);
    expect(source.isRunning()).toBe(false);
  });

  it("gives up a force stop after the retry budget", async () => {
    await source.start();
    device.failCloses(3);
    await expect(source.forceStop()).rejects.toMatchObject({ kind: "unrecoverable" });
    expect(device.closeCalls).toBe(4);
  });

  it("rebuilds the device on reset", async () => {
    await source.start();
    const first = device;
    await source.reset();

    expect(first.disposeCalls).toBe(1);
    expect(devices).toHaveLength(2);
    expect(source.deviceLabel).toBe("fake1");
    expect(source.isRunning()).toBe(false);

    // Frames from the discarded device no longer reach the sink.
    await source.start();
    first.emit(solidFrame(1, 1, 1));
    expect(received).toEqual([]);
  });

  it("reports a device that stops on its own", async () => {
    const faults: string[] = [];
    source.onFault((reason) => faults.push(reason));
    await source.start();

    device.fault("unplugged");
    expect(faults).toEqual(["unplugged"]);
    expect(source.isRunning()).toBe(false);
  });
});
