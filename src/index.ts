import { parseConfig, type AppConfig } from "./config.ts";
import { ConfigError, errorMessage } from "./errors.ts";
import { createFileLogger, silentLogger, type FileLogger } from "./logger.ts";
import { MockCamera, getNextPattern, type PatternName } from "./camera/mock-camera.ts";
import { FfmpegCamera } from "./camera/ffmpeg-camera.ts";
import { describeCameras, listCameras } from "./camera/camera-list.ts";
import { CaptureSource } from "./camera/capture-source.ts";
import { DeviceStateController } from "./camera/device-controller.ts";
import type { DeviceFactory } from "./camera/types.ts";
import { EventQueue } from "./app/event-queue.ts";
import { EventRouter } from "./app/event-router.ts";
import { TerminalApp } from "./app/app.ts";
import { getCommand } from "./app/controls.ts";

const SHUTDOWN_TIMEOUT_MS = 3000;

async function main(): Promise<number> {
  let config: AppConfig;
  try {
    config = parseConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`tui-glyphcam: ${err.message}`);
      return 2;
    }
    throw err;
  }

  const fileLog: FileLogger | null = config.logFile ? createFileLogger(config.logFile, config.logLevel) : null;
  const logger = fileLog?.logger ?? silentLogger;
  logger.info("starting", { mock: config.mock, camera: config.cameraIndex, fps: config.fps });

  // Mock state survives a device reset.
  let pattern: PatternName = config.pattern;
  let mock: MockCamera | null = null;

  const createDevice: DeviceFactory = config.mock
    ? () => (mock = new MockCamera(config.width, config.height, config.fps, pattern))
    : () =>
        new FfmpegCamera({
          width: config.width,
          height: config.height,
          fps: config.fps,
          cameraIndex: config.cameraIndex,
          ffmpegPath: config.ffmpegPath,
          logger: logger.child("ffmpeg"),
        });

  let source: CaptureSource;
  try {
    source = new CaptureSource({
      createDevice,
      frameSkipThresholdMs: config.frameSkipThresholdMs,
      logger: logger.child("capture"),
    });
  } catch (err) {
    console.error(`tui-glyphcam: cannot initialize camera: ${errorMessage(err)}`);
    logger.error("camera initialization failed", err);
    await fileLog?.close();
    return 1;
  }

  let initialMessage: string | undefined;
  if (!config.mock) {
    try {
      const cameras = await listCameras({ ffmpegPath: config.ffmpegPath, logger: logger.child("devices") });
      initialMessage = describeCameras(cameras);
    } catch (err) {
      logger.warn("camera listing failed", { error: errorMessage(err) });
      initialMessage = `Error listing cameras: ${errorMessage(err)}`;
    }
  }

  const controller = new DeviceStateController(source, logger.child("device"));
  const queue = new EventQueue();
  source.onFrame((frame) => queue.push({ kind: "frame", frame }));
  controller.subscribe((event) => queue.push({ kind: "device", event }));

  const app = new TerminalApp();
  const router: EventRouter = new EventRouter({
    queue,
    camera: controller,
    renderer: app,
    settings: { charset: config.charset, scale: config.scale, color: config.color },
    viewport: app.viewport(),
    tickIntervalMs: config.tickMs,
    renderIntervalMs: config.renderIntervalMs,
    resolution: `${config.width}x${config.height}`,
    initialMessage,
    sourceLabel: () => (config.mock ? `mock:${pattern}` : source.deviceLabel),
    cyclePattern: config.mock
      ? () => {
          pattern = getNextPattern(pattern);
          if (mock) mock.pattern = pattern;
          return pattern;
        }
      : undefined,
    debugInfo:
      config.logLevel === "debug"
        ? () => {
            const capture = source.stats;
            const routed = router.stats;
            return `acc ${capture.accepted} drop ${capture.dropped} coal ${routed.coalesced} bad ${routed.malformed}`;
          }
        : undefined,
    logger: logger.child("router"),
  });

  app.start({
    onKey: (name) => {
      const command = getCommand(name);
      if (command) queue.push({ kind: "command", command });
    },
    onResize: (size) => queue.push({ kind: "resize", ...size }),
  });

  const requestQuit = (): void => queue.push({ kind: "command", command: "quit" });
  process.on("SIGINT", requestQuit);
  process.on("SIGTERM", requestQuit);

  queue.push({ kind: "command", command: "toggle-camera" });

  try {
    await router.run();
  } finally {
    await router.settle(SHUTDOWN_TIMEOUT_MS);
    const outcome = await controller.shutdown(SHUTDOWN_TIMEOUT_MS);
    logger.info("shutdown", { ok: outcome.ok, message: outcome.message });
    app.destroy();
    await fileLog?.close();
  }

  return 0;
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error("Fatal error:", err);
    process.exit(1);
  },
);
