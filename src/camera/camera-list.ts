import { spawn } from "node:child_process";
import { CameraError } from "../errors.ts";
import { silentLogger, type Logger } from "../logger.ts";

export interface CameraInfo {
  /** System index, as `--camera` takes it. */
  index: number;
  name: string;
}

export interface ListCamerasOptions {
  platform?: NodeJS.Platform;
  ffmpegPath?: string;
  v4l2CtlPath?: string;
  timeoutMs?: number;
  logger?: Logger;
}

interface CommandOutput {
  stdout: string;
  stderr: string;
}

// Loopback devices and screens show no camera image.
const IGNORED_NAME = /virtual|dummy|capture screen/i;

/** Drops ignored devices and repeated names, keeping each camera's system index. */
export function filterCameras(cameras: readonly CameraInfo[]): CameraInfo[] {
  const seen = new Set<string>();
  return cameras.filter(({ name }) => {
    if (seen.has(name) || IGNORED_NAME.test(name)) return false;
    seen.add(name);
    return true;
  });
}

/** Video devices from `ffmpeg -f avfoundation -list_devices true` (printed on stderr). */
export function parseAvfoundationDevices(output: string): CameraInfo[] {
  const cameras: CameraInfo[] = [];
  let inVideo = false;

  for (const line of output.split("\n")) {
    if (line.includes("AVFoundation video devices")) {
      inVideo = true;
      continue;
    }
    if (line.includes("AVFoundation audio devices")) {
      inVideo = false;
      continue;
    }
    if (!inVideo) continue;

    const match = /\]\s*\[(\d+)\]\s+(.+)$/.exec(line.trim());
    if (match?.[1] && match[2]) {
      cameras.push({ index: Number(match[1]), name: match[2].trim() });
    }
  }
  return cameras;
}

/**
 * Devices from `v4l2-ctl --list-devices`. A camera lists several nodes; the
 * first `/dev/videoN` is the capture node, the rest carry metadata.
 */
export function parseV4l2Devices(output: string): CameraInfo[] {
  const cameras: CameraInfo[] = [];
  let name: string | null = null;

  for (const line of output.split("\n")) {
    if (line.trim() === "") {
      name = null;
      continue;
    }
    if (!/^\s/.test(line)) {
      const header = line.trim();
      name = /^(.*?)\s*\([^()]*\):$/.exec(header)?.[1] ?? header.replace(/:$/, "");
      continue;
    }

    const node = /\/dev\/video(\d+)/.exec(line);
    if (name !== null && node?.[1]) {
      cameras.push({ index: Number(node[1]), name });
      name = null;
    }
  }
  return cameras;
}

/** Status text for a camera listing. */
export function describeCameras(cameras: readonly CameraInfo[]): string {
  if (cameras.length === 0) return "No cameras found";
  const list = cameras.map(({ index, name }) => `ID ${index}: ${name}`).join(", ");
  return `Found ${cameras.length} camera(s): ${list}`;
}

function runCommand(command: string, args: readonly string[], timeoutMs: number): Promise<CommandOutput> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });
    let stdout = "";
    let stderr = "";

    const timer = setTimeout(() => {
      proc.kill("SIGKILL");
      reject(new CameraError("timeout", `${command} timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    proc.stdout?.on("data", (chunk: Buffer) => {
      stdout += chunk.toString("utf8");
    });
    proc.stderr?.on("data", (chunk: Buffer) => {
      stderr += chunk.toString("utf8");
    });
    proc.on("error", (err) => {
      clearTimeout(timer);
      reject(new CameraError("unavailable", `could not run ${command}: ${err.message}`, { cause: err }));
    });
    proc.on("close", () => {
      clearTimeout(timer);
      resolve({ stdout, stderr });
    });
  });
}

/** Lists the capture devices ffmpeg can open on this platform. */
export async function listCameras(options: ListCamerasOptions = {}): Promise<CameraInfo[]> {
  const platform = options.platform ?? process.platform;
  const timeoutMs = options.timeoutMs ?? 3000;
  const logger = options.logger ?? silentLogger;

  let found: CameraInfo[];
  switch (platform) {
    case "darwin": {
      // ffmpeg exits non-zero after listing; the listing is still complete.
      const { stderr } = await runCommand(
        options.ffmpegPath ?? "ffmpeg",
        ["-hide_banner", "-f", "avfoundation", "-list_devices", "true", "-i", ""],
        timeoutMs,
      );
      found = parseAvfoundationDevices(stderr);
      break;
    }
    case "linux": {
      const { stdout } = await runCommand(options.v4l2CtlPath ?? "v4l2-ctl", ["--list-devices"], timeoutMs);
      found = parseV4l2Devices(stdout);
      break;
    }
    default:
      throw new CameraError("unavailable", `camera listing is not supported on "${platform}"`);
  }

  const cameras = filterCameras(found);
  for (const camera of found) {
    if (!cameras.includes(camera)) logger.debug("skipping device", { index: camera.index, name: camera.name });
  }
  logger.info("cameras found", { count: cameras.length, cameras: describeCameras(cameras) });
  return cameras;
}
