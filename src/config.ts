import { z } from "zod";
import { getCharacterSetNames, isCharacterSetName, type CharacterSetName } from "./ascii/charsets.ts";
import { isPatternName, type PatternName } from "./camera/mock-camera.ts";
import { ConfigError } from "./errors.ts";
import { LOG_LEVELS, type LogLevel } from "./logger.ts";

const ConfigSchema = z.object({
  mock: z.boolean(),
  pattern: z.custom<PatternName>((v) => typeof v === "string" && isPatternName(v), {
    message: "unknown pattern",
  }),
  cameraIndex: z.number().int().min(0),
  fps: z.number().positive().max(120),
  tickMs: z.number().int().min(1).max(1000),
  renderFps: z.number().positive().max(120),
  charset: z.custom<CharacterSetName>((v) => typeof v === "string" && isCharacterSetName(v), {
    message: `unknown character set, expected one of ${getCharacterSetNames().join(", ")}`,
  }),
  scale: z.number().min(0.1).max(2),
  color: z.boolean(),
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  logFile: z.string().min(1).optional(),
  logLevel: z.custom<LogLevel>((v) => typeof v === "string" && LOG_LEVELS.some((level) => level === v), {
    message: "unknown log level",
  }),
  ffmpegPath: z.string().min(1),
});

export type ParsedConfig = z.infer<typeof ConfigSchema>;

// The frame-skip threshold sits below the camera's frame period, so timestamp
// jitter on frames at the target rate does not drop every other one.
export const FRAME_SKIP_MARGIN = 0.9;

export interface AppConfig extends ParsedConfig {
  /** Minimum time between two frames accepted from the camera. */
  frameSkipThresholdMs: number;
  /** Minimum time between two rendered grids. */
  renderIntervalMs: number;
}

const FLAG_NAMES: Record<keyof ParsedConfig, string> = {
  mock: "--mock",
  pattern: "--pattern",
  cameraIndex: "--camera",
  fps: "--fps",
  tickMs: "--tick",
  renderFps: "--render-fps",
  charset: "--charset",
  scale: "--scale",
  color: "--color",
  width: "--resolution",
  height: "--resolution",
  logFile: "--log-file",
  logLevel: "--log-level",
  ffmpegPath: "--ffmpeg",
};

function isConfigKey(key: unknown): key is keyof ParsedConfig {
  return typeof key === "string" && Object.hasOwn(FLAG_NAMES, key);
}

function parseResolution(value: string | undefined): { width: number; height: number } {
  if (value === undefined) return { width: 640, height: 480 };
  const parts = value.split("x");
  if (parts.length !== 2) {
    throw new ConfigError(`--resolution expects WIDTHxHEIGHT, got "${value}"`, "--resolution");
  }
  return { width: Number(parts[0]), height: Number(parts[1]) };
}

export function parseConfig(args: readonly string[] = process.argv.slice(2)): AppConfig {
  function getArg(name: string): string | undefined {
    const idx = args.indexOf(`--${name}`);
    if (idx === -1) return undefined;
    return args[idx + 1];
  }

  function hasFlag(name: string): boolean {
    return args.includes(`--${name}`);
  }

  function getNumber(name: string, fallback: number): number {
    const raw = getArg(name);
    return raw === undefined ? fallback : Number(raw);
  }

  const { width, height } = parseResolution(getArg("resolution"));

  const result = ConfigSchema.safeParse({
    mock: hasFlag("mock"),
    pattern: getArg("pattern") ?? "gradient",
    cameraIndex: getNumber("camera", 0),
    fps: getNumber("fps", 30),
    tickMs: getNumber("tick", 33),
    renderFps: getNumber("render-fps", 30),
    charset: getArg("charset") ?? "dense",
    scale: getNumber("scale", 1),
    color: hasFlag("color"),
    width,
    height,
    logFile: getArg("log-file"),
    logLevel: getArg("log-level") ?? "info",
    ffmpegPath: getArg("ffmpeg") ?? "ffmpeg",
  });

  if (!result.success) {
    const issue = result.error.issues[0];
    const key = issue?.path[0];
    const flag = isConfigKey(key) ? FLAG_NAMES[key] : undefined;
    throw new ConfigError(`${flag ?? "config"}: ${issue?.message ?? "invalid value"}`, flag);
  }

  const config = result.data;
  return {
    ...config,
    frameSkipThresholdMs: (1000 * FRAME_SKIP_MARGIN) / config.fps,
    renderIntervalMs: 1000 / config.renderFps,
  };
}
