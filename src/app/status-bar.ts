import { displayName, type CharacterSetName } from "../ascii/charsets.ts";
import type { CameraState } from "../camera/device-controller.ts";

export interface StatusInfo {
  camera: CameraState;
  fps: number;
  source: string;
  resolution: string;
  charset: CharacterSetName;
  color: boolean;
  scale: number;
  message: string;
  debugInfo?: string;
}

export const KEY_HINT = " [h]elp [q]uit ";

const CAMERA_LABELS: Record<CameraState["status"], string> = {
  stopped: "OFF",
  starting: "STARTING",
  active: "ON",
  stopping: "STOPPING",
  failed: "FAILED",
};

export function buildStatusText(info: StatusInfo): string {
  const parts: string[] = [];

  parts.push("GLYPHCAM");
  parts.push(`Camera: ${CAMERA_LABELS[info.camera.status]}`);
  parts.push(`${info.fps}fps`);
  parts.push(info.source);
  parts.push(info.resolution);
  parts.push(displayName(info.charset));
  parts.push(`Color: ${info.color ? "ON" : "OFF"}`);
  parts.push(`Scale: ${info.scale.toFixed(1)}x`);

  if (info.message) {
    parts.push(info.message);
  }
  if (info.debugInfo) {
    parts.push(`{${info.debugInfo}}`);
  }

  return " " + parts.join(" | ") + " ";
}

/** Fits the status text to `width` columns, right-aligning the key hint when it fits. */
export function layoutStatusLine(text: string, width: number): string {
  if (width <= 0) return "";
  if (text.length >= width) return text.slice(0, width);

  const gap = width - text.length - KEY_HINT.length;
  if (gap < 0) return text.padEnd(width);
  return text + " ".repeat(gap) + KEY_HINT;
}
