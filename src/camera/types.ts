export type Channels = 1 | 3 | 4;

/**
 * One captured raster image. Samples are interleaved per pixel; `channels` is
 * 1 for grayscale, 3 for RGB and 4 for RGBA (alpha ignored).
 */
export interface Frame {
  readonly width: number;
  readonly height: number;
  readonly channels: Channels;
  readonly data: Uint8Array;
  readonly timestamp: number;
}

export type FrameListener = (frame: Frame) => void;
export type FaultListener = (reason: string) => void;

/**
 * The hardware boundary. `close()` resolves only once the device has really
 * stopped and rejects with `CameraError("not-running")` when nothing is open.
 */
export interface CameraDevice {
  readonly label: string;
  open(): Promise<void>;
  close(): Promise<void>;
  /** Synchronous teardown of every resource the device holds. */
  dispose(): void;
  onFrame(listener: FrameListener): () => void;
  /** Fires when capture ends without `close()` being asked for it. */
  onFault(listener: FaultListener): () => void;
}

export type DeviceFactory = () => CameraDevice;

export function frameByteLength(width: number, height: number, channels: Channels): number {
  return width * height * channels;
}
