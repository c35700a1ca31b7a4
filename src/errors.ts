export type CameraErrorKind =
  | "unavailable"
  | "not-running"
  | "stop-failed"
  | "timeout"
  | "unrecoverable";

export class CameraError extends Error {
  readonly kind: CameraErrorKind;

  constructor(kind: CameraErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CameraError";
    this.kind = kind;
  }
}

export class FrameFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FrameFormatError";
  }
}

export class ConfigError extends Error {
  readonly flag: string | undefined;

  constructor(message: string, flag?: string) {
    super(message);
    this.name = "ConfigError";
    this.flag = flag;
  }
}

export function isCameraError(err: unknown, kind?: CameraErrorKind): err is CameraError {
  return err instanceof CameraError && (kind === undefined || err.kind === kind);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Races `promise` against a timer. On timeout the returned promise rejects with
 * a `CameraError("timeout")`; the wrapped promise keeps running.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, what: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new CameraError("timeout", `${what} timed out after ${ms}ms`));
    }, ms);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}
