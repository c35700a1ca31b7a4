import { ChildProcess } from "node:child_process";
import { PassThrough } from "node:stream";

/** A child process that never runs anything. Tests drive its streams and exit. */
export class FakeChildProcess extends ChildProcess {
  override stdout = new PassThrough();
  override stderr = new PassThrough();
  override exitCode: number | null = null;
  override signalCode: NodeJS.Signals | null = null;

  readonly signals: (NodeJS.Signals | number)[] = [];
  /** Signals the process survives, like an ffmpeg stuck in a driver call. */
  readonly ignoredSignals = new Set<NodeJS.Signals | number>();

  override kill(signal: NodeJS.Signals | number = "SIGTERM"): boolean {
    this.signals.push(signal);
    if (!this.ignoredSignals.has(signal)) {
      setImmediate(() => this.exit(null, typeof signal === "string" ? signal : "SIGTERM"));
    }
    return true;
  }

  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (this.exitCode !== null || this.signalCode !== null) return;
    this.exitCode = code;
    this.signalCode = signal;
    this.emit("exit", code, signal);
    this.emit("close", code, signal);
  }
}

/** Lets stream data written by a test reach its listeners. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
