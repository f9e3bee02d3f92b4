import type { Readable } from "stream";

const NEWLINE = 0x0a;

/**
 * Background reader: splits a byte stream into raw lines (newline kept) and buffers
 * them for the tick loop. The source is paused while `capacity` lines are waiting.
 */
export class LineQueue {
  private readonly lines: Buffer[] = [];
  private partial: Buffer[] = [];
  private ended = false;
  private failure: Error | null = null;
  private waiters: Array<() => void> = [];

  constructor(
    private readonly source: Readable,
    private readonly capacity = 1024
  ) {
    source.on("data", (chunk: Buffer | string) => this.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk));
    source.once("end", () => this.finish(null));
    source.once("close", () => this.finish(null));
    source.once("error", (err: Error) => this.finish(err));
  }

  private push(chunk: Buffer): void {
    let start = 0;
    for (let i = chunk.indexOf(NEWLINE); i !== -1; i = chunk.indexOf(NEWLINE, start)) {
      this.partial.push(chunk.subarray(start, i + 1));
      this.lines.push(Buffer.concat(this.partial));
      this.partial = [];
      start = i + 1;
    }
    if (start < chunk.length) this.partial.push(chunk.subarray(start));

    if (this.lines.length >= this.capacity && !this.source.isPaused()) this.source.pause();
    this.wake();
  }

  private finish(err: Error | null): void {
    if (this.ended) return;
    if (this.partial.length) {
      this.lines.push(Buffer.concat(this.partial));
      this.partial = [];
    }
    this.ended = true;
    this.failure = err;
    this.wake();
  }

  private wake(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const w of waiters) w();
  }

  get pending(): number {
    return this.lines.length;
  }

  /** No more lines will ever be available. */
  get finished(): boolean {
    return this.ended && this.lines.length === 0;
  }

  get error(): Error | null {
    return this.failure;
  }

  take(): Buffer[] {
    const out = this.lines.splice(0);
    if (!this.ended && this.source.isPaused()) this.source.resume();
    return out;
  }

  /** Resolves when lines arrive, the stream ends, or `ms` elapses. */
  waitForActivity(ms: number): Promise<void> {
    if (this.lines.length || this.ended) return Promise.resolve();
    return new Promise((resolve) => {
      const timer = setTimeout(resolve, ms);
      this.waiters.push(() => {
        clearTimeout(timer);
        resolve();
      });
    });
  }
}
