import type { LineSink } from './types.js';

/**
 * Collects one stream's lines. `closed` settles when the producing pump has
 * reached end-of-stream, which can be later than process exit.
 */
export class CaptureBuffer implements LineSink {
  private readonly captured: string[] = [];
  private finished = false;
  private readonly resolveClosed: (lines: readonly string[]) => void;
  readonly closed: Promise<readonly string[]>;

  constructor(private readonly echo?: LineSink) {
    let resolveClosed: (lines: readonly string[]) => void = () => undefined;
    this.closed = new Promise((resolve) => {
      resolveClosed = resolve;
    });
    this.resolveClosed = resolveClosed;
  }

  line(text: string): void {
    if (this.finished) {
      throw new Error('Line received after end of stream');
    }
    this.captured.push(text);
    this.echo?.line(text);
  }

  end(): void {
    if (this.finished) return;
    this.finished = true;
    this.resolveClosed(this.captured);
    this.echo?.end();
  }

  get ended(): boolean {
    return this.finished;
  }

  get lines(): readonly string[] {
    return this.captured;
  }

  text(): string {
    return this.captured.join('\n').trim();
  }
}
