import type { Output } from '../output/output.js';

export interface SpanOptions {
  /** Write BEGIN/END lines to the session log. */
  verbose?: boolean;
  /** Make the span the parent of spans opened after it (default true). */
  current?: boolean;
}

/**
 * Nested timing intervals. The tracer tracks the innermost open span so
 * new spans attach to it; a finished root span can print the whole tree.
 */
export class Tracer {
  current: Span | null = null;
  emitSummary = false;

  constructor(
    readonly output: Output,
    readonly clock: () => number = () => performance.now()
  ) {}

  span(tag: string, options: SpanOptions = {}): Span {
    const span = new Span(this, tag, this.current, options.verbose ?? true);
    if (options.current ?? true) {
      this.current = span;
    }
    span.begin();
    return span;
  }
}

export class Span {
  readonly children: Span[] = [];
  private startedAt: number | null = null;
  private elapsed: number | null = null;

  constructor(
    private readonly tracer: Tracer,
    readonly tag: string,
    readonly parent: Span | null,
    readonly verbose: boolean
  ) {
    parent?.children.push(this);
  }

  begin(): void {
    this.startedAt = this.tracer.clock();
    if (this.verbose) {
      this.tracer.output.write(`BEGIN SPAN ${this.tag}`);
    }
  }

  /** Closes the span and returns its duration in seconds. */
  end(): number {
    if (this.elapsed !== null) return this.elapsed;
    const startedAt = this.startedAt ?? this.tracer.clock();
    this.elapsed = (this.tracer.clock() - startedAt) / 1000;

    if (this.tracer.current === this) {
      this.tracer.current = this.parent;
    }
    if (this.verbose) {
      this.tracer.output.write(`END SPAN ${this.tag} ${this.elapsed.toFixed(1).padStart(6)}s`);
    }
    if (this.parent === null && this.tracer.emitSummary) {
      this.summarize();
    }
    return this.elapsed;
  }

  get seconds(): number | null {
    return this.elapsed;
  }

  summarize(depth = 0): void {
    const spent = this.elapsed === null ? '   ...' : this.elapsed.toFixed(1).padStart(6);
    this.tracer.output.write(`${spent}s ${'  '.repeat(depth)}${this.tag}`, 'SUM');
    for (const child of this.children) {
      child.summarize(depth + 1);
    }
  }
}
