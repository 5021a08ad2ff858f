import { Tracer } from '../../../src/tracing/span.js';
import { createMemoryOutput } from '../../helpers/mock-spawner.js';

function setup() {
  let now = 0;
  const clock = (): number => now;
  const { output, lines } = createMemoryOutput(clock);
  return {
    tracer: new Tracer(output, clock),
    lines,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe('Tracer', () => {
  it('nests spans under the current one and pops back on end', () => {
    const { tracer } = setup();
    const outer = tracer.span('outer', { verbose: false });
    const inner = tracer.span('inner', { verbose: false });

    expect(inner.parent).toBe(outer);
    expect(outer.children).toEqual([inner]);
    expect(tracer.current).toBe(inner);

    inner.end();
    expect(tracer.current).toBe(outer);
    outer.end();
    expect(tracer.current).toBeNull();
  });

  it('leaves the current span alone for detached spans', () => {
    const { tracer } = setup();
    const outer = tracer.span('outer', { verbose: false });
    const leaf = tracer.span('leaf', { verbose: false, current: false });

    expect(leaf.parent).toBe(outer);
    expect(tracer.current).toBe(outer);
  });

  it('writes begin and end lines for verbose spans', () => {
    const { tracer, lines, advance } = setup();
    const span = tracer.span('connect');
    advance(2500);
    expect(span.end()).toBe(2.5);
    expect(lines).toEqual(['   0.0 RUN | BEGIN SPAN connect', '   2.5 RUN | END SPAN connect    2.5s']);
  });

  it('returns the same duration when ended twice', () => {
    const { tracer, advance } = setup();
    const span = tracer.span('once', { verbose: false });
    advance(1000);
    expect(span.end()).toBe(1);
    advance(1000);
    expect(span.end()).toBe(1);
    expect(span.seconds).toBe(1);
  });

  it('summarizes the tree when a root span ends with the summary enabled', () => {
    const { tracer, lines, advance } = setup();
    tracer.emitSummary = true;
    const root = tracer.span('root', { verbose: false });
    const child = tracer.span('child', { verbose: false });
    advance(1000);
    child.end();
    const pending = tracer.span('pending', { verbose: false, current: false });
    root.end();

    expect(pending.seconds).toBeNull();
    expect(lines).toEqual([
      '   1.0 SUM |    1.0s root',
      '   1.0 SUM |    1.0s   child',
      '   1.0 SUM |    ...s   pending',
    ]);
  });
});
