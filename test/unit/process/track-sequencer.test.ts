import { TrackSequencer, formatTrack } from '../../../src/process/track-sequencer.js';

describe('TrackSequencer', () => {
  it('issues 1..N in order for sequential calls', () => {
    const sequencer = new TrackSequencer();
    const issued = [sequencer.next(), sequencer.next(), sequencer.next(), sequencer.next()];
    expect(issued).toEqual([1, 2, 3, 4]);
    expect(sequencer.current).toBe(4);
  });

  it('issues unique ids without gaps across concurrent async callers', async () => {
    const sequencer = new TrackSequencer();
    const draw = async (delayMs: number): Promise<number> => {
      await new Promise((resolve) => setTimeout(resolve, delayMs));
      return sequencer.next();
    };
    const issued = await Promise.all([5, 0, 3, 1, 4, 2, 0, 1].map(draw));
    expect([...issued].sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
  });

  it('starts at zero before anything is issued', () => {
    expect(new TrackSequencer().current).toBe(0);
  });
});

describe('formatTrack', () => {
  it('zero-pads to three digits', () => {
    expect(formatTrack(7)).toBe('007');
    expect(formatTrack(42)).toBe('042');
  });

  it('leaves wider numbers alone', () => {
    expect(formatTrack(1234)).toBe('1234');
  });
});
