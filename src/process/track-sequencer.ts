import type { Track } from './types.js';

// Invocations are issued from the event loop thread, so a plain increment is
// atomic with respect to any number of outstanding async invocations.
export class TrackSequencer {
  private counter = 0;

  next(): Track {
    this.counter += 1;
    return this.counter;
  }

  get current(): number {
    return this.counter;
  }
}

export function formatTrack(track: Track): string {
  return String(track).padStart(3, '0');
}
