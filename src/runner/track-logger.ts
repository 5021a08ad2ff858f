import type { Output } from '../output/output.js';
import { formatTrack } from '../process/track-sequencer.js';
import type { LineSink, Track } from '../process/types.js';

/** Writes a child's lines to the session log under its zero-padded track. */
export class TrackLogger implements LineSink {
  private readonly prefix: string;

  constructor(private readonly output: Output, readonly track: Track) {
    this.prefix = formatTrack(track);
  }

  line(text: string): void {
    this.output.write(text, this.prefix);
  }

  end(): void {}
}
