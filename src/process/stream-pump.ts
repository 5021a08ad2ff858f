import { createInterface } from 'readline';
import type { Readable } from 'stream';
import { logger } from '../logger.js';
import type { LineSink } from './types.js';

/**
 * Reads `stream` line by line into `sink` until it is exhausted, then calls
 * `sink.end()` once. Resolves after `end()` has run; never rejects.
 *
 * A sink that throws is logged and keeps receiving lines, so one stream's
 * consumer cannot stall the child or the other stream.
 */
export function pumpLines(stream: Readable, sink: LineSink, label = 'stream'): Promise<void> {
  return new Promise<void>((resolve) => {
    const lines = createInterface({ input: stream, crlfDelay: Infinity });
    let finished = false;

    const deliver = (text: string): void => {
      try {
        sink.line(text);
      } catch (err) {
        logger.warn({ err, stream: label }, 'Line consumer failed; continuing');
      }
    };

    const finish = (): void => {
      if (finished) return;
      finished = true;
      try {
        sink.end();
      } catch (err) {
        logger.warn({ err, stream: label }, 'End-of-stream consumer failed');
      }
      logger.debug({ stream: label }, 'Stream drained');
      resolve();
    };

    lines.on('line', (text: string) => {
      if (!finished) deliver(text);
    });
    lines.once('close', finish);
    let readFailed = false;
    const onError = (err: Error): void => {
      if (!readFailed) {
        readFailed = true;
        logger.warn({ err, stream: label }, 'Read failed; treating as end of stream');
      }
      lines.close();
    };
    stream.on('error', onError);
    lines.on('error', onError);
    // A destroyed pipe may close without ever emitting 'end'.
    stream.once('close', () => lines.close());
  });
}
