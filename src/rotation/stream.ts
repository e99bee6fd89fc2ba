import { Writable } from 'stream';
import { toError } from './errors.js';
import type { RotatingFileWriter } from './RotatingFileWriter.js';

/**
 * Writable over a RotatingFileWriter, for piping. Each chunk becomes one
 * write(); ending the stream closes the writer's file.
 */
export function createRotatingStream(writer: RotatingFileWriter): Writable {
  return new Writable({
    write(chunk: Buffer, _encoding, callback) {
      writer.write(chunk).then(
        () => callback(),
        (error: unknown) => callback(toError(error)),
      );
    },
    final(callback) {
      writer.close().then(
        () => callback(),
        (error: unknown) => callback(toError(error)),
      );
    },
  });
}
