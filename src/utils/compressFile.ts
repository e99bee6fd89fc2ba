import fs from 'fs';
import { rm, stat, unlink } from 'fs/promises';
import { pipeline } from 'stream/promises';
import zlib from 'zlib';
import { CompressionError } from '../rotation/errors.js';

/**
 * Gzips `src` into `dst` with the source's file mode, then removes `src`.
 * On failure the partial `dst` is deleted and a CompressionError is thrown.
 */
export async function compressFile(src: string, dst: string): Promise<void> {
  let mode: number;
  try {
    ({ mode } = await stat(src));
  } catch (error) {
    throw new CompressionError(src, error);
  }

  try {
    await pipeline(
      fs.createReadStream(src),
      zlib.createGzip(),
      fs.createWriteStream(dst, { mode: mode & 0o777 }),
    );
  } catch (error) {
    await rm(dst, { force: true });
    throw new CompressionError(src, error);
  }

  try {
    await unlink(src);
  } catch (error) {
    throw new CompressionError(src, error);
  }
}
