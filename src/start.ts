#!/usr/bin/env node
import 'dotenv/config';
import { pipeline } from 'stream/promises';
import { loadOptionsFromEnvironment } from './config/rotationConfig.js';
import { RotatingFileWriter } from './rotation/RotatingFileWriter.js';
import { createRotatingStream } from './rotation/stream.js';
import { logger } from './utils/logger.js';

// Pipe stdin into a rotating log file configured through LOGROLL_* variables
async function main() {
  const writer = new RotatingFileWriter(loadOptionsFromEnvironment());
  const { filename, maxSize, maxBackups, maxAge, compress } = writer.getConfig();
  logger.info('Writing stdin to rotating log', { filename, maxSize, maxBackups, maxAge, compress });

  try {
    await pipeline(process.stdin, createRotatingStream(writer));
  } finally {
    await writer.destroy();
  }
}

main().catch((error: unknown) => {
  logger.error('logroll failed', { error: error instanceof Error ? error.message : String(error) });
  process.exitCode = 1;
});
