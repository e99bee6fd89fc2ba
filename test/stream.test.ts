import { describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import fs from 'fs';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { RotatingFileWriter } from '../src/rotation/RotatingFileWriter.js';
import { createRotatingStream } from '../src/rotation/stream.js';
import { OversizedWriteError } from '../src/rotation/errors.js';
import { createTmpLogDir, listBackups } from './helpers/tmpLogDir.js';

describe('createRotatingStream', () => {
    let dir: string;
    let filename: string;
    let cleanup: () => void;
    let writer: RotatingFileWriter;

    beforeEach(() => {
        ({ dir, filename, cleanup } = createTmpLogDir());
        writer = new RotatingFileWriter({ filename, maxSize: '100B' });
    });

    afterEach(async () => {
        await writer.destroy();
        cleanup();
    });

    test('should write every chunk to the log file', async () => {
        await pipeline(Readable.from(['one\n', 'two\n', 'three\n']), createRotatingStream(writer));

        expect(fs.readFileSync(filename, 'utf8')).toBe('one\ntwo\nthree\n');
    });

    test('should rotate while streaming', async () => {
        const chunks = [Buffer.alloc(60, 'a'), Buffer.alloc(60, 'b')];

        await pipeline(Readable.from(chunks), createRotatingStream(writer));

        expect(listBackups(dir)).toHaveLength(1);
        expect(fs.readFileSync(filename, 'utf8')).toBe('b'.repeat(60));
    });

    test('should fail the pipeline on an oversized chunk', async () => {
        await expect(
            pipeline(Readable.from([Buffer.alloc(200)]), createRotatingStream(writer)),
        ).rejects.toBeInstanceOf(OversizedWriteError);
    });
});
