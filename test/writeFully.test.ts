import { describe, test, expect } from '@jest/globals';
import { writeFully, type WriteTarget } from '../src/utils/writeFully.js';

/**
 * Target that accepts at most `limit` bytes per call; a limit of 0 stalls
 */
const chunkedTarget = (limits: number[]) => {
    const received: number[] = [];
    const target: WriteTarget = {
        write: async (buffer, offset, length) => {
            const accepted = Math.min(limits.shift() ?? length, length);
            received.push(...buffer.subarray(offset, offset + accepted));
            return { bytesWritten: accepted };
        },
    };
    return { target, received };
};

describe('writeFully', () => {
    test('should continue after short writes until the payload is written', async () => {
        const { target, received } = chunkedTarget([3, 2]);
        const progress: number[] = [];

        const written = await writeFully(target, Buffer.from('abcdefgh'), (bytes) => progress.push(bytes));

        expect(written).toBe(8);
        expect(Buffer.from(received).toString()).toBe('abcdefgh');
        expect(progress).toEqual([3, 2, 3]);
    });

    test('should fail when the target stops accepting bytes', async () => {
        const { target } = chunkedTarget([4, 0]);
        const progress: number[] = [];

        await expect(writeFully(target, Buffer.from('abcdefgh'), (bytes) => progress.push(bytes))).rejects.toThrow(
            'write stalled after 4 of 8 bytes',
        );
        expect(progress).toEqual([4]);
    });

    test('should write nothing for an empty payload', async () => {
        const { target, received } = chunkedTarget([]);

        await expect(writeFully(target, Buffer.alloc(0))).resolves.toBe(0);
        expect(received).toEqual([]);
    });
});
