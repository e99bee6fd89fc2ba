import { describe, test, expect } from '@jest/globals';
import { Mutex } from '../src/utils/Mutex.js';

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('Mutex', () => {
    test('should run tasks one at a time in call order', async () => {
        const mutex = new Mutex();
        const order: string[] = [];

        const slow = mutex.runExclusive(async () => {
            order.push('a:start');
            await delay(20);
            order.push('a:end');
            return 1;
        });
        const fast = mutex.runExclusive(async () => {
            order.push('b:start');
            order.push('b:end');
            return 2;
        });

        await expect(Promise.all([slow, fast])).resolves.toEqual([1, 2]);
        expect(order).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
    });

    test('should release the lock when a task rejects', async () => {
        const mutex = new Mutex();

        const failing = mutex.runExclusive(async () => {
            throw new Error('boom');
        });
        const next = mutex.runExclusive(async () => 'ran');

        await expect(failing).rejects.toThrow('boom');
        await expect(next).resolves.toBe('ran');
    });
});
