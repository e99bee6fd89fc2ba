import { describe, test, expect, beforeEach, afterEach, jest } from '@jest/globals';
import fs from 'fs';
import fsPromises from 'fs/promises';
import path from 'path';
import { RotatingFileWriter } from '../src/rotation/RotatingFileWriter.js';
import { ConfigurationError } from '../src/config/rotationConfig.js';
import { RotationFailureError } from '../src/rotation/errors.js';
import { createTmpLogDir, steppingClock } from './helpers/tmpLogDir.js';

type ScheduledJob = { cancel: () => boolean };

const mockCancel = jest.fn(() => true);
const mockScheduleJob = jest.fn<(rule: string, callback: () => void) => ScheduledJob | null>();

jest.mock('node-schedule', () => ({
    __esModule: true,
    default: {
        scheduleJob: (rule: string, callback: () => void) => mockScheduleJob(rule, callback),
    },
}));

describe('scheduled rotation', () => {
    let dir: string;
    let filename: string;
    let cleanup: () => void;
    let writer: RotatingFileWriter | undefined;
    let fire: () => void;

    beforeEach(() => {
        ({ dir, filename, cleanup } = createTmpLogDir());
        fire = () => {
            throw new Error('no job scheduled');
        };
        mockScheduleJob.mockReset();
        mockCancel.mockClear();
        mockScheduleJob.mockImplementation((_rule, callback) => {
            fire = callback;
            return { cancel: mockCancel };
        });
    });

    afterEach(async () => {
        jest.restoreAllMocks();
        await writer?.destroy();
        writer = undefined;
        cleanup();
    });

    const createWriter = () => {
        writer = new RotatingFileWriter(
            { filename, rotateSchedule: '0 0 * * *' },
            { clock: steppingClock(new Date('2024-05-10T00:00:00Z')) },
        );
        return writer;
    };

    test('should register the cron rule', () => {
        createWriter();

        expect(mockScheduleJob).toHaveBeenCalledTimes(1);
        expect(mockScheduleJob.mock.calls[0][0]).toBe('0 0 * * *');
    });

    test('should rotate when the job fires', async () => {
        const subject = createWriter();
        await subject.write('yesterday\n');
        const rotated = new Promise((resolve) => subject.once('rotate', resolve));

        fire();

        expect(await rotated).toBe(path.join(dir, 'app-2024-05-10 00:00:00.log'));
        await subject.write('today\n');
        expect(fs.readFileSync(path.join(dir, 'app-2024-05-10 00:00:00.log'), 'utf8')).toBe('yesterday\n');
        expect(fs.readFileSync(filename, 'utf8')).toBe('today\n');
    });

    test('should emit scheduleError when a scheduled rotation fails', async () => {
        const subject = createWriter();
        await subject.write('yesterday\n');
        jest.spyOn(fsPromises, 'rename').mockRejectedValueOnce(new Error('EACCES: permission denied'));
        const failed = new Promise((resolve) => subject.once('scheduleError', resolve));

        fire();

        expect(await failed).toBeInstanceOf(RotationFailureError);
    });

    test('should cancel the job on destroy', async () => {
        const subject = createWriter();

        await subject.destroy();

        expect(mockCancel).toHaveBeenCalledTimes(1);
    });

    test('should reject a rule the scheduler does not accept', () => {
        mockScheduleJob.mockReturnValue(null);

        expect(() => createWriter()).toThrow(ConfigurationError);
        writer = undefined;
    });
});
