import { EventEmitter } from 'events';
import fs from 'fs';
import { open, rename, stat, type FileHandle } from 'fs/promises';
import schedule, { type Job } from 'node-schedule';
import {
    ConfigurationError,
    type RotationConfig,
    type RotationOptions,
    resolveRotationConfig,
} from '../config/rotationConfig.js';
import { backupName } from '../utils/backupName.js';
import { ensureDirExistence } from '../utils/ensureDirExistence.js';
import { logger } from '../utils/logger.js';
import { Mutex } from '../utils/Mutex.js';
import { writeFully } from '../utils/writeFully.js';
import {
    isErrnoException,
    OpenFailureError,
    OversizedWriteError,
    RotationFailureError,
    toError,
} from './errors.js';
import { MaintenanceWorker } from './MaintenanceWorker.js';

export const DEFAULT_FILE_MODE = 0o600;

export interface WriterDependencies {
    /** Time source for backup names and age cutoffs */
    clock?: () => Date;
}

/**
 * Writes to a single log file and rolls it over to a timestamped backup
 * whenever a write would push it past `maxSize`.
 *
 * write(), rotate() and close() are serialized by one lock, so writes and
 * rotations are totally ordered. Retention runs on a background
 * MaintenanceWorker and never fails a write.
 *
 * Events:
 * - `open` (path) when an existing file is reopened for append
 * - `rotate` (backup path, or null when there was nothing to move aside)
 * - `maintenance` / `maintenanceError`, forwarded from the worker
 * - `scheduleError` (Error) when a scheduled rotation fails
 */
export class RotatingFileWriter extends EventEmitter {
    private readonly config: Readonly<RotationConfig>;
    private readonly clock: () => Date;
    private readonly mutex = new Mutex();
    private readonly worker: MaintenanceWorker;
    private file: FileHandle | null = null;
    private size = 0;
    private job: Job | null = null;

    constructor(options: RotationOptions = {}, dependencies: WriterDependencies = {}) {
        super();
        this.config = resolveRotationConfig(options);
        this.clock = dependencies.clock ?? (() => new Date());

        this.worker = new MaintenanceWorker(this.config, this.clock);
        this.worker.on('maintenance', (result) => this.emit('maintenance', result));
        this.worker.on('maintenanceError', (error) => this.emit('maintenanceError', error));

        if (this.config.rotateSchedule) {
            this.scheduleRotation(this.config.rotateSchedule);
        }
    }

    getConfig(): RotationConfig {
        return { ...this.config };
    }

    /**
     * Append `data` to the log file, rotating first if it would not fit.
     * Resolves with the number of bytes written.
     */
    write(data: Uint8Array | string): Promise<number> {
        const payload = typeof data === 'string' ? Buffer.from(data) : data;
        if (payload.length > this.config.maxSize) {
            return Promise.reject(new OversizedWriteError(payload.length, this.config.maxSize));
        }

        return this.mutex.runExclusive(async () => {
            if (!this.file) {
                await this.openExistingOrNew(payload.length);
            }

            if (this.size + payload.length > this.config.maxSize) {
                await this.rotateFile();
            }

            return writeFully(this.activeFile(), payload, (bytes) => {
                this.size += bytes;
            });
        });
    }

    /**
     * Roll the current file over to a backup now, regardless of its size
     */
    rotate(): Promise<void> {
        return this.mutex.runExclusive(() => this.rotateFile());
    }

    /**
     * Close the active file if one is open. A later write reopens it.
     */
    close(): Promise<void> {
        return this.mutex.runExclusive(() => this.closeFile());
    }

    /**
     * Resolves once background maintenance has caught up
     */
    maintenanceIdle(): Promise<void> {
        return this.worker.idle();
    }

    /**
     * Cancel scheduled rotation, close the file and stop the maintenance worker
     */
    async destroy(): Promise<void> {
        this.job?.cancel();
        this.job = null;
        await this.close();
        await this.worker.stop();
        this.removeAllListeners();
    }

    private activeFile(): FileHandle {
        if (!this.file) {
            throw new OpenFailureError(this.config.filename, new Error('no active log file'));
        }
        return this.file;
    }

    /**
     * Open the log file if it exists and the pending write still fits;
     * otherwise rotate it away or create it.
     */
    private async openExistingOrNew(writeLength: number): Promise<void> {
        this.worker.signal();

        const { filename, maxSize } = this.config;
        let existingSize: number;
        try {
            existingSize = (await stat(filename)).size;
        } catch (error) {
            if (isErrnoException(error) && error.code === 'ENOENT') {
                await this.openNew();
                return;
            }
            throw new OpenFailureError(filename, error);
        }

        if (existingSize + writeLength > maxSize) {
            return this.rotateFile();
        }

        try {
            this.file = await open(filename, fs.constants.O_APPEND | fs.constants.O_WRONLY);
        } catch (error) {
            logger.debug('Append open failed, rotating the log file', {
                filename,
                error: toError(error).message,
            });
            return this.rotateFile();
        }
        this.size = existingSize;
        this.emit('open', filename);
    }

    /**
     * Close the current file, move it aside and start a fresh one. Returns
     * only once the new file is ready; maintenance is signalled, not awaited.
     */
    private async rotateFile(): Promise<void> {
        await this.closeFile();
        let backup: string | null;
        try {
            backup = await this.openNew();
        } catch (error) {
            if (error instanceof RotationFailureError) {
                throw error;
            }
            throw new RotationFailureError(this.config.filename, error);
        }
        this.worker.signal();
        this.emit('rotate', backup);
    }

    /**
     * Create a fresh file at the configured path, renaming any existing one
     * to a backup first. Assumes no file is open. Returns the backup path.
     */
    private async openNew(): Promise<string | null> {
        const { filename, localTime } = this.config;
        try {
            await ensureDirExistence(filename);
        } catch (error) {
            throw new OpenFailureError(filename, error);
        }

        let mode = DEFAULT_FILE_MODE;
        let backup: string | null = null;
        try {
            mode = (await stat(filename)).mode & 0o777;
            backup = backupName(filename, localTime, this.clock());
        } catch (error) {
            if (!isErrnoException(error) || error.code !== 'ENOENT') {
                throw new RotationFailureError(filename, error);
            }
        }

        if (backup) {
            try {
                await rename(filename, backup);
            } catch (error) {
                throw new RotationFailureError(filename, error);
            }
        }

        try {
            this.file = await open(filename, 'w', mode);
        } catch (error) {
            throw new OpenFailureError(filename, error);
        }
        this.size = 0;

        if (backup) {
            logger.debug('Rotated log file', { filename, backup });
        }
        return backup;
    }

    private async closeFile(): Promise<void> {
        const file = this.file;
        if (!file) {
            return;
        }
        this.file = null;
        await file.close();
    }

    private scheduleRotation(rule: string): void {
        const job = schedule.scheduleJob(rule, () => {
            this.rotate().catch((error: unknown) => {
                const err = toError(error);
                logger.error('Scheduled log rotation failed', {
                    filename: this.config.filename,
                    error: err.message,
                });
                this.emit('scheduleError', err);
            });
        });
        if (!job) {
            throw new ConfigurationError(`Invalid rotateSchedule: ${rule}`, 'rotateSchedule');
        }
        this.job = job;
    }
}
