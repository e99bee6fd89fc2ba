import { EventEmitter } from 'events';
import { readdir, unlink } from 'fs/promises';
import path from 'path';
import type { RotationConfig } from '../config/rotationConfig.js';
import {
    type BackupFile,
    COMPRESS_SUFFIX,
    logicalName,
    parseBackupName,
    prefixAndExt,
} from '../utils/backupName.js';
import { compressFile } from '../utils/compressFile.js';
import { logger } from '../utils/logger.js';
import { MaintenanceError, toError } from './errors.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Outcome of one maintenance pass
 */
export interface MaintenanceResult {
    /** Backups deleted by the count or age rule */
    removed: string[];
    /** Backups replaced by a gzipped copy */
    compressed: string[];
    /** Every failure, in the order encountered */
    errors: Error[];
    /** The last failure, if any */
    error?: Error;
}

type MaintenanceConfig = Pick<RotationConfig, 'filename' | 'maxBackups' | 'maxAge' | 'compress' | 'localTime'>;

/**
 * Background retention for one log file: compresses and evicts old backups.
 *
 * Signals go through a single-slot mailbox. Signalling while a pass is
 * already pending is a no-op, so a burst of rotations collapses into one
 * more pass. A single consumer loop drains the mailbox, so passes never
 * overlap. The loop starts on the first signal and runs until stop().
 *
 * Events:
 * - `maintenance` (MaintenanceResult) after every pass
 * - `maintenanceError` (MaintenanceError) after a pass that hit failures
 */
export class MaintenanceWorker extends EventEmitter {
    private pending = false;
    private busy = false;
    private stopped = false;
    private wake: (() => void) | null = null;
    private loop: Promise<void> | null = null;
    private idleWaiters: Array<() => void> = [];

    constructor(
        private readonly config: MaintenanceConfig,
        private readonly clock: () => Date = () => new Date(),
    ) {
        super();
    }

    /**
     * Request a maintenance pass without waiting for it
     */
    signal(): void {
        if (this.stopped) {
            return;
        }
        if (!this.loop) {
            this.loop = this.run();
        }
        if (this.pending) {
            return;
        }
        this.pending = true;
        this.wake?.();
    }

    /**
     * Resolves once no pass is pending or running
     */
    idle(): Promise<void> {
        if (!this.pending && !this.busy) {
            return Promise.resolve();
        }
        return new Promise((resolve) => this.idleWaiters.push(resolve));
    }

    /**
     * Stop after the current pass; pending signals are dropped
     */
    async stop(): Promise<void> {
        this.stopped = true;
        this.pending = false;
        this.wake?.();
        await this.loop;
        this.notifyIdle();
    }

    private async run(): Promise<void> {
        while (!this.stopped) {
            if (!this.pending) {
                await new Promise<void>((resolve) => {
                    this.wake = resolve;
                });
                this.wake = null;
                continue;
            }

            this.pending = false;
            this.busy = true;
            let result: MaintenanceResult;
            try {
                result = await this.runOnce();
            } catch (error) {
                const err = toError(error);
                result = { removed: [], compressed: [], errors: [err], error: err };
            } finally {
                this.busy = false;
            }
            try {
                this.report(result);
            } catch (error) {
                logger.error('Maintenance listener threw', {
                    filename: this.config.filename,
                    error: toError(error).message,
                });
            }

            if (!this.pending) {
                this.notifyIdle();
            }
        }
    }

    /**
     * One maintenance pass over the log directory. Individual failures are
     * collected and do not stop the remaining removals and compressions.
     */
    async runOnce(): Promise<MaintenanceResult> {
        const result: MaintenanceResult = { removed: [], compressed: [], errors: [] };
        const { maxBackups, maxAge, compress } = this.config;
        if (maxBackups === 0 && maxAge === 0 && !compress) {
            return result;
        }

        const dir = path.dirname(this.config.filename);
        let backups: BackupFile[];
        try {
            backups = await this.listBackups(dir);
        } catch (error) {
            // nothing to clean this round; the next signal retries
            logger.debug('Skipping maintenance, log directory unreadable', {
                dir,
                error: toError(error).message,
            });
            return result;
        }

        const remove = new Set<BackupFile>();

        if (maxBackups > 0 && maxBackups < backups.length) {
            const preserved = new Set<string>();
            for (const backup of backups) {
                preserved.add(logicalName(backup.name));
                if (preserved.size > maxBackups) {
                    remove.add(backup);
                }
            }
        }

        if (maxAge > 0) {
            const cutoff = this.clock().getTime() - maxAge * DAY_MS;
            for (const backup of backups) {
                if (backup.timestamp.getTime() < cutoff) {
                    remove.add(backup);
                }
            }
        }

        const toCompress = compress
            ? backups.filter((backup) => !remove.has(backup) && !backup.compressed)
            : [];

        for (const backup of remove) {
            try {
                await unlink(path.join(dir, backup.name));
                result.removed.push(backup.name);
            } catch (error) {
                result.errors.push(toError(error));
            }
        }

        for (const backup of toCompress) {
            const src = path.join(dir, backup.name);
            try {
                await compressFile(src, src + COMPRESS_SUFFIX);
                result.compressed.push(backup.name);
            } catch (error) {
                result.errors.push(toError(error));
            }
        }

        if (result.errors.length > 0) {
            result.error = result.errors[result.errors.length - 1];
        }
        return result;
    }

    /**
     * Backups of this log in `dir`, most recent first
     */
    private async listBackups(dir: string): Promise<BackupFile[]> {
        const entries = await readdir(dir, { withFileTypes: true });
        const { prefix, ext } = prefixAndExt(this.config.filename);

        const backups: BackupFile[] = [];
        for (const entry of entries) {
            if (!entry.isFile()) {
                continue;
            }
            const backup = parseBackupName(entry.name, prefix, ext, this.config.localTime);
            if (backup) {
                backups.push(backup);
            }
        }

        return backups.sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());
    }

    private report(result: MaintenanceResult): void {
        this.emit('maintenance', result);
        if (result.errors.length === 0) {
            return;
        }

        const error = new MaintenanceError(result.errors);
        logger.warn('Log maintenance pass failed', {
            filename: this.config.filename,
            errors: result.errors.map((err) => err.message),
        });
        this.emit('maintenanceError', error);
    }

    private notifyIdle(): void {
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        waiters.forEach((resolve) => resolve());
    }
}
