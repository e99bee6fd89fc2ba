import os from 'os';
import path from 'path';
import { z } from 'zod';
import { toError } from '../rotation/errors.js';
import { MEGABYTE, parseSize } from '../utils/parseSize.js';

export const DEFAULT_MAX_SIZE_MB = 100;

/**
 * Caller-supplied rotation options. Everything is optional.
 */
export interface RotationOptions {
    /** File to write logs to. Defaults to `<tmpdir>/<program>_rotate.log` */
    filename?: string;
    /** Rotation threshold: megabytes when numeric, or a size string such as "512KB" */
    maxSize?: number | string;
    /** Logical backups to retain; 0 keeps them all */
    maxBackups?: number;
    /** Days to retain a backup, based on the timestamp in its name; 0 keeps them forever */
    maxAge?: number;
    /** Gzip backups after rotation */
    compress?: boolean;
    /** Use local time instead of UTC in backup names */
    localTime?: boolean;
    /** Cron expression for time-based rotation, on top of size-based rotation */
    rotateSchedule?: string;
}

/**
 * Resolved configuration; immutable once a writer holds it.
 */
export interface RotationConfig {
    filename: string;
    /** Rotation threshold in bytes */
    maxSize: number;
    maxBackups: number;
    maxAge: number;
    compress: boolean;
    localTime: boolean;
    rotateSchedule?: string;
}

/**
 * Configuration validation error
 */
export class ConfigurationError extends Error {
    constructor(message: string, public field?: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

const sizeSchema = z
    .union([
        z
            .number()
            .finite()
            .nonnegative()
            .refine((mb) => mb === 0 || mb * MEGABYTE >= 1, 'Size must be at least one byte')
            .transform((mb) => Math.floor(mb * MEGABYTE)),
        z.string().transform((value, ctx) => {
            try {
                return parseSize(value);
            } catch (error) {
                ctx.addIssue({ code: z.ZodIssueCode.custom, message: toError(error).message });
                return z.NEVER;
            }
        }),
    ])
    .transform((bytes) => (bytes === 0 ? DEFAULT_MAX_SIZE_MB * MEGABYTE : bytes));

const optionsSchema = z.object({
    filename: z.string().min(1).optional(),
    maxSize: sizeSchema.default(DEFAULT_MAX_SIZE_MB),
    maxBackups: z.number().int().nonnegative().default(0),
    maxAge: z.number().finite().nonnegative().default(0),
    compress: z.boolean().default(false),
    localTime: z.boolean().default(false),
    rotateSchedule: z.string().min(1).optional(),
});

/**
 * Log file used when no filename is configured
 */
export function defaultFilename(): string {
    const program = path.basename(process.argv[1] ?? process.argv0);
    return path.join(os.tmpdir(), `${program}_rotate.log`);
}

/**
 * Validate options and fill in defaults
 */
export function resolveRotationConfig(options: RotationOptions = {}): Readonly<RotationConfig> {
    const result = optionsSchema.safeParse(options);
    if (!result.success) {
        const issue = result.error.issues[0];
        const field = issue.path.join('.');
        throw new ConfigurationError(`Invalid ${field || 'options'}: ${issue.message}`, field || undefined);
    }

    const { filename, rotateSchedule, ...rest } = result.data;
    const config: RotationConfig = {
        ...rest,
        filename: path.resolve(filename ?? defaultFilename()),
    };
    if (rotateSchedule !== undefined) {
        config.rotateSchedule = rotateSchedule;
    }
    return Object.freeze(config);
}

const parseBoolean = (value: string, field: string): boolean => {
    switch (value.trim().toLowerCase()) {
        case 'true':
        case '1':
            return true;
        case 'false':
        case '0':
            return false;
        default:
            throw new ConfigurationError(`${field} must be true, false, 1 or 0`, field);
    }
};

const parseNumber = (value: string, field: string): number => {
    const parsed = Number(value.trim());
    if (value.trim() === '' || isNaN(parsed)) {
        throw new ConfigurationError(`${field} must be a number`, field);
    }
    return parsed;
};

/**
 * Load rotation options from LOGROLL_* environment variables
 */
export function loadOptionsFromEnvironment(env: NodeJS.ProcessEnv = process.env): RotationOptions {
    const options: RotationOptions = {};

    if (env.LOGROLL_FILENAME !== undefined) {
        options.filename = env.LOGROLL_FILENAME;
    }
    if (env.LOGROLL_MAX_SIZE !== undefined) {
        const raw = env.LOGROLL_MAX_SIZE.trim();
        // bare numbers are megabytes, like the numeric option
        options.maxSize = /^\d+(\.\d+)?$/.test(raw) ? Number(raw) : raw;
    }
    if (env.LOGROLL_MAX_BACKUPS !== undefined) {
        options.maxBackups = parseNumber(env.LOGROLL_MAX_BACKUPS, 'LOGROLL_MAX_BACKUPS');
    }
    if (env.LOGROLL_MAX_AGE !== undefined) {
        options.maxAge = parseNumber(env.LOGROLL_MAX_AGE, 'LOGROLL_MAX_AGE');
    }
    if (env.LOGROLL_COMPRESS !== undefined) {
        options.compress = parseBoolean(env.LOGROLL_COMPRESS, 'LOGROLL_COMPRESS');
    }
    if (env.LOGROLL_LOCAL_TIME !== undefined) {
        options.localTime = parseBoolean(env.LOGROLL_LOCAL_TIME, 'LOGROLL_LOCAL_TIME');
    }
    if (env.LOGROLL_ROTATE_SCHEDULE !== undefined) {
        options.rotateSchedule = env.LOGROLL_ROTATE_SCHEDULE;
    }

    return options;
}
