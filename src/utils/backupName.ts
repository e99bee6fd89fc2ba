import path from 'path';

export const BACKUP_TIME_FORMAT = 'YYYY-MM-DD HH:mm:ss';
export const COMPRESS_SUFFIX = '.gz';

const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

/**
 * A rotated-out log file, recognised purely from its name.
 */
export interface BackupFile {
  /** Entry name inside the log directory */
  name: string;
  /** Rotation time encoded in the name */
  timestamp: Date;
  /** Whether the name carries the compressed suffix */
  compressed: boolean;
}

const pad = (value: number, width = 2): string => String(value).padStart(width, '0');

/**
 * Formats `date` as BACKUP_TIME_FORMAT, in local time or UTC.
 */
export function formatTimestamp(date: Date, localTime: boolean): string {
  const parts = localTime
    ? [date.getFullYear(), date.getMonth() + 1, date.getDate(), date.getHours(), date.getMinutes(), date.getSeconds()]
    : [
        date.getUTCFullYear(),
        date.getUTCMonth() + 1,
        date.getUTCDate(),
        date.getUTCHours(),
        date.getUTCMinutes(),
        date.getUTCSeconds(),
      ];
  const [year, month, day, hours, minutes, seconds] = parts;
  return `${pad(year, 4)}-${pad(month)}-${pad(day)} ${pad(hours)}:${pad(minutes)}:${pad(seconds)}`;
}

/**
 * Strict inverse of formatTimestamp; out-of-range fields (2024-02-30) yield null.
 */
export function parseTimestamp(text: string, localTime: boolean): Date | null {
  const match = text.match(TIMESTAMP_PATTERN);
  if (!match) {
    return null;
  }
  const [year, month, day, hours, minutes, seconds] = match.slice(1).map(Number);
  const date = localTime
    ? new Date(year, month - 1, day, hours, minutes, seconds)
    : new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds));
  if (isNaN(date.getTime()) || formatTimestamp(date, localTime) !== text) {
    return null;
  }
  return date;
}

/**
 * Splits the log file's base name into the backup prefix ("app-") and extension (".log").
 */
export function prefixAndExt(filename: string): { prefix: string; ext: string } {
  const base = path.basename(filename);
  const ext = path.extname(base);
  return { prefix: `${base.slice(0, base.length - ext.length)}-`, ext };
}

/**
 * Builds the backup path for `filename` rotated at `now`:
 * /var/log/app.log -> /var/log/app-2024-05-10 12:00:00.log
 */
export function backupName(filename: string, localTime: boolean, now: Date): string {
  const { prefix, ext } = prefixAndExt(filename);
  return path.join(path.dirname(filename), `${prefix}${formatTimestamp(now, localTime)}${ext}`);
}

export function parseBackupName(
  name: string,
  prefix: string,
  ext: string,
  localTime: boolean,
): BackupFile | null {
  if (!name.startsWith(prefix)) {
    return null;
  }

  for (const [suffix, compressed] of [
    [ext, false],
    [ext + COMPRESS_SUFFIX, true],
  ] as const) {
    if (!name.endsWith(suffix) || name.length < prefix.length + suffix.length) {
      continue;
    }
    const timestamp = parseTimestamp(name.slice(prefix.length, name.length - suffix.length), localTime);
    if (timestamp) {
      return { name, timestamp, compressed };
    }
  }
  return null;
}

/**
 * The logical backup a file belongs to: compressed and uncompressed copies share one.
 */
export function logicalName(name: string): string {
  return name.endsWith(COMPRESS_SUFFIX) ? name.slice(0, -COMPRESS_SUFFIX.length) : name;
}
