const UNITS: Record<string, number> = {
  B: 1,
  KB: 1024,
  MB: 1024 * 1024,
  GB: 1024 * 1024 * 1024,
};

export const MEGABYTE = UNITS.MB;

/**
 * Parse a size string such as "512KB" or "1GB" to bytes (1024 multiples).
 */
export function parseSize(size: string): number {
  const match = size.trim().match(/^(\d+(?:\.\d+)?)\s*(B|KB|MB|GB)$/i);
  if (!match) {
    throw new Error(
      `Invalid size format: "${size}". Expected <number><unit>, e.g. 512KB or 100MB`,
    );
  }
  return Math.floor(Number.parseFloat(match[1]) * UNITS[match[2].toUpperCase()]);
}
