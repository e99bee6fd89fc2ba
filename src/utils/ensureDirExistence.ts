import { mkdir } from 'fs/promises';
import path from 'node:path';

export const DEFAULT_DIR_MODE = 0o755;

export async function ensureDirExistence(filePath: string, mode: number = DEFAULT_DIR_MODE) {
    await mkdir(path.dirname(filePath), { recursive: true, mode });
}
