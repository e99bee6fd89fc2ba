import fs from 'fs';
import os from 'os';
import path from 'path';

/**
 * Fresh temp directory holding an `app.log` path for one test
 */
export function createTmpLogDir(): { dir: string; filename: string; cleanup: () => void } {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'logroll-'));
    return {
        dir,
        filename: path.join(dir, 'app.log'),
        cleanup: () => fs.rmSync(dir, { recursive: true, force: true }),
    };
}

export function touch(dir: string, name: string, content: string | Buffer = ''): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, content);
    return file;
}

/**
 * Names in `dir` that look like backups of app.log, sorted
 */
export function listBackups(dir: string): string[] {
    return fs
        .readdirSync(dir)
        .filter((name) => name.startsWith('app-'))
        .sort();
}

/**
 * Clock that advances one second per call, starting at `start`
 */
export function steppingClock(start: Date): () => Date {
    let tick = 0;
    return () => new Date(start.getTime() + tick++ * 1000);
}
