import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import os from 'os';
import path from 'path';

export function makeTempDir(): string {
    return mkdtempSync(path.join(os.tmpdir(), 'robotics-uri-'));
}

export function removeDir(dir: string): void {
    rmSync(dir, { recursive: true, force: true });
}

/** Creates an empty file (and its parent directories) below `root`. */
export function touch(root: string, ...segments: string[]): string {
    const file = path.join(root, ...segments);
    mkdirSync(path.dirname(file), { recursive: true });
    writeFileSync(file, '');
    return file;
}
