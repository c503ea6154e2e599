/**
 * Advisory lock file: exclusive create of `<path>.lock`, holding the owner
 * token. Serializes writers across processes.
 */

import fs from 'fs';
import { randomUUID } from 'crypto';
import { isRecord } from './guards';

export interface FileLockOptions {
    /** Give up after waiting this long for a live owner */
    timeoutMs?: number;
    retryIntervalMs?: number;
}

export const LOCK_TIMEOUT_MS = 5000;
const DEFAULT_RETRY_INTERVAL_MS = 25;

function errorCode(error: unknown): unknown {
    return isRecord(error) ? error.code : undefined;
}

function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

function readLock(lockPath: string): string | null {
    try {
        return fs.readFileSync(lockPath, 'utf8').trim();
    } catch (error: unknown) {
        if (errorCode(error) === 'ENOENT') return null;
        throw error;
    }
}

function ownerAlive(content: string): boolean {
    const pid = Number.parseInt(content.split('-')[0], 10);
    if (Number.isNaN(pid)) return false;
    try {
        process.kill(pid, 0);
        return true;
    } catch (error: unknown) {
        // EPERM: the process exists but belongs to someone else
        return errorCode(error) === 'EPERM';
    }
}

/**
 * Removes the lock only while it still holds `token`. Returns false when
 * the file is gone or another writer has taken it over.
 */
export function releaseLock(lockPath: string, token: string): boolean {
    if (readLock(lockPath) !== token) return false;
    fs.rmSync(lockPath, { force: true });
    return true;
}

export async function withFileLock<T>(lockPath: string, fn: () => Promise<T>, options: FileLockOptions = {}): Promise<T> {
    const timeoutMs = options.timeoutMs ?? LOCK_TIMEOUT_MS;
    const retryIntervalMs = options.retryIntervalMs ?? DEFAULT_RETRY_INTERVAL_MS;
    let deadline = Date.now() + timeoutMs;
    // pid alone is not unique within one process
    const token = `${process.pid}-${randomUUID()}`;

    for (;;) {
        try {
            fs.writeFileSync(lockPath, token, { flag: 'wx' });
            break;
        } catch (error: unknown) {
            if (errorCode(error) !== 'EEXIST') throw error;
        }

        if (Date.now() > deadline) {
            const stale = readLock(lockPath);
            if (stale !== null && ownerAlive(stale)) {
                throw new Error(`Lock ${lockPath} held by a live process after ${timeoutMs}ms`);
            }
            // a competing writer may have reclaimed and re-taken it meanwhile
            if (stale !== null) releaseLock(lockPath, stale);
            deadline = Date.now() + timeoutMs;
            continue;
        }
        await sleep(retryIntervalMs);
    }

    try {
        return await fn();
    } finally {
        releaseLock(lockPath, token);
    }
}
