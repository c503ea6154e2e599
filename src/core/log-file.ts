/**
 * Append-only, date-partitioned log files with bounded retention.
 * One file per UTC day: hooks-YYYY-MM-DD.log
 */

import fs from 'fs';
import path from 'path';
import { errorMessage } from './errors';
import { expandHome } from '../utils/paths';
import type { LoggingSettings } from '../types';

const LOG_FILE_PATTERN = /^hooks-\d{4}-\d{2}-\d{2}\.log$/;

class LogFileSink {
    primaryDir: string;
    fallbackDir: string;
    retention: number;
    _dir: string | null | undefined;
    _prunedFor: string | null;

    constructor(settings: LoggingSettings) {
        this.primaryDir = expandHome(settings.dir);
        this.fallbackDir = expandHome(settings.fallbackDir);
        this.retention = Math.max(1, settings.retention);
        this._dir = undefined;
        this._prunedFor = null;
    }

    /**
     * Resolved once: the primary directory if writable, else the fallback,
     * else null (file logging off for this process).
     */
    get directory(): string | null {
        if (this._dir === undefined) {
            this._dir = this._firstWritable([this.primaryDir, this.fallbackDir]);
        }
        return this._dir;
    }

    fileFor(date: Date): string | null {
        const dir = this.directory;
        if (!dir) return null;
        return path.join(dir, `hooks-${date.toISOString().slice(0, 10)}.log`);
    }

    write(line: string, now: Date = new Date()): void {
        const file = this.fileFor(now);
        if (!file) return;

        try {
            fs.appendFileSync(file, line + '\n');
        } catch (error: unknown) {
            process.stderr.write(`log write failed: ${errorMessage(error)}\n`);
            return;
        }

        const day = path.basename(file);
        if (this._prunedFor !== day) {
            this._prunedFor = day;
            this.prune();
        }
    }

    /**
     * Keep only the newest `retention` log files.
     */
    prune(): void {
        const dir = this.directory;
        if (!dir) return;

        try {
            const files = fs.readdirSync(dir).filter(name => LOG_FILE_PATTERN.test(name)).sort();
            for (const name of files.slice(0, Math.max(0, files.length - this.retention))) {
                fs.unlinkSync(path.join(dir, name));
            }
        } catch (error: unknown) {
            process.stderr.write(`log prune failed: ${errorMessage(error)}\n`);
        }
    }

    _firstWritable(candidates: string[]): string | null {
        for (const dir of candidates) {
            try {
                fs.mkdirSync(dir, { recursive: true });
                fs.accessSync(dir, fs.constants.W_OK);
                return dir;
            } catch {
                continue;
            }
        }
        return null;
    }
}

export default LogFileSink;
