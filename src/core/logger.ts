/**
 * Hook Logger
 * Centralized logging utility. Writes to stderr and, once configured, to a
 * date-partitioned log file. Never writes to stdout: the runtime may read a
 * hook's stdout as hook output.
 */

import { format } from 'util';
import LogFileSink from './log-file';
import type { LoggingSettings } from '../types';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function isLogLevel(value: string | undefined): value is LogLevel {
    return value !== undefined && value in LEVELS;
}

class Logger {
    static fileSink: LogFileSink | null = null;

    namespace: string;

    constructor(namespace: string = 'hooks') {
        this.namespace = namespace;
    }

    static configure(settings: LoggingSettings): void {
        Logger.fileSink = new LogFileSink(settings);
    }

    get logLevel(): LogLevel {
        const level = process.env.LOG_LEVEL?.toLowerCase();
        return isLogLevel(level) ? level : 'info';
    }

    _log(level: LogLevel, message: string, ...args: unknown[]): void {
        if (!this._shouldLog(level)) return;
        const timestamp = new Date().toISOString();
        const line = `[${timestamp}] [${this.namespace}] [${level.toUpperCase()}] ${format(message, ...args)}`;
        console.error(line);
        Logger.fileSink?.write(line);
    }

    _shouldLog(level: LogLevel): boolean {
        return LEVELS[level] >= LEVELS[this.logLevel];
    }

    debug(message: string, ...args: unknown[]): void {
        this._log('debug', message, ...args);
    }

    info(message: string, ...args: unknown[]): void {
        this._log('info', message, ...args);
    }

    warn(message: string, ...args: unknown[]): void {
        this._log('warn', message, ...args);
    }

    error(message: string, ...args: unknown[]): void {
        this._log('error', message, ...args);
    }

    child(namespace: string): Logger {
        return new Logger(`${this.namespace}:${namespace}`);
    }
}

export default Logger;
export type { LogLevel };
