/**
 * Shared fixtures: temp directories, transcripts, fake collaborators.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { loadConfig } from '../core/config';
import type { SqlClient } from '../channels/postgres/postgres';
import type { CommandRunner } from '../context/repository';
import type { HookConfig, OutputRecord } from '../types';

export const FIXED_NOW = new Date('2024-05-01T12:00:00.000Z');
export const SESSION_UUID = '123e4567-e89b-12d3-a456-426614174000';

export function makeTempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), 'hooks-test-'));
}

export function removeDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Write a JSONL transcript. Objects are serialized; strings are written
 * as-is so tests can plant malformed lines.
 */
export function writeTranscript(dir: string, lines: Array<object | string>, name: string = 'transcript.jsonl'): string {
    const file = path.join(dir, name);
    const body = lines.map(line => (typeof line === 'string' ? line : JSON.stringify(line))).join('\n');
    fs.writeFileSync(file, body + '\n', 'utf8');
    return file;
}

export function makeConfig(env: Record<string, string> = {}): HookConfig {
    return loadConfig(env);
}

export const fakeGitRunner = (remote: string): CommandRunner => () => `${remote}\n`;

export const noGitRunner: CommandRunner = () => {
    throw new Error('fatal: not a git repository');
};

export function makeRecord(overrides: Partial<OutputRecord> = {}): OutputRecord {
    return {
        cwd: '/work/widgets',
        sessionId: 'sess-1',
        repository: 'github.com/acme/widgets',
        createdAt: FIXED_NOW.toISOString(),
        text: 'World',
        usage: null,
        eventName: 'Stop',
        ...overrides,
    };
}

/** Records calls; fails at the requested step. */
export class FakeSqlClient implements SqlClient {
    failOn: 'connect' | 'query' | null;
    queries: Array<{ text: string; values: unknown[] | undefined }>;
    connectCalls: number;
    endCalls: number;

    constructor(failOn: 'connect' | 'query' | null = null) {
        this.failOn = failOn;
        this.queries = [];
        this.connectCalls = 0;
        this.endCalls = 0;
    }

    async connect(): Promise<void> {
        this.connectCalls++;
        if (this.failOn === 'connect') throw new Error('connect ECONNREFUSED 127.0.0.1:5432');
    }

    async query(text: string, values?: unknown[]): Promise<void> {
        this.queries.push({ text, values });
        if (this.failOn === 'query') throw new Error('relation "user_prompts" does not exist');
    }

    async end(): Promise<void> {
        this.endCalls++;
    }
}
