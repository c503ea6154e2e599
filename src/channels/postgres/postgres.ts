/**
 * PostgreSQL Channel
 * One connection, one parameterized INSERT, then disconnect.
 */

import fs from 'fs';
import pg from 'pg';
import type { ClientConfig } from 'pg';
import RecordChannel from '../base/channel';
import { SinkError, errorMessage } from '../../core/errors';
import { SCHEMA_PATH } from '../../utils/paths';
import type { DatabaseSettings, OutputRecord } from '../../types';

export type PostgresTable = 'user_prompts' | 'llm_outputs';

/** The part of pg.Client the channel uses. */
export interface SqlClient {
    connect(): Promise<unknown>;
    query(text: string, values?: unknown[]): Promise<unknown>;
    end(): Promise<unknown>;
}

export type ClientFactory = (config: ClientConfig) => SqlClient;

export const createPgClient: ClientFactory = (config) => new pg.Client(config);

export const DEFAULT_PORT = 5432;

/** Modes that verify the server certificate; kept when set explicitly. */
const VERIFYING_SSL_MODES = new Set(['verify-ca', 'verify-full']);

/**
 * pg reads `require` as `verify-full`; `no-verify` is its spelling of
 * "encrypt, do not verify", the same as `ssl: { rejectUnauthorized: false }`.
 */
export const UNVERIFIED_SSL_MODE = 'no-verify';

export const INSERT_STATEMENTS: Record<PostgresTable, string> = {
    user_prompts:
        'INSERT INTO user_prompts (created_at, prompt, session_id, repository) VALUES ($1, $2, $3, $4)',
    llm_outputs:
        'INSERT INTO llm_outputs (created_at, output, session_id, repository, input_tokens, output_tokens, model, service_tier) ' +
        'VALUES ($1, $2, $3, $4, $5, $6, $7, $8)',
};

/**
 * Force an encrypted sslmode onto a DSN, URL or key=value form. Anything
 * short of a verifying mode becomes `no-verify`.
 */
export function withRequiredSsl(dsn: string): string {
    if (/^postgres(ql)?:\/\//i.test(dsn)) {
        const url = new URL(dsn);
        const mode = url.searchParams.get('sslmode');
        if (!mode || !VERIFYING_SSL_MODES.has(mode)) {
            url.searchParams.set('sslmode', UNVERIFIED_SSL_MODE);
        }
        return url.toString();
    }

    const match = /(?:^|\s)sslmode\s*=\s*(\S+)/.exec(dsn);
    if (match && VERIFYING_SSL_MODES.has(match[1])) return dsn;
    const stripped = dsn.replace(/(?:^|\s)sslmode\s*=\s*\S+/, '').trim();
    return `${stripped} sslmode=${UNVERIFIED_SSL_MODE}`.trim();
}

function splitHostPort(hostPort: string): { host: string; port: number } {
    const index = hostPort.lastIndexOf(':');
    if (index <= 0) return { host: hostPort, port: DEFAULT_PORT };
    const port = Number.parseInt(hostPort.slice(index + 1), 10);
    return {
        host: hostPort.slice(0, index),
        port: Number.isInteger(port) && port > 0 ? port : DEFAULT_PORT,
    };
}

/**
 * Connection settings for pg. The DSN wins over discrete parameters;
 * returns null when neither form is complete. TLS is always on.
 */
export function buildConnectionConfig(db: DatabaseSettings, timeoutMs: number): ClientConfig | null {
    const timeouts = {
        connectionTimeoutMillis: timeoutMs,
        query_timeout: timeoutMs,
        statement_timeout: timeoutMs,
    };

    if (db.dsn) {
        return { connectionString: withRequiredSsl(db.dsn), ...timeouts };
    }

    if (db.hostPort && db.user && db.password && db.database) {
        const { host, port } = splitHostPort(db.hostPort);
        return {
            host,
            port,
            user: db.user,
            password: db.password,
            database: db.database,
            ssl: { rejectUnauthorized: false },
            ...timeouts,
        };
    }

    return null;
}

export function insertParameters(table: PostgresTable, record: OutputRecord): unknown[] {
    const common = [record.createdAt, record.text, record.sessionId, record.repository];
    if (table === 'user_prompts') return common;

    const usage = record.usage;
    return [
        ...common,
        usage?.inputTokens ?? null,
        usage?.outputTokens ?? null,
        usage?.model ?? null,
        usage?.serviceTier ?? null,
    ];
}

export async function insertRecord(client: SqlClient, table: PostgresTable, record: OutputRecord): Promise<void> {
    await client.query(INSERT_STATEMENTS[table], insertParameters(table, record));
}

export function readSchema(schemaPath: string = SCHEMA_PATH): string {
    return fs.readFileSync(schemaPath, 'utf8');
}

export async function applySchema(client: SqlClient, schemaPath: string = SCHEMA_PATH): Promise<void> {
    await client.query(readSchema(schemaPath));
}

class PostgresChannel extends RecordChannel {
    connection: ClientConfig;
    table: PostgresTable;
    createClient: ClientFactory;

    constructor(connection: ClientConfig, table: PostgresTable, createClient: ClientFactory = createPgClient) {
        super(`postgres:${table}`);
        this.connection = connection;
        this.table = table;
        this.createClient = createClient;
    }

    async _writeImpl(record: OutputRecord): Promise<void> {
        const client = this.createClient(this.connection);
        let connected = false;

        try {
            await client.connect();
            connected = true;
            await insertRecord(client, this.table, record);
        } catch (error: unknown) {
            throw new SinkError(`PostgreSQL insert into ${this.table} failed: ${errorMessage(error)}`, { cause: error });
        } finally {
            if (connected) {
                await this._close(client);
            }
        }
    }

    async _close(client: SqlClient): Promise<void> {
        try {
            await client.end();
        } catch (error: unknown) {
            this.logger.debug(`Error closing connection: ${errorMessage(error)}`);
        }
    }
}

export default PostgresChannel;
