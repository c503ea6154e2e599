/**
 * YAML File Channel
 * Durable fallback for user prompts: a top-level YAML sequence that only
 * ever grows. Existing bytes are never rewritten.
 */

import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import RecordChannel from '../base/channel';
import { SinkError, errorMessage } from '../../core/errors';
import { withFileLock, type FileLockOptions } from '../../utils/file-lock';
import { expandHome } from '../../utils/paths';
import type { OutputRecord } from '../../types';

export interface PromptEntry {
    created_at: string;
    prompt: string;
    session_id: string | null;
    repository: string | null;
}

export function toPromptEntry(record: OutputRecord): PromptEntry {
    return {
        created_at: record.createdAt,
        prompt: record.text,
        session_id: record.sessionId,
        repository: record.repository,
    };
}

export function serializeEntry(entry: PromptEntry): string {
    return yaml.dump([entry], { lineWidth: -1, noRefs: true });
}

function loadSequence(content: string, file: string): unknown[] {
    let parsed: unknown;
    try {
        parsed = yaml.load(content, { filename: file });
    } catch (error: unknown) {
        throw new SinkError(`${file} is not valid YAML: ${errorMessage(error)}`, { cause: error });
    }
    if (parsed === undefined || parsed === null) return [];
    if (!Array.isArray(parsed)) {
        throw new SinkError(`${file} does not hold a YAML sequence`);
    }
    return parsed;
}

/**
 * Append one entry under the file's lock. The combined content is checked
 * to parse as a sequence one entry longer before anything is written.
 */
export async function appendYamlEntry(file: string, entry: PromptEntry, lockOptions?: FileLockOptions): Promise<void> {
    const target = expandHome(file);
    fs.mkdirSync(path.dirname(target), { recursive: true });

    await withFileLock(`${target}.lock`, async () => {
        const existing = fs.existsSync(target) ? fs.readFileSync(target, 'utf8') : '';
        const before = loadSequence(existing, target);

        const separator = existing.length > 0 && !existing.endsWith('\n') ? '\n' : '';
        const addition = separator + serializeEntry(entry);

        if (loadSequence(existing + addition, target).length !== before.length + 1) {
            throw new SinkError(`Appending to ${target} would not add exactly one entry`);
        }

        fs.appendFileSync(target, addition, 'utf8');
    }, lockOptions);
}

class YamlFileChannel extends RecordChannel {
    file: string;
    lockOptions: FileLockOptions | undefined;

    constructor(file: string, lockOptions?: FileLockOptions) {
        super('yaml');
        this.file = file;
        this.lockOptions = lockOptions;
    }

    async _writeImpl(record: OutputRecord): Promise<void> {
        await appendYamlEntry(this.file, toPromptEntry(record), this.lockOptions);
    }
}

export default YamlFileChannel;
