/**
 * Transcript Reader
 * Finds the last assistant message with text in a JSONL session transcript.
 */

import fs from 'fs';
import readline from 'readline';
import Logger from '../core/logger';
import { TranscriptReadError, errorMessage } from '../core/errors';
import { expandHome } from '../utils/paths';
import { integerOrNull, isRecord, stringOrNull } from '../utils/guards';
import type { AssistantMessage, LlmUsage } from '../types';

export type TranscriptEntry = Record<string, unknown>;

export type TranscriptReadResult =
    | { status: 'found'; message: AssistantMessage }
    | { status: 'no-message' }
    | { status: 'missing'; path: string };

const defaultLogger = new Logger('transcript');

/**
 * Look a field up on the entry, then on its nested `message` object.
 * The runtime writes `{ type, message: { role, content, usage, model } }`;
 * flat `{ role, content, usage }` entries are accepted too.
 */
function field(entry: TranscriptEntry, key: string): unknown {
    if (entry[key] !== undefined) return entry[key];
    return isRecord(entry.message) ? entry.message[key] : undefined;
}

export function entryRole(entry: TranscriptEntry): string | null {
    const nested = isRecord(entry.message) ? entry.message.role : undefined;
    return stringOrNull(entry.role) ?? stringOrNull(entry.type) ?? stringOrNull(nested);
}

/**
 * Plain string content is trimmed; block content joins the text of every
 * `text` block in order. Other block types (tool_use, thinking) are ignored.
 */
export function extractText(content: unknown): string {
    if (typeof content === 'string') return content.trim();
    if (!Array.isArray(content)) return '';

    return content
        .filter((block): block is Record<string, unknown> => isRecord(block) && block.type === 'text')
        .map(block => (typeof block.text === 'string' ? block.text : ''))
        .join('')
        .trim();
}

export function extractUsage(entry: TranscriptEntry): LlmUsage | null {
    const usage = field(entry, 'usage');
    if (!isRecord(usage)) return null;

    return {
        inputTokens: integerOrNull(usage.input_tokens),
        outputTokens: integerOrNull(usage.output_tokens),
        model: stringOrNull(field(entry, 'model')),
        serviceTier: stringOrNull(field(entry, 'service_tier')) ?? stringOrNull(usage.service_tier),
    };
}

/**
 * The assistant message carried by this entry, or null when the entry is
 * not an assistant entry or has no text.
 */
export function toAssistantMessage(entry: TranscriptEntry): AssistantMessage | null {
    if (entryRole(entry) !== 'assistant') return null;
    const text = extractText(field(entry, 'content'));
    if (!text) return null;
    return { text, usage: extractUsage(entry) };
}

/**
 * Parse one transcript line. Returns null for blank lines and for JSON
 * that is not an object; throws SyntaxError for malformed JSON.
 */
export function parseTranscriptLine(line: string): TranscriptEntry | null {
    if (!line.trim()) return null;
    const parsed: unknown = JSON.parse(line);
    return isRecord(parsed) ? parsed : null;
}

/**
 * Scan the whole transcript and keep the last qualifying assistant message.
 * Malformed lines are skipped. A missing file is reported, not thrown.
 */
export async function readLastAssistantMessage(
    transcriptPath: string,
    logger: Logger = defaultLogger
): Promise<TranscriptReadResult> {
    const resolved = expandHome(transcriptPath);

    let stats: fs.Stats;
    try {
        stats = await fs.promises.stat(resolved);
    } catch (error: unknown) {
        if (isRecord(error) && error.code === 'ENOENT') {
            return { status: 'missing', path: resolved };
        }
        throw new TranscriptReadError(`Cannot access transcript ${resolved}`, { cause: error });
    }
    if (!stats.isFile()) {
        throw new TranscriptReadError(`Transcript ${resolved} is not a file`);
    }

    const rl = readline.createInterface({
        input: fs.createReadStream(resolved, { encoding: 'utf8' }),
        crlfDelay: Infinity,
    });

    let last: AssistantMessage | null = null;
    let lineNumber = 0;
    let skipped = 0;

    try {
        for await (const line of rl) {
            lineNumber++;
            let entry: TranscriptEntry | null;
            try {
                entry = parseTranscriptLine(line);
            } catch (error: unknown) {
                skipped++;
                logger.debug(`Skipping malformed line ${lineNumber} in ${resolved}: ${errorMessage(error)}`);
                continue;
            }
            if (!entry) continue;

            const message = toAssistantMessage(entry);
            if (message) last = message;
        }
    } catch (error: unknown) {
        throw new TranscriptReadError(`Failed to read transcript ${resolved}`, { cause: error });
    } finally {
        rl.close();
    }

    logger.debug(`Scanned ${lineNumber} lines (${skipped} malformed) in ${resolved}`);
    return last ? { status: 'found', message: last } : { status: 'no-message' };
}
