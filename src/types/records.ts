/**
 * Values that flow from the transcript to the sinks.
 */

/** Present only when the assistant entry carried a `usage` object. */
export interface LlmUsage {
  readonly inputTokens: number | null;
  readonly outputTokens: number | null;
  readonly model: string | null;
  readonly serviceTier: string | null;
}

export interface AssistantMessage {
  readonly text: string;
  readonly usage: LlmUsage | null;
}

export interface ResolvedContext {
  readonly cwd: string | null;
  readonly sessionId: string | null;
  readonly repository: string | null;
  /** ISO-8601 UTC, taken at record build time */
  readonly createdAt: string;
}

export interface OutputRecord extends ResolvedContext {
  readonly text: string;
  readonly usage: LlmUsage | null;
  readonly eventName: string | null;
}
