/**
 * Delivery policies. A closed set: each entry point picks one by name.
 */

export interface NotifyOnlyPolicy {
    readonly kind: 'notify-only';
}

export interface PersistPolicy {
    readonly kind: 'persist';
    /** What to do when the primary sink has no configuration */
    readonly onMissingConfig: 'fallback' | 'fail';
    /** What to do when the primary sink rejects the record */
    readonly onPrimaryFailure: 'fallback' | 'fail';
}

export type SinkPolicy = NotifyOnlyPolicy | PersistPolicy;

/** Messaging side channel: one attempt, nothing to fall back to. */
export const NOTIFY_ONLY: NotifyOnlyPolicy = Object.freeze({ kind: 'notify-only' });

/** Prompts can be re-submitted; a file copy is good enough. */
export const USER_PROMPT_POLICY: PersistPolicy = Object.freeze({
    kind: 'persist',
    onMissingConfig: 'fallback',
    onPrimaryFailure: 'fallback',
});

/** Outputs go to the database or nowhere, and the run fails loudly. */
export const LLM_OUTPUT_POLICY: PersistPolicy = Object.freeze({
    kind: 'persist',
    onMissingConfig: 'fail',
    onPrimaryFailure: 'fail',
});
