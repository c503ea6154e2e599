/**
 * Claude Code hook stdin payload types.
 */

import { z } from 'zod';

export const HookInputSchema = z.object({
  session_id: z.string().nullish(),
  transcript_path: z.string().nullish(),
  cwd: z.string().nullish(),
  hook_event_name: z.string().nullish(),
  prompt: z.string().nullish(),
  message: z.string().nullish(),
  stop_hook_active: z.boolean().nullish(),
}).passthrough();

export type HookInput = z.infer<typeof HookInputSchema>;

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

/** Never 2: the runtime treats exit code 2 as a blocking error. */
export type ExitCode = typeof EXIT_OK | typeof EXIT_FAILURE;
