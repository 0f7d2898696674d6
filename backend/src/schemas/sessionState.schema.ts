import { z } from 'zod';
import { FINAL_STAGE_INDEX, INTERVIEW_STAGES, MAX_FOLLOW_UPS } from '../models/types';

export class InvalidSessionStateError extends Error {
  constructor(
    public sessionId: string,
    public issues: string[]
  ) {
    super(`Invalid stored state for session ${sessionId}: ${issues.join('; ')}`);
    this.name = 'InvalidSessionStateError';
  }
}

const InteractionRecordSchema = z.object({
  stage: z.enum(INTERVIEW_STAGES),
  question: z.string(),
  answer: z.string(),
  isFollowup: z.boolean(),
  wordCount: z.number().int().nonnegative(),
  neededFollowup: z.boolean(),
});

/**
 * Orchestrator state as written under `orch:<sessionId>`.
 * An out-of-range stage is rejected; an out-of-range follow-up count is clamped.
 */
export const StoredSessionStateSchema = z.object({
  job_role: z.string().min(1),
  skills: z.array(z.string()),
  stage: z.number().int().min(0).max(FINAL_STAGE_INDEX),
  follow_up_count: z
    .number()
    .int()
    .default(0)
    .transform((count) => Math.min(Math.max(count, 0), MAX_FOLLOW_UPS)),
  weak_areas: z.array(z.string()).default([]),
  questions_asked: z.array(z.string()).default([]),
  history: z.array(InteractionRecordSchema).default([]),
});

export type StoredSessionState = z.output<typeof StoredSessionStateSchema>;

export const StoredMessageSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
  timestamp: z.string().optional(),
});

export const StoredHistorySchema = z.array(StoredMessageSchema);

export type StoredMessage = z.infer<typeof StoredMessageSchema>;

export const parseStoredSessionState = (sessionId: string, raw: unknown): StoredSessionState => {
  const result = StoredSessionStateSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidSessionStateError(
      sessionId,
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
};
