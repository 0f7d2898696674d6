import { z } from 'zod';

const FeedbackList = z.array(z.string().min(1)).max(10);

export const EvaluationResponseSchema = z.object({
  strengths: FeedbackList.min(1),
  improvements: FeedbackList.min(1),
  nextSteps: FeedbackList.default([]),
  overallScore: z.number().min(0).max(100),
});

export type EvaluationResponse = z.infer<typeof EvaluationResponseSchema>;
