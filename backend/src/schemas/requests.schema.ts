import { z } from 'zod';

const SkillList = z.array(z.string().trim().min(1)).max(50);

export const VoiceInputPayloadSchema = z.object({
  transcript: z.string().default(''),
  session_id: z.string().trim().min(1).optional(),
  job_role: z.string().trim().min(1).optional(),
  resume_skills: SkillList.optional(),
});

export type VoiceInputPayload = z.infer<typeof VoiceInputPayloadSchema>;

export const StartInterviewPayloadSchema = z.object({
  session_id: z.string().trim().min(1).optional(),
  job_role: z.string().trim().min(1).optional(),
  resume_skills: SkillList.optional(),
  weak_areas: SkillList.optional(),
});

export type StartInterviewPayload = z.infer<typeof StartInterviewPayloadSchema>;

const UserId = z.string().trim().min(1).max(128);

export const StartSessionBodySchema = z.object({
  userId: UserId.optional(),
  jobRole: z.string().trim().min(1),
  resumeSkills: SkillList.optional(),
  weakAreas: SkillList.optional(),
});

export const EndSessionBodySchema = z.object({
  userId: UserId.optional(),
});

export const SessionIdParamsSchema = z.object({
  sessionId: z.string().trim().min(1),
});

export const UserIdParamsSchema = z.object({
  userId: UserId,
});
