import type { Server } from 'socket.io';
import { v4 as uuidv4 } from 'uuid';
import type { ZodError } from 'zod';
import { sessionConfig } from '../config/services';
import { StartInterviewPayloadSchema, VoiceInputPayloadSchema } from '../schemas/requests.schema';
import { InterviewerAgent, TurnEventSink } from '../services/ai/interviewerAgent';

const describeIssues = (error: ZodError) =>
  error.issues.map((issue) => `${issue.path.join('.') || 'payload'}: ${issue.message}`).join('; ');

/** The part of a socket.io `Socket` the interview handlers use. */
export interface InterviewSocket {
  id: string;
  emit(event: string, payload: unknown): void;
  on(event: string, listener: (data: unknown) => void | Promise<void>): void;
}

export const socketSink = (socket: Pick<InterviewSocket, 'emit'>): TurnEventSink => ({
  streamingStart: (event) => socket.emit('ai_streaming_start', event),
  token: (event) => socket.emit('ai_token', event),
  complete: (event) => socket.emit('ai_complete', event),
  error: (event) => socket.emit('error', event),
});

/** Handlers for one connected client. */
export const handleInterviewConnection = (
  socket: InterviewSocket,
  agent: InterviewerAgent,
  defaultJobRole = sessionConfig.defaultJobRole
) => {
  console.log(`🔌 [Socket] Client connected: ${socket.id}`);
  socket.emit('connection_response', {
    status: 'connected',
    message: 'Connected to the interview coach',
    client_id: socket.id,
  });

  socket.on('start_interview', async (data: unknown) => {
    const parsed = StartInterviewPayloadSchema.safeParse(data ?? {});
    if (!parsed.success) {
      socket.emit('error', { message: `Invalid start_interview payload: ${describeIssues(parsed.error)}` });
      return;
    }

    const sessionId = parsed.data.session_id ?? uuidv4();
    const jobRole = parsed.data.job_role ?? defaultJobRole;

    try {
      const { orchestrator, question } = await agent.startInterview({
        sessionId,
        jobRole,
        resumeSkills: parsed.data.resume_skills,
        weakAreas: parsed.data.weak_areas,
      });

      socket.emit('interview_session_created', {
        session_id: sessionId,
        job_role: jobRole,
        status: 'ready',
        question,
        progress: orchestrator.getStageProgress(),
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      console.error(`❌ [Socket] Error starting interview ${sessionId}:`, error);
      socket.emit('error', { message: 'Failed to start interview' });
    }
  });

  socket.on('voice_input', async (data: unknown) => {
    const parsed = VoiceInputPayloadSchema.safeParse(data ?? {});
    if (!parsed.success) {
      socket.emit('error', { message: `Invalid voice_input payload: ${describeIssues(parsed.error)}` });
      return;
    }

    await agent.processVoiceInput(
      {
        transcript: parsed.data.transcript,
        sessionId: parsed.data.session_id ?? socket.id,
        jobRole: parsed.data.job_role ?? defaultJobRole,
        resumeSkills: parsed.data.resume_skills,
      },
      socketSink(socket)
    );
  });

  socket.on('disconnect', (reason) => {
    console.log(`🔌 [Socket] Client disconnected: ${socket.id} (${String(reason)})`);
  });
};

export const registerInterviewSocket = (io: Server, agent: InterviewerAgent): void => {
  io.on('connection', (socket) => handleInterviewConnection(socket, agent));
};
