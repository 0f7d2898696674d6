import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { ApiError } from '../middlewares/errorHandler';
import { hasInteractions, SummaryResult, TranscriptMessage } from '../models/types';
import { InterviewRecordRepository } from '../repositories/interviewRecordRepository';
import { InvalidSessionStateError } from '../schemas/sessionState.schema';
import { EndSessionBodySchema, SessionIdParamsSchema, StartSessionBodySchema } from '../schemas/requests.schema';
import { InterviewerAgent } from '../services/ai/interviewerAgent';
import { EvaluationService } from '../services/evaluation/evaluationService';
import { FallbackProvider } from '../services/fallback/fallbackProvider';
import { ConversationOrchestrator } from '../services/interview-orchestrator/conversationOrchestrator';
import { SessionStore } from '../services/session/sessionStore';

export interface SessionControllerDeps {
  agent: InterviewerAgent;
  store: SessionStore;
  records: InterviewRecordRepository;
  evaluation: EvaluationService;
  fallbacks: FallbackProvider;
}

export class SessionController {
  constructor(private deps: SessionControllerDeps) {}

  startSession = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = StartSessionBodySchema.parse(req.body ?? {});
      const sessionId = uuidv4();

      const { orchestrator, question } = await this.deps.agent.startInterview({
        sessionId,
        jobRole: body.jobRole,
        resumeSkills: body.resumeSkills,
        weakAreas: body.weakAreas,
      });

      await this.deps.records.create({
        sessionId,
        userId: body.userId,
        jobRole: orchestrator.jobRole,
        resumeSkills: [...orchestrator.resumeSkills],
      });

      console.log(`✅ [API] Session ${sessionId} created for ${orchestrator.jobRole}`);

      res.status(201).json({
        success: true,
        data: {
          sessionId,
          jobRole: orchestrator.jobRole,
          resumeSkills: orchestrator.resumeSkills,
          question,
          progress: orchestrator.getStageProgress(),
        },
      });
    } catch (error) {
      next(error);
    }
  };

  getProgress = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { sessionId } = SessionIdParamsSchema.parse(req.params);
      const orchestrator = await this.loadOrchestrator(sessionId);

      res.json({
        success: true,
        data: {
          sessionId,
          progress: orchestrator.getStageProgress(),
          isComplete: orchestrator.isInterviewComplete(),
        },
      });
    } catch (error) {
      next(error);
    }
  };

  getSummary = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { sessionId } = SessionIdParamsSchema.parse(req.params);
      const orchestrator = await this.loadOrchestrator(sessionId);

      res.json({ success: true, data: orchestrator.getInterviewSummary() });
    } catch (error) {
      next(error);
    }
  };

  endSession = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { sessionId } = SessionIdParamsSchema.parse(req.params);
      const { userId } = EndSessionBodySchema.parse(req.body ?? {});
      const orchestrator = await this.loadOrchestrator(sessionId);
      const history = await this.deps.store.loadHistory(sessionId);
      const summary = orchestrator.getInterviewSummary();

      const transcripts: TranscriptMessage[] = history.map((message) => ({
        role: message.role,
        content: message.content,
        timestamp: message.timestamp ? new Date(message.timestamp) : new Date(),
      }));

      const record = await this.deps.records.endInterview(sessionId, {
        userId,
        jobRole: orchestrator.jobRole,
        resumeSkills: [...orchestrator.resumeSkills],
        stagesCompleted: orchestrator.currentStage + 1,
        summary: hasInteractions(summary) ? summary : undefined,
        transcripts,
      });

      if (!record) {
        throw new ApiError(404, 'Interview record not found');
      }

      this.runEvaluation(sessionId, orchestrator.jobRole, summary, transcripts).catch((error) => {
        console.error(`❌ [Evaluation] Background evaluation failed for ${sessionId}:`, error);
      });

      res.json({
        success: true,
        message: 'Interview ended successfully',
        data: { sessionId, summary },
      });
    } catch (error) {
      next(error);
    }
  };

  getResults = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { sessionId } = SessionIdParamsSchema.parse(req.params);
      const record = await this.deps.records.findBySessionId(sessionId);

      if (!record) {
        throw new ApiError(404, 'Interview record not found');
      }

      if (record.status === 'ended' && !record.evaluation) {
        res.json({
          success: true,
          data: {
            status: 'processing',
            message: 'Evaluation in progress',
          },
        });
        return;
      }

      res.json({
        success: true,
        data: {
          sessionId: record.sessionId,
          jobRole: record.jobRole,
          status: record.status,
          stagesCompleted: record.stagesCompleted,
          summary: record.summary,
          transcripts: record.transcripts,
          evaluation: record.evaluation,
        },
      });
    } catch (error) {
      next(error);
    }
  };

  private async loadOrchestrator(sessionId: string): Promise<ConversationOrchestrator> {
    try {
      const orchestrator = await this.deps.store.loadOrchestrator(sessionId);
      if (!orchestrator) {
        throw new ApiError(404, this.deps.fallbacks.get('session_missing', { sessionId }));
      }
      return orchestrator;
    } catch (error) {
      if (error instanceof InvalidSessionStateError) {
        throw new ApiError(409, 'Stored session state is invalid', error.issues);
      }
      throw error;
    }
  }

  private async runEvaluation(
    sessionId: string,
    jobRole: string,
    summary: SummaryResult,
    transcripts: TranscriptMessage[]
  ): Promise<void> {
    const evaluation = await this.deps.evaluation.evaluateInterview(jobRole, summary, transcripts);
    await this.deps.records.saveEvaluation(sessionId, evaluation);
    console.log(`✓ [Evaluation] Completed for session ${sessionId} (fallback: ${evaluation.isFallback})`);
  }
}
