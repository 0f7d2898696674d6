import InterviewRecord, { InterviewRecordData } from '../models/InterviewRecord';
import type { EvaluationResult, InterviewSummary, TranscriptMessage } from '../models/types';
import { ApiError } from '../middlewares/errorHandler';

export type NewInterviewRecord = Pick<InterviewRecordData, 'sessionId' | 'userId' | 'jobRole' | 'resumeSkills'>;

export interface EndInterviewData {
  userId?: string;
  jobRole: string;
  resumeSkills: string[];
  stagesCompleted: number;
  summary?: InterviewSummary;
  transcripts: TranscriptMessage[];
}

/** Persistence for finished and in-progress interviews. */
export interface InterviewRecordRepository {
  create(data: NewInterviewRecord): Promise<InterviewRecordData>;
  findBySessionId(sessionId: string): Promise<InterviewRecordData | null>;
  /** Ended or evaluated interviews of one user, oldest first. */
  findFinishedByUserId(userId: string): Promise<InterviewRecordData[]>;
  endInterview(sessionId: string, data: EndInterviewData): Promise<InterviewRecordData | null>;
  saveEvaluation(sessionId: string, evaluation: EvaluationResult): Promise<InterviewRecordData | null>;
}

export class MongoInterviewRecordRepository implements InterviewRecordRepository {
  async create(data: NewInterviewRecord): Promise<InterviewRecordData> {
    try {
      const record = new InterviewRecord({ ...data, status: 'active', transcripts: [] });
      return (await record.save()).toObject();
    } catch (error) {
      console.error('[InterviewRecordRepository] Error creating record:', error);
      throw new ApiError(500, 'Failed to create interview record');
    }
  }

  async findBySessionId(sessionId: string): Promise<InterviewRecordData | null> {
    try {
      return await InterviewRecord.findOne({ sessionId }).lean<InterviewRecordData>();
    } catch (error) {
      console.error('[InterviewRecordRepository] Error fetching:', error);
      throw new ApiError(500, 'Failed to fetch interview record');
    }
  }

  async findFinishedByUserId(userId: string): Promise<InterviewRecordData[]> {
    try {
      return await InterviewRecord.find({ userId, status: { $in: ['ended', 'evaluated'] } })
        .sort({ endedAt: 1 })
        .lean<InterviewRecordData[]>();
    } catch (error) {
      console.error('[InterviewRecordRepository] Error fetching user history:', error);
      throw new ApiError(500, 'Failed to fetch interview history');
    }
  }

  async endInterview(sessionId: string, data: EndInterviewData): Promise<InterviewRecordData | null> {
    try {
      return await InterviewRecord.findOneAndUpdate(
        { sessionId },
        {
          $set: {
            status: 'ended',
            endedAt: new Date(),
            stagesCompleted: data.stagesCompleted,
            summary: data.summary,
            transcripts: data.transcripts,
          },
          // Sessions started over the socket have no record until they end.
          $setOnInsert: {
            jobRole: data.jobRole,
            resumeSkills: data.resumeSkills,
            ...(data.userId ? { userId: data.userId } : {}),
          },
        },
        { new: true, upsert: true }
      ).lean<InterviewRecordData>();
    } catch (error) {
      console.error('[InterviewRecordRepository] Error ending interview:', error);
      throw new ApiError(500, 'Failed to end interview');
    }
  }

  async saveEvaluation(sessionId: string, evaluation: EvaluationResult): Promise<InterviewRecordData | null> {
    try {
      return await InterviewRecord.findOneAndUpdate(
        { sessionId },
        { $set: { status: 'evaluated', evaluation: { ...evaluation, generatedAt: new Date() } } },
        { new: true }
      ).lean<InterviewRecordData>();
    } catch (error) {
      console.error('[InterviewRecordRepository] Error saving evaluation:', error);
      throw new ApiError(500, 'Failed to save evaluation');
    }
  }
}
