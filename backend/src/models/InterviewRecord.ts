import mongoose, { Schema, Document } from 'mongoose';
import type { EvaluationResult, InterviewSummary, TranscriptMessage } from './types';

export type InterviewStatus = 'active' | 'ended' | 'evaluated';

export interface InterviewRecordData {
  sessionId: string;
  userId?: string;
  jobRole: string;
  resumeSkills: string[];
  status: InterviewStatus;
  startedAt: Date;
  endedAt?: Date;
  stagesCompleted: number;
  transcripts: TranscriptMessage[];
  summary?: InterviewSummary;
  evaluation?: EvaluationResult & { generatedAt: Date };
}

export interface IInterviewRecord extends InterviewRecordData, Document {}

const EvaluationSchema = new Schema(
  {
    strengths: [String],
    improvements: [String],
    nextSteps: [String],
    overallScore: Number,
    isFallback: Boolean,
    generatedAt: Date,
  },
  { _id: false }
);

const InterviewRecordSchema: Schema = new Schema(
  {
    sessionId: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    userId: {
      type: String,
      index: true,
    },
    jobRole: {
      type: String,
      required: true,
    },
    resumeSkills: [{
      type: String,
    }],
    status: {
      type: String,
      enum: ['active', 'ended', 'evaluated'],
      default: 'active',
    },
    startedAt: {
      type: Date,
      default: Date.now,
    },
    endedAt: {
      type: Date,
    },
    stagesCompleted: {
      type: Number,
      default: 0,
    },
    transcripts: [{
      role: {
        type: String,
        enum: ['user', 'assistant'],
        required: true,
      },
      content: {
        type: String,
        required: true,
      },
      timestamp: {
        type: Date,
        default: Date.now,
      },
    }],
    summary: Schema.Types.Mixed,
    // Single nested so it stays unset until an evaluation is saved
    evaluation: {
      type: EvaluationSchema,
      required: false,
    },
  },
  {
    timestamps: true,
  }
);

export default mongoose.model<IInterviewRecord>('InterviewRecord', InterviewRecordSchema);
