export const INTERVIEW_STAGES = [
  'greeting',
  'experience_probe',
  'technical_deep_dive',
  'behavioral',
  'closing',
] as const;

export type InterviewStage = (typeof INTERVIEW_STAGES)[number];

export const TOTAL_STAGES = INTERVIEW_STAGES.length;
export const FINAL_STAGE_INDEX = TOTAL_STAGES - 1;
export const MAX_FOLLOW_UPS = 2;

export interface InteractionRecord {
  stage: InterviewStage;
  question: string;
  answer: string;
  isFollowup: boolean;
  wordCount: number;
  neededFollowup: boolean;
}

export interface StageProgress {
  currentStage: InterviewStage;
  stageNumber: number;
  totalStages: number;
  progressPercent: number;
  followUpCount: number;
  questionsAskedCount: number;
  conversationLength: number;
}

export interface InterviewSummary {
  stagesCompleted: number;
  totalInteractions: number;
  averageResponseLength: number;
  followupsNeeded: number;
  engagementScore: number;
  completionPercentage: number;
  weakAreas: string[];
  strongAreas: string[];
}

export interface NoInteractionSummary {
  status: 'no_interaction';
}

export type SummaryResult = InterviewSummary | NoInteractionSummary;

export const hasInteractions = (summary: SummaryResult): summary is InterviewSummary =>
  !('status' in summary);

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface TranscriptMessage {
  role: 'user' | 'assistant';
  content: string;
  timestamp: Date;
}

export interface EvaluationResult {
  strengths: string[];
  improvements: string[];
  nextSteps: string[];
  overallScore: number;
  isFallback: boolean;
}

// Outbound socket payloads keep the snake_case wire names clients already read.
export interface TokenEvent {
  token: string;
  stage: InterviewStage | 'general';
  is_followup: boolean;
}

export interface StreamingStartEvent {
  stage: InterviewStage;
  stage_progress: StageProgress;
}

export interface TurnCompleteEvent {
  stage: InterviewStage | 'general';
  stage_number: number;
  total_stages: number;
  is_final: boolean;
  needs_followup: boolean;
  follow_up_count: number;
  full_response: string;
  progress?: StageProgress;
}

export interface ErrorEvent {
  message: string;
}

export interface SessionPerformance {
  sessionId: string;
  jobRole: string;
  completedAt: Date;
  score: number;
  stagesCompleted: number;
  evaluated: boolean;
}

export interface SkillCount {
  skill: string;
  sessions: number;
}

/** Progress across every finished interview of one user. */
export interface PerformanceReport {
  userId: string;
  activity: {
    firstSeen: Date | null;
    lastSeen: Date | null;
    totalSessions: number;
    sessionsPerWeek: number;
    recentSessions: SessionPerformance[];
  };
  metrics: {
    averageScore: number;
    bestScore: number;
    averageEngagement: number;
    averageCompletion: number;
    strengths: string[];
    weaknesses: string[];
  };
  insights: {
    /** Score points gained per day between the first and the latest session. */
    scoreTrend: number;
    topSkills: SkillCount[];
  };
  recommendations: string[];
}
