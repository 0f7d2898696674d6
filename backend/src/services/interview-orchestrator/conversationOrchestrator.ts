import {
  FINAL_STAGE_INDEX,
  INTERVIEW_STAGES,
  InteractionRecord,
  InterviewStage,
  MAX_FOLLOW_UPS,
  StageProgress,
  SummaryResult,
  TOTAL_STAGES,
} from '../../models/types';
import type { StoredSessionState } from '../../schemas/sessionState.schema';
import { followupQuestionPool, pickQuestion, RandomSource, stageQuestionPool } from './questionBank';

export const DEFAULT_SKILLS = ['general technical skills'];

export const FOLLOWUP_HINT = '[CANDIDATE GAVE A VAGUE ANSWER - ASK ONE SPECIFIC FOLLOW-UP QUESTION]';

const SPECIFICITY_MARKERS = [
  'because', 'example', 'specifically', 'by using', 'with', 'when', 'where',
  'implemented', 'designed', 'built', 'created', 'developed', 'managed',
  'result', 'outcome', 'impact', 'achieved', 'improved', 'reduced',
  'increased', 'optimized', 'solved', 'fixed', 'handled',
];

const TECHNICAL_TERMS = [
  'algorithm', 'database', 'api', 'framework', 'library', 'method',
  'function', 'class', 'object', 'variable', 'query', 'server',
  'client', 'frontend', 'backend', 'architecture', 'design pattern',
];

const TECHNICAL_STAGE_INDEX = 2;

export const countWords = (text: string): number => {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
};

/**
 * Interview state for one candidate conversation: stage progression,
 * follow-up bookkeeping and the answer-quality heuristic.
 *
 * Every method is synchronous and free of I/O. Persisting the state between
 * turns is the caller's job (see `toState` / `fromState`).
 */
export class ConversationOrchestrator {
  readonly jobRole: string;
  readonly resumeSkills: readonly string[];
  private stageIndex = 0;
  private followUps = 0;
  private readonly weakAreaList: string[] = [];
  private readonly askedQuestions: string[] = [];
  private readonly history: InteractionRecord[] = [];

  constructor(jobRole: string, resumeSkills: readonly string[] = []) {
    this.jobRole = jobRole;
    this.resumeSkills = resumeSkills.length > 0 ? [...resumeSkills] : [...DEFAULT_SKILLS];
  }

  static create(jobRole: string, resumeSkills: readonly string[] = []): ConversationOrchestrator {
    return new ConversationOrchestrator(jobRole, resumeSkills);
  }

  static fromState(state: StoredSessionState): ConversationOrchestrator {
    const orchestrator = new ConversationOrchestrator(state.job_role, state.skills);
    orchestrator.stageIndex = state.stage;
    orchestrator.followUps = state.follow_up_count;
    orchestrator.weakAreaList.push(...state.weak_areas);
    orchestrator.askedQuestions.push(...state.questions_asked);
    orchestrator.history.push(...state.history.map((record) => ({ ...record })));
    return orchestrator;
  }

  toState(): StoredSessionState {
    return {
      job_role: this.jobRole,
      skills: [...this.resumeSkills],
      stage: this.stageIndex,
      follow_up_count: this.followUps,
      weak_areas: [...this.weakAreaList],
      questions_asked: [...this.askedQuestions],
      history: this.history.map((record) => ({ ...record })),
    };
  }

  get currentStage(): number {
    return this.stageIndex;
  }

  get currentStageName(): InterviewStage {
    return INTERVIEW_STAGES[this.stageIndex];
  }

  get followUpCount(): number {
    return this.followUps;
  }

  get weakAreas(): readonly string[] {
    return this.weakAreaList;
  }

  get questionsAsked(): readonly string[] {
    return this.askedQuestions;
  }

  get conversationHistory(): readonly InteractionRecord[] {
    return this.history;
  }

  private get primarySkill(): string {
    return this.resumeSkills[0] ?? DEFAULT_SKILLS[0];
  }

  addWeakArea(area: string): void {
    const trimmed = area.trim();
    if (trimmed && !this.weakAreaList.includes(trimmed)) {
      this.weakAreaList.push(trimmed);
    }
  }

  buildSystemPrompt(followupHint?: string): string {
    const stage = this.currentStageName;

    const base = `You are an expert recruiter interviewing for a ${this.jobRole} position.
Candidate's resume skills: ${this.resumeSkills.join(', ')}

CRITICAL CONVERSATION RULES:
- Keep responses under 25 words maximum
- Ask ONE question at a time
- Use natural speech patterns: "I see", "Got it", "Tell me more"
- If an answer is vague, ask a specific follow-up question
- Be conversational and engaging, not robotic
- Acknowledge the answer before asking the next question

INTERVIEW FLOW:
- Current stage: ${stage} (${this.stageIndex + 1}/${TOTAL_STAGES})
- Follow-ups asked: ${this.followUps}
- Weak areas identified: ${this.weakAreaList.length > 0 ? this.weakAreaList.join(', ') : 'None yet'}
`;

    const prompt = base + this.stageDirective(stage);
    return followupHint ? `${prompt}\n${followupHint}` : prompt;
  }

  private stageDirective(stage: InterviewStage): string {
    switch (stage) {
      case 'greeting':
        return `
GREETING STAGE:
- Start warmly and professionally
- Ask about their current role or recent experience
- Keep it brief, build rapport
`;
      case 'experience_probe':
        return `
EXPERIENCE PROBE STAGE:
- Deep dive into their most relevant experience
- Ask for specific examples and outcomes
- Probe for technical challenges they've solved
`;
      case 'technical_deep_dive':
        return `
TECHNICAL DEEP DIVE STAGE:
- Test knowledge of ${this.primarySkill} and related technologies
- Ask problem-solving questions and present hypothetical scenarios
- Assess depth of understanding
`;
      case 'behavioral':
        return `
BEHAVIORAL STAGE:
- Ask about teamwork, conflicts and leadership situations
- Use the STAR method (Situation, Task, Action, Result)
- Focus on soft skills and cultural fit
`;
      case 'closing':
        return `
CLOSING STAGE:
- Wrap up the interview professionally
- Ask if they have questions about the role or company
- Thank them for their time
`;
    }
  }

  /**
   * True when the answer is too vague to move on. Returns false once two
   * follow-ups have been asked in the current stage.
   */
  shouldRequestFollowup(answerText: string): boolean {
    if (this.followUps >= MAX_FOLLOW_UPS) {
      return false;
    }

    const trimmed = answerText.trim();
    if (trimmed.length < 5) {
      return true;
    }

    const wordCount = countWords(trimmed);
    const lower = trimmed.toLowerCase();
    const hasSpecifics = SPECIFICITY_MARKERS.some((marker) => lower.includes(marker));

    const inTechnicalStage = this.stageIndex >= TECHNICAL_STAGE_INDEX;
    const hasTechnicalTerms = inTechnicalStage && TECHNICAL_TERMS.some((term) => lower.includes(term));

    return (
      wordCount < 15 ||
      (wordCount < 30 && !hasSpecifics) ||
      (inTechnicalStage && wordCount < 40 && !hasTechnicalTerms)
    );
  }

  registerFollowup(): void {
    if (this.followUps < MAX_FOLLOW_UPS) {
      this.followUps += 1;
    }
  }

  recordInteraction(question: string, answer: string, isFollowup = false): void {
    this.history.push({
      stage: this.currentStageName,
      question,
      answer,
      isFollowup,
      wordCount: countWords(answer),
      neededFollowup: this.shouldRequestFollowup(answer),
    });
  }

  advanceStage(): void {
    if (this.stageIndex < FINAL_STAGE_INDEX) {
      this.stageIndex += 1;
      this.followUps = 0;
    }
  }

  /** Tracks a question issued outside the canned pools, e.g. generated text. */
  noteQuestionAsked(question: string): void {
    this.askedQuestions.push(question);
  }

  getStageQuestion(random?: RandomSource): string {
    const pool = stageQuestionPool(this.currentStageName, this.jobRole, this.primarySkill);
    const question = pickQuestion(pool, this.askedQuestions, random);
    this.askedQuestions.push(question);
    return question;
  }

  getFollowupQuestion(_previousAnswer: string, random?: RandomSource): string {
    const question = pickQuestion(followupQuestionPool(this.currentStageName), this.askedQuestions, random);
    this.askedQuestions.push(question);
    return question;
  }

  getStageProgress(): StageProgress {
    const stageNumber = this.stageIndex + 1;
    return {
      currentStage: this.currentStageName,
      stageNumber,
      totalStages: TOTAL_STAGES,
      progressPercent: (stageNumber / TOTAL_STAGES) * 100,
      followUpCount: this.followUps,
      questionsAskedCount: this.askedQuestions.length,
      conversationLength: this.history.length,
    };
  }

  isInterviewComplete(): boolean {
    return this.stageIndex === FINAL_STAGE_INDEX && this.history.length >= 2;
  }

  getInterviewSummary(): SummaryResult {
    if (this.history.length === 0) {
      return { status: 'no_interaction' };
    }

    const totalWords = this.history.reduce((sum, record) => sum + record.wordCount, 0);
    const averageResponseLength = totalWords / this.history.length;
    const stagesCompleted = this.stageIndex + 1;
    const answers = this.history.map((record) => record.answer.toLowerCase()).join(' ');

    return {
      stagesCompleted,
      totalInteractions: this.history.length,
      averageResponseLength,
      followupsNeeded: this.history.filter((record) => record.neededFollowup).length,
      engagementScore: Math.min(100, (averageResponseLength / 20) * 100),
      completionPercentage: (stagesCompleted / TOTAL_STAGES) * 100,
      weakAreas: [...this.weakAreaList],
      strongAreas: this.resumeSkills.filter((skill) => answers.includes(skill.toLowerCase())),
    };
  }
}
