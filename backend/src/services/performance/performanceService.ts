import type { InterviewRecordData } from '../../models/InterviewRecord';
import { PerformanceReport, SessionPerformance, SkillCount, TOTAL_STAGES } from '../../models/types';
import { InterviewRecordRepository } from '../../repositories/interviewRecordRepository';

const DAY_MS = 24 * 60 * 60 * 1000;
const RECENT_SESSIONS = 5;
const TOP_SKILLS = 5;
const PASSING_SCORE = 60;

const round = (value: number, digits: number) => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

const mean = (values: number[]) =>
  values.length === 0 ? 0 : values.reduce((sum, value) => sum + value, 0) / values.length;

// Whole days between two dates, never less than one.
const daysBetween = (from: Date, to: Date) => Math.floor((to.getTime() - from.getTime()) / DAY_MS) || 1;

const unique = (values: string[]) => [...new Set(values)];

const completedAt = (record: InterviewRecordData) => new Date(record.endedAt ?? record.startedAt);

/** Generated score when available, otherwise the same blend the summary-based feedback uses. */
export const sessionScore = (record: InterviewRecordData): number => {
  if (record.evaluation) return record.evaluation.overallScore;
  if (record.summary) {
    return Math.round((record.summary.engagementScore + record.summary.completionPercentage) / 2);
  }
  return 0;
};

const toSessionPerformance = (record: InterviewRecordData): SessionPerformance => ({
  sessionId: record.sessionId,
  jobRole: record.jobRole,
  completedAt: completedAt(record),
  score: sessionScore(record),
  stagesCompleted: record.stagesCompleted,
  evaluated: record.evaluation !== undefined,
});

const topSkills = (records: InterviewRecordData[]): SkillCount[] => {
  const counts = new Map<string, number>();
  for (const record of records) {
    for (const skill of unique(record.resumeSkills)) {
      counts.set(skill, (counts.get(skill) ?? 0) + 1);
    }
  }
  // Array.prototype.sort is stable, so ties keep first-seen order
  return [...counts.entries()]
    .map(([skill, sessions]) => ({ skill, sessions }))
    .sort((a, b) => b.sessions - a.sessions)
    .slice(0, TOP_SKILLS);
};

const recommend = (report: Pick<PerformanceReport, 'metrics' | 'insights'>): string[] => {
  const { metrics, insights } = report;
  const recommendations: string[] = [];

  if (metrics.averageScore < PASSING_SCORE) {
    recommendations.push('Focus on improving your interview performance. Consider practicing more mock interviews.');
  }
  if (metrics.weaknesses.length > 0) {
    recommendations.push(`Work on: ${metrics.weaknesses.slice(0, 3).join(', ')}`);
  }
  if (metrics.averageCompletion < 100) {
    recommendations.push('Complete all five interview stages to get feedback on every area.');
  }
  if (insights.scoreTrend < 0) {
    recommendations.push('Your scores are trending down. Revisit the feedback from your earlier sessions.');
  }

  return recommendations.length > 0
    ? recommendations
    : ['Keep up the good work! Your performance metrics look solid.'];
};

export const buildPerformanceReport = (userId: string, records: InterviewRecordData[]): PerformanceReport => {
  if (records.length === 0) {
    return {
      userId,
      activity: { firstSeen: null, lastSeen: null, totalSessions: 0, sessionsPerWeek: 0, recentSessions: [] },
      metrics: {
        averageScore: 0,
        bestScore: 0,
        averageEngagement: 0,
        averageCompletion: 0,
        strengths: [],
        weaknesses: [],
      },
      insights: { scoreTrend: 0, topSkills: [] },
      recommendations: ['Start practicing to build performance data.'],
    };
  }

  const sessions = [...records].sort((a, b) => completedAt(a).getTime() - completedAt(b).getTime());
  const performances = sessions.map(toSessionPerformance);
  const scores = performances.map((performance) => performance.score);
  const first = performances[0];
  const last = performances[performances.length - 1];

  const metrics: PerformanceReport['metrics'] = {
    averageScore: round(mean(scores), 1),
    bestScore: Math.max(...scores),
    averageEngagement: round(
      mean(sessions.flatMap((record) => (record.summary ? [record.summary.engagementScore] : []))),
      1
    ),
    averageCompletion: round(mean(sessions.map((record) => (record.stagesCompleted / TOTAL_STAGES) * 100)), 1),
    strengths: unique(sessions.flatMap((record) => record.summary?.strongAreas ?? [])),
    weaknesses: unique(
      sessions.flatMap((record) => [
        ...(record.summary?.weakAreas ?? []),
        ...(sessionScore(record) < PASSING_SCORE ? record.evaluation?.improvements ?? [] : []),
      ])
    ),
  };

  const insights: PerformanceReport['insights'] = {
    scoreTrend:
      performances.length < 2
        ? 0
        : round((last.score - first.score) / daysBetween(first.completedAt, last.completedAt), 2),
    topSkills: topSkills(sessions),
  };

  return {
    userId,
    activity: {
      firstSeen: first.completedAt,
      lastSeen: last.completedAt,
      totalSessions: sessions.length,
      sessionsPerWeek: round(sessions.length / (daysBetween(first.completedAt, last.completedAt) / 7), 2),
      recentSessions: performances.slice(-RECENT_SESSIONS),
    },
    metrics,
    insights,
    recommendations: recommend({ metrics, insights }),
  };
};

export class PerformanceService {
  constructor(private records: InterviewRecordRepository) {}

  async getUserPerformance(userId: string): Promise<PerformanceReport> {
    const records = await this.records.findFinishedByUserId(userId);
    console.log(`📈 [Performance] Building report for ${userId} from ${records.length} sessions`);
    return buildPerformanceReport(userId, records);
  }
}
