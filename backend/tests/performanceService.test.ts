import { describe, expect, it } from 'vitest';
import type { InterviewRecordData } from '../src/models/InterviewRecord';
import type { InterviewSummary } from '../src/models/types';
import {
  buildPerformanceReport,
  PerformanceService,
  sessionScore,
} from '../src/services/performance/performanceService';
import { InMemoryInterviewRecordRepository } from './helpers/fakes';

const record = (overrides: Partial<InterviewRecordData> & { sessionId: string; endedAt: Date }): InterviewRecordData => ({
  userId: 'user-1',
  jobRole: 'Backend Engineer',
  resumeSkills: [],
  status: 'ended',
  startedAt: overrides.endedAt,
  stagesCompleted: 5,
  transcripts: [],
  ...overrides,
});

const evaluation = (overallScore: number, improvements: string[] = []) => ({
  strengths: [],
  improvements,
  nextSteps: [],
  overallScore,
  isFallback: false,
  generatedAt: new Date('2026-01-01T00:00:00Z'),
});

const summary = (overrides: Partial<InterviewSummary> = {}): InterviewSummary => ({
  stagesCompleted: 5,
  totalInteractions: 5,
  averageResponseLength: 30,
  followupsNeeded: 0,
  engagementScore: 70,
  completionPercentage: 100,
  weakAreas: [],
  strongAreas: [],
  ...overrides,
});

const day = (n: number) => new Date(`2026-03-${String(n).padStart(2, '0')}T10:00:00Z`);

describe('sessionScore', () => {
  it('prefers the generated evaluation', () => {
    expect(sessionScore(record({ sessionId: 'a', endedAt: day(1), evaluation: evaluation(42), summary: summary() }))).toBe(42);
  });

  it('blends engagement and completion without an evaluation', () => {
    const scored = record({
      sessionId: 'a',
      endedAt: day(1),
      summary: summary({ engagementScore: 55, completionPercentage: 40 }),
    });

    expect(sessionScore(scored)).toBe(48);
  });

  it('is zero for an interview without answers', () => {
    expect(sessionScore(record({ sessionId: 'a', endedAt: day(1) }))).toBe(0);
  });
});

describe('buildPerformanceReport', () => {
  it('returns an empty report without interviews', () => {
    const report = buildPerformanceReport('user-1', []);

    expect(report.activity).toEqual({
      firstSeen: null,
      lastSeen: null,
      totalSessions: 0,
      sessionsPerWeek: 0,
      recentSessions: [],
    });
    expect(report.recommendations).toEqual(['Start practicing to build performance data.']);
  });

  it('aggregates scores, areas and trend in chronological order', () => {
    const first = record({
      sessionId: 'a',
      endedAt: day(1),
      stagesCompleted: 3,
      evaluation: evaluation(50, ['Quantify impact']),
      summary: summary({ engagementScore: 60, weakAreas: ['Kubernetes'], strongAreas: ['Node.js'] }),
    });
    const second = record({
      sessionId: 'b',
      endedAt: day(11),
      evaluation: evaluation(80, ['Draw diagrams']),
      summary: summary({ engagementScore: 90, strongAreas: ['Node.js', 'SQL'] }),
    });

    const report = buildPerformanceReport('user-1', [second, first]);

    expect(report.activity.firstSeen).toEqual(day(1));
    expect(report.activity.lastSeen).toEqual(day(11));
    expect(report.activity.totalSessions).toBe(2);
    expect(report.activity.sessionsPerWeek).toBe(1.4);
    expect(report.activity.recentSessions.map((session) => session.sessionId)).toEqual(['a', 'b']);
    expect(report.metrics).toEqual({
      averageScore: 65,
      bestScore: 80,
      averageEngagement: 75,
      averageCompletion: 80,
      strengths: ['Node.js', 'SQL'],
      weaknesses: ['Kubernetes', 'Quantify impact'],
    });
    expect(report.insights.scoreTrend).toBe(3);
    expect(report.recommendations).toEqual([
      'Work on: Kubernetes, Quantify impact',
      'Complete all five interview stages to get feedback on every area.',
    ]);
  });

  it('flags low and declining scores', () => {
    const report = buildPerformanceReport('user-1', [
      record({ sessionId: 'a', endedAt: day(1), evaluation: evaluation(70) }),
      record({ sessionId: 'b', endedAt: day(5), evaluation: evaluation(40) }),
    ]);

    expect(report.metrics.averageScore).toBe(55);
    expect(report.metrics.averageEngagement).toBe(0);
    expect(report.insights.scoreTrend).toBe(-7.5);
    expect(report.recommendations).toEqual([
      'Focus on improving your interview performance. Consider practicing more mock interviews.',
      'Your scores are trending down. Revisit the feedback from your earlier sessions.',
    ]);
  });

  it('counts a single day of practice as one day', () => {
    const report = buildPerformanceReport('user-1', [
      record({ sessionId: 'a', endedAt: day(1), evaluation: evaluation(90) }),
    ]);

    expect(report.activity.sessionsPerWeek).toBe(7);
    expect(report.insights.scoreTrend).toBe(0);
    expect(report.recommendations).toEqual(['Keep up the good work! Your performance metrics look solid.']);
  });

  it('ranks skills by the number of interviews that listed them', () => {
    const report = buildPerformanceReport('user-1', [
      record({ sessionId: 'a', endedAt: day(1), resumeSkills: ['Go', 'SQL', 'Go'] }),
      record({ sessionId: 'b', endedAt: day(2), resumeSkills: ['SQL', 'Redis'] }),
      record({ sessionId: 'c', endedAt: day(3), resumeSkills: ['SQL', 'Go', 'Docker', 'Kafka', 'Rust'] }),
    ]);

    expect(report.insights.topSkills).toEqual([
      { skill: 'SQL', sessions: 3 },
      { skill: 'Go', sessions: 2 },
      { skill: 'Redis', sessions: 1 },
      { skill: 'Docker', sessions: 1 },
      { skill: 'Kafka', sessions: 1 },
    ]);
  });

  it('keeps the five most recent sessions', () => {
    const records = [1, 2, 3, 4, 5, 6, 7].map((n) => record({ sessionId: `s${n}`, endedAt: day(n) }));

    const report = buildPerformanceReport('user-1', records);

    expect(report.activity.totalSessions).toBe(7);
    expect(report.activity.recentSessions.map((session) => session.sessionId)).toEqual(['s3', 's4', 's5', 's6', 's7']);
  });
});

describe('PerformanceService', () => {
  it('reports only finished interviews of the requested user', async () => {
    const records = new InMemoryInterviewRecordRepository();
    await records.create({ sessionId: 'active', userId: 'user-1', jobRole: 'Dev', resumeSkills: [] });
    await records.create({ sessionId: 'done', userId: 'user-1', jobRole: 'Dev', resumeSkills: [] });
    await records.endInterview('done', { jobRole: 'Dev', resumeSkills: [], stagesCompleted: 5, transcripts: [] });
    await records.endInterview('other', {
      userId: 'user-2',
      jobRole: 'Dev',
      resumeSkills: [],
      stagesCompleted: 5,
      transcripts: [],
    });

    const report = await new PerformanceService(records).getUserPerformance('user-1');

    expect(report.activity.totalSessions).toBe(1);
    expect(report.activity.recentSessions[0]).toMatchObject({ sessionId: 'done', score: 0, evaluated: false });
  });
});
