import { describe, expect, it } from 'vitest';
import type { InterviewSummary } from '../src/models/types';
import { EvaluationParseError, EvaluationService } from '../src/services/evaluation/evaluationService';
import { FallbackProvider } from '../src/services/fallback/fallbackProvider';
import { ScriptedGenerator } from './helpers/fakes';

const summary: InterviewSummary = {
  stagesCompleted: 2,
  totalInteractions: 3,
  averageResponseLength: 12,
  followupsNeeded: 1,
  engagementScore: 60,
  completionPercentage: 40,
  weakAreas: [],
  strongAreas: ['Go'],
};

const transcripts = [
  { role: 'assistant' as const, content: 'What do you work on?', timestamp: new Date() },
  { role: 'user' as const, content: 'Payment services in Go', timestamp: new Date() },
];

describe('EvaluationService.parseEvaluation', () => {
  const service = new EvaluationService(new ScriptedGenerator(), new FallbackProvider());

  it('accepts fenced JSON and rounds the score', () => {
    const response = '```json\n{"strengths":["Clear"],"improvements":["Depth"],"overallScore":72.6}\n```';

    expect(service.parseEvaluation(response)).toEqual({
      strengths: ['Clear'],
      improvements: ['Depth'],
      nextSteps: [],
      overallScore: 73,
    });
  });

  it('finds the object inside surrounding prose', () => {
    const response = 'Here you go: {"strengths":["A"],"improvements":["B"],"nextSteps":["C"],"overallScore":50} Thanks!';

    expect(service.parseEvaluation(response).nextSteps).toEqual(['C']);
  });

  it.each([
    ['no object', 'I cannot evaluate this.'],
    ['broken JSON', '{"strengths": [}'],
    ['score out of range', '{"strengths":["A"],"improvements":["B"],"overallScore":140}'],
    ['empty strengths', '{"strengths":[],"improvements":["B"],"overallScore":40}'],
  ])('rejects %s', (_label, response) => {
    expect(() => service.parseEvaluation(response)).toThrow(EvaluationParseError);
  });
});

describe('EvaluationService.evaluateInterview', () => {
  it('returns the generated evaluation', async () => {
    const generator = new ScriptedGenerator({
      completion: '{"strengths":["Concrete examples"],"improvements":["Talk about testing"],"overallScore":68}',
    });
    const service = new EvaluationService(generator, new FallbackProvider());

    const result = await service.evaluateInterview('Backend Engineer', summary, transcripts);

    expect(result).toEqual({
      strengths: ['Concrete examples'],
      improvements: ['Talk about testing'],
      nextSteps: [],
      overallScore: 68,
      isFallback: false,
    });
    const prompt = generator.completeCalls[0][1].content;
    expect(prompt).toContain('practice interview for a Backend Engineer position');
    expect(prompt).toContain('Interviewer: What do you work on?\nCandidate: Payment services in Go');
  });

  it('falls back to summary-based feedback when the generator fails', async () => {
    const generator = new ScriptedGenerator({ completionError: new Error('rate limited') });
    const service = new EvaluationService(generator, new FallbackProvider());

    const result = await service.evaluateInterview('Backend Engineer', summary, transcripts);

    expect(result).toEqual({
      strengths: ['Discussed Go with concrete detail'],
      improvements: ['Expand answers with specific examples and outcomes'],
      nextSteps: ['Finish all five interview stages in your next session'],
      overallScore: 50,
      isFallback: true,
    });
  });

  it('falls back when the response does not validate', async () => {
    const service = new EvaluationService(new ScriptedGenerator({ completion: 'not json' }), new FallbackProvider());

    expect((await service.evaluateInterview('Backend Engineer', summary, [])).isFallback).toBe(true);
  });
});
