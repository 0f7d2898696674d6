import { describe, expect, it } from 'vitest';
import { ConversationOrchestrator } from '../src/services/interview-orchestrator/conversationOrchestrator';
import {
  defaultSkillsForRole,
  followupQuestionPool,
  pickQuestion,
  stageQuestionPool,
} from '../src/services/interview-orchestrator/questionBank';

describe('pickQuestion', () => {
  const pool = ['A', 'B', 'C'];

  it('prefers questions that have not been asked', () => {
    expect(pickQuestion(pool, ['A', 'B'], () => 0)).toBe('C');
    expect(pickQuestion(pool, ['B'], () => 0.99)).toBe('C');
    expect(pickQuestion(pool, ['B'], () => 0)).toBe('A');
  });

  it('only excludes the most recent question once the pool is exhausted', () => {
    expect(pickQuestion(pool, ['A', 'B', 'C'], () => 0)).toBe('A');
    expect(pickQuestion(pool, ['C', 'B', 'A'], () => 0)).toBe('B');
  });

  it('falls back to the whole pool when it has a single entry', () => {
    expect(pickQuestion(['Only'], ['Only'], () => 0.5)).toBe('Only');
  });

  it('stays in range when the random source returns 1', () => {
    expect(pickQuestion(pool, [], () => 1)).toBe('C');
  });

  it('has a generic prompt for an empty pool', () => {
    expect(pickQuestion([], [], () => 0)).toBe('Can you elaborate on that?');
  });
});

describe('question pools', () => {
  it('fills the role and skill placeholders', () => {
    const experience = stageQuestionPool('experience_probe', 'Data Engineer', 'Spark');
    const technical = stageQuestionPool('technical_deep_dive', 'Data Engineer', 'Spark');

    expect(experience[0]).toBe('Great! Can you walk me through your most challenging project as a Data Engineer?');
    expect(technical[1]).toBe("If you had to optimize a slow Spark application, where would you start?");
    expect([...experience, ...technical].some((question) => /\{(role|skill)\}/.test(question))).toBe(false);
  });

  it('has follow-ups for every stage', () => {
    expect(followupQuestionPool('greeting')).toHaveLength(2);
    expect(followupQuestionPool('closing')).toEqual([
      "Is there anything specific about the role you'd like to know?",
      'What draws you to this opportunity?',
    ]);
  });
});

describe('orchestrator canned questions', () => {
  it('walks through the stage pool without repeating', () => {
    const orchestrator = new ConversationOrchestrator('Software Engineer', ['Python']);
    const asked = [0, 1, 2].map(() => orchestrator.getStageQuestion(() => 0));

    expect(asked).toEqual([
      "Hi! Thanks for joining. Tell me, what's your current role?",
      "Good to meet you! Can you briefly describe what you're working on now?",
      "Thanks for your time today! What's keeping you busy in your current position?",
    ]);
    expect(orchestrator.getStageQuestion(() => 0)).toBe("Hi! Thanks for joining. Tell me, what's your current role?");
  });

  it('does not count a canned follow-up against the follow-up limit', () => {
    const orchestrator = new ConversationOrchestrator('Software Engineer', ['Python']);
    orchestrator.getFollowupQuestion('no', () => 0);

    expect(orchestrator.followUpCount).toBe(0);
    expect(orchestrator.questionsAsked).toEqual(['Can you tell me more about your day-to-day responsibilities?']);
  });

  it('biases technical questions toward the first resume skill', () => {
    const orchestrator = new ConversationOrchestrator('Software Engineer', ['Rust', 'Go']);
    orchestrator.advanceStage();
    orchestrator.advanceStage();

    expect(orchestrator.getStageQuestion(() => 0)).toBe(
      "Let's dive into Rust. How would you approach designing a scalable system?"
    );
  });
});

describe('defaultSkillsForRole', () => {
  it('matches role keywords case-insensitively', () => {
    expect(defaultSkillsForRole('Senior Data Scientist')[0]).toBe('Python');
    expect(defaultSkillsForRole('Frontend Developer')).toContain('React');
    expect(defaultSkillsForRole('Backend Engineer')).toContain('PostgreSQL');
    expect(defaultSkillsForRole('Full Stack Engineer')).toContain('AWS');
  });

  it('falls back to general skills', () => {
    expect(defaultSkillsForRole('Product Manager')).toEqual(['Python', 'JavaScript', 'React', 'FastAPI', 'SQL', 'Git']);
  });

  it('returns a copy', () => {
    defaultSkillsForRole('Product Manager').push('Cobol');
    expect(defaultSkillsForRole('Product Manager')).not.toContain('Cobol');
  });
});
