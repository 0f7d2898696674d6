import bank from '../../data/questionBank.json';
import type { InterviewStage } from '../../models/types';

export type RandomSource = () => number;

type StagePool = Record<InterviewStage, string[]>;

const stageQuestions: StagePool = bank.stageQuestions;
const followupQuestions: StagePool = bank.followupQuestions;

const fillTemplate = (template: string, jobRole: string, primarySkill: string): string =>
  template.replace(/\{role\}/g, jobRole).replace(/\{skill\}/g, primarySkill);

/**
 * Picks a question from `pool`, preferring ones not yet asked this session.
 * When every question has been used, only the most recent one is excluded.
 */
export const pickQuestion = (
  pool: string[],
  asked: readonly string[],
  random: RandomSource = Math.random
): string => {
  if (pool.length === 0) {
    return 'Can you elaborate on that?';
  }

  let candidates = pool.filter((question) => !asked.includes(question));
  if (candidates.length === 0) {
    const last = asked[asked.length - 1];
    candidates = pool.filter((question) => question !== last);
  }
  if (candidates.length === 0) {
    candidates = pool;
  }

  const index = Math.min(Math.floor(random() * candidates.length), candidates.length - 1);
  return candidates[index];
};

export const stageQuestionPool = (stage: InterviewStage, jobRole: string, primarySkill: string): string[] =>
  stageQuestions[stage].map((template) => fillTemplate(template, jobRole, primarySkill));

export const followupQuestionPool = (stage: InterviewStage): string[] => [...followupQuestions[stage]];

export const defaultSkillsForRole = (jobRole: string): string[] => {
  const role = jobRole.toLowerCase();
  const entry = bank.defaultSkills.find(({ match }) => match.some((fragment) => role.includes(fragment)));
  return [...(entry ? entry.skills : bank.fallbackSkills)];
};
