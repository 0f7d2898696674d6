import { EvaluationResult, hasInteractions, SummaryResult } from '../../models/types';

interface FallbackContexts {
  agent_reply: { transcript: string };
  evaluation: { summary: SummaryResult };
  session_missing: { sessionId: string };
}

interface FallbackPayloads {
  agent_reply: string;
  evaluation: EvaluationResult;
  session_missing: string;
}

export type FallbackOperation = keyof FallbackContexts;

type FallbackBuilders = {
  [K in FallbackOperation]: (context: FallbackContexts[K]) => FallbackPayloads[K];
};

const clip = (text: string, max: number) => (text.length > max ? `${text.slice(0, max)}...` : text);

const evaluationFromSummary = ({ summary }: FallbackContexts['evaluation']): EvaluationResult => {
  if (!hasInteractions(summary)) {
    return {
      strengths: ['Joined the interview session'],
      improvements: ['Answer at least a few questions so feedback can be generated'],
      nextSteps: ['Start a new practice interview'],
      overallScore: 0,
      isFallback: true,
    };
  }

  const strengths: string[] = [];
  const improvements: string[] = [];

  if (summary.strongAreas.length > 0) {
    strengths.push(`Discussed ${summary.strongAreas.join(', ')} with concrete detail`);
  }
  if (summary.engagementScore >= 75) {
    strengths.push('Gave well-developed answers');
  } else {
    improvements.push('Expand answers with specific examples and outcomes');
  }
  if (summary.followupsNeeded > summary.totalInteractions / 2) {
    improvements.push('Many answers needed a follow-up; lead with the situation, your action and the result');
  }
  for (const area of summary.weakAreas) {
    improvements.push(`Review ${area}`);
  }
  if (strengths.length === 0) {
    strengths.push('Completed the interview');
  }
  if (improvements.length === 0) {
    improvements.push('Keep practicing to stay sharp');
  }

  return {
    strengths,
    improvements,
    nextSteps:
      summary.completionPercentage < 100
        ? ['Finish all five interview stages in your next session']
        : ['Practice the behavioral stage with the STAR method'],
    overallScore: Math.round((summary.engagementScore + summary.completionPercentage) / 2),
    isFallback: true,
  };
};

const builders: FallbackBuilders = {
  agent_reply: ({ transcript }) =>
    `Thank you for sharing: '${clip(transcript, 120)}'. Can you tell me more about your experience with this?`,
  evaluation: evaluationFromSummary,
  session_missing: ({ sessionId }) =>
    `I could not find interview session ${sessionId}. Please start a new interview.`,
};

/** Canned payloads for every operation that can degrade, keyed by operation name. */
export class FallbackProvider {
  get<K extends FallbackOperation>(operation: K, context: FallbackContexts[K]): FallbackPayloads[K] {
    const build: (context: FallbackContexts[K]) => FallbackPayloads[K] = builders[operation];
    return build(context);
  }
}
