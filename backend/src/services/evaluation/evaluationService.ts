import type { EvaluationResult, SummaryResult, TranscriptMessage } from '../../models/types';
import { EvaluationResponseSchema } from '../../schemas/evaluation.schema';
import { FallbackProvider } from '../fallback/fallbackProvider';
import { TextGenerator } from '../ai/textGenerator';

export class EvaluationParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EvaluationParseError';
  }
}

export class EvaluationService {
  constructor(
    private generator: TextGenerator,
    private fallbacks: FallbackProvider
  ) {}

  async evaluateInterview(
    jobRole: string,
    summary: SummaryResult,
    transcripts: TranscriptMessage[]
  ): Promise<EvaluationResult> {
    try {
      const response = await this.generator.complete(
        [
          {
            role: 'system',
            content: 'You are an expert interviewer giving constructive feedback on a practice interview.',
          },
          { role: 'user', content: this.buildEvaluationPrompt(jobRole, summary, transcripts) },
        ],
        { json: true }
      );

      return { ...this.parseEvaluation(response), isFallback: false };
    } catch (error) {
      console.warn('⚠️ [Evaluation] Using summary-based feedback:', error instanceof Error ? error.message : error);
      return this.fallbacks.get('evaluation', { summary });
    }
  }

  private buildEvaluationPrompt(jobRole: string, summary: SummaryResult, transcripts: TranscriptMessage[]): string {
    const transcriptText = transcripts
      .map((t) => `${t.role === 'assistant' ? 'Interviewer' : 'Candidate'}: ${t.content}`)
      .join('\n');

    return `
You are evaluating a practice interview for a ${jobRole} position.

**Interview Metrics:**
${JSON.stringify(summary, null, 2)}

**Interview Transcript:**
${transcriptText || 'No transcript available'}

**Provide evaluation in JSON format ONLY:**

{
  "strengths": ["strength1", "strength2"],
  "improvements": ["improvement1", "improvement2"],
  "nextSteps": ["step1", "step2"],
  "overallScore": 0
}

overallScore is a number from 0 to 100. Be specific and actionable. Return ONLY valid JSON.
    `.trim();
  }

  parseEvaluation(response: string): Omit<EvaluationResult, 'isFallback'> {
    const jsonString = response.trim().replace(/```json\s*/g, '').replace(/```\s*/g, '');
    const jsonMatch = jsonString.match(/\{[\s\S]*\}/);
    if (!jsonMatch) {
      throw new EvaluationParseError('No JSON object in evaluation response');
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(jsonMatch[0]);
    } catch {
      throw new EvaluationParseError('Evaluation response is not valid JSON');
    }

    const result = EvaluationResponseSchema.safeParse(parsed);
    if (!result.success) {
      throw new EvaluationParseError(`Evaluation response failed validation: ${result.error.message}`);
    }
    return { ...result.data, overallScore: Math.round(result.data.overallScore) };
  }
}
