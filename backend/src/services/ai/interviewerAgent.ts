import type { SessionConfig } from '../../config/services';
import {
  ChatMessage,
  ErrorEvent,
  MAX_FOLLOW_UPS,
  StreamingStartEvent,
  TOTAL_STAGES,
  TokenEvent,
  TurnCompleteEvent,
} from '../../models/types';
import { InvalidSessionStateError, StoredMessage } from '../../schemas/sessionState.schema';
import { FallbackProvider } from '../fallback/fallbackProvider';
import { ConversationOrchestrator, FOLLOWUP_HINT } from '../interview-orchestrator/conversationOrchestrator';
import { defaultSkillsForRole, RandomSource } from '../interview-orchestrator/questionBank';
import { SessionLock } from '../session/sessionLock';
import { SessionStore } from '../session/sessionStore';
import { GeneratorError, TextGenerator } from './textGenerator';

/** Receives the events of one turn, in order: start, tokens, then complete. */
export interface TurnEventSink {
  streamingStart(event: StreamingStartEvent): void;
  token(event: TokenEvent): void;
  complete(event: TurnCompleteEvent): void;
  error(event: ErrorEvent): void;
}

export interface VoiceInput {
  transcript: string;
  sessionId: string;
  jobRole: string;
  resumeSkills?: string[];
}

export interface StartInterviewInput {
  sessionId: string;
  jobRole: string;
  resumeSkills?: string[];
  weakAreas?: string[];
}

export interface InterviewerAgentDeps {
  store: SessionStore;
  generator: TextGenerator;
  lock: SessionLock;
  fallbacks: FallbackProvider;
  config: Pick<SessionConfig, 'generatorTimeoutMs' | 'historyWindow'>;
  random?: RandomSource;
}

interface LoadedSession {
  orchestrator: ConversationOrchestrator;
  messages: StoredMessage[];
}

const preview = (text: string) => (text.length > 100 ? `${text.substring(0, 100)}...` : text);

const lastAssistantMessage = (messages: StoredMessage[]): string | undefined => {
  for (let i = messages.length - 1; i >= 0; i--) {
    if (messages[i].role === 'assistant') return messages[i].content;
  }
  return undefined;
};

/**
 * Runs the voice-interview turn protocol: load state, decide follow-up versus
 * advance, relay generated tokens (or a canned question), persist, complete.
 */
export class InterviewerAgent {
  private store: SessionStore;
  private generator: TextGenerator;
  private lock: SessionLock;
  private fallbacks: FallbackProvider;
  private config: InterviewerAgentDeps['config'];
  private random?: RandomSource;

  constructor(deps: InterviewerAgentDeps) {
    this.store = deps.store;
    this.generator = deps.generator;
    this.lock = deps.lock;
    this.fallbacks = deps.fallbacks;
    this.config = deps.config;
    this.random = deps.random;
  }

  async startInterview(input: StartInterviewInput): Promise<{ orchestrator: ConversationOrchestrator; question: string }> {
    return this.lock.runExclusive(input.sessionId, async () => {
      const orchestrator = this.createOrchestrator(input.jobRole, input.resumeSkills);
      for (const area of input.weakAreas ?? []) {
        orchestrator.addWeakArea(area);
      }

      const question = orchestrator.getStageQuestion(this.random);
      const messages: StoredMessage[] = [
        { role: 'assistant', content: question, timestamp: new Date().toISOString() },
      ];
      await this.persist(input.sessionId, orchestrator, messages);

      console.log(`📝 [Turn] Started interview ${input.sessionId} for ${orchestrator.jobRole}`);
      return { orchestrator, question };
    });
  }

  /**
   * Processes one answer. Resolves with the completion event, or null when the
   * transcript was rejected. Never rejects: failures degrade to canned text.
   */
  async processVoiceInput(input: VoiceInput, sink: TurnEventSink): Promise<TurnCompleteEvent | null> {
    const transcript = input.transcript.trim();
    if (!transcript) {
      sink.error({ message: 'No transcript provided' });
      return null;
    }

    console.log(`💬 [Turn] ${input.sessionId}: "${preview(transcript)}"`);
    if (this.lock.isLocked(input.sessionId)) {
      console.log(`⏳ [Turn] ${input.sessionId} is waiting for the previous turn to finish`);
    }

    return this.lock.runExclusive(input.sessionId, async () => {
      let completion: TurnCompleteEvent;
      try {
        completion = await this.runTurn({ ...input, transcript }, sink);
      } catch (error) {
        console.error(`❌ [Turn] Orchestrated turn failed for ${input.sessionId}:`, error);
        completion = this.relayGenericReply(transcript, sink);
      }

      // Exactly one completion per turn, even when the sink throws
      try {
        sink.complete(completion);
      } catch (error) {
        console.error(`❌ [Turn] Could not deliver completion for ${input.sessionId}:`, error);
      }
      return completion;
    });
  }

  private async runTurn(input: VoiceInput, sink: TurnEventSink): Promise<TurnCompleteEvent> {
    const { sessionId, transcript } = input;
    const { orchestrator, messages } = await this.loadSession(input);

    const previousQuestion = lastAssistantMessage(messages) ?? 'Initial';
    messages.push({ role: 'user', content: transcript, timestamp: new Date().toISOString() });

    const needsFollowup = orchestrator.shouldRequestFollowup(transcript);
    let followupHint: string | undefined;

    if (needsFollowup && orchestrator.followUpCount < MAX_FOLLOW_UPS) {
      orchestrator.registerFollowup();
      followupHint = FOLLOWUP_HINT;
      console.log(`🔁 [Turn] Follow-up needed for ${sessionId}, count: ${orchestrator.followUpCount}`);
    } else {
      const before = orchestrator.currentStage;
      orchestrator.advanceStage();
      if (orchestrator.currentStage !== before) {
        console.log(`➡️  [Turn] ${sessionId} advanced to ${orchestrator.currentStageName}`);
      }
    }

    orchestrator.recordInteraction(previousQuestion, transcript, needsFollowup);

    const stage = orchestrator.currentStageName;
    sink.streamingStart({ stage, stage_progress: orchestrator.getStageProgress() });

    const generatorMessages: ChatMessage[] = [
      { role: 'system', content: orchestrator.buildSystemPrompt(followupHint) },
      ...messages.slice(-this.config.historyWindow).map(({ role, content }) => ({ role, content })),
    ];

    let fullResponse = await this.relayGeneratedTokens(generatorMessages, (token) =>
      sink.token({ token, stage, is_followup: needsFollowup })
    );

    if (fullResponse) {
      orchestrator.noteQuestionAsked(fullResponse);
    } else {
      fullResponse = needsFollowup
        ? orchestrator.getFollowupQuestion(transcript, this.random)
        : orchestrator.getStageQuestion(this.random);
      for (const word of fullResponse.split(/\s+/).filter(Boolean)) {
        sink.token({ token: `${word} `, stage, is_followup: needsFollowup });
      }
    }

    messages.push({ role: 'assistant', content: fullResponse, timestamp: new Date().toISOString() });
    await this.persist(sessionId, orchestrator, messages);

    const completion: TurnCompleteEvent = {
      stage,
      stage_number: orchestrator.currentStage + 1,
      total_stages: TOTAL_STAGES,
      is_final: orchestrator.isInterviewComplete(),
      needs_followup: needsFollowup,
      follow_up_count: orchestrator.followUpCount,
      full_response: fullResponse,
      progress: orchestrator.getStageProgress(),
    };
    return completion;
  }

  private createOrchestrator(jobRole: string, resumeSkills?: string[]): ConversationOrchestrator {
    const skills = resumeSkills && resumeSkills.length > 0 ? resumeSkills : defaultSkillsForRole(jobRole);
    return ConversationOrchestrator.create(jobRole, skills);
  }

  private async loadSession(input: VoiceInput): Promise<LoadedSession> {
    const { sessionId } = input;
    let orchestrator: ConversationOrchestrator | null = null;

    try {
      orchestrator = await this.store.loadOrchestrator(sessionId);
    } catch (error) {
      if (error instanceof InvalidSessionStateError) {
        console.warn(`⚠️ [SessionStore] ${error.message}. Starting a fresh session.`);
      } else {
        console.warn(`⚠️ [SessionStore] Load failed for ${sessionId}, continuing in memory:`, error);
      }
    }

    if (orchestrator) {
      console.log(`📂 [Turn] Restored ${sessionId} at stage ${orchestrator.currentStageName}`);
      return { orchestrator, messages: await this.loadMessages(sessionId) };
    }

    const created = this.createOrchestrator(input.jobRole, input.resumeSkills);
    console.log(`🆕 [Turn] Created session ${sessionId} with ${created.resumeSkills.length} skills`);
    return { orchestrator: created, messages: [] };
  }

  // A bad history record costs the transcript, not the interview position.
  private async loadMessages(sessionId: string): Promise<StoredMessage[]> {
    try {
      return await this.store.loadHistory(sessionId);
    } catch (error) {
      const reason = error instanceof InvalidSessionStateError ? error.message : error;
      console.warn(`⚠️ [SessionStore] History unavailable for ${sessionId}, keeping stage state:`, reason);
      return [];
    }
  }

  /**
   * Streams generator tokens to `onToken` until the stream ends, fails or the
   * timeout elapses. Returns the text relayed so far, or '' if none was.
   * Tokens already relayed are never retracted.
   */
  private async relayGeneratedTokens(messages: ChatMessage[], onToken: (token: string) => void): Promise<string> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.config.generatorTimeoutMs);
    const timedOut = new Promise<'timeout'>((resolve) => {
      controller.signal.addEventListener('abort', () => resolve('timeout'), { once: true });
    });

    let response = '';
    try {
      const iterator = this.generator.streamChat(messages, { signal: controller.signal })[Symbol.asyncIterator]();
      for (;;) {
        const next = await Promise.race([iterator.next(), timedOut]);
        if (next === 'timeout') {
          throw new GeneratorError('timeout', `No completion within ${this.config.generatorTimeoutMs}ms`);
        }
        if (next.done) break;
        if (typeof next.value !== 'string') {
          throw new GeneratorError('malformed', 'Generator produced a non-text chunk');
        }
        if (next.value) {
          response += next.value;
          onToken(next.value);
        }
      }
    } catch (error) {
      const kind = error instanceof GeneratorError ? error.kind : 'unavailable';
      const outcome = response.trim() ? 'keeping the partial response' : 'using a canned question';
      console.warn(`⚠️ [Generator] ${kind}: ${error instanceof Error ? error.message : String(error)}; ${outcome}`);
    } finally {
      clearTimeout(timer);
      controller.abort();
    }

    return response.trim() ? response : '';
  }

  private async persist(sessionId: string, orchestrator: ConversationOrchestrator, messages: StoredMessage[]): Promise<void> {
    try {
      await this.store.saveOrchestrator(sessionId, orchestrator);
      await this.store.saveHistory(sessionId, messages);
    } catch (error) {
      console.warn(`⚠️ [SessionStore] Save failed for ${sessionId}; this turn is not persisted:`, error);
    }
  }

  private relayGenericReply(transcript: string, sink: TurnEventSink): TurnCompleteEvent {
    const reply = this.fallbacks.get('agent_reply', { transcript });
    try {
      for (const word of reply.split(/\s+/).filter(Boolean)) {
        sink.token({ token: `${word} `, stage: 'general', is_followup: false });
      }
    } catch (error) {
      console.error('❌ [Turn] Could not relay the generic reply:', error);
    }

    const completion: TurnCompleteEvent = {
      stage: 'general',
      stage_number: 1,
      total_stages: 1,
      is_final: false,
      needs_followup: false,
      follow_up_count: 0,
      full_response: reply,
    };
    return completion;
  }
}
