import type { RedisClient } from '../../config/redis';
import {
  InvalidSessionStateError,
  parseStoredSessionState,
  StoredHistorySchema,
  StoredMessage,
} from '../../schemas/sessionState.schema';
import { ConversationOrchestrator } from '../interview-orchestrator/conversationOrchestrator';

/** The two Redis commands the session store needs. */
export interface KeyValueClient {
  get(key: string): Promise<string | null>;
  setWithExpiry(key: string, value: string, ttlSeconds: number): Promise<void>;
}

export const redisKeyValueClient = (client: RedisClient): KeyValueClient => ({
  get: async (key) => (await client.get(key)) ?? null,
  setWithExpiry: async (key, value, ttlSeconds) => {
    await client.set(key, value, { EX: ttlSeconds });
  },
});

export interface MemoryEntry {
  value: string;
  expiresAt: number;
}

/**
 * Process-local stand-in used when Redis cannot be reached at startup.
 * Entries expire the same way Redis keys do; every write also evicts
 * whatever has expired, so abandoned sessions do not accumulate.
 */
export class MemoryKeyValueClient implements KeyValueClient {
  constructor(
    private now: () => number = Date.now,
    private entries: Map<string, MemoryEntry> = new Map()
  ) {}

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  async setWithExpiry(key: string, value: string, ttlSeconds: number): Promise<void> {
    const now = this.now();
    for (const [storedKey, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(storedKey);
      }
    }
    this.entries.set(key, { value, expiresAt: now + ttlSeconds * 1000 });
  }
}

export const stateKey = (sessionId: string) => `orch:${sessionId}`;
export const historyKey = (sessionId: string) => `history:${sessionId}`;

const parseJson = (sessionId: string, raw: string): unknown => {
  try {
    return JSON.parse(raw);
  } catch {
    throw new InvalidSessionStateError(sessionId, ['stored value is not valid JSON']);
  }
};

export class SessionStore {
  constructor(
    private client: KeyValueClient,
    private ttlSeconds: number,
    private historyLimit: number
  ) {}

  /** Returns null when nothing is stored; throws InvalidSessionStateError on a corrupt record. */
  async loadOrchestrator(sessionId: string): Promise<ConversationOrchestrator | null> {
    const raw = await this.client.get(stateKey(sessionId));
    if (raw === null) return null;

    const state = parseStoredSessionState(sessionId, parseJson(sessionId, raw));
    return ConversationOrchestrator.fromState(state);
  }

  async saveOrchestrator(sessionId: string, orchestrator: ConversationOrchestrator): Promise<void> {
    await this.client.setWithExpiry(stateKey(sessionId), JSON.stringify(orchestrator.toState()), this.ttlSeconds);
  }

  async loadHistory(sessionId: string): Promise<StoredMessage[]> {
    const raw = await this.client.get(historyKey(sessionId));
    if (raw === null) return [];

    const result = StoredHistorySchema.safeParse(parseJson(sessionId, raw));
    if (!result.success) {
      throw new InvalidSessionStateError(sessionId, ['stored history has an unexpected shape']);
    }
    return result.data;
  }

  async saveHistory(sessionId: string, messages: readonly StoredMessage[]): Promise<void> {
    const trimmed = messages.slice(-this.historyLimit);
    await this.client.setWithExpiry(historyKey(sessionId), JSON.stringify(trimmed), this.ttlSeconds);
  }
}
