import { describe, expect, it } from 'vitest';
import { InvalidSessionStateError } from '../src/schemas/sessionState.schema';
import { ConversationOrchestrator } from '../src/services/interview-orchestrator/conversationOrchestrator';
import {
  historyKey,
  MemoryEntry,
  MemoryKeyValueClient,
  SessionStore,
  stateKey,
} from '../src/services/session/sessionStore';

describe('MemoryKeyValueClient', () => {
  it('expires entries after their ttl', async () => {
    let now = 1_000;
    const client = new MemoryKeyValueClient(() => now);
    await client.setWithExpiry('k', 'v', 10);

    now += 9_999;
    expect(await client.get('k')).toBe('v');
    now += 1;
    expect(await client.get('k')).toBeNull();
  });

  it('refreshes the ttl on every write', async () => {
    let now = 0;
    const client = new MemoryKeyValueClient(() => now);
    await client.setWithExpiry('k', 'v1', 10);
    now = 8_000;
    await client.setWithExpiry('k', 'v2', 10);
    now = 15_000;

    expect(await client.get('k')).toBe('v2');
  });

  it('evicts expired sessions on write even if they are never read again', async () => {
    let now = 0;
    const entries = new Map<string, MemoryEntry>();
    const client = new MemoryKeyValueClient(() => now, entries);
    for (let i = 0; i < 200; i++) {
      await client.setWithExpiry(`orch:abandoned-${i}`, '{}', 1);
    }
    await client.setWithExpiry('orch:long-lived', '{}', 3600);
    expect(entries.size).toBe(201);

    now = 10_000;
    await client.setWithExpiry('orch:new', '{}', 1);

    expect([...entries.keys()]).toEqual(['orch:long-lived', 'orch:new']);
  });
});

describe('SessionStore', () => {
  const createStore = (historyLimit = 40) => {
    const client = new MemoryKeyValueClient();
    return { client, store: new SessionStore(client, 3600, historyLimit) };
  };

  it('uses the orch and history key prefixes', () => {
    expect(stateKey('abc')).toBe('orch:abc');
    expect(historyKey('abc')).toBe('history:abc');
  });

  it('returns null and an empty history for unknown sessions', async () => {
    const { store } = createStore();

    expect(await store.loadOrchestrator('missing')).toBeNull();
    expect(await store.loadHistory('missing')).toEqual([]);
  });

  it('round-trips orchestrator state', async () => {
    const { client, store } = createStore();
    const orchestrator = new ConversationOrchestrator('Backend Engineer', ['Go']);
    orchestrator.advanceStage();
    orchestrator.registerFollowup();
    orchestrator.addWeakArea('testing');
    await store.saveOrchestrator('s1', orchestrator);

    const raw = await client.get('orch:s1');
    expect(raw).not.toBeNull();
    expect(JSON.parse(raw ?? '{}')).toMatchObject({
      job_role: 'Backend Engineer',
      skills: ['Go'],
      stage: 1,
      follow_up_count: 1,
      weak_areas: ['testing'],
    });

    const restored = await store.loadOrchestrator('s1');
    expect(restored?.currentStageName).toBe('experience_probe');
    expect(restored?.followUpCount).toBe(1);
    expect(restored?.weakAreas).toEqual(['testing']);
  });

  it('keeps only the most recent messages', async () => {
    const { store } = createStore(3);
    const messages = ['a', 'b', 'c', 'd', 'e'].map((content) => ({ role: 'user' as const, content }));
    await store.saveHistory('s1', messages);

    expect((await store.loadHistory('s1')).map((message) => message.content)).toEqual(['c', 'd', 'e']);
  });

  it('rejects corrupt JSON', async () => {
    const { client, store } = createStore();
    await client.setWithExpiry('orch:s1', '{not json', 60);

    await expect(store.loadOrchestrator('s1')).rejects.toBeInstanceOf(InvalidSessionStateError);
  });

  it('rejects a stored stage outside the interview', async () => {
    const { client, store } = createStore();
    await client.setWithExpiry('orch:s1', JSON.stringify({ job_role: 'Dev', skills: [], stage: 9 }), 60);

    await expect(store.loadOrchestrator('s1')).rejects.toBeInstanceOf(InvalidSessionStateError);
  });

  it('rejects history with an unexpected shape', async () => {
    const { client, store } = createStore();
    await client.setWithExpiry('history:s1', JSON.stringify([{ role: 'system', content: 'x' }]), 60);

    await expect(store.loadHistory('s1')).rejects.toBeInstanceOf(InvalidSessionStateError);
  });
});
