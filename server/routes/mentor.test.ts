import type { Server } from 'http';
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { z } from 'zod';
import { createApp } from '../app.js';
import { CredentialStore } from '../lib/credentials.js';
import { openDb } from '../lib/db.js';
import { ProviderError } from '../lib/errors.js';
import type { CompletionFn } from '../lib/llm.js';
import { createMentor } from '../lib/mentor.js';
import { PromptAssembler, parsePromptConfig } from '../lib/prompts.js';
import { parseBasicAuth } from './mentor.js';

function basic(value: string): string {
  return `Basic ${Buffer.from(value, 'utf-8').toString('base64')}`;
}

describe('parseBasicAuth', () => {
  it('splits on the first colon only', () => {
    expect(parseBasicAuth(basic('vijaya01:test:secret'))).toEqual({ username: 'vijaya01', password: 'test:secret' });
  });

  it('keeps surrounding whitespace in the password', () => {
    expect(parseBasicAuth(basic('vijaya01: test-secret '))).toEqual({ username: 'vijaya01', password: ' test-secret ' });
  });

  it.each([undefined, '', 'Bearer abc', basic('no-colon'), basic(':test-secret')])('rejects %j', (header) => {
    expect(parseBasicAuth(header)).toBeUndefined();
  });
});

const prompts = new PromptAssembler(
  parsePromptConfig({
    defaultRole: 'default',
    roles: {
      default: 'Mentor for {role}.\n{context}\n{history}\nLearner says: {message}',
      Executive: 'Executive coach for {role}.\n{history}\nLearner says: {message}',
    },
    topicPrompts: 'Four questions about {topic} for {role}.',
    introPrompts: 'Intro for {role}.\n{context}',
  })
);

const VIJAYA = { username: 'vijaya01', password: 'test-secret' };
const HARISH = { username: 'harish02', password: 'other-secret' };
const UNAVAILABLE = { error: 'The mentor is unavailable right now. Please try again.' };

const replySchema = z.object({ reply: z.string(), sessionId: z.string() });

describe('mentor HTTP API', () => {
  let complete: Mock<CompletionFn>;
  let server: Server;
  let base: string;

  beforeEach(async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});

    complete = vi.fn<CompletionFn>(async () => 'Start with your BATNA.');
    const db = openDb(':memory:');
    const credentials = new CredentialStore(db);
    await credentials.createUser({ ...VIJAYA, displayName: 'Vijaya' });
    await credentials.createUser(HARISH);

    const mentor = createMentor(db, prompts, complete, {
      model: { model: 'test-model', temperature: 0.7, maxTokens: 100 },
      historyWindow: 10,
      timeoutMs: 1000,
    });
    const app = createApp({ mentor, roles: prompts.listRoles(), checkLlm: async () => ({ ok: true }) });

    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('Server has no TCP address');
    base = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
    vi.restoreAllMocks();
  });

  function post(path: string, body: unknown) {
    return fetch(`${base}/api${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  function get(path: string, authorization?: string) {
    return fetch(`${base}/api${path}`, { headers: authorization ? { Authorization: authorization } : {} });
  }

  async function chat(body: Record<string, unknown>): Promise<z.infer<typeof replySchema>> {
    const res = await post('/chat', { ...VIJAYA, ...body });
    expect(res.status).toBe(200);
    return replySchema.parse(await res.json());
  }

  describe('POST /api/chat', () => {
    it('answers and reports the session it used', async () => {
      const first = await chat({ message: 'How do I open a negotiation?' });
      expect(first.reply).toBe('Start with your BATNA.');
      expect(first.sessionId).toHaveLength(12);

      const second = await chat({ message: 'And then?', sessionId: first.sessionId });
      expect(second.sessionId).toBe(first.sessionId);
    });

    it.each([
      ['an empty id', ''],
      ['a null id', null],
      ['an over-long id', 'x'.repeat(65)],
      ['an unknown id', 'nope'],
    ])('starts a new session for %s', async (_label, sessionId) => {
      const result = await chat({ message: 'Hello', sessionId });
      expect(result.sessionId).toHaveLength(12);
      expect(result.sessionId).not.toBe(sessionId);
    });

    it('rejects a missing message with 400', async () => {
      const res = await post('/chat', VIJAYA);
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'Message is required.' });
      expect(complete).not.toHaveBeenCalled();
    });

    it('rejects a wrong password with 401', async () => {
      const res = await post('/chat', { ...VIJAYA, password: 'Test-secret', message: 'Hi' });
      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({ error: 'Login failed.' });
    });

    it('does not trim the username', async () => {
      const res = await post('/chat', { ...VIJAYA, username: ' vijaya01', message: 'Hi' });
      expect(res.status).toBe(401);
    });

    it('maps a provider failure to 502 with the public message only', async () => {
      complete.mockRejectedValueOnce(new Error('connect ECONNREFUSED 10.0.0.1:443'));
      const res = await post('/chat', { ...VIJAYA, message: 'Hi' });
      expect(res.status).toBe(502);
      expect(await res.json()).toEqual(UNAVAILABLE);
    });

    it('maps a provider timeout to 504', async () => {
      complete.mockRejectedValueOnce(new ProviderError('No completion within 1000ms', 'timeout'));
      const res = await post('/chat', { ...VIJAYA, message: 'Hi' });
      expect(res.status).toBe(504);
      expect(await res.json()).toEqual(UNAVAILABLE);
    });
  });

  it('POST /api/login returns the user', async () => {
    const res = await post('/login', VIJAYA);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ user: { username: 'vijaya01', displayName: 'Vijaya', role: null } });
  });

  it('POST /api/sessions starts a session with 201', async () => {
    complete.mockResolvedValueOnce('{"greeting": "Welcome.", "topics": ["Anchoring", "Concessions"]}');

    const res = await post('/sessions', { ...VIJAYA, role: 'Executive', learningGoal: 'Negotiate better' });
    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({
      sessionId: expect.any(String),
      title: 'Negotiate better',
      intro: "Welcome.\n\nHere are the topics we'll explore:\n- Anchoring\n- Concessions\n\nShall we start?",
      topics: ['Anchoring', 'Concessions'],
      currentTopic: 'Anchoring',
      suggestions: [],
    });
  });

  it('POST /api/sessions requires a role', async () => {
    const res = await post('/sessions', VIJAYA);
    expect(res.status).toBe(400);
  });

  describe('GET /api/sessions', () => {
    it('asks for Basic credentials when none are sent', async () => {
      const res = await get('/sessions');
      expect(res.status).toBe(401);
      expect(res.headers.get('www-authenticate')).toBe('Basic realm="mentor"');
      expect(await res.json()).toEqual({ error: 'Login failed.' });
    });

    it('rejects wrong Basic credentials', async () => {
      const res = await get('/sessions', basic('vijaya01:wrong'));
      expect(res.status).toBe(401);
    });

    it("lists the caller's sessions", async () => {
      const { sessionId } = await chat({ message: 'Hi' });
      const res = await get('/sessions', basic('vijaya01:test-secret'));
      expect(res.status).toBe(200);

      const body = z.object({ sessions: z.array(z.object({ sessionId: z.string() })) }).parse(await res.json());
      expect(body.sessions.map((s) => s.sessionId)).toEqual([sessionId]);
    });
  });

  describe('GET /api/sessions/:id/messages', () => {
    it('returns the transcript of an owned session', async () => {
      const { sessionId } = await chat({ message: 'Hi' });
      const res = await get(`/sessions/${sessionId}/messages`, basic('vijaya01:test-secret'));
      expect(res.status).toBe(200);

      const body = z.object({ messages: z.array(z.object({ content: z.string() })) }).parse(await res.json());
      expect(body.messages.map((m) => m.content)).toEqual(['Hi', 'Start with your BATNA.']);
    });

    it("answers 404 for someone else's session", async () => {
      const { sessionId } = await chat({ message: 'Hi' });
      const res = await get(`/sessions/${sessionId}/messages`, basic('harish02:other-secret'));
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: 'Session not found.' });
    });
  });

  it('POST /api/topic-prompts returns suggestions', async () => {
    complete.mockResolvedValueOnce('["A?", "B?", "C?", "D?"]');
    const res = await post('/topic-prompts', { ...VIJAYA, topic: 'pricing' });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ prompts: ['A?', 'B?', 'C?', 'D?'] });
  });

  it('GET /api/roles lists the configured roles', async () => {
    const res = await get('/roles');
    expect(await res.json()).toEqual({ roles: ['default', 'Executive'] });
  });

  it('GET /api/health is ok', async () => {
    const res = await get('/health');
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok', timestamp: expect.any(String) });
  });

  it('GET /api/status reports the LLM probe', async () => {
    const res = await get('/status');
    expect(await res.json()).toEqual({ status: 'ok', llm: { ok: true }, timestamp: expect.any(String) });
  });
});
