/**
 * Mentor — the façade the HTTP layer talks to.
 *
 * One chat turn: check credentials, resolve the session, read recent history,
 * build the role-specific prompt, record the learner's turn, ask the LLM,
 * record the reply. Nothing here holds state between requests; everything
 * lives in the stores.
 */

import { z } from 'zod';
import { CredentialStore } from './credentials.js';
import type { Db } from './db.js';
import { AuthError, NotFoundError, ProviderError, describeError } from './errors.js';
import { HistoryStore, type ChatTurn } from './history.js';
import { toProviderError, type CompletionFn, type ModelConfig } from './llm.js';
import { ProfileStore, describeProfile, type LearnerProfile } from './profiles.js';
import type { PromptAssembler } from './prompts.js';
import { SessionManager, describeTopics, generateTitle, type Session } from './sessions.js';

export interface Credentials {
  username: string;
  password: string;
}

export interface ChatRequest extends Credentials {
  message: string;
  sessionId?: string;
}

export interface ChatReply {
  reply: string;
  sessionId: string;
}

export interface LoginResult {
  username: string;
  displayName: string | null;
  role: string | null;
}

export interface SessionPreferences {
  role: string;
  learningGoal?: string;
  skills?: string[];
  difficulty?: string;
}

/** What a new session opens with: the intro turn, its topic plan and starter questions. */
export interface SessionIntro {
  intro: string;
  topics: string[];
  suggestions: string[];
}

export interface StartedSession extends SessionIntro {
  sessionId: string;
  title: string;
  currentTopic: string | null;
}

export interface Transcript {
  session: Session;
  messages: ChatTurn[];
}

/** Best-effort text-to-speech hand-off. */
export interface Speaker {
  speak(text: string): Promise<void>;
}

export interface MentorOptions {
  model: ModelConfig;
  /** Most recent turns sent to the LLM as context. */
  historyWindow: number;
  timeoutMs: number;
  speaker?: Speaker;
}

export interface MentorDeps extends MentorOptions {
  credentials: CredentialStore;
  sessions: SessionManager;
  history: HistoryStore;
  profiles: ProfileStore;
  prompts: PromptAssembler;
  complete: CompletionFn;
}

const suggestionsSchema = z.array(z.string().min(1)).min(1);

const introSchema = z.object({
  greeting: z.string().min(1),
  topics: z.array(z.string().min(1)).min(1),
  question: z.string().min(1).default('Shall we start?'),
  suggestions: z.array(z.string().min(1)).default([]),
});

export function fallbackPrompts(topic: string): string[] {
  return [
    `What are the basics of ${topic}?`,
    `Can you give me a real-world example of ${topic}?`,
    `How do I apply ${topic} in practice?`,
    `What are common mistakes in ${topic}?`,
  ];
}

export function fallbackIntro(): SessionIntro {
  return {
    intro:
      "Hello! I'm your mentor, ready to guide you.\n\nHere are some topics:\n- Introduction\n- Core Concepts\n- Advanced Topics\n\nShall we start?",
    topics: ['Introduction', 'Core Concepts', 'Advanced Topics'],
    suggestions: [
      'What should I focus on first?',
      'Can you explain the first topic?',
      'How does this relate to my goal?',
      'Can you quiz me on a topic?',
    ],
  };
}

// Completions often wrap JSON in code fences or a sentence; take the outermost pair.
function extractJson(raw: string, open: '[' | '{', close: ']' | '}'): unknown {
  const start = raw.indexOf(open);
  const end = raw.lastIndexOf(close);
  if (start === -1 || end <= start) return undefined;

  try {
    return JSON.parse(raw.slice(start, end + 1));
  } catch {
    return undefined;
  }
}

/** Pull a JSON string array out of a completion, tolerating code fences around it. */
export function parseSuggestions(raw: string): string[] | undefined {
  const parsed = suggestionsSchema.safeParse(extractJson(raw, '[', ']'));
  return parsed.success ? parsed.data.slice(0, 4) : undefined;
}

/** Read `{ greeting, topics, question?, suggestions? }` from a completion and render the intro turn. */
export function parseIntro(raw: string): SessionIntro | undefined {
  const parsed = introSchema.safeParse(extractJson(raw, '{', '}'));
  if (!parsed.success) return undefined;

  const { greeting, topics, question, suggestions } = parsed.data;
  const plan = topics.map((topic) => `- ${topic}`).join('\n');
  return {
    intro: `${greeting}\n\nHere are the topics we'll explore:\n${plan}\n\n${question}`,
    topics,
    suggestions: suggestions.slice(0, 4),
  };
}

export class Mentor {
  constructor(private readonly deps: MentorDeps) {}

  async login(credentials: Credentials): Promise<LoginResult> {
    await this.authenticate(credentials);
    const user = this.deps.credentials.getUser(credentials.username);
    const profile = this.deps.profiles.get(credentials.username);
    return {
      username: credentials.username,
      displayName: user?.displayName ?? null,
      role: profile?.role ?? null,
    };
  }

  /**
   * Handle one chat turn. Calling twice with the same arguments records two
   * independent exchanges.
   */
  async handle(request: ChatRequest): Promise<ChatReply> {
    const { username, message } = request;
    const { sessions, history, profiles, prompts } = this.deps;

    await this.authenticate(request);

    const { sessionId, resumed } = sessions.resolve(username, request.sessionId);
    if (!resumed) {
      sessions.rename(sessionId, generateTitle(message));
    }
    const session = resumed ? sessions.get(username, sessionId) : undefined;

    const previous = history.fetch(sessionId, this.deps.historyWindow);
    const profile = profiles.get(username);
    const context = [describeProfile(profile), describeTopics(session)].filter(Boolean).join('\n');
    const prompt = prompts.build(profile?.role, previous, message, context);

    history.append(sessionId, 'user', message);

    // A failed call leaves the learner's turn unanswered rather than inventing a reply.
    const reply = await this.completeWithTimeout(prompt);
    history.append(sessionId, 'assistant', reply);

    this.speak(reply);
    return { reply, sessionId };
  }

  /**
   * Save the learner's preferences and open a fresh session whose first turn
   * is the mentor's intro. Falls back to a fixed intro and topic plan when the
   * LLM is unavailable or answers with something unusable.
   */
  async startSession(credentials: Credentials, preferences: SessionPreferences): Promise<StartedSession> {
    await this.authenticate(credentials);

    const profile: LearnerProfile = {
      role: preferences.role,
      learningGoal: preferences.learningGoal ?? null,
      skills: preferences.skills ?? [],
      difficulty: preferences.difficulty ?? null,
    };
    this.deps.profiles.save(credentials.username, profile);

    const { intro, topics, suggestions } = await this.introduce(profile);

    const title = generateTitle(profile.learningGoal || profile.skills[0] || 'New session');
    const session = this.deps.sessions.create(credentials.username, title, topics);
    this.deps.history.append(session.sessionId, 'assistant', intro);

    return {
      sessionId: session.sessionId,
      title,
      intro,
      topics: session.topics,
      currentTopic: session.currentTopic,
      suggestions,
    };
  }

  async listSessions(credentials: Credentials): Promise<Session[]> {
    await this.authenticate(credentials);
    return this.deps.sessions.listForUser(credentials.username);
  }

  /** Full history of one of the user's own sessions. */
  async transcript(credentials: Credentials, sessionId: string): Promise<Transcript> {
    await this.authenticate(credentials);
    const session = this.deps.sessions.get(credentials.username, sessionId);
    if (!session) {
      throw new NotFoundError(`Session ${sessionId} not found for ${credentials.username}`);
    }
    return { session, messages: this.deps.history.fetch(sessionId) };
  }

  /**
   * Four starter questions about a topic. Falls back to fixed questions when
   * the LLM is unavailable or answers with something that is not a string array.
   */
  async suggestPrompts(credentials: Credentials, topic: string): Promise<string[]> {
    await this.authenticate(credentials);
    const profile = this.deps.profiles.get(credentials.username);
    const prompt = this.deps.prompts.buildTopicPrompt(topic, profile?.role, describeProfile(profile));

    let raw: string;
    try {
      raw = await this.completeWithTimeout(prompt);
    } catch (error: unknown) {
      if (!(error instanceof ProviderError)) throw error;
      console.error('Topic prompts error:', describeError(error));
      return fallbackPrompts(topic);
    }

    const suggestions = parseSuggestions(raw);
    if (!suggestions) {
      console.warn('Topic prompts: completion was not a JSON string array; using fallback');
      return fallbackPrompts(topic);
    }
    return suggestions;
  }

  private async introduce(profile: LearnerProfile): Promise<SessionIntro> {
    const prompt = this.deps.prompts.buildIntroPrompt(profile.role, describeProfile(profile));

    let raw: string;
    try {
      raw = await this.completeWithTimeout(prompt);
    } catch (error: unknown) {
      if (!(error instanceof ProviderError)) throw error;
      console.error('Session intro error:', describeError(error));
      return fallbackIntro();
    }

    const intro = parseIntro(raw);
    if (!intro) {
      console.warn('Session intro: completion was not a JSON intro object; using fallback');
      return fallbackIntro();
    }
    return intro;
  }

  private async authenticate({ username, password }: Credentials): Promise<void> {
    const ok = await this.deps.credentials.verify(username, password);
    if (!ok) throw new AuthError(`Login failed for ${username}`);
  }

  private async completeWithTimeout(prompt: string): Promise<string> {
    const { complete, model, timeoutMs } = this.deps;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        // Reject before abort(): the race must settle on the timeout.
        reject(new ProviderError(`No completion within ${timeoutMs}ms`, 'timeout'));
        controller.abort();
      }, timeoutMs);
    });

    let reply: string;
    try {
      reply = await Promise.race([complete(prompt, model, controller.signal), timeout]);
    } catch (error: unknown) {
      throw toProviderError(error);
    } finally {
      clearTimeout(timer);
    }

    if (!reply.trim()) {
      throw new ProviderError('LLM returned an empty completion');
    }
    return reply;
  }

  private speak(text: string): void {
    const { speaker } = this.deps;
    if (!speaker) return;
    void Promise.resolve()
      .then(() => speaker.speak(text))
      .catch((error: unknown) => console.error('Speech error:', describeError(error)));
  }
}

/** Wire the stores over one database and create a mentor. */
export function createMentor(db: Db, prompts: PromptAssembler, complete: CompletionFn, options: MentorOptions): Mentor {
  return new Mentor({
    ...options,
    credentials: new CredentialStore(db),
    sessions: new SessionManager(db),
    history: new HistoryStore(db),
    profiles: new ProfileStore(db),
    prompts,
    complete,
  });
}
