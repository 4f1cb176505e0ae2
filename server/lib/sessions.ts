import { nanoid } from 'nanoid';
import { guard, now, parseStringList, type Db } from './db.js';

export interface Session {
  sessionId: string;
  username: string;
  title: string | null;
  /** Topics proposed when the session started, in teaching order. */
  topics: string[];
  currentTopic: string | null;
  createdAt: string;
}

export interface ResolvedSession {
  sessionId: string;
  /** False when a new session was started. */
  resumed: boolean;
}

interface SessionRow {
  session_id: string;
  username: string;
  title: string | null;
  topics: string;
  current_topic: string | null;
  created_at: string;
}

/**
 * Decides whether a request continues a session or starts one.
 *
 * Sessions are only ever "open": there is no close or expiry.
 */
export class SessionManager {
  constructor(private readonly db: Db) {}

  /**
   * Resume `sessionId` if it belongs to `username`, otherwise start a new one.
   * An unknown or foreign id is not an error; the caller just gets a fresh session.
   */
  resolve(username: string, sessionId?: string): ResolvedSession {
    if (sessionId) {
      if (this.get(username, sessionId)) {
        return { sessionId, resumed: true };
      }
      console.warn(`Session ${sessionId} not found for ${username}; starting a new one`);
    }
    return { sessionId: this.create(username).sessionId, resumed: false };
  }

  create(username: string, title: string | null = null, topics: string[] = []): Session {
    const session: Session = {
      sessionId: nanoid(12),
      username,
      title,
      topics,
      currentTopic: topics[0] ?? null,
      createdAt: now(),
    };

    guard('Create session', () => {
      this.db.prepare(
        'INSERT INTO sessions (session_id, username, title, topics, current_topic, created_at) VALUES (?, ?, ?, ?, ?, ?)'
      ).run(
        session.sessionId,
        session.username,
        session.title,
        JSON.stringify(session.topics),
        session.currentTopic,
        session.createdAt
      );
    });

    return session;
  }

  /** The session, if it exists and is owned by `username`. */
  get(username: string, sessionId: string): Session | undefined {
    const row = guard('Load session', () =>
      this.db.prepare<[string, string], SessionRow>(
        'SELECT * FROM sessions WHERE session_id = ? AND username = ?'
      ).get(sessionId, username)
    );
    return row ? toSession(row) : undefined;
  }

  listForUser(username: string, limit: number = 50): Session[] {
    const rows = guard('List sessions', () =>
      this.db.prepare<[string, number], SessionRow>(
        'SELECT * FROM sessions WHERE username = ? ORDER BY created_at DESC, rowid DESC LIMIT ?'
      ).all(username, limit)
    );
    return rows.map(toSession);
  }

  rename(sessionId: string, title: string): void {
    guard('Rename session', () => {
      this.db.prepare('UPDATE sessions SET title = ? WHERE session_id = ?').run(title, sessionId);
    });
  }
}

function toSession(row: SessionRow): Session {
  return {
    sessionId: row.session_id,
    username: row.username,
    title: row.title,
    topics: parseStringList(row.topics, 'topics'),
    currentTopic: row.current_topic,
    createdAt: row.created_at,
  };
}

/** Topic lines for the {context} slot; empty for a session without topics. */
export function describeTopics(session: Session | undefined): string {
  if (!session || session.topics.length === 0) return '';
  const lines = [`Topics: ${session.topics.join(', ')}`];
  if (session.currentTopic) lines.push(`Current topic: ${session.currentTopic}`);
  return lines.join('\n');
}

/**
 * Generate a session title from the first user message.
 */
export function generateTitle(firstMessage: string): string {
  // Take first 50 chars, clean up
  const title = firstMessage
    .replace(/\n/g, ' ')
    .trim()
    .slice(0, 50);

  return title.length < firstMessage.trim().length ? title + '...' : title;
}
