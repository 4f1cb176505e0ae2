import { guard, now, type Db } from './db.js';

export type TurnRole = 'user' | 'assistant';

export interface ChatTurn {
  id: number;
  sessionId: string;
  role: TurnRole;
  content: string;
  timestamp: string;
}

interface TurnRow {
  id: number;
  session_id: string;
  role: TurnRole;
  content: string;
  timestamp: string;
}

/**
 * Ordered chat turns per session. Append order (the autoincrement id) is the
 * only ordering; turns are always returned oldest first.
 */
export class HistoryStore {
  constructor(private readonly db: Db) {}

  /**
   * Fails with StorageError when the session does not exist. The timestamp
   * never goes below the session's previous turn, even if the clock steps back.
   */
  append(sessionId: string, role: TurnRole, content: string): ChatTurn {
    const { id, timestamp } = guard('Append chat turn', () => {
      const last = this.db.prepare<[string], { timestamp: string }>(
        'SELECT timestamp FROM chat_history WHERE session_id = ? ORDER BY id DESC LIMIT 1'
      ).get(sessionId);

      const current = now();
      const stamp = last && last.timestamp > current ? last.timestamp : current;
      const result = this.db.prepare(
        'INSERT INTO chat_history (session_id, role, content, timestamp) VALUES (?, ?, ?, ?)'
      ).run(sessionId, role, content, stamp);
      return { id: Number(result.lastInsertRowid), timestamp: stamp };
    });

    return { id, sessionId, role, content, timestamp };
  }

  /**
   * Turns for a session, oldest first. With `limit`, only the most recent
   * `limit` turns (still oldest first).
   */
  fetch(sessionId: string, limit?: number): ChatTurn[] {
    if (limit !== undefined && limit <= 0) return [];

    const rows = guard('Fetch chat history', () => {
      if (limit === undefined) {
        return this.db.prepare<[string], TurnRow>(
          'SELECT * FROM chat_history WHERE session_id = ? ORDER BY id ASC'
        ).all(sessionId);
      }
      // Last N turns for the context window
      return this.db.prepare<[string, number], TurnRow>(
        'SELECT * FROM chat_history WHERE session_id = ? ORDER BY id DESC LIMIT ?'
      ).all(sessionId, limit).reverse();
    });

    return rows.map(toTurn);
  }
}

function toTurn(row: TurnRow): ChatTurn {
  return {
    id: row.id,
    sessionId: row.session_id,
    role: row.role,
    content: row.content,
    timestamp: row.timestamp,
  };
}
