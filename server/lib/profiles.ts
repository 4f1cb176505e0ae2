import { guard, now, parseStringList, type Db } from './db.js';

export interface LearnerProfile {
  role: string;
  learningGoal: string | null;
  skills: string[];
  difficulty: string | null;
}

interface PreferencesRow {
  username: string;
  role: string;
  learning_goal: string | null;
  skills: string;
  difficulty: string | null;
  updated_at: string;
}

/** Declared role and learning preferences, one row per user. */
export class ProfileStore {
  constructor(private readonly db: Db) {}

  get(username: string): LearnerProfile | undefined {
    const row = guard('Load preferences', () =>
      this.db.prepare<[string], PreferencesRow>(
        'SELECT * FROM user_preferences WHERE username = ?'
      ).get(username)
    );
    if (!row) return undefined;

    return {
      role: row.role,
      learningGoal: row.learning_goal,
      skills: parseStringList(row.skills, 'skills'),
      difficulty: row.difficulty,
    };
  }

  save(username: string, profile: LearnerProfile): void {
    guard('Save preferences', () => {
      this.db.prepare(`
        INSERT INTO user_preferences (username, role, learning_goal, skills, difficulty, updated_at)
        VALUES (?, ?, ?, ?, ?, ?)
        ON CONFLICT (username) DO UPDATE SET
          role = excluded.role,
          learning_goal = excluded.learning_goal,
          skills = excluded.skills,
          difficulty = excluded.difficulty,
          updated_at = excluded.updated_at
      `).run(username, profile.role, profile.learningGoal, JSON.stringify(profile.skills), profile.difficulty, now());
    });
  }
}

/** One line per known preference, for the {context} prompt slot. */
export function describeProfile(profile: LearnerProfile | undefined): string {
  if (!profile) return '';
  const lines: string[] = [];
  if (profile.learningGoal) lines.push(`Learning goal: ${profile.learningGoal}`);
  if (profile.skills.length > 0) lines.push(`Skills/interests: ${profile.skills.join(', ')}`);
  if (profile.difficulty) lines.push(`Difficulty: ${profile.difficulty}`);
  return lines.join('\n');
}
