/**
 * Create a user (and optionally their mentoring role) out of band.
 *
 *   npm run provision -- <username> <password> [--name "Display Name"] [--email a@b.c] [--role Executive]
 */

import path from 'path';
import { parseArgs } from 'util';
import { CredentialStore } from './lib/credentials.js';
import { openDb } from './lib/db.js';
import { describeError } from './lib/errors.js';
import { ProfileStore } from './lib/profiles.js';

const DB_PATH = process.env.DB_PATH || path.resolve(process.cwd(), 'data', 'mentor.db');

async function provision(argv: string[]): Promise<void> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      name: { type: 'string' },
      email: { type: 'string' },
      role: { type: 'string' },
    },
  });

  const [username, password] = positionals;
  if (!username || !password) {
    throw new Error('Usage: provision <username> <password> [--name NAME] [--email EMAIL] [--role ROLE]');
  }

  const db = openDb(DB_PATH);
  try {
    const user = await new CredentialStore(db).createUser({
      username,
      password,
      displayName: values.name,
      email: values.email,
    });
    if (values.role) {
      new ProfileStore(db).save(username, { role: values.role, learningGoal: null, skills: [], difficulty: null });
    }
    console.log(`Created user ${user.username}${values.role ? ` (${values.role})` : ''}`);
  } finally {
    db.close();
  }
}

provision(process.argv.slice(2)).catch((error: unknown) => {
  console.error('Provision error:', describeError(error));
  process.exit(1);
});
