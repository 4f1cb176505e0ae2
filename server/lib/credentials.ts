import { randomBytes, scrypt, timingSafeEqual } from 'crypto';
import { guard, now, type Db } from './db.js';
import { StorageError } from './errors.js';

const KEY_LENGTH = 64;
const SALT_LENGTH = 16;

// Compared against when the username is unknown, so both paths cost one scrypt.
const DUMMY_HASH = `scrypt$${'00'.repeat(SALT_LENGTH)}$${'00'.repeat(KEY_LENGTH)}`;

export interface User {
  username: string;
  displayName: string | null;
  email: string | null;
  createdAt: string;
}

export interface NewUser {
  username: string;
  password: string;
  displayName?: string;
  email?: string;
}

interface UserRow {
  username: string;
  password_hash: string;
  display_name: string | null;
  email: string | null;
  created_at: string;
}

function deriveKey(password: string, salt: Buffer, keyLength: number): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    scrypt(password, salt, keyLength, (err, key) => (err ? reject(err) : resolve(key)));
  });
}

/** Format: scrypt$<salt hex>$<key hex> */
export async function hashPassword(password: string): Promise<string> {
  const salt = randomBytes(SALT_LENGTH);
  const key = await deriveKey(password, salt, KEY_LENGTH);
  return `scrypt$${salt.toString('hex')}$${key.toString('hex')}`;
}

export async function checkPassword(password: string, stored: string): Promise<boolean> {
  const [scheme, saltHex, keyHex] = stored.split('$');
  if (scheme !== 'scrypt' || !saltHex || !keyHex) return false;

  const expected = Buffer.from(keyHex, 'hex');
  const actual = await deriveKey(password, Buffer.from(saltHex, 'hex'), expected.length);
  return actual.length === expected.length && timingSafeEqual(actual, expected);
}

/** Username/password pairs. Users are provisioned out of band and never deleted here. */
export class CredentialStore {
  constructor(private readonly db: Db) {}

  /** True only for an exact username/password match. */
  async verify(username: string, password: string): Promise<boolean> {
    const row = this.findRow(username);
    const ok = await checkPassword(password, row?.password_hash ?? DUMMY_HASH);
    return row !== undefined && ok;
  }

  getUser(username: string): User | undefined {
    const row = this.findRow(username);
    return row ? toUser(row) : undefined;
  }

  async createUser(user: NewUser): Promise<User> {
    const passwordHash = await hashPassword(user.password);
    const row: UserRow = {
      username: user.username,
      password_hash: passwordHash,
      display_name: user.displayName ?? null,
      email: user.email ?? null,
      created_at: now(),
    };

    guard('Create user', () => {
      if (this.findRow(user.username)) {
        throw new StorageError(`User ${user.username} already exists`);
      }
      this.db.prepare(
        'INSERT INTO users (username, password_hash, display_name, email, created_at) VALUES (?, ?, ?, ?, ?)'
      ).run(row.username, row.password_hash, row.display_name, row.email, row.created_at);
    });

    return toUser(row);
  }

  private findRow(username: string): UserRow | undefined {
    return guard('Look up user', () =>
      this.db.prepare<[string], UserRow>('SELECT * FROM users WHERE username = ?').get(username)
    );
  }
}

function toUser(row: UserRow): User {
  return {
    username: row.username,
    displayName: row.display_name,
    email: row.email,
    createdAt: row.created_at,
  };
}
