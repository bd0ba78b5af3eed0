import bcrypt from 'bcryptjs';
import Database from 'better-sqlite3';
import jwt from 'jsonwebtoken';
import type { DB } from '../db/database';
import { now } from '../db/database';
import { mapProfile, mapUser, type ProfileRow, type UserRow } from '../db/mappers';
import { logger } from '../utils/logger';
import type { Principal, Role, User } from '../types';

export interface SignupInput {
  first_name: string;
  last_name: string;
  email: string;
  password: string;
}

export type SignupResult = { ok: true; user: User } | { ok: false; error: string };

export interface IdentityOptions {
  sessionSecret: string;
  sessionTtlSeconds: number;
  bcryptRounds: number;
}

const ANONYMOUS: Principal = { kind: 'anonymous' };

export class IdentityService {
  constructor(
    private readonly db: DB,
    private readonly options: IdentityOptions
  ) {}

  /**
   * Creates the account and its profile together. The role is fixed by
   * whichever signup page was used and cannot be changed later.
   */
  async signup(role: Role, input: SignupInput): Promise<SignupResult> {
    const username = input.email;
    if (this.findByUsername(username)) {
      return { ok: false, error: 'Email already registered.' };
    }

    const passwordHash = await bcrypt.hash(input.password, this.options.bcryptRounds);
    const createdAt = now();

    const create = this.db.transaction(() => {
      const result = this.db
        .prepare(
          'INSERT INTO users (username, email, password_hash, first_name, last_name, created_at) VALUES (?, ?, ?, ?, ?, ?)'
        )
        .run(username, input.email, passwordHash, input.first_name, input.last_name, createdAt);
      const userId = Number(result.lastInsertRowid);
      this.db
        .prepare('INSERT INTO profiles (user_id, role, created_at) VALUES (?, ?, ?)')
        .run(userId, role, createdAt);
      return userId;
    });

    let userId: number;
    try {
      userId = create();
    } catch (error) {
      // Another signup for the same address can land while the password is hashing.
      if (error instanceof Database.SqliteError && error.code === 'SQLITE_CONSTRAINT_UNIQUE') {
        return { ok: false, error: 'Email already registered.' };
      }
      throw error;
    }

    const user = this.getUser(userId);
    if (!user) {
      throw new Error('User vanished right after signup');
    }
    logger.info(`Signed up ${role} account #${user.id}`);
    return { ok: true, user };
  }

  async authenticate(username: string, password: string): Promise<User | null> {
    const row = this.findByUsername(username);
    if (!row) return null;
    const valid = await bcrypt.compare(password, row.password_hash);
    return valid ? mapUser(row) : null;
  }

  issueToken(user: User): string {
    return jwt.sign({}, this.options.sessionSecret, {
      subject: String(user.id),
      expiresIn: this.options.sessionTtlSeconds,
      algorithm: 'HS256',
    });
  }

  /** Resolves a bearer token into a principal; anything unusable is anonymous. */
  principalFromToken(token: string | undefined): Principal {
    if (!token) return ANONYMOUS;

    let subject: string;
    try {
      const decoded = jwt.verify(token, this.options.sessionSecret, { algorithms: ['HS256'] });
      if (typeof decoded === 'string' || typeof decoded.sub !== 'string') {
        return ANONYMOUS;
      }
      subject = decoded.sub;
    } catch (error) {
      logger.debug('Rejected session token:', error instanceof Error ? error.message : error);
      return ANONYMOUS;
    }

    const userId = Number(subject);
    return Number.isInteger(userId) ? this.loadPrincipal(userId) : ANONYMOUS;
  }

  loadPrincipal(userId: number): Principal {
    const user = this.getUser(userId);
    if (!user) return ANONYMOUS;
    const profile = this.db
      .prepare<[number], ProfileRow>('SELECT * FROM profiles WHERE user_id = ?')
      .get(userId);
    return { kind: 'member', user, role: profile ? mapProfile(profile).role : null };
  }

  getUser(userId: number): User | null {
    const row = this.db.prepare<[number], UserRow>('SELECT * FROM users WHERE id = ?').get(userId);
    return row ? mapUser(row) : null;
  }

  private findByUsername(username: string): UserRow | undefined {
    return this.db.prepare<[string], UserRow>('SELECT * FROM users WHERE username = ?').get(username);
  }
}
