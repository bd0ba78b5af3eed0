import { createDatabase, type DB } from '../src/db/database';
import { createServices, type Services } from '../src/services';
import type { Member, Role, User } from '../src/types';

export const identityOptions = {
  sessionSecret: 'test-secret',
  sessionTtlSeconds: 3600,
  bcryptRounds: 4,
};

export const setup = (): { db: DB; services: Services } => {
  const db = createDatabase(':memory:');
  return { db, services: createServices(db, identityOptions) };
};

let counter = 0;

/** Inserts an account directly; pass `role: null` for an account without a profile. */
export function insertUser(db: DB, role: Role | null, name = 'Test'): User {
  counter += 1;
  const username = `${name.toLowerCase()}${counter}@example.com`;
  const createdAt = new Date().toISOString();
  const result = db
    .prepare(
      'INSERT INTO users (username, email, password_hash, first_name, last_name, created_at) VALUES (?, ?, ?, ?, ?, ?)'
    )
    .run(username, username, 'not-a-hash', name, 'User', createdAt);
  const id = Number(result.lastInsertRowid);
  if (role) {
    db.prepare('INSERT INTO profiles (user_id, role, created_at) VALUES (?, ?, ?)').run(id, role, createdAt);
  }
  return { id, username, email: username, first_name: name, last_name: 'User', created_at: createdAt };
}

export function member<R extends Role>(db: DB, role: R, name?: string): Member<R> {
  return { user: insertUser(db, role, name), role };
}

export function statusOf(db: DB, table: 'jobs' | 'applications', id: number): string | undefined {
  return db.prepare<[number], { status: string }>(`SELECT status FROM ${table} WHERE id = ?`).get(id)?.status;
}
