import type { DB } from '../db/database';
import { now } from '../db/database';
import { mapJob, mapMessage, mapPublicUser, type JobRow, type MessageRow } from '../db/mappers';
import { ForbiddenError, NotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';
import { JOB_SELECT, JobService, isOwner } from './job.service';
import type { ConversationSummary, Job, Message, Principal, PublicUser, User } from '../types';

export interface Thread {
  job: Job;
  other_user: PublicUser;
  messages: Message[];
  marked_read: number;
}

type PublicUserRow = Pick<User, 'id' | 'username' | 'first_name' | 'last_name'>;

export class MessageService {
  private readonly jobs: JobService;

  constructor(private readonly db: DB) {
    this.jobs = new JobService(db);
  }

  /** The job's owner, or anyone holding an accepted application on it. */
  isAuthorized(user: User, job: Job): boolean {
    if (isOwner(user, job)) return true;
    const accepted = this.db
      .prepare<[number, number], { found: number }>(
        "SELECT 1 AS found FROM applications WHERE job_id = ? AND applicant_user_id = ? AND status = 'accepted' LIMIT 1"
      )
      .get(job.id, user.id);
    return accepted !== undefined;
  }

  /**
   * Fetch-and-mark. Opening a thread is not a read-only call: every
   * message the other participant sent to the viewer on this job is
   * flagged read in the same transaction that loads the thread.
   */
  openThread(viewer: User, jobId: number, otherUserId: number): Thread {
    const { job, other } = this.resolve(viewer, jobId, otherUserId, 'view this conversation');

    const fetchAndMark = this.db.transaction(() => {
      const marked = this.db
        .prepare('UPDATE messages SET read = 1 WHERE job_id = ? AND receiver_id = ? AND sender_id = ? AND read = 0')
        .run(job.id, viewer.id, other.id);
      const messages = this.db
        .prepare<[number, number, number, number, number], MessageRow>(
          `SELECT * FROM messages
           WHERE job_id = ?
             AND ((sender_id = ? AND receiver_id = ?) OR (sender_id = ? AND receiver_id = ?))
           ORDER BY timestamp ASC, id ASC`
        )
        .all(job.id, viewer.id, other.id, other.id, viewer.id)
        .map(mapMessage);
      return { messages, marked: marked.changes };
    });

    const { messages, marked } = fetchAndMark();
    return { job, other_user: other, messages, marked_read: marked };
  }

  /** Empty content is ignored and yields null; whitespace still counts as content. */
  postMessage(sender: User, jobId: number, otherUserId: number, content: string): Message | null {
    const { job, other } = this.resolve(sender, jobId, otherUserId, 'post in this conversation');
    if (content.length === 0) return null;

    const result = this.db
      .prepare('INSERT INTO messages (sender_id, receiver_id, job_id, content, read, timestamp) VALUES (?, ?, ?, ?, 0, ?)')
      .run(sender.id, other.id, job.id, content, now());
    const row = this.db
      .prepare<[number], MessageRow>('SELECT * FROM messages WHERE id = ?')
      .get(Number(result.lastInsertRowid));
    if (!row) throw new Error('Message vanished right after insert');
    return mapMessage(row);
  }

  clearConversation(requester: User, jobId: number, otherUserId: number): number {
    const { job, other } = this.resolve(requester, jobId, otherUserId, 'clear this chat');
    const result = this.db
      .prepare(
        `DELETE FROM messages
         WHERE job_id = ?
           AND sender_id IN (?, ?)
           AND receiver_id IN (?, ?)`
      )
      .run(job.id, requester.id, other.id, requester.id, other.id);
    logger.info(`Cleared ${result.changes} message(s) on job #${job.id} between #${requester.id} and #${other.id}`);
    return result.changes;
  }

  /**
   * One entry per (job, counterpart) the user has exchanged messages with,
   * newest activity first. Scans every message the user is part of.
   */
  listConversations(user: User): ConversationSummary[] {
    const rows = this.db
      .prepare<[number, number], MessageRow>(
        'SELECT * FROM messages WHERE sender_id = ? OR receiver_id = ? ORDER BY timestamp DESC, id DESC'
      )
      .all(user.id, user.id);

    const latest = new Map<string, { jobId: number; otherId: number; timestamp: string }>();
    for (const row of rows) {
      const otherId = row.receiver_id === user.id ? row.sender_id : row.receiver_id;
      const key = `${row.job_id}:${otherId}`;
      if (!latest.has(key)) {
        latest.set(key, { jobId: row.job_id, otherId, timestamp: row.timestamp });
      }
    }

    const unread = this.db.prepare<[number, number, number], { count: number }>(
      'SELECT COUNT(*) AS count FROM messages WHERE job_id = ? AND receiver_id = ? AND sender_id = ? AND read = 0'
    );
    const jobById = this.db.prepare<[number], JobRow>(`${JOB_SELECT} WHERE jobs.id = ?`);
    const userById = this.db.prepare<[number], PublicUserRow>(
      'SELECT id, username, first_name, last_name FROM users WHERE id = ?'
    );

    const summaries: ConversationSummary[] = [];
    for (const entry of latest.values()) {
      const job = jobById.get(entry.jobId);
      const other = userById.get(entry.otherId);
      if (!job || !other) continue;
      summaries.push({
        job: mapJob(job),
        other_user: mapPublicUser(other),
        last_message_time: entry.timestamp,
        unread_count: unread.get(entry.jobId, user.id, entry.otherId)?.count ?? 0,
      });
    }

    // Insertion order is already newest first; the stable sort keeps ties that way.
    return summaries.sort((a, b) => b.last_message_time.localeCompare(a.last_message_time));
  }

  /** Site-wide badge count. */
  unreadCount(principal: Principal): number {
    if (principal.kind === 'anonymous') return 0;
    const row = this.db
      .prepare<[number], { count: number }>('SELECT COUNT(*) AS count FROM messages WHERE receiver_id = ? AND read = 0')
      .get(principal.user.id);
    return row?.count ?? 0;
  }

  private resolve(actor: User, jobId: number, otherUserId: number, action: string) {
    const job = this.jobs.getJob(jobId);
    const otherRow = this.db
      .prepare<[number], PublicUserRow>('SELECT id, username, first_name, last_name FROM users WHERE id = ?')
      .get(otherUserId);
    if (!otherRow) throw new NotFoundError('User');
    if (!this.isAuthorized(actor, job)) {
      throw new ForbiddenError(`Not authorized to ${action}`);
    }
    if (otherRow.id === actor.id) {
      throw new ForbiddenError('A conversation needs two different participants');
    }
    return { job, other: mapPublicUser(otherRow) };
  }
}
