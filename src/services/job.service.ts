import type { DB } from '../db/database';
import { now } from '../db/database';
import { mapApplication, mapJob, type ApplicationRow, type JobRow } from '../db/mappers';
import { ForbiddenError, NotFoundError, RedirectSignal } from '../utils/errors';
import { logger } from '../utils/logger';
import { HOME_PATH } from './access';
import type { Application, Client, Freelancer, Job, OwnedJob, User } from '../types';

export const JOB_SELECT = `
  SELECT jobs.*, users.first_name AS owner_first_name, users.last_name AS owner_last_name
  FROM jobs
  LEFT JOIN users ON jobs.owner_id = users.id
`;

export interface PostJobInput {
  title: string;
  description: string;
  budget: string;
}

const INTEGER = /^\s*[+-]?\d+\s*$/;

/** Budgets that are not whole numbers are stored as 0 rather than refused. */
export function parseBudget(raw: string): number {
  if (!INTEGER.test(raw)) return 0;
  const value = Number.parseInt(raw, 10);
  return Number.isSafeInteger(value) ? value : 0;
}

export const isOwner = (user: User, job: Job) => job.owner_id !== null && job.owner_id === user.id;

export class JobService {
  constructor(private readonly db: DB) {}

  postJob(client: Client, input: PostJobInput): Job {
    const result = this.db
      .prepare('INSERT INTO jobs (owner_id, title, description, budget, status, created_at) VALUES (?, ?, ?, ?, ?, ?)')
      .run(client.user.id, input.title, input.description, parseBudget(input.budget), 'open', now());
    const job = this.getJob(Number(result.lastInsertRowid));
    logger.info(`Job #${job.id} posted by user #${client.user.id}`);
    return job;
  }

  // Only freelancers browse the board; the parameter keeps that visible to callers.
  listAvailableJobs(_freelancer: Freelancer): Job[] {
    return this.db
      .prepare<[], JobRow>(`${JOB_SELECT} WHERE jobs.status = 'open' ORDER BY jobs.created_at DESC, jobs.id DESC`)
      .all()
      .map(mapJob);
  }

  /** The client's dashboard: everything not yet completed, with a live count of applications still in play. */
  listMyJobs(client: Client): OwnedJob[] {
    const rows = this.db
      .prepare<[number], JobRow & { active_application_count: number }>(
        `SELECT jobs.*,
           (SELECT COUNT(*) FROM applications
             WHERE applications.job_id = jobs.id AND applications.status != 'rejected') AS active_application_count
         FROM jobs
         WHERE jobs.owner_id = ? AND jobs.status != 'completed'
         ORDER BY jobs.created_at DESC, jobs.id DESC`
      )
      .all(client.user.id);
    return rows.map((row) => ({ ...mapJob(row), active_application_count: row.active_application_count }));
  }

  getJob(jobId: number): Job {
    const row = this.db.prepare<[number], JobRow>(`${JOB_SELECT} WHERE jobs.id = ?`).get(jobId);
    if (!row) throw new NotFoundError('Job');
    return mapJob(row);
  }

  /** Applications a job owner still has to act on; rejected ones drop out of view. */
  jobApplications(actor: User, jobId: number): { job: Job; applications: Application[] } {
    const job = this.getJob(jobId);
    if (!isOwner(actor, job)) {
      throw new RedirectSignal(HOME_PATH);
    }
    const applications = this.db
      .prepare<[number], ApplicationRow>(
        "SELECT * FROM applications WHERE job_id = ? AND status != 'rejected' ORDER BY created_at ASC, id ASC"
      )
      .all(jobId)
      .map(mapApplication);
    return { job, applications };
  }

  /**
   * Terminal transition. The job is closed first and the leftover
   * applications are rejected afterwards as a separate statement; the
   * accepted ones keep their status.
   */
  completeJob(actor: User, jobId: number): Job {
    const job = this.getJob(jobId);
    if (!isOwner(actor, job)) {
      throw new ForbiddenError('Not authorized to complete this job');
    }

    this.db.prepare("UPDATE jobs SET status = 'completed' WHERE id = ?").run(jobId);
    const rejected = this.db
      .prepare("UPDATE applications SET status = 'rejected' WHERE job_id = ? AND status != 'accepted'")
      .run(jobId);

    logger.info(`Job #${jobId} completed; ${rejected.changes} application(s) rejected`);
    return { ...job, status: 'completed' };
  }
}
