import type { DB } from '../db/database';
import { now } from '../db/database';
import { mapApplication, mapJob, type ApplicationRow } from '../db/mappers';
import { ConflictError, ForbiddenError, NotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';
import { JobService, isOwner } from './job.service';
import type { Application, ApplicationStatus, ApplicationWithJob, Freelancer, Job, User } from '../types';

export interface ApplyInput {
  applicant_name: string;
  proposal: string;
}

type Decision = Extract<ApplicationStatus, 'accepted' | 'rejected'>;

interface ApplicationWithJobRow extends ApplicationRow {
  job_owner_id: number | null;
  job_owner_first_name: string | null;
  job_owner_last_name: string | null;
  job_title: string;
  job_description: string;
  job_budget: number;
  job_status: string;
  job_created_at: string;
}

export class ApplicationService {
  private readonly jobs: JobService;

  constructor(private readonly db: DB) {
    this.jobs = new JobService(db);
  }

  /**
   * The applicant name comes from the form and may differ from the
   * account's own name; the row is still linked to the account. Jobs
   * already in progress keep taking applications.
   */
  applyToJob(freelancer: Freelancer, jobId: number, input: ApplyInput): Application {
    const job = this.jobs.getJob(jobId);
    if (job.status === 'completed') {
      throw new ConflictError('This job is completed');
    }

    const result = this.db
      .prepare(
        'INSERT INTO applications (job_id, applicant_user_id, applicant_name, proposal, status, created_at) VALUES (?, ?, ?, ?, ?, ?)'
      )
      .run(job.id, freelancer.user.id, input.applicant_name, input.proposal, 'pending', now());
    return this.getApplication(Number(result.lastInsertRowid));
  }

  getApplication(applicationId: number): Application {
    const row = this.db
      .prepare<[number], ApplicationRow>('SELECT * FROM applications WHERE id = ?')
      .get(applicationId);
    if (!row) throw new NotFoundError('Application');
    return mapApplication(row);
  }

  /**
   * Accepting puts the job in progress. A job may end up with more than
   * one accepted application; earlier acceptances are left alone.
   */
  acceptApplication(actor: User, applicationId: number): { application: Application; job: Job } {
    const { application, job } = this.loadForOwner(actor, applicationId, 'accept');
    if (job.status === 'completed') {
      throw new ConflictError('Cannot accept applications on a completed job');
    }
    this.decide(application, 'accepted');
    this.db.prepare("UPDATE jobs SET status = 'in_progress' WHERE id = ?").run(job.id);

    logger.info(`Application #${application.id} accepted; job #${job.id} in progress`);
    return {
      application: { ...application, status: 'accepted' },
      job: { ...job, status: 'in_progress' },
    };
  }

  rejectApplication(actor: User, applicationId: number): { application: Application; job: Job } {
    const { application, job } = this.loadForOwner(actor, applicationId, 'reject');
    this.decide(application, 'rejected');

    logger.info(`Application #${application.id} rejected`);
    return { application: { ...application, status: 'rejected' }, job };
  }

  /** Applicants may clear away their own rejected applications, nothing else. */
  deleteApplication(actor: User, applicationId: number): void {
    const application = this.getApplication(applicationId);
    if (application.applicant_user_id !== actor.id || application.status !== 'rejected') {
      throw new ForbiddenError('Not allowed to delete this application');
    }
    this.db.prepare('DELETE FROM applications WHERE id = ?').run(applicationId);
    logger.info(`Application #${applicationId} deleted by its applicant`);
  }

  /** Applications on completed jobs disappear from this list but stay stored. */
  listMyApplications(freelancer: Freelancer): ApplicationWithJob[] {
    const rows = this.db
      .prepare<[number], ApplicationWithJobRow>(
        `SELECT applications.*,
           jobs.owner_id AS job_owner_id, jobs.title AS job_title,
           jobs.description AS job_description, jobs.budget AS job_budget,
           jobs.status AS job_status, jobs.created_at AS job_created_at,
           users.first_name AS job_owner_first_name, users.last_name AS job_owner_last_name
         FROM applications
         JOIN jobs ON applications.job_id = jobs.id
         LEFT JOIN users ON jobs.owner_id = users.id
         WHERE applications.applicant_user_id = ? AND jobs.status != 'completed'
         ORDER BY applications.created_at DESC, applications.id DESC`
      )
      .all(freelancer.user.id);

    return rows.map((row) => ({
      ...mapApplication(row),
      job: mapJob({
        id: row.job_id,
        owner_id: row.job_owner_id,
        owner_first_name: row.job_owner_first_name,
        owner_last_name: row.job_owner_last_name,
        title: row.job_title,
        description: row.job_description,
        budget: row.job_budget,
        status: row.job_status,
        created_at: row.job_created_at,
      }),
    }));
  }

  private loadForOwner(actor: User, applicationId: number, verb: string) {
    const application = this.getApplication(applicationId);
    const job = this.jobs.getJob(application.job_id);
    if (!isOwner(actor, job)) {
      throw new ForbiddenError(`Not authorized to ${verb} this application`);
    }
    return { application, job };
  }

  // Pending is the only state a decision can leave; repeating it is a no-op.
  private decide(application: Application, status: Decision) {
    if (application.status === status) return;
    if (application.status !== 'pending') {
      throw new ConflictError(`Application is already ${application.status}`);
    }
    this.db.prepare('UPDATE applications SET status = ? WHERE id = ?').run(status, application.id);
  }
}
