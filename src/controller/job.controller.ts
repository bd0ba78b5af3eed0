import { Request, Response } from 'express';
import { principalOf } from '../middleware/auth.middleware';
import { applySchema, postJobSchema } from '../schemas/job.schemas';
import { parseId } from '../schemas/params.schema';
import { HOME_PATH, requireMember, requireRole } from '../services/access';
import type { ApplicationService } from '../services/application.service';
import type { JobService } from '../services/job.service';
import type { PageRenderer } from './page';

export class JobController {
  constructor(
    private readonly jobs: JobService,
    private readonly applications: ApplicationService,
    private readonly pages: PageRenderer
  ) {}

  availableJobs = (req: Request, res: Response) => {
    const freelancer = requireRole(principalOf(req), 'freelancer', { anonymousRedirect: HOME_PATH });
    this.pages.render(req, res, 'available_jobs', { jobs: this.jobs.listAvailableJobs(freelancer) });
  };

  postJobForm = (req: Request, res: Response) => {
    requireRole(principalOf(req), 'client');
    this.pages.render(req, res, 'post_job');
  };

  postJob = (req: Request, res: Response) => {
    const client = requireRole(principalOf(req), 'client');
    const form = postJobSchema.safeParse(req.body);
    if (!form.success) {
      return this.pages.render(req, res, 'post_job');
    }
    this.jobs.postJob(client, form.data);
    res.redirect(302, HOME_PATH);
  };

  applyForm = (req: Request, res: Response) => {
    requireRole(principalOf(req), 'freelancer');
    const job = this.jobs.getJob(parseId(req.params.jobId, 'Job'));
    this.pages.render(req, res, 'apply_job', { job });
  };

  apply = (req: Request, res: Response) => {
    const freelancer = requireRole(principalOf(req), 'freelancer');
    const jobId = parseId(req.params.jobId, 'Job');
    const form = applySchema.safeParse(req.body);
    if (!form.success) {
      return this.pages.render(req, res, 'apply_job', { job: this.jobs.getJob(jobId) });
    }
    this.applications.applyToJob(freelancer, jobId, form.data);
    res.redirect(302, '/available-jobs/');
  };

  myJobs = (req: Request, res: Response) => {
    const client = requireRole(principalOf(req), 'client');
    this.pages.render(req, res, 'my_jobs', {
      jobs: this.jobs.listMyJobs(client),
      ...(req.query.completed !== undefined && { notice: 'Job marked as completed!' }),
    });
  };

  jobApplications = (req: Request, res: Response) => {
    const user = requireMember(principalOf(req));
    const { job, applications } = this.jobs.jobApplications(user, parseId(req.params.jobId, 'Job'));
    this.pages.render(req, res, 'job_applications', { job, applications });
  };

  completeJob = (req: Request, res: Response) => {
    const user = requireMember(principalOf(req));
    this.jobs.completeJob(user, parseId(req.params.jobId, 'Job'));
    res.redirect(302, '/my-jobs/?completed=1');
  };
}
