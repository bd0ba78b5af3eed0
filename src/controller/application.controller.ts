import { Request, Response } from 'express';
import { principalOf } from '../middleware/auth.middleware';
import { parseId } from '../schemas/params.schema';
import { requireMember, requireRole } from '../services/access';
import type { ApplicationService } from '../services/application.service';
import type { PageRenderer } from './page';

export class ApplicationController {
  constructor(
    private readonly applications: ApplicationService,
    private readonly pages: PageRenderer
  ) {}

  myApplications = (req: Request, res: Response) => {
    const freelancer = requireRole(principalOf(req), 'freelancer');
    this.pages.render(req, res, 'my_applications', {
      applications: this.applications.listMyApplications(freelancer),
    });
  };

  accept = (req: Request, res: Response) => {
    const user = requireMember(principalOf(req));
    const { job } = this.applications.acceptApplication(user, parseId(req.params.appId, 'Application'));
    res.redirect(302, `/my-jobs/${job.id}/`);
  };

  reject = (req: Request, res: Response) => {
    const user = requireMember(principalOf(req));
    const { job } = this.applications.rejectApplication(user, parseId(req.params.appId, 'Application'));
    res.redirect(302, `/my-jobs/${job.id}/`);
  };

  remove = (req: Request, res: Response) => {
    const user = requireMember(principalOf(req));
    this.applications.deleteApplication(user, parseId(req.params.appId, 'Application'));
    res.redirect(302, '/my-applications/');
  };
}
