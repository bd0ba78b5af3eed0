import type { DB } from '../db/database';
import { ApplicationService } from './application.service';
import { IdentityService, type IdentityOptions } from './identity.service';
import { JobService } from './job.service';
import { MessageService } from './message.service';

export interface Services {
  identity: IdentityService;
  jobs: JobService;
  applications: ApplicationService;
  messages: MessageService;
}

export const createServices = (db: DB, options: IdentityOptions): Services => ({
  identity: new IdentityService(db, options),
  jobs: new JobService(db),
  applications: new ApplicationService(db),
  messages: new MessageService(db),
});
