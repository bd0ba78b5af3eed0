import { Request, Response } from 'express';
import { principalOf } from '../middleware/auth.middleware';
import { messageSchema } from '../schemas/message.schemas';
import { parseId } from '../schemas/params.schema';
import { requireMember } from '../services/access';
import type { MessageService } from '../services/message.service';
import type { PageRenderer } from './page';

const threadPath = (jobId: number, userId: number) => `/messages/${jobId}/${userId}/`;

export class MessageController {
  constructor(
    private readonly messages: MessageService,
    private readonly pages: PageRenderer
  ) {}

  private target(req: Request) {
    return {
      jobId: parseId(req.params.jobId, 'Job'),
      userId: parseId(req.params.userId, 'User'),
    };
  }

  /** Viewing marks the counterpart's messages as read before the badge is computed. */
  thread = (req: Request, res: Response) => {
    const user = requireMember(principalOf(req));
    const { jobId, userId } = this.target(req);
    const thread = this.messages.openThread(user, jobId, userId);
    this.pages.render(req, res, 'conversation', {
      job: thread.job,
      other: thread.other_user,
      messages: thread.messages,
    });
  };

  post = (req: Request, res: Response) => {
    const user = requireMember(principalOf(req));
    const { jobId, userId } = this.target(req);
    const form = messageSchema.safeParse(req.body);
    this.messages.postMessage(user, jobId, userId, form.success ? form.data.content : '');
    res.redirect(302, threadPath(jobId, userId));
  };

  clear = (req: Request, res: Response) => {
    const user = requireMember(principalOf(req));
    const { jobId, userId } = this.target(req);
    this.messages.clearConversation(user, jobId, userId);
    res.redirect(302, threadPath(jobId, userId));
  };

  conversations = (req: Request, res: Response) => {
    const user = requireMember(principalOf(req));
    this.pages.render(req, res, 'my_conversations', {
      conversations: this.messages.listConversations(user),
    });
  };
}
