import { Request, Response } from 'express';
import { principalOf } from '../middleware/auth.middleware';
import type { MessageService } from '../services/message.service';
import { navigationFor } from '../services/navigation';

/**
 * Every page answers with the same frame: which view it is, the menu for
 * the visitor and the unread badge, followed by the page's own data.
 */
export class PageRenderer {
  constructor(private readonly messages: MessageService) {}

  render(req: Request, res: Response, view: string, data: Record<string, unknown> = {}) {
    const principal = principalOf(req);
    res.json({
      view,
      navigation: navigationFor(principal),
      unreadMessageCount: this.messages.unreadCount(principal),
      ...data,
    });
  }
}
