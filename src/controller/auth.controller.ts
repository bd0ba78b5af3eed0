import { Request, Response, NextFunction } from 'express';
import { principalOf } from '../middleware/auth.middleware';
import { signupSchema, loginSchema } from '../schemas/auth.schema';
import { HOME_PATH, requireAnonymous } from '../services/access';
import type { IdentityService } from '../services/identity.service';
import { logger } from '../utils/logger';
import type { Role } from '../types';
import type { PageRenderer } from './page';

export class AuthController {
  constructor(
    private readonly identity: IdentityService,
    private readonly pages: PageRenderer
  ) {}

  home = (req: Request, res: Response) => {
    const principal = principalOf(req);
    this.pages.render(req, res, 'home', {
      user: principal.kind === 'member' ? principal.user : null,
      role: principal.kind === 'member' ? principal.role : null,
    });
  };

  chooseRole = (req: Request, res: Response) => {
    requireAnonymous(principalOf(req));
    this.pages.render(req, res, 'choose_role', {
      options: [
        { role: 'client', url: '/signup/client/' },
        { role: 'freelancer', url: '/signup/freelancer/' },
      ],
    });
  };

  signupForm = (role: Role) => (req: Request, res: Response) => {
    requireAnonymous(principalOf(req));
    this.pages.render(req, res, 'signup', { role });
  };

  /**
   * Incomplete forms come back unchanged; a taken e-mail comes back with
   * an inline error instead of a failure status.
   */
  signup = (role: Role) => async (req: Request, res: Response, next: NextFunction) => {
    try {
      requireAnonymous(principalOf(req));

      const form = signupSchema.safeParse(req.body);
      if (!form.success) {
        return this.pages.render(req, res, 'signup', { role });
      }

      const result = await this.identity.signup(role, form.data);
      if (!result.ok) {
        return this.pages.render(req, res, 'signup', { role, error: result.error });
      }
      res.redirect(302, HOME_PATH);
    } catch (error) {
      next(error);
    }
  };

  loginForm = (req: Request, res: Response) => {
    this.pages.render(req, res, 'login');
  };

  login = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const form = loginSchema.safeParse(req.body);
      if (!form.success) {
        return this.pages.render(req, res, 'login');
      }

      const user = await this.identity.authenticate(form.data.username, form.data.password);
      if (!user) {
        logger.debug(`Failed login for ${form.data.username}`);
        return this.pages.render(req, res, 'login', {
          error: 'Please enter a correct username and password.',
        });
      }

      res.json({ success: true, token: this.identity.issueToken(user), user });
    } catch (error) {
      next(error);
    }
  };

  // Sessions are bearer tokens; forgetting one is up to the client.
  logout = (_req: Request, res: Response) => {
    res.redirect(302, HOME_PATH);
  };
}
