import { Request, Response, NextFunction } from 'express';
import type { IdentityService } from '../services/identity.service';
import type { Principal } from '../types';

declare global {
  namespace Express {
    interface Request {
      principal?: Principal;
    }
  }
}

const ANONYMOUS: Principal = { kind: 'anonymous' };

export const principalOf = (req: Request): Principal => req.principal ?? ANONYMOUS;

/** Attaches the caller's principal; requests without a usable bearer token are anonymous. */
export const createAuthMiddleware =
  (identity: IdentityService) => (req: Request, _res: Response, next: NextFunction) => {
    const header = req.headers.authorization;
    const token = header?.startsWith('Bearer ') ? header.slice('Bearer '.length).trim() : undefined;
    req.principal = identity.principalFromToken(token);
    next();
  };
