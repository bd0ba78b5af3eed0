import { RedirectSignal } from '../utils/errors';
import type { Member, Principal, Role, User } from '../types';

export const LOGIN_PATH = '/join/';
export const HOME_PATH = '/';

/** Any signed-in account, with or without a profile. */
export function requireMember(principal: Principal): User {
  if (principal.kind === 'anonymous') {
    throw new RedirectSignal(LOGIN_PATH);
  }
  return principal.user;
}

/**
 * Gate for pages that belong to one role. Visitors who are signed in but
 * hold the other role, or no profile at all, are sent home rather than
 * shown an error.
 */
export function requireRole<R extends Role>(
  principal: Principal,
  role: R,
  options: { anonymousRedirect?: string } = {}
): Member<R> {
  if (principal.kind === 'anonymous') {
    throw new RedirectSignal(options.anonymousRedirect ?? LOGIN_PATH);
  }
  if (principal.role !== role) {
    throw new RedirectSignal(HOME_PATH);
  }
  return { user: principal.user, role };
}

export function requireAnonymous(principal: Principal): void {
  if (principal.kind === 'member') {
    throw new RedirectSignal(HOME_PATH);
  }
}
