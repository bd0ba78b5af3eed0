import type { NavLink, Principal } from '../types';

const anonymousLinks: NavLink[] = [
  { name: 'Sign Up', url: '/signup/' },
  { name: 'Login', url: '/join/' },
];

const clientLinks: NavLink[] = [
  { name: 'Home', url: '/' },
  { name: 'Post Job', url: '/post/' },
  { name: 'My Jobs', url: '/my-jobs/' },
  { name: 'Messages', url: '/my-conversations/' },
];

const freelancerLinks: NavLink[] = [
  { name: 'Home', url: '/' },
  { name: 'Available Jobs', url: '/available-jobs/' },
  { name: 'My Applications', url: '/my-applications/' },
  { name: 'Messages', url: '/my-conversations/' },
];

const logout: NavLink = { name: 'Logout', url: '/logout/' };

/** Menu for the current visitor. Members without a profile only get Logout. */
export function navigationFor(principal: Principal): NavLink[] {
  if (principal.kind === 'anonymous') return [...anonymousLinks];
  switch (principal.role) {
    case 'client':
      return [...clientLinks, logout];
    case 'freelancer':
      return [...freelancerLinks, logout];
    case null:
      return [logout];
  }
}
