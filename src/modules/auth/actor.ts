import { AuthUser } from './auth.types';

/**
 * The caller of an operation. Resolved once per request and passed
 * explicitly into every permission check.
 */
export type Actor = AuthenticatedActor | AnonymousActor;

export interface AuthenticatedActor {
  kind: 'user';
  userId: string;
  email: string;
  isAdmin: boolean;
}

export interface AnonymousActor {
  kind: 'anonymous';
  isAdmin: false;
}

export const ANONYMOUS_ACTOR: AnonymousActor = {
  kind: 'anonymous',
  isAdmin: false,
};

export function authenticatedActor(user: AuthUser): AuthenticatedActor {
  return {
    kind: 'user',
    userId: user.userId,
    email: user.email,
    isAdmin: user.admin,
  };
}

export function isAuthenticated(actor: Actor): actor is AuthenticatedActor {
  return actor.kind === 'user';
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null;
}

function getString(obj: Record<string, unknown>, key: string): string | null {
  const v = obj[key];
  return typeof v === 'string' && v.length > 0 ? v : null;
}

/** Narrows whatever passport left on the request into an actor. */
export function toActor(user: unknown): Actor {
  if (!isRecord(user)) return ANONYMOUS_ACTOR;

  const userId = getString(user, 'userId');
  const email = getString(user, 'email');
  if (!userId || !email) return ANONYMOUS_ACTOR;

  return authenticatedActor({ userId, email, admin: user.admin === true });
}
