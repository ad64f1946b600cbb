import {
  createParamDecorator,
  ExecutionContext,
  UnauthorizedException,
} from '@nestjs/common';
import { Actor, AuthenticatedActor, isAuthenticated, toActor } from './actor';

function actorOf(ctx: ExecutionContext): Actor {
  const req = ctx.switchToHttp().getRequest<{ user?: unknown }>();
  return toActor(req.user);
}

/** The caller, anonymous when no valid token came with the request. */
export const CurrentActor = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): Actor => actorOf(ctx),
);

/** For routes behind JwtAuthGuard: the caller must be signed in. */
export const CurrentUser = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): AuthenticatedActor => {
    const actor = actorOf(ctx);
    if (!isAuthenticated(actor)) throw new UnauthorizedException();
    return actor;
  },
);
