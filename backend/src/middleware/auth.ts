/**
 * Request guards.
 * Users and admins authenticate with a JWT (`sub`, `role`); workers with the shared
 * worker secret in `x-worker-secret`.
 */
import type { FastifyReply, FastifyRequest } from 'fastify';
import { timingSafeEqual } from 'crypto';
import { ForbiddenError, UnauthorizedError } from '../errors.js';
import { sendError } from '../routes/http.js';

export type Role = 'user' | 'admin';

export interface AuthUser {
  sub: string;
  role: Role;
}

declare module '@fastify/jwt' {
  interface FastifyJWT {
    payload: AuthUser;
    user: AuthUser;
  }
}

export type Guard = (request: FastifyRequest, reply: FastifyReply) => Promise<FastifyReply | undefined>;

export async function requireUser(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | undefined> {
  try {
    await request.jwtVerify();
  } catch {
    return sendError(reply, new UnauthorizedError());
  }
  if (typeof request.user.sub !== 'string' || request.user.sub === '') {
    return sendError(reply, new UnauthorizedError('Token has no subject'));
  }
  return undefined;
}

export async function requireAdmin(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | undefined> {
  const denied = await requireUser(request, reply);
  if (denied) return denied;
  if (request.user.role !== 'admin') {
    return sendError(reply, new ForbiddenError('Forbidden: admin role required'));
  }
  return undefined;
}

export function requireWorker(workerSecret: string): Guard {
  const expected = Buffer.from(workerSecret);
  return async (request, reply) => {
    const header = request.headers['x-worker-secret'];
    const given = Buffer.from(typeof header === 'string' ? header : '');
    if (given.length !== expected.length || !timingSafeEqual(given, expected)) {
      return sendError(reply, new UnauthorizedError('Invalid worker secret'));
    }
    return undefined;
  };
}

/** Role from a verified token, 'anonymous' otherwise. */
export function roleOf(request: FastifyRequest): string {
  const user: Partial<AuthUser> | undefined = request.user;
  return user?.role ?? 'anonymous';
}
