/**
 * Caller identity for the HTTP API.
 *
 * Authentication is out of scope for this service: an upstream gateway
 * authenticates the caller and forwards who they are in headers. The
 * provider interface is the seam for replacing that.
 */

import { NextFunction, Request, Response } from 'express';
import { ForbiddenError } from '../errors';

export const ROLES = ['student', 'staff', 'admin'] as const;

export type Role = (typeof ROLES)[number];

export interface Identity {
  role: Role;
  subjectId?: string;
  deviceId?: string;
}

export interface IdentityProvider {
  identify(req: Request): Identity;
}

function isRole(value: string): value is Role {
  return ROLES.some((role) => role === value);
}

function header(req: Request, name: string): string | undefined {
  const value = req.header(name);
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Reads `x-role`, `x-subject-id` and `x-device-id`. A missing or unknown
 * role is treated as `student`, the least privileged.
 */
export class HeaderIdentityProvider implements IdentityProvider {
  identify(req: Request): Identity {
    const role = header(req, 'x-role');
    return {
      role: role !== undefined && isRole(role) ? role : 'student',
      subjectId: header(req, 'x-subject-id'),
      deviceId: header(req, 'x-device-id'),
    };
  }
}

const identities = new WeakMap<Request, Identity>();

export function identityMiddleware(provider: IdentityProvider) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    identities.set(req, provider.identify(req));
    next();
  };
}

export function identityOf(req: Request): Identity {
  return identities.get(req) ?? { role: 'student' };
}

export function requireRole(...allowed: Role[]) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const identity = identityOf(req);
    if (!allowed.includes(identity.role)) {
      next(new ForbiddenError(`Role ${identity.role} may not perform this action`));
      return;
    }
    next();
  };
}
