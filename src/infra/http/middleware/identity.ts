import type { Request, Response, NextFunction } from 'express';
import { UnauthorizedError } from '../../../application/errors.js';

export interface OwnerRequest extends Request {
  ownerId?: string;
}

/**
 * Attach the owner every vault call is scoped to.
 * There is no login yet: the configured placeholder owner is used for every request,
 * and an authentication middleware can replace this one without touching the routes.
 */
export function ownerIdentity(ownerId: string) {
  return (req: OwnerRequest, _res: Response, next: NextFunction): void => {
    req.ownerId = ownerId;
    next();
  };
}

/**
 * The owner id attached by ownerIdentity. Throws UnauthorizedError when none is present.
 */
export function requireOwner(req: OwnerRequest): string {
  if (!req.ownerId) {
    throw new UnauthorizedError('No owner identity on request');
  }
  return req.ownerId;
}
