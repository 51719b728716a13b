import { Request } from 'express';
import { CallerIdentity, CallerRole } from '../types';
import { ValidationError } from './errors';
import { normalizeTags } from './validators';

// Set by the upstream gateway after it has authenticated the caller
export const CALLER_ID_HEADER = 'X-Caller-Id';
export const CALLER_ROLE_HEADER = 'X-Caller-Role';
export const CALLER_TAGS_HEADER = 'X-Caller-Tags';

function isCallerRole(value: string): value is CallerRole {
  return value === 'admin' || value === 'member';
}

/**
 * Caller identity from the gateway headers, or null when the request carries none.
 */
export function resolveCaller(req: Request): CallerIdentity | null {
  const callerId = req.get(CALLER_ID_HEADER)?.trim();
  if (!callerId) {
    return null;
  }

  const role = (req.get(CALLER_ROLE_HEADER) || 'member').trim().toLowerCase();
  if (!isCallerRole(role)) {
    throw new ValidationError(`Unknown caller role '${role}'`);
  }

  return {
    callerId,
    role,
    tags: normalizeTags(req.get(CALLER_TAGS_HEADER) ?? '')
  };
}
