/**
 * Permission Evaluator
 *
 * Pure decision function for mutating ad operations. The bot calls it before
 * touching its local log and the gateway calls it again before touching the
 * database, so both sides must import this exact module.
 *
 * Rules, first match wins:
 *   1. admin                              → allow
 *   2. unrecognized role                  → deny
 *   3. create                             → allow (the creator becomes the owner)
 *   4. leasing_company, update | delete   → allow iff actor owns the target
 *   5. user, update | delete              → deny
 */

import { PermissionDeniedError } from './errors/index.js';
import { isUserRole } from './types/user.js';

export const AD_OPERATIONS = ['create', 'update', 'delete'] as const;
export type AdOperation = (typeof AD_OPERATIONS)[number];

export type PermissionDecision =
  | { effect: 'allow' }
  | { effect: 'deny'; reason: string };

const ALLOW: PermissionDecision = { effect: 'allow' };

function deny(reason: string): PermissionDecision {
  return { effect: 'deny', reason };
}

export function evaluate(
  actorRole: string,
  actorId: number,
  targetAuthorId: number | null,
  operation: AdOperation,
): PermissionDecision {
  if (actorRole === 'admin') {
    return ALLOW;
  }

  if (!isUserRole(actorRole)) {
    return deny(`unrecognized role "${actorRole}"`);
  }

  if (operation === 'create') {
    return ALLOW;
  }

  if (actorRole === 'leasing_company') {
    return targetAuthorId !== null && actorId === targetAuthorId
      ? ALLOW
      : deny('leasing_company can modify only own ads');
  }

  return deny('insufficient permissions');
}

/**
 * Evaluate and throw PermissionDeniedError on deny.
 */
export function assertAllowed(
  actorRole: string,
  actorId: number,
  targetAuthorId: number | null,
  operation: AdOperation,
): void {
  const decision = evaluate(actorRole, actorId, targetAuthorId, operation);
  if (decision.effect === 'deny') {
    throw new PermissionDeniedError(decision.reason, {
      actorId,
      actorRole,
      targetAuthorId,
      operation,
    });
  }
}

/**
 * Roles that may edit ads beyond their own creations.
 */
export function canManageAds(role: string): boolean {
  return role === 'admin' || role === 'leasing_company';
}
