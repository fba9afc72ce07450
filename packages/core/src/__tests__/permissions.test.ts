import { describe, it, expect } from 'vitest';
import { AD_OPERATIONS, assertAllowed, evaluate, type AdOperation } from '../permissions.js';
import { PermissionDeniedError } from '../errors/index.js';

const ACTOR_ID = 5;

type Case = [role: string, target: number | null, operation: AdOperation, allowed: boolean];

const matrix: Case[] = [
  // admin: everything
  ...AD_OPERATIONS.flatMap((operation): Case[] => [
    ['admin', 5, operation, true],
    ['admin', 7, operation, true],
    ['admin', null, operation, true],
  ]),
  // create: any recognized role
  ['leasing_company', null, 'create', true],
  ['user', null, 'create', true],
  // leasing_company: own ads only
  ['leasing_company', 5, 'update', true],
  ['leasing_company', 5, 'delete', true],
  ['leasing_company', 7, 'update', false],
  ['leasing_company', 7, 'delete', false],
  ['leasing_company', null, 'update', false],
  ['leasing_company', null, 'delete', false],
  // user: never update or delete, not even own ads
  ['user', 5, 'update', false],
  ['user', 5, 'delete', false],
  ['user', 7, 'update', false],
  ['user', 7, 'delete', false],
  // unrecognized roles fail closed
  ...AD_OPERATIONS.flatMap((operation): Case[] => [
    ['guest', 5, operation, false],
    ['Admin', 5, operation, false],
    ['', null, operation, false],
  ]),
];

describe('evaluate', () => {
  it.each(matrix)('%s on author %s, %s → allowed=%s', (role, target, operation, allowed) => {
    const decision = evaluate(role, ACTOR_ID, target, operation);
    expect(decision.effect).toBe(allowed ? 'allow' : 'deny');
  });

  it('names the unrecognized role in the deny reason', () => {
    expect(evaluate('guest', ACTOR_ID, null, 'create')).toEqual({
      effect: 'deny',
      reason: 'unrecognized role "guest"',
    });
  });

  it('explains leasing_company denials by ownership', () => {
    expect(evaluate('leasing_company', 5, 7, 'delete')).toEqual({
      effect: 'deny',
      reason: 'leasing_company can modify only own ads',
    });
  });

  it('denies plain users with a generic reason', () => {
    expect(evaluate('user', 42, 42, 'update')).toEqual({
      effect: 'deny',
      reason: 'insufficient permissions',
    });
  });
});

describe('assertAllowed', () => {
  it('returns quietly on allow', () => {
    expect(() => assertAllowed('leasing_company', 5, 5, 'update')).not.toThrow();
  });

  it('throws PermissionDeniedError carrying the decision inputs', () => {
    try {
      assertAllowed('leasing_company', 5, 7, 'delete');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(PermissionDeniedError);
      expect(error).toMatchObject({
        kind: 'PermissionDenied',
        statusCode: 403,
        reason: 'leasing_company can modify only own ads',
        details: { actorId: 5, actorRole: 'leasing_company', targetAuthorId: 7, operation: 'delete' },
      });
    }
  });
});
