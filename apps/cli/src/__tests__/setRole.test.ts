import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  closeDatabase,
  NotFoundError,
  openDatabase,
  UserRepository,
  ValidationError,
  type DatabaseConnection,
} from '@adsync/core';
import { setRole } from '../commands/setRole.js';
import { describeError } from '../lib/output.js';
import { makeUser, silentLogger } from './helpers.js';

describe('setRole', () => {
  let db: DatabaseConnection;
  let users: UserRepository;

  beforeEach(async () => {
    db = openDatabase(':memory:');
    users = new UserRepository(db);
    await users.upsert(makeUser());
  });

  afterEach(() => {
    closeDatabase(db);
  });

  it('widens the role of a known user', async () => {
    const user = await setRole(db, '42', 'admin', silentLogger);

    expect(user.role).toBe('admin');
    expect((await users.get(42))?.role).toBe('admin');
  });

  it('narrows the role too', async () => {
    await setRole(db, '42', 'leasing_company', silentLogger);

    await expect(setRole(db, '42', 'user', silentLogger)).resolves.toMatchObject({ role: 'user' });
  });

  it('fails for an unknown user', async () => {
    await expect(setRole(db, '7', 'admin', silentLogger)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('fails for an unknown role and leaves the user alone', async () => {
    const error = await setRole(db, '42', 'owner', silentLogger).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ValidationError);
    expect(describeError(error)).toBe(
      'ValidationFailed: Validation failed for role: role must be one of: user, leasing_company, admin',
    );
    expect((await users.get(42))?.role).toBe('user');
  });

  it('fails for a malformed telegram id', async () => {
    await expect(setRole(db, 'abc', 'admin', silentLogger)).rejects.toBeInstanceOf(ValidationError);
  });
});
