/**
 * User Registry
 *
 * Registers users who share their contact and resolves the role the bot
 * acts with. Role sources, first hit wins: configured admin ids, the
 * gateway (best effort), the local log, then `user`.
 */

import {
  UpsertEngine,
  type LocalLog,
  type TelegramUser,
  type UpsertOutcome,
  type UserRole,
} from '@adsync/core';
import { withTimeout, type Logger } from '@adsync/utils';
import type { SyncGateway } from '../lib/syncGatewayClient.js';
import type { DualWriteCoordinator } from '../sync/dualWrite.js';
import { profileFields, type TelegramProfile } from './types.js';

export interface UserRegistryOptions {
  log: LocalLog;
  engine: UpsertEngine;
  coordinator: DualWriteCoordinator;
  /** Absent when sync is disabled. */
  gateway: SyncGateway | null;
  adminIds: readonly number[];
  lookupTimeoutMs: number;
  now?: () => Date;
  logger: Logger;
}

export class UserRegistry {
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(private readonly options: UserRegistryOptions) {
    this.now = options.now ?? (() => new Date());
    this.log = options.logger.child({ component: 'user-registry' });
  }

  isAdmin(telegramId: number): boolean {
    return this.options.adminIds.includes(telegramId);
  }

  /**
   * Role for permission checks on this side, asked before every mutation.
   * A role the gateway reports replaces the one in the local log, so
   * promotions and demotions made there apply here too.
   */
  async currentRole(telegramId: number): Promise<UserRole> {
    if (this.isAdmin(telegramId)) {
      return 'admin';
    }

    const remote = await this.lookupRemoteRole(telegramId);
    const stored = await this.options.log.users.get(telegramId);
    if (!remote) {
      return stored?.role ?? 'user';
    }

    if (stored && stored.role !== remote) {
      await this.options.log.users.upsert({ ...stored, role: remote, updatedAt: this.now() });
      this.log.info({ telegramId, from: stored.role, to: remote }, 'Local role refreshed from gateway');
    }
    return remote;
  }

  async resolveRole(telegramId: number): Promise<UserRole> {
    if (this.isAdmin(telegramId)) {
      return 'admin';
    }

    const remote = await this.lookupRemoteRole(telegramId);
    if (remote) {
      return remote;
    }

    const stored = await this.options.log.users.get(telegramId);
    return stored?.role ?? 'user';
  }

  /**
   * Store the user locally with the resolved role and forward the
   * registration.
   */
  async register(profile: TelegramProfile, phoneNumber: string): Promise<UpsertOutcome<TelegramUser>> {
    const role = await this.resolveRole(profile.id);
    const payload = {
      ...profileFields(profile),
      language_code: profile.language_code ?? '',
      phone_number: phoneNumber,
      role,
      is_authenticated: true,
      authenticated_at: this.now().toISOString(),
    };

    return this.options.coordinator.write(
      `user upsert ${profile.id}`,
      () => this.options.engine.upsertUser(payload, { roleChange: 'explicit' }),
      () => this.forward((gateway) => gateway.upsertUser(payload)),
    );
  }

  private async lookupRemoteRole(telegramId: number): Promise<UserRole | null> {
    const { gateway, lookupTimeoutMs } = this.options;
    if (!gateway) {
      return null;
    }

    try {
      return await withTimeout(gateway.getUserRole(telegramId), lookupTimeoutMs, 'Role lookup');
    } catch (error) {
      this.log.warn({ telegramId, err: error }, 'Role lookup failed, falling back to local log');
      return null;
    }
  }

  private async forward<T>(send: (gateway: SyncGateway) => Promise<T>): Promise<T | undefined> {
    return this.options.gateway ? send(this.options.gateway) : undefined;
  }
}
