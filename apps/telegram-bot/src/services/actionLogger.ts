import type { ActionService, UserAction } from '@adsync/core';
import type { SyncGateway } from '../lib/syncGatewayClient.js';
import type { DualWriteCoordinator } from '../sync/dualWrite.js';
import { profileFields, type TelegramProfile } from './types.js';

/**
 * Records what users do with the bot, locally and on the backend.
 */
export class ActionLogger {
  constructor(
    private readonly actions: ActionService,
    private readonly coordinator: DualWriteCoordinator,
    private readonly gateway: SyncGateway | null,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async record(profile: TelegramProfile, action: string, details = ''): Promise<UserAction> {
    const payload = {
      ...profileFields(profile),
      action,
      details,
      timestamp: this.now().toISOString(),
    };

    return this.coordinator.write(
      `action ${action} by ${profile.id}`,
      () => this.actions.record(payload),
      async () => this.gateway?.recordAction(payload),
    );
  }
}
