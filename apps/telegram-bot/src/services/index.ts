/**
 * Bot services over the local log, wired through one coordinator.
 */

import {
  ActionService,
  AdService,
  UpsertEngine,
  openLocalLog,
  type LocalLog,
} from '@adsync/core';
import type { Logger } from '@adsync/utils';
import type { SyncGateway } from '../lib/syncGatewayClient.js';
import { DualWriteCoordinator } from '../sync/dualWrite.js';
import { ActionLogger } from './actionLogger.js';
import { AdFeed } from './adFeed.js';
import { UserRegistry } from './userRegistry.js';

export interface BotServicesOptions {
  dataDir: string;
  adminIds: readonly number[];
  /** Null disables forwarding. */
  gateway: SyncGateway | null;
  forwardTimeoutMs: number;
  logger: Logger;
  now?: () => Date;
  newAdId?: () => string;
}

export interface BotServices {
  log: LocalLog;
  coordinator: DualWriteCoordinator;
  registry: UserRegistry;
  actions: ActionLogger;
  ads: AdFeed;
}

export function createBotServices(options: BotServicesOptions): BotServices {
  const { gateway, logger, now } = options;
  const log = openLocalLog(options.dataDir, logger);
  const engine = new UpsertEngine({ users: log.users, ads: log.ads }, { now, logger });
  const coordinator = new DualWriteCoordinator({
    syncEnabled: gateway !== null,
    forwardTimeoutMs: options.forwardTimeoutMs,
    logger,
  });

  const registry = new UserRegistry({
    log,
    engine,
    coordinator,
    gateway,
    adminIds: options.adminIds,
    lookupTimeoutMs: options.forwardTimeoutMs,
    now,
    logger,
  });

  return {
    log,
    coordinator,
    registry,
    actions: new ActionLogger(new ActionService(log.actions, now), coordinator, gateway, now),
    ads: new AdFeed({
      ads: new AdService(engine, log.ads),
      registry,
      coordinator,
      gateway,
      newId: options.newAdId,
    }),
  };
}

export { ActionLogger } from './actionLogger.js';
export { AdFeed, webAppCommandSchema, type WebAppCommand, type AdImportResult } from './adFeed.js';
export { UserRegistry } from './userRegistry.js';
export type { TelegramProfile } from './types.js';
