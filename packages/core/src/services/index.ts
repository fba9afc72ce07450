/**
 * Gateway services over one SQLite connection.
 */

import type { DatabaseConnection } from '../db/client.js';
import {
  AdItemRepository,
  UserActionRepository,
  UserRepository,
} from '../db/repositories/index.js';
import type { Logger } from '@adsync/utils';
import { ActionService } from './actionService.js';
import { AdService } from './adService.js';
import { UpsertEngine } from './upsertEngine.js';
import { UserService } from './userService.js';

export interface GatewayServices {
  users: UserService;
  actions: ActionService;
  ads: AdService;
}

export interface GatewayServiceOptions {
  now?: () => Date;
  logger?: Logger;
}

export function createGatewayServices(
  db: DatabaseConnection,
  options: GatewayServiceOptions = {},
): GatewayServices & { engine: UpsertEngine } {
  const users = new UserRepository(db);
  const ads = new AdItemRepository(db);
  const actions = new UserActionRepository(db);
  const engine = new UpsertEngine({ users, ads }, options);

  return {
    engine,
    users: new UserService(engine, users),
    actions: new ActionService(actions, options.now),
    ads: new AdService(engine, ads),
  };
}
