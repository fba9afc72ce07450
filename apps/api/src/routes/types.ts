import type { ActionService, AdService, UserService } from '@adsync/core';

/**
 * What the routes need from the sync core. Routes see only these methods,
 * so tests can hand in stand-ins.
 */
export interface SyncServices {
  users: Pick<UserService, 'upsert' | 'getRole'>;
  actions: Pick<ActionService, 'record'>;
  ads: Pick<AdService, 'upsert' | 'bulkUpsert' | 'update' | 'delete'>;
}

export interface SyncRouteOptions {
  services: SyncServices;
}
