/**
 * @adsync/core
 *
 * Synchronization and authorization core shared by the gateway, the bot
 * and the CLI:
 * - Domain types and error taxonomy
 * - Payload validation
 * - Store adapters (SQLite tables, JSON local log)
 * - Permission evaluator
 * - Upsert engine and bulk orchestrator
 */

// Types
export {
  USER_ROLES,
  ROLE_RANK,
  isUserRole,
  type UserRole,
  type TelegramUser,
} from './types/user.js';

export {
  AD_STATUSES,
  AD_SOURCE_TYPES,
  type AdStatus,
  type AdSourceType,
  type AdAuthor,
  type AdContent,
  type AdItem,
} from './types/ad.js';

export type { UserAction, UserActionInput } from './types/action.js';

// Errors
export {
  ERROR_KINDS,
  isErrorKind,
  AdSyncError,
  AuthenticationError,
  ValidationError,
  NotFoundError,
  PermissionDeniedError,
  StoreUnavailableError,
  toErrorResult,
  type ErrorKind,
  type ResultKind,
  type ErrorResult,
} from './errors/index.js';

// Validation
export {
  parseWith,
  parseUserPayload,
  parseRole,
  parseActionPayload,
  parseAdPayload,
  parseActor,
  splitActor,
  parseTelegramId,
  parseAdKey,
  parseAdUpdates,
  type UserInput,
  type ActionInput,
  type AdInput,
  type Actor,
  type AdContentPatch,
} from './validation/payloads.js';

// Permissions
export {
  AD_OPERATIONS,
  evaluate,
  assertAllowed,
  canManageAds,
  type AdOperation,
  type PermissionDecision,
} from './permissions.js';

// Stores
export {
  matchesFilter,
  type StoreAdapter,
  type RemovableStore,
  type AppendOnlyStore,
  type EntityFilter,
  type ListOptions,
  type UpsertResult,
} from './store/types.js';

export {
  JsonFileStore,
  JsonAppendLog,
  type JsonFileStoreOptions,
  type JsonAppendLogOptions,
} from './store/jsonFileStore.js';

export {
  openLocalLog,
  LOCAL_LOG_FILES,
  ACTION_LOG_LIMIT,
  type LocalLog,
} from './store/localLog.js';

// Database
export {
  openDatabase,
  closeDatabase,
  checkDatabaseHealth,
  BaseRepository,
  UserRepository,
  AdItemRepository,
  UserActionRepository,
  type DatabaseConnection,
  type TableMapping,
  type SqlRow,
  type SqlValue,
} from './db/index.js';

// Services
export {
  UpsertEngine,
  type UpsertOutcome,
  type EntityKind,
  type EntityMap,
  type UpsertStores,
  type UpsertEngineOptions,
  type RoleChange,
  type UpsertUserOptions,
  type UpsertAdOptions,
} from './services/upsertEngine.js';

export {
  bulkApply,
  bulkUpsert,
  summarizeBulk,
  type BulkItemOutcome,
  type BulkSummary,
} from './services/bulkUpsert.js';

export { UserService } from './services/userService.js';
export { ActionService } from './services/actionService.js';
export { AdService } from './services/adService.js';
export {
  createGatewayServices,
  type GatewayServices,
  type GatewayServiceOptions,
} from './services/index.js';
