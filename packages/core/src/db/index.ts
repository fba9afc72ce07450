/**
 * Database Layer Index
 */

export {
  openDatabase,
  closeDatabase,
  checkDatabaseHealth,
  type DatabaseConnection,
} from './client.js';

export {
  BaseRepository,
  type TableMapping,
  type SqlRow,
  type SqlValue,
} from './baseRepository.js';

export {
  UserRepository,
  AdItemRepository,
  UserActionRepository,
} from './repositories/index.js';
