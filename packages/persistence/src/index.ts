/**
 * @gatewarden/persistence
 *
 * Storage for audit records using DrizzleORM over postgres.js.
 *
 * Key components:
 * - Database connection and transaction management
 * - AuditStore: append-only record store (Drizzle and in-memory)
 * - Mutation hooks: decorators that report entity and relation changes
 * - Read-only query repositories for operate and login logs
 * - Table definitions for the audit tables
 *
 * @example
 * ```typescript
 * import {
 *     createDatabase,
 *     createTransactionManager,
 *     createDrizzleAuditStore,
 *     withMutationHooks,
 * } from '@gatewarden/persistence';
 *
 * const database = createDatabase({ url: config.database.url });
 * const transactionManager = createTransactionManager(database.db);
 * const store = createDrizzleAuditStore({ transactionManager, listeners: [mirror.persistListener] });
 *
 * const users = withMutationHooks(userStore, interceptor, transactionManager);
 * await users.save(ctx, user);
 * ```
 */

// Database connection
export { createDatabase, type Database, type DatabaseConfig } from './connection.js';

// Transaction management
export {
	createTransactionManager,
	resolveDb,
	type AuditDatabase,
	type TransactionContext,
	type TransactionManager,
	type TransactionRunner,
} from './transaction.js';

// Audit store
export {
	createDrizzleAuditStore,
	assignIdentity,
	partitionRecords,
	categoriesOf,
	notifyPersisted,
	type AuditStore,
	type DrizzleAuditStoreConfig,
	type PartitionedRecords,
	type PersistListener,
} from './audit-store.js';
export {
	createInMemoryAuditStore,
	type InMemoryAuditStore,
	type InMemoryAuditStoreConfig,
	type MemoryTransaction,
} from './in-memory-audit-store.js';

// Mutation hooks
export {
	withMutationHooks,
	withRelationHooks,
	type MutationHooks,
	type SavedNotification,
	type RelationAction,
	type RelationChange,
	type SaveOptions,
	type SaveOutcome,
	type EntityStore,
	type HookedEntityStore,
	type RelationOwner,
	type RelationStore,
	type HookedRelationStore,
} from './mutation-hooks.js';

// Query repositories
export { type PaginationOptions, type DateRange, type PagedRecords } from './repositories/pagination.js';
export {
	createOperateLogRepository,
	operateLogConditions,
	rowToOperateLog,
	type OperateLogFilters,
	type OperateLogRepository,
} from './repositories/operate-log-repository.js';
export {
	createLoginLogRepository,
	loginLogConditions,
	rowToUserLoginLog,
	type LoginLogFilters,
	type LoginLogRepository,
} from './repositories/login-log-repository.js';

// Schema definitions
export * from './schema/index.js';
