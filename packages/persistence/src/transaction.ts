/**
 * Transaction Management
 *
 * An audit write and the mutation that triggered it share one transaction:
 * if the audit insert fails, the mutation rolls back with it.
 */

import type { PgDatabase } from 'drizzle-orm/pg-core';
import type { PostgresJsQueryResultHKT } from 'drizzle-orm/postgres-js';

/**
 * Database handle accepted by audit queries: the pooled database or a
 * transaction opened on it.
 */
export type AuditDatabase = PgDatabase<PostgresJsQueryResultHKT>;

/**
 * Transaction context passed to store and repository operations.
 */
export interface TransactionContext {
	/** DrizzleORM database instance scoped to this transaction */
	readonly db: AuditDatabase;
}

/**
 * Anything that can open a transaction of type `Tx`.
 *
 * The drizzle transaction manager and the in-memory audit store both
 * implement it, so storage hooks work against either.
 */
export interface TransactionRunner<Tx = TransactionContext> {
	/**
	 * Execute a function within a transaction.
	 * If the function throws, the transaction is rolled back and the error re-thrown.
	 */
	inTransaction<T>(fn: (tx: Tx) => Promise<T>): Promise<T>;
}

/**
 * Transaction manager over a DrizzleORM database.
 */
export interface TransactionManager extends TransactionRunner<TransactionContext> {
	/**
	 * Database instance for non-transactional queries.
	 */
	readonly db: AuditDatabase;
}

/**
 * Create a transaction manager from a DrizzleORM database instance.
 */
export function createTransactionManager(db: AuditDatabase): TransactionManager {
	return {
		db,
		async inTransaction<T>(fn: (tx: TransactionContext) => Promise<T>): Promise<T> {
			return db.transaction(async (tx) => fn({ db: tx }));
		},
	};
}

/**
 * Resolve the database instance from a transaction context or fall back to default.
 */
export function resolveDb(defaultDb: AuditDatabase, tx?: TransactionContext): AuditDatabase {
	return tx?.db ?? defaultDb;
}
