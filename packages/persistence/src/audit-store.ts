/**
 * Audit Store
 *
 * Primary store for audit records. Writes are append-only: there is no
 * update or delete operation.
 *
 * `insert()` assigns record IDs (and timestamps the builder did not set),
 * groups the batch by category and issues one multi-row INSERT per table.
 * A batch is therefore visible all at once or not at all.
 *
 * After every successful insert the persisted records are handed to the
 * registered persist listeners. The mirror is one such listener, so every
 * write that goes through the store is mirrored without the writer having
 * to know about it. Listener failures are logged and never reach the writer.
 */

import {
	AuditWriteError,
	generateRecordId,
	type AuditRecord,
	type AuditRecordCategory,
	type FtpLog,
	type MirroredRecord,
	type NewAuditRecord,
	type OperateLog,
	type PasswordChangeLog,
	type UserLoginLog,
} from '@gatewarden/domain-core';
import { createComponentLogger, getLogger, type Logger } from '@gatewarden/logging';
import type { TransactionContext, TransactionManager, TransactionRunner } from './transaction.js';
import { operateLogs, type NewOperateLogRow } from './schema/operate-logs.js';
import { passwordChangeLogs, type NewPasswordChangeLogRow } from './schema/password-change-logs.js';
import { userLoginLogs, type NewUserLoginLogRow } from './schema/user-login-logs.js';
import { ftpLogs, type NewFtpLogRow } from './schema/ftp-logs.js';

/**
 * Called once per record after its insert succeeds. Inside a caller's
 * transaction that is before the commit, so a later rollback does not
 * retract what a listener already saw.
 */
export type PersistListener = (record: MirroredRecord) => void;

/**
 * Primary audit record store.
 */
export interface AuditStore<Tx = TransactionContext> extends TransactionRunner<Tx> {
	/**
	 * Persist a batch of records.
	 *
	 * @param records - Records to write; an empty batch writes nothing
	 * @param tx - Transaction of the triggering mutation, if any
	 * @returns The persisted records with IDs and timestamps assigned
	 * @throws AuditWriteError if the store rejects the batch
	 */
	insert(records: readonly NewAuditRecord[], tx?: Tx): Promise<AuditRecord[]>;
}

/**
 * Records of one batch, grouped by target table.
 */
export interface PartitionedRecords {
	readonly operation_log: OperateLog[];
	readonly password_change_log: PasswordChangeLog[];
	readonly login_log: UserLoginLog[];
	readonly ftp_log: FtpLog[];
}

/**
 * Assign the store-owned fields of a new record.
 */
export function assignIdentity(record: NewAuditRecord, now: Date): AuditRecord {
	return {
		...record,
		id: generateRecordId(record.category),
		datetime: record.datetime ?? now,
	};
}

/**
 * Group records by category, preserving batch order within each group.
 */
export function partitionRecords(records: readonly AuditRecord[]): PartitionedRecords {
	const partitioned: PartitionedRecords = {
		operation_log: [],
		password_change_log: [],
		login_log: [],
		ftp_log: [],
	};

	for (const record of records) {
		switch (record.category) {
			case 'operation_log':
				partitioned.operation_log.push(record);
				break;
			case 'password_change_log':
				partitioned.password_change_log.push(record);
				break;
			case 'login_log':
				partitioned.login_log.push(record);
				break;
			case 'ftp_log':
				partitioned.ftp_log.push(record);
				break;
		}
	}

	return partitioned;
}

/**
 * Distinct categories of a batch, in first-seen order.
 */
export function categoriesOf(records: readonly { readonly category: AuditRecordCategory }[]): AuditRecordCategory[] {
	return [...new Set(records.map((record) => record.category))];
}

/**
 * Deliver persisted records to listeners. A throwing listener is logged and
 * skipped; the remaining listeners still run.
 */
export function notifyPersisted(
	listeners: readonly PersistListener[],
	records: readonly MirroredRecord[],
	logger: Logger,
): void {
	for (const record of records) {
		for (const listener of listeners) {
			try {
				listener(record);
			} catch (error) {
				logger.error({ err: error, category: record.category, recordId: record.id }, 'Persist listener failed');
			}
		}
	}
}

/**
 * Configuration for the Drizzle audit store.
 */
export interface DrizzleAuditStoreConfig {
	/** Transaction manager for database operations */
	readonly transactionManager: TransactionManager;
	/** Listeners notified after each successful insert */
	readonly listeners?: readonly PersistListener[] | undefined;
	readonly logger?: Logger | undefined;
}

/**
 * Create a PostgreSQL-backed audit store.
 *
 * @example
 * ```typescript
 * const store = createDrizzleAuditStore({
 *     transactionManager: createTransactionManager(database.db),
 *     listeners: [mirror.persistListener],
 * });
 *
 * await store.insert([operateLog], tx);
 * ```
 */
export function createDrizzleAuditStore(config: DrizzleAuditStoreConfig): AuditStore {
	const { transactionManager } = config;
	const listeners = config.listeners ?? [];
	const logger = createComponentLogger(config.logger ?? getLogger(), 'audit-store');

	async function write(partitioned: PartitionedRecords, tx: TransactionContext): Promise<void> {
		if (partitioned.operation_log.length > 0) {
			await tx.db.insert(operateLogs).values(partitioned.operation_log.map(toOperateLogRow));
		}
		if (partitioned.password_change_log.length > 0) {
			await tx.db.insert(passwordChangeLogs).values(partitioned.password_change_log.map(toPasswordChangeLogRow));
		}
		if (partitioned.login_log.length > 0) {
			await tx.db.insert(userLoginLogs).values(partitioned.login_log.map(toUserLoginLogRow));
		}
		if (partitioned.ftp_log.length > 0) {
			await tx.db.insert(ftpLogs).values(partitioned.ftp_log.map(toFtpLogRow));
		}
	}

	return {
		async insert(records: readonly NewAuditRecord[], tx?: TransactionContext): Promise<AuditRecord[]> {
			if (records.length === 0) {
				return [];
			}

			const now = new Date();
			const persisted = records.map((record) => assignIdentity(record, now));
			const partitioned = partitionRecords(persisted);
			const categories = categoriesOf(persisted);

			try {
				if (tx) {
					await write(partitioned, tx);
				} else if (categories.length === 1) {
					// A single multi-row INSERT is atomic on its own
					await write(partitioned, { db: transactionManager.db });
				} else {
					await transactionManager.inTransaction((ownTx) => write(partitioned, ownTx));
				}
			} catch (error) {
				throw new AuditWriteError(categories, error);
			}

			logger.debug({ categories, count: persisted.length }, 'Audit records persisted');
			notifyPersisted(listeners, persisted, logger);
			return persisted;
		},

		inTransaction<T>(fn: (tx: TransactionContext) => Promise<T>): Promise<T> {
			return transactionManager.inTransaction(fn);
		},
	};
}

function toOperateLogRow(record: OperateLog): NewOperateLogRow {
	return {
		id: record.id,
		user: record.user,
		action: record.action,
		resourceType: record.resourceType,
		resource: record.resource,
		remoteAddr: record.remoteAddr,
		orgId: record.orgId,
		datetime: record.datetime,
	};
}

function toPasswordChangeLogRow(record: PasswordChangeLog): NewPasswordChangeLogRow {
	return {
		id: record.id,
		user: record.user,
		changeBy: record.changeBy,
		remoteAddr: record.remoteAddr,
		orgId: record.orgId,
		datetime: record.datetime,
	};
}

function toUserLoginLogRow(record: UserLoginLog): NewUserLoginLogRow {
	return {
		id: record.id,
		username: record.username,
		type: record.type,
		ip: record.ip,
		city: record.city,
		userAgent: record.userAgent,
		mfa: record.mfa,
		reason: record.reason,
		backend: record.backend,
		status: record.status,
		datetime: record.datetime,
	};
}

function toFtpLogRow(record: FtpLog): NewFtpLogRow {
	return {
		id: record.id,
		user: record.user,
		remoteAddr: record.remoteAddr,
		asset: record.asset,
		systemUser: record.systemUser,
		operate: record.operate,
		filename: record.filename,
		isSuccess: record.isSuccess,
		orgId: record.orgId,
		datetime: record.datetime,
	};
}
