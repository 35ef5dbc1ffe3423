/**
 * In-Memory Audit Store
 *
 * AuditStore implementation for tests and local tooling. Records inserted
 * inside `inTransaction()` stay in a per-transaction buffer and become
 * visible only when the callback resolves; a rejected callback discards
 * them. Listeners are notified at insert time, as with the database store.
 */

import {
	AuditWriteError,
	type AuditRecord,
	type AuditRecordCategory,
	type NewAuditRecord,
} from '@gatewarden/domain-core';
import { createComponentLogger, getLogger, type Logger } from '@gatewarden/logging';
import {
	assignIdentity,
	categoriesOf,
	notifyPersisted,
	partitionRecords,
	type AuditStore,
	type PartitionedRecords,
	type PersistListener,
} from './audit-store.js';

/**
 * Transaction handle of the in-memory store.
 */
export interface MemoryTransaction {
	readonly id: number;
}

/**
 * In-memory store with read access for assertions.
 */
export interface InMemoryAuditStore extends AuditStore<MemoryTransaction> {
	/** Committed records, in insert order */
	all(): readonly AuditRecord[];
	/** Committed records grouped by category */
	byCategory(): PartitionedRecords;
	/** Number of insert() calls that wrote at least one record */
	readonly insertCount: number;
	/** Make the next insert() fail with the given error */
	failNextInsert(error: Error): void;
	clear(): void;
}

export interface InMemoryAuditStoreConfig {
	readonly listeners?: readonly PersistListener[] | undefined;
	readonly logger?: Logger | undefined;
}

/**
 * Create an in-memory audit store.
 */
export function createInMemoryAuditStore(config: InMemoryAuditStoreConfig = {}): InMemoryAuditStore {
	const listeners = config.listeners ?? [];
	const logger = createComponentLogger(config.logger ?? getLogger(), 'audit-store', { store: 'memory' });

	let committed: AuditRecord[] = [];
	const pending = new Map<number, AuditRecord[]>();
	let nextTransactionId = 1;
	let insertCount = 0;
	let nextFailure: Error | null = null;

	return {
		async insert(records: readonly NewAuditRecord[], tx?: MemoryTransaction): Promise<AuditRecord[]> {
			if (records.length === 0) {
				return [];
			}

			const categories: AuditRecordCategory[] = categoriesOf(records);

			if (nextFailure) {
				const failure = nextFailure;
				nextFailure = null;
				throw new AuditWriteError(categories, failure);
			}

			const target = tx ? pending.get(tx.id) : committed;
			if (!target) {
				throw new AuditWriteError(categories, new Error(`Transaction ${tx?.id ?? '?'} is not open`));
			}

			const now = new Date();
			const persisted = records.map((record) => assignIdentity(record, now));
			target.push(...persisted);
			insertCount++;

			notifyPersisted(listeners, persisted, logger);
			return persisted;
		},

		async inTransaction<T>(fn: (tx: MemoryTransaction) => Promise<T>): Promise<T> {
			const tx: MemoryTransaction = { id: nextTransactionId++ };
			const buffer: AuditRecord[] = [];
			pending.set(tx.id, buffer);

			try {
				const result = await fn(tx);
				committed.push(...buffer);
				return result;
			} finally {
				pending.delete(tx.id);
			}
		},

		all(): readonly AuditRecord[] {
			return [...committed];
		},

		byCategory(): PartitionedRecords {
			return partitionRecords(committed);
		},

		get insertCount(): number {
			return insertCount;
		},

		failNextInsert(error: Error): void {
			nextFailure = error;
		},

		clear(): void {
			committed = [];
			insertCount = 0;
			nextFailure = null;
		},
	};
}
