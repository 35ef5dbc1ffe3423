/**
 * Operate Log Repository
 *
 * Read access to operate logs. Audit records are written only through the
 * audit store; this repository never inserts, updates or deletes.
 */

import { and, asc, desc, eq, gte, lte, sql, type SQL } from 'drizzle-orm';
import { AuditError, AuditFailure, isAction, type OperateLog } from '@gatewarden/domain-core';
import { resolveDb, type AuditDatabase, type TransactionContext } from '../transaction.js';
import { operateLogs, type OperateLogRow } from '../schema/operate-logs.js';
import type { DateRange, PagedRecords, PaginationOptions } from './pagination.js';

/**
 * Filter options for operate log queries.
 */
export interface OperateLogFilters extends DateRange {
	readonly user?: string | undefined;
	readonly action?: string | undefined;
	readonly resourceType?: string | undefined;
	readonly orgId?: string | undefined;
}

export interface OperateLogRepository {
	findById(id: string, tx?: TransactionContext): Promise<OperateLog | undefined>;
	findPaged(
		filters: OperateLogFilters,
		pagination: PaginationOptions,
		tx?: TransactionContext,
	): Promise<PagedRecords<OperateLog>>;
	findDistinctResourceTypes(tx?: TransactionContext): Promise<string[]>;
	count(tx?: TransactionContext): Promise<number>;
}

/**
 * Build the WHERE clause for a filter set; undefined when nothing filters.
 */
export function operateLogConditions(filters: OperateLogFilters): SQL | undefined {
	const conditions: SQL[] = [];

	if (filters.user) {
		conditions.push(eq(operateLogs.user, filters.user));
	}
	if (filters.action) {
		conditions.push(eq(operateLogs.action, filters.action));
	}
	if (filters.resourceType) {
		conditions.push(eq(operateLogs.resourceType, filters.resourceType));
	}
	if (filters.orgId) {
		conditions.push(eq(operateLogs.orgId, filters.orgId));
	}
	if (filters.from) {
		conditions.push(gte(operateLogs.datetime, filters.from));
	}
	if (filters.to) {
		conditions.push(lte(operateLogs.datetime, filters.to));
	}

	return conditions.length > 0 ? and(...conditions) : undefined;
}

/**
 * Create an operate log repository.
 */
export function createOperateLogRepository(defaultDb: AuditDatabase): OperateLogRepository {
	const db = (tx?: TransactionContext): AuditDatabase => resolveDb(defaultDb, tx);

	return {
		async findById(id, tx) {
			const [row] = await db(tx).select().from(operateLogs).where(eq(operateLogs.id, id)).limit(1);
			return row ? rowToOperateLog(row) : undefined;
		},

		async findPaged(filters, pagination, tx) {
			const where = operateLogConditions(filters);
			const sortFn = pagination.sortOrder === 'asc' ? asc : desc;

			const [rows, countResult] = await Promise.all([
				db(tx)
					.select()
					.from(operateLogs)
					.where(where)
					.orderBy(sortFn(operateLogs.datetime))
					.limit(pagination.limit)
					.offset(pagination.offset),
				db(tx)
					.select({ count: sql<number>`count(*)` })
					.from(operateLogs)
					.where(where),
			]);

			return {
				records: rows.map(rowToOperateLog),
				total: Number(countResult[0]?.count ?? 0),
				limit: pagination.limit,
				offset: pagination.offset,
			};
		},

		async findDistinctResourceTypes(tx) {
			const results = await db(tx)
				.selectDistinct({ resourceType: operateLogs.resourceType })
				.from(operateLogs)
				.orderBy(operateLogs.resourceType);
			return results.map((r) => r.resourceType);
		},

		async count(tx) {
			const [result] = await db(tx)
				.select({ count: sql<number>`count(*)` })
				.from(operateLogs);
			return Number(result?.count ?? 0);
		},
	};
}

/**
 * Convert a database row to an OperateLog.
 */
export function rowToOperateLog(row: OperateLogRow): OperateLog {
	if (!isAction(row.action)) {
		throw new AuditFailure(
			AuditError.invalidRecord('UNKNOWN_ACTION', `Unknown operate log action: ${row.action}`, { id: row.id }),
		);
	}
	return {
		category: 'operation_log',
		id: row.id,
		user: row.user,
		action: row.action,
		resourceType: row.resourceType,
		resource: row.resource,
		remoteAddr: row.remoteAddr,
		orgId: row.orgId,
		datetime: row.datetime,
	};
}
