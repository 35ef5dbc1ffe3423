/**
 * Login Log Repository
 *
 * Read access to user login logs.
 */

import { and, asc, desc, eq, gte, lte, sql, type SQL } from 'drizzle-orm';
import { AuditError, AuditFailure, isLoginType, isMfaStatus, type UserLoginLog } from '@gatewarden/domain-core';
import { resolveDb, type AuditDatabase, type TransactionContext } from '../transaction.js';
import { userLoginLogs, type UserLoginLogRow } from '../schema/user-login-logs.js';
import type { DateRange, PagedRecords, PaginationOptions } from './pagination.js';

export interface LoginLogFilters extends DateRange {
	readonly username?: string | undefined;
	readonly status?: boolean | undefined;
	readonly type?: string | undefined;
}

export interface LoginLogRepository {
	findById(id: string, tx?: TransactionContext): Promise<UserLoginLog | undefined>;
	findPaged(
		filters: LoginLogFilters,
		pagination: PaginationOptions,
		tx?: TransactionContext,
	): Promise<PagedRecords<UserLoginLog>>;
	count(tx?: TransactionContext): Promise<number>;
}

export function loginLogConditions(filters: LoginLogFilters): SQL | undefined {
	const conditions: SQL[] = [];

	if (filters.username) {
		conditions.push(eq(userLoginLogs.username, filters.username));
	}
	if (filters.status !== undefined) {
		conditions.push(eq(userLoginLogs.status, filters.status));
	}
	if (filters.type) {
		conditions.push(eq(userLoginLogs.type, filters.type));
	}
	if (filters.from) {
		conditions.push(gte(userLoginLogs.datetime, filters.from));
	}
	if (filters.to) {
		conditions.push(lte(userLoginLogs.datetime, filters.to));
	}

	return conditions.length > 0 ? and(...conditions) : undefined;
}

/**
 * Create a login log repository.
 */
export function createLoginLogRepository(defaultDb: AuditDatabase): LoginLogRepository {
	const db = (tx?: TransactionContext): AuditDatabase => resolveDb(defaultDb, tx);

	return {
		async findById(id, tx) {
			const [row] = await db(tx).select().from(userLoginLogs).where(eq(userLoginLogs.id, id)).limit(1);
			return row ? rowToUserLoginLog(row) : undefined;
		},

		async findPaged(filters, pagination, tx) {
			const where = loginLogConditions(filters);
			const sortFn = pagination.sortOrder === 'asc' ? asc : desc;

			const [rows, countResult] = await Promise.all([
				db(tx)
					.select()
					.from(userLoginLogs)
					.where(where)
					.orderBy(sortFn(userLoginLogs.datetime))
					.limit(pagination.limit)
					.offset(pagination.offset),
				db(tx)
					.select({ count: sql<number>`count(*)` })
					.from(userLoginLogs)
					.where(where),
			]);

			return {
				records: rows.map(rowToUserLoginLog),
				total: Number(countResult[0]?.count ?? 0),
				limit: pagination.limit,
				offset: pagination.offset,
			};
		},

		async count(tx) {
			const [result] = await db(tx)
				.select({ count: sql<number>`count(*)` })
				.from(userLoginLogs);
			return Number(result?.count ?? 0);
		},
	};
}

export function rowToUserLoginLog(row: UserLoginLogRow): UserLoginLog {
	const { type, mfa } = row;
	if (!isLoginType(type) || !isMfaStatus(mfa)) {
		throw new AuditFailure(
			AuditError.invalidRecord('MALFORMED_LOGIN_LOG', 'Login log row has an unknown type or mfa value', {
				id: row.id,
				type,
				mfa,
			}),
		);
	}
	return {
		category: 'login_log',
		id: row.id,
		username: row.username,
		ip: row.ip,
		city: row.city,
		type,
		userAgent: row.userAgent,
		mfa,
		reason: row.reason,
		backend: row.backend,
		status: row.status,
		datetime: row.datetime,
	};
}
