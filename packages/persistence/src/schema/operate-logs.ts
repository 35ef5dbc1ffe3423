/**
 * Operate Logs Schema
 *
 * One row per audited object mutation (create, update, delete, and
 * membership changes on tracked relations).
 */

import { pgTable, varchar, index } from 'drizzle-orm/pg-core';
import { recordIdColumn, orgIdColumn, timestampColumn } from './common.js';

export const operateLogs = pgTable(
	'audits_operate_logs',
	{
		id: recordIdColumn('id').primaryKey(),
		user: varchar('user', { length: 128 }).notNull(),
		action: varchar('action', { length: 16 }).notNull(),
		resourceType: varchar('resource_type', { length: 64 }).notNull(),
		resource: varchar('resource', { length: 128 }).notNull(),
		remoteAddr: varchar('remote_addr', { length: 128 }).notNull().default(''),
		orgId: orgIdColumn('org_id').notNull(),
		datetime: timestampColumn('datetime').notNull().defaultNow(),
	},
	(table) => [
		index('idx_operate_logs_datetime').on(table.datetime),
		index('idx_operate_logs_org').on(table.orgId, table.datetime),
		index('idx_operate_logs_user').on(table.user),
		index('idx_operate_logs_resource_type').on(table.resourceType),
	],
);

export type OperateLogRow = typeof operateLogs.$inferSelect;
export type NewOperateLogRow = typeof operateLogs.$inferInsert;
