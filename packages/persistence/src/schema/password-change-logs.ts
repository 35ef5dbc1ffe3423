/**
 * Password Change Logs Schema
 */

import { pgTable, varchar, index } from 'drizzle-orm/pg-core';
import { recordIdColumn, orgIdColumn, timestampColumn } from './common.js';

export const passwordChangeLogs = pgTable(
	'audits_password_change_logs',
	{
		id: recordIdColumn('id').primaryKey(),
		user: varchar('user', { length: 128 }).notNull(),
		changeBy: varchar('change_by', { length: 128 }).notNull(),
		remoteAddr: varchar('remote_addr', { length: 128 }).notNull().default(''),
		orgId: orgIdColumn('org_id').notNull(),
		datetime: timestampColumn('datetime').notNull().defaultNow(),
	},
	(table) => [
		index('idx_password_change_logs_datetime').on(table.datetime),
		index('idx_password_change_logs_user').on(table.user),
	],
);

export type PasswordChangeLogRow = typeof passwordChangeLogs.$inferSelect;
export type NewPasswordChangeLogRow = typeof passwordChangeLogs.$inferInsert;
