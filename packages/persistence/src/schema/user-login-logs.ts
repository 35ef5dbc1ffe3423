/**
 * User Login Logs Schema
 *
 * Authentication attempts. Not tenant-scoped: authentication happens before
 * an organization is selected.
 */

import { pgTable, varchar, boolean, smallint, index } from 'drizzle-orm/pg-core';
import { recordIdColumn, timestampColumn } from './common.js';

export const userLoginLogs = pgTable(
	'audits_user_login_logs',
	{
		id: recordIdColumn('id').primaryKey(),
		username: varchar('username', { length: 128 }).notNull(),
		type: varchar('type', { length: 2 }).notNull(),
		ip: varchar('ip', { length: 45 }).notNull(),
		city: varchar('city', { length: 254 }).notNull().default(''),
		userAgent: varchar('user_agent', { length: 255 }).notNull().default(''),
		mfa: smallint('mfa').notNull().default(2),
		reason: varchar('reason', { length: 128 }).notNull().default(''),
		backend: varchar('backend', { length: 32 }).notNull().default(''),
		status: boolean('status').notNull().default(true),
		datetime: timestampColumn('datetime').notNull().defaultNow(),
	},
	(table) => [
		index('idx_user_login_logs_datetime').on(table.datetime),
		index('idx_user_login_logs_username').on(table.username),
		index('idx_user_login_logs_status').on(table.status),
	],
);

export type UserLoginLogRow = typeof userLoginLogs.$inferSelect;
export type NewUserLoginLogRow = typeof userLoginLogs.$inferInsert;
