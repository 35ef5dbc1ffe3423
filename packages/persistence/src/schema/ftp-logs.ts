/**
 * FTP Logs Schema
 *
 * File transfers recorded by the file-transfer gateway.
 */

import { pgTable, varchar, boolean, index } from 'drizzle-orm/pg-core';
import { recordIdColumn, orgIdColumn, timestampColumn } from './common.js';

export const ftpLogs = pgTable(
	'audits_ftp_logs',
	{
		id: recordIdColumn('id').primaryKey(),
		user: varchar('user', { length: 128 }).notNull(),
		remoteAddr: varchar('remote_addr', { length: 128 }).notNull().default(''),
		asset: varchar('asset', { length: 1024 }).notNull(),
		systemUser: varchar('system_user', { length: 128 }).notNull(),
		operate: varchar('operate', { length: 16 }).notNull(),
		filename: varchar('filename', { length: 1024 }).notNull(),
		isSuccess: boolean('is_success').notNull().default(true),
		orgId: orgIdColumn('org_id').notNull(),
		datetime: timestampColumn('date_start').notNull().defaultNow(),
	},
	(table) => [
		index('idx_ftp_logs_date_start').on(table.datetime),
		index('idx_ftp_logs_org').on(table.orgId, table.datetime),
	],
);

export type FtpLogRow = typeof ftpLogs.$inferSelect;
export type NewFtpLogRow = typeof ftpLogs.$inferInsert;
