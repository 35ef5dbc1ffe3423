/**
 * Common Schema Definitions
 *
 * Shared column definitions used across the audit tables.
 */

import { varchar, timestamp } from 'drizzle-orm/pg-core';

/**
 * Record ID column - 17-character prefixed TSID.
 * Format: "{prefix}_{tsid}" (e.g., "opl_0HZXEQ5Y8JY5Z")
 */
export const recordIdColumn = (name: string) => varchar(name, { length: 17 });

/**
 * Organization (tenant) ID column. Organization IDs are UUID strings.
 */
export const orgIdColumn = (name: string) => varchar(name, { length: 36 });

/**
 * Standard timestamp column with timezone.
 */
export const timestampColumn = (name: string) => timestamp(name, { withTimezone: true, mode: 'date' });
