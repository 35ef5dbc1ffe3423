/**
 * Record Mirror
 *
 * Writes a flat JSON copy of every persisted audit record (and of terminal
 * sessions and commands) to the secondary log stream, one line per record:
 *
 *   login_log - {"id":"lgl_...","username":"dave",...}
 *
 * Registered on the audit store as a persist listener, so every record that
 * goes through the store is mirrored. Mirror failures are logged and never
 * affect the primary write.
 */

import type { MirroredRecord, RecordCategory } from '@gatewarden/domain-core';
import { createComponentLogger, getLogger, type Logger, type SecondaryLogAppender } from '@gatewarden/logging';
import type { PersistListener } from '@gatewarden/persistence';

/**
 * Categories written to the secondary log.
 */
export const MIRRORED_CATEGORIES: readonly RecordCategory[] = [
	'login_log',
	'ftp_log',
	'operation_log',
	'password_change_log',
	'host_session_log',
	'session_command_log',
];

export type SerializedRecord = Record<string, string | number | boolean | null>;

const iso = (date: Date): string => date.toISOString();

/**
 * Flat, snake_case form of a record.
 */
export function serializeRecord(record: MirroredRecord): SerializedRecord {
	switch (record.category) {
		case 'login_log':
			return {
				id: record.id,
				username: record.username,
				type: record.type,
				ip: record.ip,
				city: record.city,
				user_agent: record.userAgent,
				mfa: record.mfa,
				reason: record.reason,
				backend: record.backend,
				status: record.status,
				datetime: iso(record.datetime),
			};
		case 'ftp_log':
			return {
				id: record.id,
				user: record.user,
				remote_addr: record.remoteAddr,
				asset: record.asset,
				system_user: record.systemUser,
				operate: record.operate,
				filename: record.filename,
				is_success: record.isSuccess,
				date_start: iso(record.datetime),
				org_id: record.orgId,
			};
		case 'operation_log':
			return {
				id: record.id,
				user: record.user,
				action: record.action,
				resource_type: record.resourceType,
				resource: record.resource,
				remote_addr: record.remoteAddr,
				datetime: iso(record.datetime),
				org_id: record.orgId,
			};
		case 'password_change_log':
			return {
				id: record.id,
				user: record.user,
				change_by: record.changeBy,
				remote_addr: record.remoteAddr,
				datetime: iso(record.datetime),
				org_id: record.orgId,
			};
		case 'host_session_log':
			return {
				id: record.id,
				user: record.user,
				asset: record.asset,
				system_user: record.systemUser,
				login_from: record.loginFrom,
				remote_addr: record.remoteAddr,
				protocol: record.protocol,
				is_finished: record.isFinished,
				date_start: iso(record.dateStart),
				date_end: record.dateEnd ? iso(record.dateEnd) : null,
				org_id: record.orgId,
			};
		case 'session_command_log':
			return {
				id: record.id,
				user: record.user,
				asset: record.asset,
				system_user: record.systemUser,
				input: record.input,
				output: record.output,
				session: record.session,
				risk_level: record.riskLevel,
				timestamp: record.timestamp,
				org_id: record.orgId,
			};
	}
}

/**
 * Secondary log line for a record.
 */
export function formatMirrorLine(record: MirroredRecord): string {
	return `${record.category} - ${JSON.stringify(serializeRecord(record))}`;
}

export interface RecordMirror {
	mirror(record: MirroredRecord): void;
	/** Listener to register on the audit store */
	readonly persistListener: PersistListener;
}

export interface RecordMirrorConfig {
	readonly appender: SecondaryLogAppender;
	/** When false, mirror() does nothing */
	readonly enabled?: boolean | undefined;
	readonly logger?: Logger | undefined;
}

/**
 * Create the mirror.
 *
 * @example
 * ```typescript
 * const mirror = createRecordMirror({ appender: createSecondaryLogAppender({ destination: 'stdout' }) });
 * const store = createDrizzleAuditStore({ transactionManager, listeners: [mirror.persistListener] });
 *
 * // Terminal sessions are persisted elsewhere and mirrored directly
 * mirror.mirror(sessionLog);
 * ```
 */
export function createRecordMirror(config: RecordMirrorConfig): RecordMirror {
	const { appender } = config;
	const enabled = config.enabled ?? true;
	const logger = createComponentLogger(config.logger ?? getLogger(), 'record-mirror');

	function mirror(record: MirroredRecord): void {
		if (!enabled) {
			return;
		}
		try {
			appender.append(formatMirrorLine(record));
		} catch (error) {
			logger.error({ err: error, category: record.category, recordId: record.id }, 'Failed to mirror audit record');
		}
	}

	return {
		mirror,
		persistListener: mirror,
	};
}
