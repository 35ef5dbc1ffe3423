/**
 * Audit Record Types
 *
 * Every record carries a `category` tag. Code that needs to treat records
 * differently (table routing, mirroring) switches on the tag instead of
 * inspecting runtime types.
 *
 * Records are append-only: they are created once at event time and never
 * updated or deleted by the audit pipeline.
 */

/**
 * Operate log actions.
 */
export const Action = {
	CREATE: 'create',
	UPDATE: 'update',
	DELETE: 'delete',
} as const;

export type Action = (typeof Action)[keyof typeof Action];

export function isAction(value: string): value is Action {
	return value === Action.CREATE || value === Action.UPDATE || value === Action.DELETE;
}

/**
 * Channel a login came through.
 */
export const LoginType = {
	WEB: 'W',
	TERMINAL: 'T',
	UNKNOWN: 'U',
} as const;

export type LoginType = (typeof LoginType)[keyof typeof LoginType];

export function isLoginType(value: string): value is LoginType {
	return value === LoginType.WEB || value === LoginType.TERMINAL || value === LoginType.UNKNOWN;
}

/**
 * MFA flag stored on login logs. Failed logins do not know whether the
 * account has MFA, so they record UNKNOWN.
 */
export const MfaStatus = {
	DISABLED: 0,
	ENABLED: 1,
	UNKNOWN: 2,
} as const;

export type MfaStatus = (typeof MfaStatus)[keyof typeof MfaStatus];

export function isMfaStatus(value: number): value is MfaStatus {
	return value === MfaStatus.DISABLED || value === MfaStatus.ENABLED || value === MfaStatus.UNKNOWN;
}

/**
 * Record categories. The string values double as the prefix of mirrored
 * log lines.
 */
export const RecordCategory = {
	LOGIN_LOG: 'login_log',
	FTP_LOG: 'ftp_log',
	OPERATION_LOG: 'operation_log',
	PASSWORD_CHANGE_LOG: 'password_change_log',
	HOST_SESSION_LOG: 'host_session_log',
	SESSION_COMMAND_LOG: 'session_command_log',
} as const;

export type RecordCategory = (typeof RecordCategory)[keyof typeof RecordCategory];

/**
 * Organization used when an operation has no resolved tenant.
 */
export const DEFAULT_ORG_ID = '00000000-0000-0000-0000-000000000002';

/**
 * One row per audited object mutation.
 */
export interface OperateLog {
	readonly category: 'operation_log';
	readonly id: string;
	/** Acting user (display form) */
	readonly user: string;
	readonly action: Action;
	readonly resourceType: string;
	/** At most 128 characters */
	readonly resource: string;
	readonly remoteAddr: string;
	readonly orgId: string;
	readonly datetime: Date;
}

/**
 * One row per password change.
 */
export interface PasswordChangeLog {
	readonly category: 'password_change_log';
	readonly id: string;
	/** User whose password changed */
	readonly user: string;
	/** Who changed it ("System" for system-initiated changes) */
	readonly changeBy: string;
	readonly remoteAddr: string;
	readonly orgId: string;
	readonly datetime: Date;
}

/**
 * One row per authentication attempt. Not tenant-scoped: authentication
 * happens before an organization is selected.
 */
export interface UserLoginLog {
	readonly category: 'login_log';
	readonly id: string;
	readonly username: string;
	readonly ip: string;
	readonly city: string;
	readonly type: LoginType;
	/** At most 255 characters */
	readonly userAgent: string;
	readonly mfa: MfaStatus;
	/** At most 128 characters; empty on success */
	readonly reason: string;
	/** Auth backend label, e.g. "Password" */
	readonly backend: string;
	readonly status: boolean;
	readonly datetime: Date;
}

/**
 * One row per file transfer, written by the file-transfer gateway.
 */
export interface FtpLog {
	readonly category: 'ftp_log';
	readonly id: string;
	readonly user: string;
	readonly remoteAddr: string;
	readonly asset: string;
	readonly systemUser: string;
	readonly operate: string;
	readonly filename: string;
	readonly isSuccess: boolean;
	readonly orgId: string;
	/** Transfer start */
	readonly datetime: Date;
}

/**
 * Terminal session, persisted by the terminal layer and mirrored here.
 */
export interface SessionLog {
	readonly category: 'host_session_log';
	readonly id: string;
	readonly user: string;
	readonly asset: string;
	readonly systemUser: string;
	readonly loginFrom: string;
	readonly remoteAddr: string;
	readonly protocol: string;
	readonly isFinished: boolean;
	readonly dateStart: Date;
	readonly dateEnd: Date | null;
	readonly orgId: string;
}

/**
 * Terminal command, persisted by the terminal layer and mirrored here.
 */
export interface CommandLog {
	readonly category: 'session_command_log';
	readonly id: string;
	readonly user: string;
	readonly asset: string;
	readonly systemUser: string;
	readonly input: string;
	readonly output: string;
	readonly session: string;
	readonly riskLevel: number;
	/** Seconds since epoch */
	readonly timestamp: number;
	readonly orgId: string;
}

/**
 * Records owned and persisted by the audit store.
 */
export type AuditRecord = OperateLog | PasswordChangeLog | UserLoginLog | FtpLog;

export type AuditRecordCategory = AuditRecord['category'];

/**
 * Records persisted elsewhere but still mirrored.
 */
export type TerminalRecord = SessionLog | CommandLog;

/**
 * Every record shape the mirror can serialize.
 */
export type MirroredRecord = AuditRecord | TerminalRecord;

/**
 * Input shape for a record: the store assigns `id`, and `datetime` when the
 * builder did not set one.
 */
export type NewRecord<T extends AuditRecord> = T extends AuditRecord
	? Omit<T, 'id' | 'datetime'> & { readonly datetime?: Date | undefined }
	: never;

export type NewAuditRecord = NewRecord<AuditRecord>;
export type NewOperateLog = NewRecord<OperateLog>;
export type NewPasswordChangeLog = NewRecord<PasswordChangeLog>;
export type NewUserLoginLog = NewRecord<UserLoginLog>;
export type NewFtpLog = NewRecord<FtpLog>;
