/**
 * @gatewarden/domain-core
 *
 * Core types shared by the audit pipeline:
 * - Audit record variants (operate, password change, login, ftp, terminal)
 * - Explicit operation context (acting user, organization, request)
 * - Entity type/instance descriptors used by storage-layer hooks
 * - Field caps and code-point-safe truncation
 * - Time-sorted, prefixed record IDs
 * - Audit error types
 *
 * @example
 * ```typescript
 * import { OperationContext, Action, truncate, FieldLimits } from '@gatewarden/domain-core';
 *
 * const ctx = OperationContext.create({
 *     user: OperationContext.createUser('usr-1', 'bob'),
 *     org: { id: 'org-1', name: 'Default' },
 * });
 *
 * const resource = truncate(instance.display, FieldLimits.RESOURCE);
 * ```
 */

// Error types
export {
	AuditError,
	AuditFailure,
	AuditWriteError,
	type AuditErrorBase,
	type ConfigurationError,
	type InvalidRecordError,
	type PersistenceError,
} from './errors.js';

// Operation context
export {
	OperationContext,
	createMemorySession,
	type UserRef,
	type OrgRef,
	type RequestInfo,
	type RequestHeaders,
	type SessionState,
} from './operation-context.js';

// Entities
export { EntityType, CoreEntityTypes, type EntityInstance } from './entity.js';

// Records
export {
	Action,
	LoginType,
	MfaStatus,
	isAction,
	isLoginType,
	isMfaStatus,
	RecordCategory,
	DEFAULT_ORG_ID,
	type OperateLog,
	type PasswordChangeLog,
	type UserLoginLog,
	type FtpLog,
	type SessionLog,
	type CommandLog,
	type AuditRecord,
	type AuditRecordCategory,
	type TerminalRecord,
	type MirroredRecord,
	type NewRecord,
	type NewAuditRecord,
	type NewOperateLog,
	type NewPasswordChangeLog,
	type NewUserLoginLog,
	type NewFtpLog,
} from './records.js';

// Truncation
export { FieldLimits, truncate } from './truncate.js';

// Record IDs
export { RecordIdPrefix, generateRecordId, isRecordId } from './record-id.js';
