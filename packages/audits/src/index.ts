/**
 * @gatewarden/audits
 *
 * Event-capture side of the audit pipeline:
 * - Context resolver (actor, tenant, source IP)
 * - Relation-change mapper (tracked relations and their templates)
 * - Generic mutation interceptor (create/update/delete/relation changes)
 * - Authentication interceptors (password change, login success/failure)
 * - Record mirror (secondary log stream)
 *
 * @example
 * ```typescript
 * import { createAuditSubsystem } from '@gatewarden/audits';
 * import { loadAuditConfig } from '@gatewarden/config';
 *
 * const audit = createAuditSubsystem({ config: loadAuditConfig(), loadEntities });
 * await audit.auth.onAuthSuccess(user, request);
 * ```
 */

export { getRequestIp, resolveContext, type ResolvedContext } from './context-resolver.js';

export { TRACKED_RELATIONS, format, lookup, substitutionKey, type RelationTemplate } from './relation-mapper.js';

export {
	createMutationInterceptor,
	isLastLoginTouch,
	type EntityLoader,
	type MutationInterceptorConfig,
} from './mutation-interceptor.js';

export {
	AuthBackend,
	DEFAULT_SOURCE_BACKENDS,
	ensureAuthBackendLabels,
	initAuthBackendLabels,
	isAuthBackendLabelsInitialized,
	getAuthBackendLabel,
	resetAuthBackendLabelsForTesting,
	type AuthBackendLabelOptions,
} from './backend-labels.js';

export {
	createAuthInterceptors,
	formatLoginTime,
	resolveLoginType,
	getLoginBackend,
	AUTH_BACKEND_SESSION_KEY,
	FALLBACK_BACKEND_SESSION_KEY,
	LOGIN_TIME_SESSION_KEY,
	LOGIN_TYPE_HEADER,
	type AuthInterceptors,
	type AuthInterceptorsConfig,
	type CityLookup,
	type UnusualLocationCheck,
} from './auth-interceptors.js';

export {
	createRecordMirror,
	formatMirrorLine,
	serializeRecord,
	MIRRORED_CATEGORIES,
	type RecordMirror,
	type RecordMirrorConfig,
	type SerializedRecord,
} from './record-mirror.js';

export { createAuditSubsystem, type AuditSubsystem, type AuditSubsystemOptions } from './audit-subsystem.js';
