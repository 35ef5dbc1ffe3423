/**
 * Audit Error Types
 *
 * Errors raised by the audit pipeline fall into two groups:
 *
 * - `AuditError` values describe configuration and programming mistakes
 *   (an unknown record category, labels read before initialization). They
 *   are plain tagged objects so they can be logged and compared.
 * - `AuditWriteError` is thrown when the primary store rejects a write. It
 *   propagates to the caller of the triggering mutation and keeps the
 *   underlying driver error as `cause`.
 *
 * Mirroring and geo-check failures are never surfaced as errors; they are
 * logged where they happen.
 */

/**
 * Base interface for all audit errors.
 */
export interface AuditErrorBase {
	readonly type: string;
	readonly code: string;
	readonly message: string;
	readonly details: Record<string, unknown>;
}

/**
 * Invalid or missing configuration (environment, label mapping, registry).
 */
export interface ConfigurationError extends AuditErrorBase {
	readonly type: 'configuration';
}

/**
 * A record or notification that does not match the expected shape.
 */
export interface InvalidRecordError extends AuditErrorBase {
	readonly type: 'invalid_record';
}

/**
 * The primary store failed to persist a record batch.
 */
export interface PersistenceError extends AuditErrorBase {
	readonly type: 'persistence';
}

/**
 * Union type for all audit errors.
 */
export type AuditError = ConfigurationError | InvalidRecordError | PersistenceError;

/**
 * Factory functions for creating errors.
 */
export const AuditError = {
	/**
	 * @example
	 * ```typescript
	 * AuditError.configuration('BACKEND_LABELS_NOT_INITIALIZED', 'Call initAuthBackendLabels() at startup')
	 * ```
	 */
	configuration(code: string, message: string, details: Record<string, unknown> = {}): ConfigurationError {
		return { type: 'configuration', code, message, details };
	},

	invalidRecord(code: string, message: string, details: Record<string, unknown> = {}): InvalidRecordError {
		return { type: 'invalid_record', code, message, details };
	},

	persistence(code: string, message: string, details: Record<string, unknown> = {}): PersistenceError {
		return { type: 'persistence', code, message, details };
	},

	/**
	 * Check if an unknown value is an AuditError.
	 */
	isAuditError(value: unknown): value is AuditError {
		if (typeof value !== 'object' || value === null) return false;
		return (
			'type' in value &&
			typeof value.type === 'string' &&
			'code' in value &&
			typeof value.code === 'string' &&
			'message' in value &&
			typeof value.message === 'string' &&
			'details' in value &&
			typeof value.details === 'object'
		);
	},
};

/**
 * Thrown error carrying an AuditError payload.
 */
export class AuditFailure extends Error {
	readonly error: AuditError;

	constructor(error: AuditError) {
		super(error.message);
		this.name = 'AuditFailure';
		this.error = error;
	}

	get code(): string {
		return this.error.code;
	}
}

/**
 * Primary-store write failure. Propagates to the caller of the triggering
 * mutation, so the surrounding transaction rolls back.
 */
export class AuditWriteError extends Error {
	readonly categories: readonly string[];

	constructor(categories: readonly string[], cause: unknown) {
		const reason = cause instanceof Error ? cause.message : String(cause);
		super(`Failed to persist audit records (${categories.join(', ')}): ${reason}`, { cause });
		this.name = 'AuditWriteError';
		this.categories = categories;
	}

	toAuditError(): PersistenceError {
		return AuditError.persistence('AUDIT_WRITE_FAILED', this.message, { categories: [...this.categories] });
	}
}
