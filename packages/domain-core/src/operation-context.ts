/**
 * Operation Context
 *
 * Per-operation state (acting user, organization, originating request) that
 * the request-handling layer builds and hands to every audit entry point.
 *
 * The context is an explicit value: nothing in the audit pipeline reads
 * thread-local or AsyncLocalStorage state. Background jobs and system tasks
 * pass `OperationContext.system()` (or `null`), which carries no user and no
 * request. The audit pipeline only reads the context; all fields are readonly.
 */

/**
 * The acting user as seen by the audit pipeline.
 */
export interface UserRef {
	/** User ID */
	readonly id: string;
	/** Login name */
	readonly username: string;
	/** Display form written into audit records, e.g. "Bob(bob)" */
	readonly display: string;
	/** False for anonymous/unauthenticated request users */
	readonly isAuthenticated: boolean;
	/** Whether multi-factor authentication is enabled for the user */
	readonly mfaEnabled: boolean;
}

/**
 * Organization (tenant) the operation runs in.
 */
export interface OrgRef {
	readonly id: string;
	readonly name: string;
}

/**
 * Header map as delivered by Node's HTTP layer (lower-case keys).
 */
export type RequestHeaders = Readonly<Record<string, string | readonly string[] | undefined>>;

/**
 * Session storage attached to a request. Owned by the session layer; the
 * login interceptor only records the login time into it.
 */
export interface SessionState {
	get(key: string): string | undefined;
	set(key: string, value: string): void;
}

/**
 * Network-level information about the originating request.
 */
export interface RequestInfo {
	readonly headers: RequestHeaders;
	/** Socket peer address, if known */
	readonly remoteAddress: string | null;
	/** True for REST API requests (token/API clients), false for browser views */
	readonly isApi: boolean;
	readonly session: SessionState;
}

/**
 * Context passed explicitly to every audit entry point.
 */
export interface OperationContext {
	readonly user: UserRef | null;
	readonly org: OrgRef | null;
	readonly request: RequestInfo | null;
}

/**
 * Simple Map-backed session, used by CLI tools and tests.
 */
export function createMemorySession(initial: Record<string, string> = {}): SessionState {
	const values = new Map<string, string>(Object.entries(initial));
	return {
		get(key) {
			return values.get(key);
		},
		set(key, value) {
			values.set(key, value);
		},
	};
}

/**
 * OperationContext factory functions.
 */
export const OperationContext = {
	/**
	 * Create a context for an operation.
	 */
	create(parts: { user?: UserRef | null; org?: OrgRef | null; request?: RequestInfo | null }): OperationContext {
		return {
			user: parts.user ?? null,
			org: parts.org ?? null,
			request: parts.request ?? null,
		};
	},

	/**
	 * Context for system-initiated work: no user, no request.
	 */
	system(org: OrgRef | null = null): OperationContext {
		return { user: null, org, request: null };
	},

	/**
	 * Check if the context has an authenticated user.
	 */
	isAuthenticated(ctx: OperationContext | null): boolean {
		return ctx?.user?.isAuthenticated === true;
	},

	/**
	 * Create a user reference.
	 *
	 * @example
	 * ```typescript
	 * const bob = OperationContext.createUser('usr-1', 'bob', { display: 'Bob(bob)' });
	 * ```
	 */
	createUser(
		id: string,
		username: string,
		options: { display?: string; isAuthenticated?: boolean; mfaEnabled?: boolean } = {},
	): UserRef {
		return {
			id,
			username,
			display: options.display ?? username,
			isAuthenticated: options.isAuthenticated ?? true,
			mfaEnabled: options.mfaEnabled ?? false,
		};
	},

	/**
	 * Create request information.
	 */
	createRequest(
		options: {
			headers?: RequestHeaders;
			remoteAddress?: string | null;
			isApi?: boolean;
			session?: SessionState;
		} = {},
	): RequestInfo {
		return {
			headers: options.headers ?? {},
			remoteAddress: options.remoteAddress ?? null,
			isApi: options.isApi ?? false,
			session: options.session ?? createMemorySession(),
		};
	},
};
