/**
 * Authentication Interceptors
 *
 * Dedicated write paths for password changes and login attempts. These
 * records never go through the generic mutation interceptor.
 *
 * Only the password-change write propagates store failures; a failed
 * login-log write is logged and the login flow carries on.
 */

import { isIP } from 'node:net';
import {
	DEFAULT_ORG_ID,
	FieldLimits,
	LoginType,
	MfaStatus,
	isLoginType,
	truncate,
	type NewPasswordChangeLog,
	type NewUserLoginLog,
	type OperationContext,
	type RequestInfo,
	type UserRef,
} from '@gatewarden/domain-core';
import { createComponentLogger, getLogger, type Logger } from '@gatewarden/logging';
import type { AuditStore, TransactionContext } from '@gatewarden/persistence';
import { getRequestIp } from './context-resolver.js';
import { getAuthBackendLabel } from './backend-labels.js';

/** Session key holding the backend that authenticated the user */
export const AUTH_BACKEND_SESSION_KEY = 'auth_backend';
/** Session key the session layer sets for backend-based logins */
export const FALLBACK_BACKEND_SESSION_KEY = '_auth_user_backend';
/** Session key the login time is written to */
export const LOGIN_TIME_SESSION_KEY = 'login_time';
/** Header API clients use to state their login channel */
export const LOGIN_TYPE_HEADER = 'x-jms-login-type';

const SYSTEM_ACTOR = 'System';
const LOOPBACK_ADDR = '127.0.0.1';
const UNKNOWN_IP = '0.0.0.0';
const UNKNOWN_CITY = 'Unknown';

/**
 * Geo-velocity check run on every successful login. May be async; its
 * outcome is not awaited.
 */
export type UnusualLocationCheck = (user: UserRef, request: RequestInfo) => void | Promise<void>;

/**
 * Resolves a city name for an IP address.
 */
export type CityLookup = (ip: string) => string | null | undefined | Promise<string | null | undefined>;

export interface AuthInterceptorsConfig<Tx = TransactionContext> {
	readonly store: AuditStore<Tx>;
	readonly checkUnusualLocation?: UnusualLocationCheck | undefined;
	readonly lookupCity?: CityLookup | undefined;
	/** Tenant recorded on password changes outside any organization */
	readonly defaultOrgId?: string | undefined;
	readonly logger?: Logger | undefined;
	/** Clock; defaults to the system time */
	readonly now?: (() => Date) | undefined;
}

export interface AuthInterceptors {
	onPasswordChanged(ctx: OperationContext | null, subject: UserRef): Promise<void>;
	onAuthSuccess(user: UserRef, request: RequestInfo, loginType?: LoginType): Promise<void>;
	onAuthFailed(username: string, request: RequestInfo, reason?: string): Promise<void>;
}

/**
 * Format a login time as stored in the session: "YYYY-MM-DD HH:mm:ss" (UTC).
 */
export function formatLoginTime(date: Date): string {
	return date.toISOString().slice(0, 19).replace('T', ' ');
}

function header(request: RequestInfo, name: string): string | undefined {
	const value = request.headers[name];
	return typeof value === 'string' ? value : value?.[0];
}

/**
 * Login channel: an explicit type wins, API requests state theirs in a
 * header, everything else is a web login.
 */
export function resolveLoginType(request: RequestInfo, loginType?: LoginType): LoginType {
	if (loginType !== undefined) {
		return loginType;
	}
	if (!request.isApi) {
		return LoginType.WEB;
	}
	const declared = header(request, LOGIN_TYPE_HEADER);
	return declared !== undefined && isLoginType(declared) ? declared : LoginType.UNKNOWN;
}

/**
 * Backend label for the backend recorded in the request session.
 */
export function getLoginBackend(request: RequestInfo): string {
	const backend =
		request.session.get(AUTH_BACKEND_SESSION_KEY) || request.session.get(FALLBACK_BACKEND_SESSION_KEY) || '';
	return getAuthBackendLabel(backend);
}

/**
 * Create the authentication interceptors.
 *
 * @example
 * ```typescript
 * initAuthBackendLabels();
 * const auth = createAuthInterceptors({ store, lookupCity: geoip.city });
 * await auth.onAuthFailed('dave', request, 'Password incorrect');
 * ```
 */
export function createAuthInterceptors<Tx = TransactionContext>(config: AuthInterceptorsConfig<Tx>): AuthInterceptors {
	const { store, checkUnusualLocation, lookupCity } = config;
	const defaultOrgId = config.defaultOrgId ?? DEFAULT_ORG_ID;
	const now = config.now ?? (() => new Date());
	const logger = createComponentLogger(config.logger ?? getLogger(), 'auth-interceptors');

	function runLocationCheck(user: UserRef, request: RequestInfo): void {
		if (!checkUnusualLocation) {
			return;
		}
		const onError = (error: unknown) => {
			logger.warn({ err: error, username: user.username }, 'Unusual location check failed');
		};
		try {
			const pending = checkUnusualLocation(user, request);
			if (pending instanceof Promise) {
				void pending.catch(onError);
			}
		} catch (error) {
			onError(error);
		}
	}

	async function resolveCity(ip: string): Promise<string> {
		if (!lookupCity) {
			return UNKNOWN_CITY;
		}
		try {
			return (await lookupCity(ip)) || UNKNOWN_CITY;
		} catch (error) {
			logger.warn({ err: error, ip }, 'City lookup failed');
			return UNKNOWN_CITY;
		}
	}

	async function writeLoginLog(record: NewUserLoginLog): Promise<void> {
		try {
			await store.insert([record]);
		} catch (error) {
			logger.error({ err: error, username: record.username, status: record.status }, 'Failed to record login');
		}
	}

	async function loginData(
		username: string,
		request: RequestInfo,
		loginType: LoginType | undefined,
	): Promise<Omit<NewUserLoginLog, 'mfa' | 'status' | 'reason'> & { readonly datetime: Date }> {
		const requestIp = getRequestIp(request) || UNKNOWN_IP;
		const validIp = isIP(requestIp) !== 0;

		return {
			category: 'login_log',
			username,
			ip: validIp ? requestIp : truncate(requestIp, FieldLimits.INVALID_IP),
			city: validIp ? await resolveCity(requestIp) : UNKNOWN_CITY,
			type: resolveLoginType(request, loginType),
			userAgent: truncate(header(request, 'user-agent') ?? '', FieldLimits.USER_AGENT),
			backend: getLoginBackend(request),
			datetime: now(),
		};
	}

	return {
		async onPasswordChanged(ctx, subject) {
			const request = ctx?.request ?? null;
			let changeBy: string;
			let remoteAddr: string;

			if (!request) {
				changeBy = SYSTEM_ACTOR;
				remoteAddr = LOOPBACK_ADDR;
			} else {
				const actor = ctx?.user;
				remoteAddr = getRequestIp(request);
				changeBy = actor?.isAuthenticated ? actor.display : subject.display;
			}

			const record: NewPasswordChangeLog = {
				category: 'password_change_log',
				user: subject.display,
				changeBy,
				remoteAddr,
				orgId: ctx?.org?.id ?? defaultOrgId,
			};

			await store.inTransaction(async (tx) => {
				await store.insert([record], tx);
			});
		},

		async onAuthSuccess(user, request, loginType) {
			logger.debug({ username: user.username }, 'User login success');
			runLocationCheck(user, request);

			const data = await loginData(user.username, request, loginType);
			request.session.set(LOGIN_TIME_SESSION_KEY, formatLoginTime(data.datetime));

			await writeLoginLog({
				...data,
				mfa: user.mfaEnabled ? MfaStatus.ENABLED : MfaStatus.DISABLED,
				reason: '',
				status: true,
			});
		},

		async onAuthFailed(username, request, reason = '') {
			logger.debug({ username }, 'User login failed');

			const data = await loginData(username, request, undefined);

			await writeLoginLog({
				...data,
				mfa: MfaStatus.UNKNOWN,
				reason: truncate(reason, FieldLimits.REASON),
				status: false,
			});
		},
	};
}
