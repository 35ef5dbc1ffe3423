import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
	AuditWriteError,
	OperationContext,
	createMemorySession,
	type RequestInfo,
	type UserLoginLog,
} from '@gatewarden/domain-core';
import { createLogger, type Logger } from '@gatewarden/logging';
import { createInMemoryAuditStore, type InMemoryAuditStore } from '@gatewarden/persistence';
import {
	createAuthInterceptors,
	formatLoginTime,
	resolveLoginType,
	type AuthInterceptors,
	type AuthInterceptorsConfig,
} from '../auth-interceptors.js';
import { AuthBackend, initAuthBackendLabels, resetAuthBackendLabelsForTesting } from '../backend-labels.js';
import type { MemoryTransaction } from '@gatewarden/persistence';

const LOGIN_AT = new Date('2024-03-01T08:30:15.250Z');

function quietLogger(): Logger {
	const logger = createLogger({ level: 'fatal', serviceName: 'test' });
	vi.spyOn(logger, 'child').mockReturnValue(logger);
	return logger;
}

function webRequest(overrides: Parameters<typeof OperationContext.createRequest>[0] = {}): RequestInfo {
	return OperationContext.createRequest({
		headers: { 'user-agent': 'test-agent/1.0' },
		remoteAddress: '203.0.113.7',
		session: createMemorySession({ auth_backend: AuthBackend.MODEL }),
		...overrides,
	});
}

function loginLogs(store: InMemoryAuditStore): UserLoginLog[] {
	return store.byCategory().login_log;
}

describe('createAuthInterceptors', () => {
	let store: InMemoryAuditStore;
	let logger: Logger;

	function interceptors(overrides: Partial<AuthInterceptorsConfig<MemoryTransaction>> = {}): AuthInterceptors {
		return createAuthInterceptors({ store, logger, now: () => LOGIN_AT, ...overrides });
	}

	beforeEach(() => {
		logger = quietLogger();
		store = createInMemoryAuditStore({ logger });
		initAuthBackendLabels();
	});

	afterEach(() => {
		resetAuthBackendLabelsForTesting();
	});

	describe('onPasswordChanged', () => {
		const carol = OperationContext.createUser('usr-carol', 'carol');

		it('should attribute a change without context to the system', async () => {
			await interceptors().onPasswordChanged(null, carol);

			expect(store.byCategory().password_change_log).toEqual([
				expect.objectContaining({
					user: 'carol',
					changeBy: 'System',
					remoteAddr: '127.0.0.1',
				}),
			]);
		});

		it('should attribute a change to the acting user', async () => {
			const ctx = OperationContext.create({
				user: OperationContext.createUser('usr-bob', 'bob', { display: 'Bob(bob)' }),
				org: { id: 'org-1', name: 'Default' },
				request: webRequest(),
			});

			await interceptors().onPasswordChanged(ctx, carol);

			expect(store.byCategory().password_change_log).toEqual([
				expect.objectContaining({ user: 'carol', changeBy: 'Bob(bob)', remoteAddr: '203.0.113.7', orgId: 'org-1' }),
			]);
		});

		it('should attribute a self-service reset to the subject', async () => {
			const ctx = OperationContext.create({
				user: OperationContext.createUser('usr-anon', 'anonymous', { isAuthenticated: false }),
				request: webRequest(),
			});

			await interceptors().onPasswordChanged(ctx, carol);

			expect(store.byCategory().password_change_log[0]?.changeBy).toBe('carol');
		});

		it('should propagate write failures', async () => {
			store.failNextInsert(new Error('connection refused'));

			await expect(interceptors().onPasswordChanged(null, carol)).rejects.toBeInstanceOf(AuditWriteError);
			expect(store.all()).toHaveLength(0);
		});
	});

	describe('onAuthSuccess', () => {
		const erin = OperationContext.createUser('usr-erin', 'erin', { mfaEnabled: true });

		it('should record a successful web login', async () => {
			await interceptors({ lookupCity: () => 'Springfield' }).onAuthSuccess(erin, webRequest());

			expect(loginLogs(store)).toEqual([
				expect.objectContaining({
					username: 'erin',
					ip: '203.0.113.7',
					city: 'Springfield',
					type: 'W',
					userAgent: 'test-agent/1.0',
					mfa: 1,
					reason: '',
					backend: 'Password',
					status: true,
					datetime: LOGIN_AT,
				}),
			]);
		});

		it('should store the login time in the session', async () => {
			const request = webRequest();

			await interceptors().onAuthSuccess(erin, request);

			expect(request.session.get('login_time')).toBe('2024-03-01 08:30:15');
		});

		it('should record mfa as disabled for users without it', async () => {
			await interceptors().onAuthSuccess(OperationContext.createUser('usr-finn', 'finn'), webRequest());

			expect(loginLogs(store)[0]?.mfa).toBe(0);
		});

		it('should use an explicit login type', async () => {
			await interceptors().onAuthSuccess(erin, webRequest(), 'T');

			expect(loginLogs(store)[0]?.type).toBe('T');
		});

		it('should run the location check without waiting for it', async () => {
			const check = vi.fn(() => new Promise<void>(() => undefined));

			await interceptors({ checkUnusualLocation: check }).onAuthSuccess(erin, webRequest());

			expect(check).toHaveBeenCalledTimes(1);
			expect(loginLogs(store)).toHaveLength(1);
		});

		it('should log a failing location check and still records the login', async () => {
			const warn = vi.spyOn(logger, 'warn');
			const check = vi.fn(() => {
				throw new Error('geo service down');
			});

			await interceptors({ checkUnusualLocation: check }).onAuthSuccess(erin, webRequest());

			expect(loginLogs(store)).toHaveLength(1);
			expect(warn).toHaveBeenCalledWith(
				expect.objectContaining({ username: 'erin' }),
				'Unusual location check failed',
			);
		});

		it('should log a rejected location check', async () => {
			const warn = vi.spyOn(logger, 'warn');
			const check = vi.fn(() => Promise.reject(new Error('geo service down')));

			await interceptors({ checkUnusualLocation: check }).onAuthSuccess(erin, webRequest());
			await new Promise((resolve) => setImmediate(resolve));

			expect(loginLogs(store)).toHaveLength(1);
			expect(warn).toHaveBeenCalledWith(
				expect.objectContaining({ username: 'erin' }),
				'Unusual location check failed',
			);
		});

		it('should fall back to Unknown when the city lookup fails', async () => {
			const lookupCity = vi.fn(() => {
				throw new Error('no database');
			});

			await interceptors({ lookupCity }).onAuthSuccess(erin, webRequest());

			expect(loginLogs(store)[0]?.city).toBe('Unknown');
		});

		it('should use 0.0.0.0 when the request has no address', async () => {
			const lookupCity = vi.fn(() => 'Nowhere');

			await interceptors({ lookupCity }).onAuthSuccess(erin, webRequest({ remoteAddress: null }));

			expect(loginLogs(store)[0]?.ip).toBe('0.0.0.0');
			expect(lookupCity).toHaveBeenCalledWith('0.0.0.0');
		});

		it('should cut an invalid address and skips the city lookup', async () => {
			const lookupCity = vi.fn(() => 'Nowhere');
			const request = webRequest({ headers: { 'x-forwarded-for': 'not-an-address-at-all' } });

			await interceptors({ lookupCity }).onAuthSuccess(erin, request);

			expect(loginLogs(store)[0]?.ip).toBe('not-an-address-');
			expect(loginLogs(store)[0]?.city).toBe('Unknown');
			expect(lookupCity).not.toHaveBeenCalled();
		});

		it('should log a failed login-log write and still complete the login', async () => {
			const error = vi.spyOn(logger, 'error');
			const request = webRequest();
			store.failNextInsert(new Error('db down'));

			await expect(interceptors().onAuthSuccess(erin, request)).resolves.toBeUndefined();

			expect(loginLogs(store)).toEqual([]);
			expect(request.session.get('login_time')).toBe('2024-03-01 08:30:15');
			expect(error).toHaveBeenCalledWith(
				expect.objectContaining({ err: expect.any(AuditWriteError), username: 'erin', status: true }),
				'Failed to record login',
			);
		});

		it('should read the backend from the fallback session key', async () => {
			const request = webRequest({ session: createMemorySession({ _auth_user_backend: AuthBackend.LDAP }) });

			await interceptors().onAuthSuccess(erin, request);

			expect(loginLogs(store)[0]?.backend).toBe('LDAP');
		});
	});

	describe('onAuthFailed', () => {
		it('should record a failed login with the reason cut to 128 characters', async () => {
			const reason = 'r'.repeat(300);

			await interceptors().onAuthFailed('dave', webRequest(), reason);

			const [log] = loginLogs(store);
			expect(log?.status).toBe(false);
			expect(log?.reason).toBe('r'.repeat(128));
			expect(log?.mfa).toBe(2);
			expect(log?.username).toBe('dave');
		});

		it('should default the reason to empty', async () => {
			await interceptors().onAuthFailed('dave', webRequest());

			expect(loginLogs(store)[0]?.reason).toBe('');
		});

		it('should log a failed login-log write instead of throwing', async () => {
			const error = vi.spyOn(logger, 'error');
			store.failNextInsert(new Error('db down'));

			await expect(interceptors().onAuthFailed('dave', webRequest(), 'bad password')).resolves.toBeUndefined();

			expect(loginLogs(store)).toEqual([]);
			expect(error).toHaveBeenCalledWith(
				expect.objectContaining({ err: expect.any(AuditWriteError), username: 'dave', status: false }),
				'Failed to record login',
			);
		});

		it('should cut a long user agent to 255 characters', async () => {
			const request = webRequest({ headers: { 'user-agent': 'a'.repeat(400) } });

			await interceptors().onAuthFailed('dave', request);

			expect(loginLogs(store)[0]?.userAgent).toBe('a'.repeat(255));
		});
	});
});

describe('resolveLoginType', () => {
	it('should treat browser requests as web logins', () => {
		expect(resolveLoginType(OperationContext.createRequest())).toBe('W');
	});

	it('should read the login type header of API requests', () => {
		const request = OperationContext.createRequest({ isApi: true, headers: { 'x-jms-login-type': 'T' } });

		expect(resolveLoginType(request)).toBe('T');
	});

	it('should default API requests without the header to unknown', () => {
		expect(resolveLoginType(OperationContext.createRequest({ isApi: true }))).toBe('U');
	});

	it('should prefer an explicit type', () => {
		const request = OperationContext.createRequest({ isApi: true, headers: { 'x-jms-login-type': 'T' } });

		expect(resolveLoginType(request, 'W')).toBe('W');
	});
});

describe('formatLoginTime', () => {
	it('should format in UTC without fractions', () => {
		expect(formatLoginTime(new Date('2024-12-31T23:59:59.999Z'))).toBe('2024-12-31 23:59:59');
	});
});
