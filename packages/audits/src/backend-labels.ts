/**
 * Auth Backend Labels
 *
 * Maps authentication backend identifiers to the label stored on login logs.
 * Built once at startup by `initAuthBackendLabels()` and read-only afterwards.
 * Labels are always the English ones so stored text does not depend on the
 * caller's locale.
 */

import { AuditError, AuditFailure } from '@gatewarden/domain-core';

/**
 * Backend identifiers known to the platform.
 */
export const AuthBackend = {
	LDAP: 'ldap',
	OIDC_PASSWORD: 'oidc-password',
	OIDC_CODE: 'oidc-code',
	CAS: 'cas',
	SAML2: 'saml2',
	OAUTH2: 'oauth2',
	RADIUS: 'radius',
	PUBKEY: 'pubkey',
	MODEL: 'password',
	SSO: 'sso',
	AUTH_TOKEN: 'auth-token',
	WECOM: 'wecom',
	FEISHU: 'feishu',
	DINGTALK: 'dingtalk',
	TEMP_TOKEN: 'temp-token',
} as const;

export type AuthBackend = (typeof AuthBackend)[keyof typeof AuthBackend];

/**
 * User sources and the backends that authenticate them.
 */
export const DEFAULT_SOURCE_BACKENDS: Readonly<Record<string, readonly string[]>> = {
	LDAP: [AuthBackend.LDAP],
	OpenID: [AuthBackend.OIDC_PASSWORD, AuthBackend.OIDC_CODE],
	CAS: [AuthBackend.CAS],
	SAML2: [AuthBackend.SAML2],
	OAuth2: [AuthBackend.OAUTH2],
	Radius: [AuthBackend.RADIUS],
};

const FIXED_LABELS: ReadonlyArray<readonly [string, string]> = [
	[AuthBackend.PUBKEY, 'SSH Key'],
	[AuthBackend.MODEL, 'Password'],
	[AuthBackend.SSO, 'SSO'],
	[AuthBackend.AUTH_TOKEN, 'Auth Token'],
	[AuthBackend.WECOM, 'WeCom'],
	[AuthBackend.FEISHU, 'FeiShu'],
	[AuthBackend.DINGTALK, 'DingTalk'],
	[AuthBackend.TEMP_TOKEN, 'Temporary token'],
];

export interface AuthBackendLabelOptions {
	/** Source label → backend identifiers; defaults to DEFAULT_SOURCE_BACKENDS */
	readonly sourceBackends?: Readonly<Record<string, readonly string[]>> | undefined;
}

let labels: ReadonlyMap<string, string> | null = null;

/**
 * Build the label mapping. Call once at startup, before the first login.
 *
 * @throws AuditFailure if the mapping is already initialized
 */
export function initAuthBackendLabels(options: AuthBackendLabelOptions = {}): ReadonlyMap<string, string> {
	if (labels) {
		throw new AuditFailure(
			AuditError.configuration('BACKEND_LABELS_ALREADY_INITIALIZED', 'Auth backend labels are already initialized'),
		);
	}

	const mapping = new Map<string, string>();
	for (const [source, backends] of Object.entries(options.sourceBackends ?? DEFAULT_SOURCE_BACKENDS)) {
		for (const backend of backends) {
			mapping.set(backend, source);
		}
	}
	for (const [backend, label] of FIXED_LABELS) {
		mapping.set(backend, label);
	}

	labels = mapping;
	return mapping;
}

/**
 * Initialize the mapping unless it already is. Explicit options always
 * initialize, so a second configuration fails instead of being ignored.
 *
 * @throws AuditFailure if options are given and the mapping is already initialized
 */
export function ensureAuthBackendLabels(options?: AuthBackendLabelOptions): void {
	if (options === undefined && labels) {
		return;
	}
	initAuthBackendLabels(options);
}

/**
 * Whether `initAuthBackendLabels()` has run.
 */
export function isAuthBackendLabelsInitialized(): boolean {
	return labels !== null;
}

/**
 * Label for a backend identifier; empty for unknown backends.
 *
 * @throws AuditFailure if the mapping has not been initialized
 */
export function getAuthBackendLabel(backend: string): string {
	if (!labels) {
		throw new AuditFailure(
			AuditError.configuration(
				'BACKEND_LABELS_NOT_INITIALIZED',
				'Call initAuthBackendLabels() during startup before recording logins',
			),
		);
	}
	return labels.get(backend) ?? '';
}

/**
 * Drop the mapping so tests can initialize it again.
 */
export function resetAuthBackendLabelsForTesting(): void {
	labels = null;
}
