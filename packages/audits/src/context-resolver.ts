/**
 * Context Resolver
 *
 * Extracts the acting user, tenant and source address from the explicit
 * operation context handed to every audit entry point.
 */

import { OperationContext, type RequestInfo, type UserRef } from '@gatewarden/domain-core';

/**
 * Who did it, in which tenant, from where.
 */
export interface ResolvedContext {
	/** Authenticated acting user; null for anonymous or system operations */
	readonly actor: UserRef | null;
	readonly tenantId: string | null;
	/** Source IP; empty when unknown */
	readonly remoteAddr: string;
}

const IPV4_MAPPED_PREFIX = '::ffff:';

function firstHeader(request: RequestInfo, name: string): string | undefined {
	const value = request.headers[name];
	if (value === undefined) {
		return undefined;
	}
	return typeof value === 'string' ? value : value[0];
}

function canonicalize(address: string): string {
	const trimmed = address.trim();
	if (trimmed.toLowerCase().startsWith(IPV4_MAPPED_PREFIX) && trimmed.includes('.')) {
		return trimmed.slice(IPV4_MAPPED_PREFIX.length);
	}
	return trimmed;
}

/**
 * Client IP of a request.
 *
 * Takes the first hop of `X-Forwarded-For`, then `X-Real-IP`, then the socket
 * peer address.
 */
export function getRequestIp(request: RequestInfo | null): string {
	if (!request) {
		return '';
	}

	const forwardedFor = firstHeader(request, 'x-forwarded-for');
	const firstHop = forwardedFor?.split(',')[0]?.trim();
	if (firstHop) {
		return canonicalize(firstHop);
	}

	const realIp = firstHeader(request, 'x-real-ip')?.trim();
	if (realIp) {
		return canonicalize(realIp);
	}

	return request.remoteAddress ? canonicalize(request.remoteAddress) : '';
}

/**
 * Resolve actor, tenant and source address.
 *
 * The actor is null when there is no context, no user, or the user is not
 * authenticated.
 */
export function resolveContext(ctx: OperationContext | null): ResolvedContext {
	if (!ctx) {
		return { actor: null, tenantId: null, remoteAddr: '' };
	}

	return {
		actor: OperationContext.isAuthenticated(ctx) ? ctx.user : null,
		tenantId: ctx.org?.id ?? null,
		remoteAddr: getRequestIp(ctx.request),
	};
}
