/**
 * Generic Mutation Interceptor
 *
 * Turns storage-layer mutation notifications into operate logs. Installed on
 * entity and relation stores through `withMutationHooks()` /
 * `withRelationHooks()`.
 *
 * Only mutations made by an authenticated user are recorded; system and
 * anonymous mutations are skipped. Store failures propagate, so a failed
 * audit write fails the triggering mutation.
 */

import {
	Action,
	DEFAULT_ORG_ID,
	FieldLimits,
	truncate,
	type EntityInstance,
	type EntityType,
	type NewOperateLog,
	type OperationContext,
	type UserRef,
} from '@gatewarden/domain-core';
import { createComponentLogger, getLogger, type Logger } from '@gatewarden/logging';
import type {
	AuditStore,
	MutationHooks,
	RelationAction,
	RelationChange,
	SavedNotification,
	TransactionContext,
} from '@gatewarden/persistence';
import { resolveContext, type ResolvedContext } from './context-resolver.js';
import { format, lookup, substitutionKey } from './relation-mapper.js';

/**
 * Loads related entities by ID for relation-change records.
 */
export type EntityLoader<Tx = TransactionContext> = (
	entityType: EntityType,
	ids: ReadonlySet<string>,
	tx?: Tx,
) => Promise<EntityInstance[]>;

export interface MutationInterceptorConfig<Tx = TransactionContext> {
	readonly store: AuditStore<Tx>;
	readonly loadEntities: EntityLoader<Tx>;
	/** Tenant recorded when the context carries no organization */
	readonly defaultOrgId?: string | undefined;
	readonly logger?: Logger | undefined;
}

/** Field touched on every login; saves that change only it are not audited. */
const LAST_LOGIN_FIELD = 'lastLogin';

const RELATION_ACTIONS: Partial<Record<RelationAction, Action>> = {
	add: Action.CREATE,
	remove: Action.DELETE,
	clear: Action.DELETE,
};

/**
 * True for a save that only touched the user's last-login timestamp.
 */
export function isLastLoginTouch(entityType: EntityType, changedFields: ReadonlySet<string> | null): boolean {
	if (entityType.name !== 'User' || !changedFields || changedFields.size === 0) {
		return false;
	}
	return [...changedFields].every((field) => field === LAST_LOGIN_FIELD);
}

/**
 * Create the interceptor.
 *
 * @example
 * ```typescript
 * const interceptor = createMutationInterceptor({ store, loadEntities: loadByIds });
 * const users = withMutationHooks(userStore, interceptor, transactionManager);
 * ```
 */
export function createMutationInterceptor<Tx = TransactionContext>(
	config: MutationInterceptorConfig<Tx>,
): MutationHooks<Tx> {
	const { store, loadEntities } = config;
	const defaultOrgId = config.defaultOrgId ?? DEFAULT_ORG_ID;
	const logger = createComponentLogger(config.logger ?? getLogger(), 'mutation-interceptor');

	function operateLog(
		actor: UserRef,
		resolved: ResolvedContext,
		action: Action,
		resourceType: string,
		resource: string,
	): NewOperateLog {
		return {
			category: 'operation_log',
			user: actor.display,
			action,
			resourceType,
			resource: truncate(resource, FieldLimits.RESOURCE),
			remoteAddr: resolved.remoteAddr,
			orgId: resolved.tenantId ?? defaultOrgId,
		};
	}

	async function record(
		ctx: OperationContext | null,
		action: Action,
		entityType: EntityType,
		instance: EntityInstance,
		tx?: Tx,
	): Promise<void> {
		const resolved = resolveContext(ctx);
		const { actor } = resolved;
		if (!actor) {
			logger.debug({ entityType: entityType.name, action }, 'No authenticated actor, mutation not audited');
			return;
		}

		await store.insert([operateLog(actor, resolved, action, entityType.verboseName, instance.display)], tx);
	}

	return {
		async onSaved(
			ctx: OperationContext | null,
			entityType: EntityType,
			instance: EntityInstance,
			saved: SavedNotification,
			tx?: Tx,
		): Promise<void> {
			if (isLastLoginTouch(entityType, saved.changedFields)) {
				return;
			}
			await record(ctx, saved.created ? Action.CREATE : Action.UPDATE, entityType, instance, tx);
		},

		async onDeleting(
			ctx: OperationContext | null,
			entityType: EntityType,
			instance: EntityInstance,
			tx?: Tx,
		): Promise<void> {
			await record(ctx, Action.DELETE, entityType, instance, tx);
		},

		async onRelationChanged(ctx: OperationContext | null, change: RelationChange, tx?: Tx): Promise<void> {
			const action = RELATION_ACTIONS[change.action];
			if (!action) {
				return;
			}

			const resolved = resolveContext(ctx);
			const { actor } = resolved;
			if (!actor) {
				logger.debug({ relation: change.relation }, 'No authenticated actor, relation change not audited');
				return;
			}

			const template = lookup(change.relation);
			if (!template) {
				return;
			}

			const resourceTemplate = action === Action.CREATE ? template.addTemplate : template.removeTemplate;
			const ownerKey = substitutionKey(change.ownerType);
			const related = await loadEntities(change.relatedType, change.relatedIds, tx);

			const records = related.map((entity) =>
				operateLog(
					actor,
					resolved,
					action,
					template.category,
					format(resourceTemplate, ownerKey, change.owner.display, change.relatedType.name, entity.display),
				),
			);

			await store.insert(records, tx);
		},
	};
}
