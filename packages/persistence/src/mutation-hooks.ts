/**
 * Mutation Hooks
 *
 * Storage-layer decorators that call the audit pipeline around every
 * mutating operation. Stores wrapped with `withMutationHooks()` /
 * `withRelationHooks()` report:
 *
 * - `onSaved` after an entity is inserted or updated,
 * - `onDeleting` before an entity is removed (its fields are still readable),
 * - `onRelationChanged` after related IDs are added to, removed from or
 *   cleared out of a many-to-many relation.
 *
 * The mutation and its hook run in the same transaction. When the caller
 * passes no transaction, the decorator opens one, so a failing audit write
 * rolls the mutation back.
 */

import type { EntityInstance, EntityType, OperationContext } from '@gatewarden/domain-core';
import type { TransactionContext, TransactionRunner } from './transaction.js';

/**
 * Details of a save notification.
 */
export interface SavedNotification {
	readonly created: boolean;
	/** Fields named by a partial update; null for a full save */
	readonly changedFields: ReadonlySet<string> | null;
}

/**
 * Relation change kinds. `other` stands for the storage layer's
 * pre-change signals, which the audit pipeline ignores.
 */
export type RelationAction = 'add' | 'remove' | 'clear' | 'other';

/**
 * A change to a many-to-many relation.
 */
export interface RelationChange {
	/** Relation name, e.g. "User_groups" */
	readonly relation: string;
	readonly action: RelationAction;
	/** Runtime type of the owner (may be a subtype of the relation's declared owner type) */
	readonly ownerType: EntityType;
	readonly owner: EntityInstance;
	readonly relatedType: EntityType;
	readonly relatedIds: ReadonlySet<string>;
}

/**
 * Contract the storage layer calls for every mutation.
 */
export interface MutationHooks<Tx = TransactionContext> {
	onSaved(
		ctx: OperationContext | null,
		entityType: EntityType,
		instance: EntityInstance,
		saved: SavedNotification,
		tx?: Tx,
	): Promise<void>;

	onDeleting(ctx: OperationContext | null, entityType: EntityType, instance: EntityInstance, tx?: Tx): Promise<void>;

	onRelationChanged(ctx: OperationContext | null, change: RelationChange, tx?: Tx): Promise<void>;
}

/**
 * Options for a save.
 */
export interface SaveOptions {
	/** Restrict the save to these fields (partial update) */
	readonly changedFields?: readonly string[] | undefined;
}

/**
 * Result of a save.
 */
export interface SaveOutcome<T> {
	readonly entity: T;
	readonly created: boolean;
}

/**
 * Undecorated entity persistence, implemented by each domain repository.
 */
export interface EntityStore<T extends EntityInstance, Tx = TransactionContext> {
	readonly type: EntityType;
	save(entity: T, options: SaveOptions, tx: Tx): Promise<SaveOutcome<T>>;
	delete(entity: T, tx: Tx): Promise<boolean>;
}

/**
 * Entity store whose mutations are reported to the audit pipeline.
 */
export interface HookedEntityStore<T extends EntityInstance, Tx = TransactionContext> {
	readonly type: EntityType;
	save(ctx: OperationContext | null, entity: T, options?: SaveOptions, tx?: Tx): Promise<SaveOutcome<T>>;
	delete(ctx: OperationContext | null, entity: T, tx?: Tx): Promise<boolean>;
}

/**
 * Relation owner; `type` overrides the relation's declared owner type when
 * the owner is a polymorphic subtype.
 */
export interface RelationOwner extends EntityInstance {
	readonly type?: EntityType | undefined;
}

/**
 * Undecorated many-to-many relation persistence.
 */
export interface RelationStore<Tx = TransactionContext> {
	readonly name: string;
	readonly ownerType: EntityType;
	readonly relatedType: EntityType;
	add(ownerId: string, relatedIds: readonly string[], tx: Tx): Promise<void>;
	remove(ownerId: string, relatedIds: readonly string[], tx: Tx): Promise<void>;
	clear(ownerId: string, tx: Tx): Promise<void>;
	listRelatedIds(ownerId: string, tx: Tx): Promise<string[]>;
}

/**
 * Relation store whose changes are reported to the audit pipeline.
 */
export interface HookedRelationStore<Tx = TransactionContext> {
	readonly name: string;
	add(ctx: OperationContext | null, owner: RelationOwner, relatedIds: readonly string[], tx?: Tx): Promise<void>;
	remove(ctx: OperationContext | null, owner: RelationOwner, relatedIds: readonly string[], tx?: Tx): Promise<void>;
	clear(ctx: OperationContext | null, owner: RelationOwner, tx?: Tx): Promise<void>;
}

function inTransaction<Tx, T>(
	transactions: TransactionRunner<Tx>,
	tx: Tx | undefined,
	fn: (tx: Tx) => Promise<T>,
): Promise<T> {
	return tx === undefined ? transactions.inTransaction(fn) : fn(tx);
}

/**
 * Wrap an entity store so saves and deletes are reported to `hooks`.
 *
 * @example
 * ```typescript
 * const users = withMutationHooks(createUserStore(db), auditHooks, transactionManager);
 * await users.save(ctx, user, { changedFields: ['email'] });
 * ```
 */
export function withMutationHooks<T extends EntityInstance, Tx = TransactionContext>(
	store: EntityStore<T, Tx>,
	hooks: MutationHooks<Tx>,
	transactions: TransactionRunner<Tx>,
): HookedEntityStore<T, Tx> {
	return {
		type: store.type,

		save(ctx, entity, options = {}, tx) {
			return inTransaction(transactions, tx, async (activeTx) => {
				const outcome = await store.save(entity, options, activeTx);
				const changedFields = options.changedFields ? new Set(options.changedFields) : null;
				await hooks.onSaved(ctx, store.type, outcome.entity, { created: outcome.created, changedFields }, activeTx);
				return outcome;
			});
		},

		delete(ctx, entity, tx) {
			return inTransaction(transactions, tx, async (activeTx) => {
				await hooks.onDeleting(ctx, store.type, entity, activeTx);
				return store.delete(entity, activeTx);
			});
		},
	};
}

/**
 * Wrap a relation store so membership changes are reported to `hooks`.
 *
 * `clear()` reads the current related IDs before clearing, so the
 * notification names every removed member.
 */
export function withRelationHooks<Tx = TransactionContext>(
	relation: RelationStore<Tx>,
	hooks: MutationHooks<Tx>,
	transactions: TransactionRunner<Tx>,
): HookedRelationStore<Tx> {
	function change(owner: RelationOwner, action: RelationAction, relatedIds: Iterable<string>): RelationChange {
		return {
			relation: relation.name,
			action,
			ownerType: owner.type ?? relation.ownerType,
			owner: { id: owner.id, display: owner.display },
			relatedType: relation.relatedType,
			relatedIds: new Set(relatedIds),
		};
	}

	return {
		name: relation.name,

		add(ctx, owner, relatedIds, tx) {
			return inTransaction(transactions, tx, async (activeTx) => {
				await relation.add(owner.id, relatedIds, activeTx);
				await hooks.onRelationChanged(ctx, change(owner, 'add', relatedIds), activeTx);
			});
		},

		remove(ctx, owner, relatedIds, tx) {
			return inTransaction(transactions, tx, async (activeTx) => {
				await relation.remove(owner.id, relatedIds, activeTx);
				await hooks.onRelationChanged(ctx, change(owner, 'remove', relatedIds), activeTx);
			});
		},

		clear(ctx, owner, tx) {
			return inTransaction(transactions, tx, async (activeTx) => {
				const previous = await relation.listRelatedIds(owner.id, activeTx);
				await relation.clear(owner.id, activeTx);
				await hooks.onRelationChanged(ctx, change(owner, 'clear', previous), activeTx);
			});
		},
	};
}
