import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
	AuditWriteError,
	CoreEntityTypes,
	OperationContext,
	type EntityInstance,
	type EntityType,
} from '@gatewarden/domain-core';
import { createLogger, type SecondaryLogAppender } from '@gatewarden/logging';
import {
	createInMemoryAuditStore,
	withMutationHooks,
	withRelationHooks,
	type EntityStore,
	type InMemoryAuditStore,
	type MemoryTransaction,
	type RelationStore,
} from '@gatewarden/persistence';
import { createAuthInterceptors } from '../auth-interceptors.js';
import { initAuthBackendLabels, resetAuthBackendLabelsForTesting } from '../backend-labels.js';
import { createMutationInterceptor } from '../mutation-interceptor.js';
import { createRecordMirror } from '../record-mirror.js';

type Entity = EntityInstance;

function createTable(type: EntityType): EntityStore<Entity, MemoryTransaction> & { rows: Map<string, Entity> } {
	const rows = new Map<string, Entity>();
	return {
		rows,
		type,
		async save(entity) {
			const created = !rows.has(entity.id);
			rows.set(entity.id, entity);
			return { entity, created };
		},
		async delete(entity) {
			return rows.delete(entity.id);
		},
	};
}

function createJoinTable(
	name: string,
	ownerType: EntityType,
	relatedType: EntityType,
): RelationStore<MemoryTransaction> & { links: Set<string> } {
	const links = new Set<string>();
	return {
		links,
		name,
		ownerType,
		relatedType,
		async add(ownerId, relatedIds) {
			relatedIds.forEach((id) => links.add(`${ownerId}:${id}`));
		},
		async remove(ownerId, relatedIds) {
			relatedIds.forEach((id) => links.delete(`${ownerId}:${id}`));
		},
		async clear(ownerId) {
			[...links].filter((link) => link.startsWith(`${ownerId}:`)).forEach((link) => links.delete(link));
		},
		async listRelatedIds(ownerId) {
			return [...links].filter((link) => link.startsWith(`${ownerId}:`)).map((link) => link.slice(ownerId.length + 1));
		},
	};
}

describe('audit pipeline', () => {
	const logger = createLogger({ level: 'fatal', serviceName: 'test' });
	const org = { id: 'org-1', name: 'Default' };
	const bob = OperationContext.createUser('usr-bob', 'bob');
	const bobCtx = OperationContext.create({
		user: bob,
		org,
		request: OperationContext.createRequest({ remoteAddress: '10.0.0.1' }),
	});

	let lines: string[];
	let store: InMemoryAuditStore;
	let users: ReturnType<typeof createTable>;
	let groups: ReturnType<typeof createTable>;
	let userGroups: ReturnType<typeof createJoinTable>;

	function wire() {
		const hooks = createMutationInterceptor({
			store,
			logger,
			loadEntities: async (type: EntityType, ids: ReadonlySet<string>) => {
				const table = type.name === 'UserGroup' ? groups : users;
				return [...ids].flatMap((id) => table.rows.get(id) ?? []);
			},
		});
		return {
			users: withMutationHooks(users, hooks, store),
			groups: withMutationHooks(groups, hooks, store),
			userGroups: withRelationHooks(userGroups, hooks, store),
			auth: createAuthInterceptors({ store, logger }),
		};
	}

	beforeEach(() => {
		lines = [];
		const appender: SecondaryLogAppender = {
			append: (line) => {
				lines.push(line);
			},
			flush() {},
			close() {},
		};
		const mirror = createRecordMirror({ appender, logger });
		store = createInMemoryAuditStore({ listeners: [mirror.persistListener], logger });
		users = createTable(CoreEntityTypes.User);
		groups = createTable(CoreEntityTypes.UserGroup);
		userGroups = createJoinTable('User_groups', CoreEntityTypes.User, CoreEntityTypes.UserGroup);
		initAuthBackendLabels();
	});

	afterEach(() => {
		resetAuthBackendLabelsForTesting();
	});

	it('should record alice joining admins as one operate log', async () => {
		users.rows.set('usr-alice', { id: 'usr-alice', display: 'alice' });
		groups.rows.set('grp-admins', { id: 'grp-admins', display: 'admins' });
		const pipeline = wire();

		await pipeline.userGroups.add(bobCtx, { id: 'usr-alice', display: 'alice' }, ['grp-admins']);

		const logs = store.byCategory().operation_log;
		expect(logs).toHaveLength(1);
		expect(logs[0]).toMatchObject({
			user: 'bob',
			action: 'create',
			resourceType: 'User and Group',
			resource: 'alice JOINED admins',
			remoteAddr: '10.0.0.1',
			orgId: 'org-1',
		});
		expect(lines).toHaveLength(1);
		expect(lines[0]?.startsWith('operation_log - {')).toBe(true);
		expect(lines[0]).toContain('"resource":"alice JOINED admins"');
	});

	it('should record nothing for an unauthenticated background save', async () => {
		const pipeline = wire();

		await pipeline.groups.save(OperationContext.system(org), { id: 'grp-ops', display: 'ops' });

		expect(groups.rows.has('grp-ops')).toBe(true);
		expect(store.all()).toHaveLength(0);
		expect(lines).toHaveLength(0);
	});

	it('should roll the mutation back when the audit write fails', async () => {
		const pipeline = wire();
		users.rows.set('usr-alice', { id: 'usr-alice', display: 'alice' });
		groups.rows.set('grp-admins', { id: 'grp-admins', display: 'admins' });
		store.failNextInsert(new Error('connection refused'));

		await expect(pipeline.userGroups.add(bobCtx, { id: 'usr-alice', display: 'alice' }, ['grp-admins'])).rejects.toBeInstanceOf(
			AuditWriteError,
		);
		expect(store.all()).toHaveLength(0);
	});

	it('should keep the mirrored line of a delete that rolls back', async () => {
		users.rows.set('usr-alice', { id: 'usr-alice', display: 'alice' });
		users.delete = async () => {
			throw new Error('row locked');
		};
		const pipeline = wire();

		await expect(pipeline.users.delete(bobCtx, { id: 'usr-alice', display: 'alice' })).rejects.toThrow('row locked');

		expect(store.all()).toHaveLength(0);
		expect(lines).toHaveLength(1);
		expect(lines[0]?.startsWith('operation_log - {')).toBe(true);
		expect(lines[0]).toContain('"action":"delete"');
	});

	it('should record a clear with one delete per former member', async () => {
		users.rows.set('usr-alice', { id: 'usr-alice', display: 'alice' });
		groups.rows.set('grp-admins', { id: 'grp-admins', display: 'admins' });
		groups.rows.set('grp-ops', { id: 'grp-ops', display: 'ops' });
		const pipeline = wire();
		const alice = { id: 'usr-alice', display: 'alice' };
		await pipeline.userGroups.add(bobCtx, alice, ['grp-admins', 'grp-ops']);

		await pipeline.userGroups.clear(bobCtx, alice);

		const deletes = store.byCategory().operation_log.filter((log) => log.action === 'delete');
		expect(deletes.map((log) => log.resource).sort()).toEqual(['alice LEFT admins', 'alice LEFT ops']);
		expect(userGroups.links.size).toBe(0);
	});

	it('should record a system password change for carol', async () => {
		const pipeline = wire();

		await pipeline.auth.onPasswordChanged(null, OperationContext.createUser('usr-carol', 'carol'));

		expect(store.byCategory().password_change_log[0]).toMatchObject({
			user: 'carol',
			changeBy: 'System',
			remoteAddr: '127.0.0.1',
		});
		expect(lines[0]?.startsWith('password_change_log - ')).toBe(true);
	});

	it('should record a failed login for dave with the reason cut to 128 characters', async () => {
		const pipeline = wire();
		const reason = `${'x'.repeat(128)}and more`;

		await pipeline.auth.onAuthFailed('dave', OperationContext.createRequest({ remoteAddress: '10.0.0.9' }), reason);

		const [log] = store.byCategory().login_log;
		expect(log?.status).toBe(false);
		expect(log?.reason).toBe('x'.repeat(128));
		expect(store.byCategory().operation_log).toHaveLength(0);
		expect(lines).toHaveLength(1);
		expect(lines[0]?.startsWith('login_log - ')).toBe(true);
	});
});
