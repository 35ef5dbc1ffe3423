import { describe, it, expect } from 'vitest';
import { CoreEntityTypes, EntityType } from '@gatewarden/domain-core';
import { TRACKED_RELATIONS, format, lookup, substitutionKey } from '../relation-mapper.js';

describe('lookup', () => {
	it('should know the tracked relations', () => {
		expect(TRACKED_RELATIONS).toEqual([
			'User_groups',
			'Asset_nodes',
			'AssetPermission_users',
			'AssetPermission_user_groups',
			'AssetPermission_assets',
			'AssetPermission_nodes',
		]);
	});

	it('should return the templates of a tracked relation', () => {
		expect(lookup('User_groups')).toEqual({
			category: 'User and Group',
			addTemplate: '{User} JOINED {UserGroup}',
			removeTemplate: '{User} LEFT {UserGroup}',
		});
	});

	it('should return null for an untracked relation', () => {
		expect(lookup('User_roles')).toBeNull();
	});
});

describe('substitutionKey', () => {
	it('should use the type name of a plain type', () => {
		expect(substitutionKey(CoreEntityTypes.Node)).toBe('Node');
	});

	it('should use the declared base name of a subtype', () => {
		const host = EntityType.subtype(CoreEntityTypes.Asset, 'Host');

		expect(substitutionKey(host)).toBe('Asset');
	});
});

describe('format', () => {
	it('should substitute both sides by name', () => {
		expect(format('{User} JOINED {UserGroup}', 'User', 'alice', 'UserGroup', 'admins')).toBe('alice JOINED admins');
	});

	it('should substitute regardless of placeholder order', () => {
		expect(format('{Node} ADD {Asset}', 'Asset', 'web-01(10.0.0.5)', 'Node', '/Default/Web')).toBe(
			'/Default/Web ADD web-01(10.0.0.5)',
		);
	});

	it('should keep placeholders that match neither side', () => {
		expect(format('{Host} ADD {Node}', 'Asset', 'web-01', 'Node', '/Default')).toBe('{Host} ADD /Default');
	});

	it('should cut the result to 128 characters', () => {
		const result = format('{User} JOINED {UserGroup}', 'User', 'u'.repeat(200), 'UserGroup', 'admins');

		expect(result).toBe('u'.repeat(128));
	});

	it('should not split a surrogate pair at the cut', () => {
		const display = `${'a'.repeat(127)}😀tail`;

		const result = format('{User}', 'User', display, 'UserGroup', 'admins');

		expect(Array.from(result)).toHaveLength(128);
		expect(result.endsWith('😀')).toBe(true);
	});
});
