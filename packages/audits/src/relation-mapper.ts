/**
 * Relation-Change Mapper
 *
 * Static registry of the many-to-many relations whose membership changes are
 * audited, with the category label and the add/remove templates for each.
 * Changes to relations not listed here produce no record.
 */

import { EntityType, FieldLimits, truncate } from '@gatewarden/domain-core';

/**
 * How membership changes of one relation are described.
 */
export interface RelationTemplate {
	/** Written as the operate log's resource type */
	readonly category: string;
	readonly addTemplate: string;
	readonly removeTemplate: string;
}

const RELATION_TEMPLATES: ReadonlyMap<string, RelationTemplate> = new Map<string, RelationTemplate>([
	[
		'User_groups',
		{ category: 'User and Group', addTemplate: '{User} JOINED {UserGroup}', removeTemplate: '{User} LEFT {UserGroup}' },
	],
	[
		'Asset_nodes',
		{ category: 'Node and Asset', addTemplate: '{Node} ADD {Asset}', removeTemplate: '{Node} REMOVE {Asset}' },
	],
	[
		'AssetPermission_users',
		{
			category: 'User asset permissions',
			addTemplate: '{AssetPermission} ADD {User}',
			removeTemplate: '{AssetPermission} REMOVE {User}',
		},
	],
	[
		'AssetPermission_user_groups',
		{
			category: 'User group asset permissions',
			addTemplate: '{AssetPermission} ADD {UserGroup}',
			removeTemplate: '{AssetPermission} REMOVE {UserGroup}',
		},
	],
	[
		'AssetPermission_assets',
		{
			category: 'Asset permission',
			addTemplate: '{AssetPermission} ADD {Asset}',
			removeTemplate: '{AssetPermission} REMOVE {Asset}',
		},
	],
	[
		'AssetPermission_nodes',
		{
			category: 'Node permission',
			addTemplate: '{AssetPermission} ADD {Node}',
			removeTemplate: '{AssetPermission} REMOVE {Node}',
		},
	],
]);

/**
 * Names of all tracked relations.
 */
export const TRACKED_RELATIONS: readonly string[] = Object.freeze([...RELATION_TEMPLATES.keys()]);

/**
 * Templates for a relation, or null when the relation is not tracked.
 */
export function lookup(relationName: string): RelationTemplate | null {
	return RELATION_TEMPLATES.get(relationName) ?? null;
}

/**
 * Key under which an owner is substituted into a template: its declared
 * base type when it is a polymorphic subtype, otherwise its own name.
 */
export function substitutionKey(entityType: EntityType): string {
	return EntityType.declaredName(entityType);
}

const PLACEHOLDER = /\{(\w+)\}/g;

/**
 * Fill a template by placeholder name and cut the result to the resource cap.
 * Placeholders that match neither key are kept as written.
 *
 * @example
 * ```typescript
 * format('{User} JOINED {UserGroup}', 'User', 'alice', 'UserGroup', 'admins');
 * // 'alice JOINED admins'
 * ```
 */
export function format(
	template: string,
	ownerTypeName: string,
	ownerDisplay: string,
	relatedTypeName: string,
	relatedDisplay: string,
): string {
	const values = new Map<string, string>([
		[ownerTypeName, ownerDisplay],
		[relatedTypeName, relatedDisplay],
	]);
	const filled = template.replace(PLACEHOLDER, (placeholder: string, key: string) => values.get(key) ?? placeholder);
	return truncate(filled, FieldLimits.RESOURCE);
}
