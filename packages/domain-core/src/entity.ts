/**
 * Entity Model
 *
 * The audit pipeline never sees concrete domain classes. The storage layer
 * describes each mutated row with an `EntityType` (what kind of thing it is)
 * and an `EntityInstance` (which one, and how it reads in a log line).
 */

/**
 * Describes an auditable entity type.
 */
export interface EntityType {
	/** Type name, e.g. "User", "Host" */
	readonly name: string;
	/** Human label written as an operate log's resource type, e.g. "User group" */
	readonly verboseName: string;
	/**
	 * Declared base type for polymorphic subtypes (a "Host" is declared as an
	 * "Asset" on the relations that reference it). Absent for plain types.
	 */
	readonly baseName?: string | undefined;
}

/**
 * A single entity row as seen by the audit pipeline.
 */
export interface EntityInstance {
	readonly id: string;
	/** Display form, e.g. "web-01(10.0.0.5)" */
	readonly display: string;
}

/**
 * EntityType factory functions.
 */
export const EntityType = {
	define(name: string, verboseName: string, baseName?: string): EntityType {
		return baseName === undefined ? { name, verboseName } : { name, verboseName, baseName };
	},

	/**
	 * Declare a polymorphic subtype of `base`.
	 */
	subtype(base: EntityType, name: string, verboseName: string = name): EntityType {
		return { name, verboseName, baseName: base.baseName ?? base.name };
	},

	/**
	 * Name under which the type is known to relations declared on its base.
	 */
	declaredName(type: EntityType): string {
		return type.baseName ?? type.name;
	},
};

/**
 * Entity types that take part in tracked relations.
 */
export const CoreEntityTypes = {
	User: EntityType.define('User', 'User'),
	UserGroup: EntityType.define('UserGroup', 'User group'),
	Asset: EntityType.define('Asset', 'Asset'),
	Node: EntityType.define('Node', 'Node'),
	AssetPermission: EntityType.define('AssetPermission', 'Asset permission'),
} as const;
