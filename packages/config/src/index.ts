import 'dotenv/config';
import { z } from 'zod/v4';

export { z } from 'zod/v4';

/**
 * Parse environment variables with Zod schema validation.
 * Throws a descriptive error if validation fails.
 */
export function parseEnv<T extends z.ZodRawShape>(
	schema: z.ZodObject<T>,
	env: Record<string, string | undefined> = process.env,
): z.infer<z.ZodObject<T>> {
	const result = schema.safeParse(env);

	if (!result.success) {
		const tree = z.treeifyError(result.error);
		const errors: string[] = [];

		if ('properties' in tree && tree.properties) {
			for (const [key, sub] of Object.entries(tree.properties)) {
				const node = sub as { errors?: string[] };
				if (node.errors?.length) {
					errors.push(`  ${key}: ${node.errors.join(', ')}`);
				}
			}
		}

		throw new Error(`Environment validation failed:\n${errors.join('\n')}`);
	}

	return result.data;
}

/**
 * Common environment variable schemas for reuse.
 *
 * Note: In zod v4, .default() on a transformed schema expects the OUTPUT type.
 * Use .prefault() to provide an INPUT default (applied before parsing).
 */
export const CommonEnvSchemas = {
	/** Log level enum */
	logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),

	/** Boolean from string */
	boolean: z
		.string()
		.transform((v) => v === 'true' || v === '1')
		.prefault('false'),

	/** Positive integer from string */
	positiveInt: z
		.string()
		.transform((v) => Number.parseInt(v, 10))
		.pipe(z.number().int().positive()),
};

/**
 * Environment schema for the audit pipeline.
 */
export const auditEnvSchema = z.object({
	NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
	SERVICE_NAME: z.string().min(1).default('gatewarden-audit'),

	// Database
	DATABASE_URL: z.string().default('postgres://localhost:5432/gatewarden'),
	DATABASE_MAX_CONNECTIONS: CommonEnvSchemas.positiveInt.prefault('10'),

	// Logging
	LOG_LEVEL: CommonEnvSchemas.logLevel,
	LOG_PRETTY: CommonEnvSchemas.boolean,

	// Secondary (mirrored) audit log stream
	AUDIT_MIRROR_ENABLED: z
		.string()
		.transform((v) => v === 'true' || v === '1')
		.prefault('true'),
	AUDIT_MIRROR_DESTINATION: z.string().min(1).default('stdout'),

	// Tenant written on records when no organization is resolved
	AUDIT_DEFAULT_ORG_ID: z.string().min(1).default('00000000-0000-0000-0000-000000000002'),
});

export type AuditEnv = z.infer<typeof auditEnvSchema>;

/**
 * Typed configuration for the audit pipeline.
 */
export interface AuditConfig {
	readonly serviceName: string;
	readonly environment: AuditEnv['NODE_ENV'];
	readonly database: {
		readonly url: string;
		readonly maxConnections: number;
	};
	readonly logging: {
		readonly level: AuditEnv['LOG_LEVEL'];
		readonly pretty: boolean;
	};
	readonly mirror: {
		readonly enabled: boolean;
		readonly destination: string;
	};
	readonly defaultOrgId: string;
}

/**
 * Load the audit configuration from environment variables.
 */
export function loadAuditConfig(env: Record<string, string | undefined> = process.env): AuditConfig {
	const parsed = parseEnv(auditEnvSchema, env);

	return {
		serviceName: parsed.SERVICE_NAME,
		environment: parsed.NODE_ENV,
		database: {
			url: parsed.DATABASE_URL,
			maxConnections: parsed.DATABASE_MAX_CONNECTIONS,
		},
		logging: {
			level: parsed.LOG_LEVEL,
			pretty: parsed.LOG_PRETTY,
		},
		mirror: {
			enabled: parsed.AUDIT_MIRROR_ENABLED,
			destination: parsed.AUDIT_MIRROR_DESTINATION,
		},
		defaultOrgId: parsed.AUDIT_DEFAULT_ORG_ID,
	};
}

/**
 * Type helper to extract config type from schema
 */
export type ConfigType<T extends z.ZodObject<z.ZodRawShape>> = z.infer<T>;
