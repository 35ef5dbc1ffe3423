/**
 * Audit Subsystem
 *
 * Wires the pipeline from configuration: database, audit store, mirror,
 * generic mutation interceptor and authentication interceptors.
 */

import type { AuditConfig } from '@gatewarden/config';
import { createComponentLogger, createLogger, createSecondaryLogAppender, setDefaultLogger, type Logger } from '@gatewarden/logging';
import {
	createDatabase,
	createDrizzleAuditStore,
	createLoginLogRepository,
	createOperateLogRepository,
	createTransactionManager,
	type AuditStore,
	type Database,
	type LoginLogRepository,
	type MutationHooks,
	type OperateLogRepository,
	type TransactionManager,
} from '@gatewarden/persistence';
import { ensureAuthBackendLabels, type AuthBackendLabelOptions } from './backend-labels.js';
import { createMutationInterceptor, type EntityLoader } from './mutation-interceptor.js';
import {
	createAuthInterceptors,
	type AuthInterceptors,
	type CityLookup,
	type UnusualLocationCheck,
} from './auth-interceptors.js';
import { createRecordMirror, type RecordMirror } from './record-mirror.js';

export interface AuditSubsystemOptions {
	readonly config: AuditConfig;
	/** Loads related entities for relation-change records */
	readonly loadEntities: EntityLoader;
	readonly checkUnusualLocation?: UnusualLocationCheck | undefined;
	readonly lookupCity?: CityLookup | undefined;
	readonly backendLabels?: AuthBackendLabelOptions | undefined;
	/** Use this logger instead of creating one from the configuration */
	readonly logger?: Logger | undefined;
}

export interface AuditSubsystem {
	readonly logger: Logger;
	readonly database: Database;
	readonly transactionManager: TransactionManager;
	readonly store: AuditStore;
	readonly mirror: RecordMirror;
	/** Install on entity and relation stores with withMutationHooks()/withRelationHooks() */
	readonly mutationHooks: MutationHooks;
	readonly auth: AuthInterceptors;
	readonly operateLogs: OperateLogRepository;
	readonly loginLogs: LoginLogRepository;
	/** Flush the secondary log and close the connection pool */
	close(): Promise<void>;
}

/**
 * Build the audit pipeline.
 *
 * @example
 * ```typescript
 * const audit = createAuditSubsystem({ config: loadAuditConfig(), loadEntities });
 * const users = withMutationHooks(userStore, audit.mutationHooks, audit.transactionManager);
 *
 * process.on('SIGTERM', () => void audit.close());
 * ```
 */
export function createAuditSubsystem(options: AuditSubsystemOptions): AuditSubsystem {
	const { config } = options;

	const logger =
		options.logger ??
		createLogger({
			level: config.logging.level,
			serviceName: config.serviceName,
			pretty: config.logging.pretty,
		});
	setDefaultLogger(logger);

	ensureAuthBackendLabels(options.backendLabels);

	const database = createDatabase({
		url: config.database.url,
		maxConnections: config.database.maxConnections,
		applicationName: config.serviceName,
		queryLogger: createComponentLogger(logger, 'sql'),
	});
	const transactionManager = createTransactionManager(database.db);

	const appender = createSecondaryLogAppender({ destination: config.mirror.destination });
	const mirror = createRecordMirror({ appender, enabled: config.mirror.enabled, logger });

	const store = createDrizzleAuditStore({
		transactionManager,
		listeners: [mirror.persistListener],
		logger,
	});

	const mutationHooks = createMutationInterceptor({
		store,
		loadEntities: options.loadEntities,
		defaultOrgId: config.defaultOrgId,
		logger,
	});

	const auth = createAuthInterceptors({
		store,
		checkUnusualLocation: options.checkUnusualLocation,
		lookupCity: options.lookupCity,
		defaultOrgId: config.defaultOrgId,
		logger,
	});

	logger.info(
		{ mirrorEnabled: config.mirror.enabled, mirrorDestination: config.mirror.destination },
		'Audit subsystem initialized',
	);

	return {
		logger,
		database,
		transactionManager,
		store,
		mirror,
		mutationHooks,
		auth,
		operateLogs: createOperateLogRepository(database.db),
		loginLogs: createLoginLogRepository(database.db),
		async close() {
			appender.close();
			await database.close();
		},
	};
}
