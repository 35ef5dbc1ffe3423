import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
	createLogger,
	createComponentLogger,
	createSecondaryLogAppender,
	getLogger,
	setDefaultLogger,
	LogLevel,
} from '../index.js';

describe('createLogger', () => {
	it('should apply the configured level', () => {
		const logger = createLogger({ level: LogLevel.WARN, serviceName: 'audit-test' });

		expect(logger.level).toBe('warn');
		expect(logger.isLevelEnabled('info')).toBe(false);
		expect(logger.isLevelEnabled('error')).toBe(true);
	});

	it('should bind the service name', () => {
		const logger = createLogger({ level: LogLevel.INFO, serviceName: 'audit-test' });
		expect(logger.bindings()).toMatchObject({ service: 'audit-test' });
	});

	it('should censor credentials and extra redact paths', () => {
		const lines: string[] = [];
		const logger = createLogger({
			level: LogLevel.INFO,
			serviceName: 'audit-test',
			redact: ['reason'],
			stream: { write: (line: string) => void lines.push(line) },
		});

		logger.info(
			{ username: 'dave', password: 'test-secret', request: { headers: { cookie: 'sid=test' } }, reason: 'locked' },
			'Login failed',
		);

		expect(lines).toHaveLength(1);
		const entry: unknown = JSON.parse(lines[0] ?? '');
		expect(entry).toMatchObject({
			level: 'info',
			service: 'audit-test',
			username: 'dave',
			password: '[redacted]',
			request: { headers: { cookie: '[redacted]' } },
			reason: '[redacted]',
			msg: 'Login failed',
		});
	});
});

describe('createComponentLogger', () => {
	it('should add component bindings', () => {
		const parent = createLogger({ level: LogLevel.INFO, serviceName: 'audit-test' });
		const child = createComponentLogger(parent, 'record-mirror', { sink: 'file' });

		expect(child.bindings()).toMatchObject({ component: 'record-mirror', sink: 'file' });
	});
});

describe('default logger', () => {
	it('should be replaceable', () => {
		const original = getLogger();
		const replacement = createLogger({ level: LogLevel.ERROR, serviceName: 'replacement' });

		setDefaultLogger(replacement);
		expect(getLogger()).toBe(replacement);

		setDefaultLogger(original);
	});
});

describe('createSecondaryLogAppender', () => {
	let dir: string | null = null;

	afterEach(() => {
		if (dir) {
			rmSync(dir, { recursive: true, force: true });
			dir = null;
		}
	});

	it('should append one line per call', () => {
		dir = mkdtempSync(join(tmpdir(), 'audit-mirror-'));
		const file = join(dir, 'nested', 'audit.log');
		const appender = createSecondaryLogAppender({ destination: file, sync: true });

		appender.append('operation_log - {"id":"1"}');
		appender.append('login_log - {"id":"2"}');
		appender.flush();
		appender.close();

		expect(readFileSync(file, 'utf8')).toBe('operation_log - {"id":"1"}\nlogin_log - {"id":"2"}\n');
	});
});
