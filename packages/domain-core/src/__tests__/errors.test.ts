import { describe, it, expect } from 'vitest';
import { AuditError, AuditFailure, AuditWriteError } from '../errors.js';

describe('AuditError', () => {
	describe('configuration', () => {
		it('should create a configuration error', () => {
			const error = AuditError.configuration('BACKEND_LABELS_NOT_INITIALIZED', 'Labels not initialized', {
				backend: 'password',
			});

			expect(error.type).toBe('configuration');
			expect(error.code).toBe('BACKEND_LABELS_NOT_INITIALIZED');
			expect(error.message).toBe('Labels not initialized');
			expect(error.details).toEqual({ backend: 'password' });
		});

		it('should default to empty details', () => {
			const error = AuditError.configuration('MISSING', 'Missing');
			expect(error.details).toEqual({});
		});
	});

	describe('invalidRecord', () => {
		it('should create an invalid record error', () => {
			const error = AuditError.invalidRecord('UNKNOWN_CATEGORY', 'Unknown category', { category: 'x' });

			expect(error.type).toBe('invalid_record');
			expect(error.details).toEqual({ category: 'x' });
		});
	});

	describe('isAuditError', () => {
		it('should return true for audit errors', () => {
			expect(AuditError.isAuditError(AuditError.persistence('WRITE', 'failed'))).toBe(true);
		});

		it('should return false for other values', () => {
			expect(AuditError.isAuditError(null)).toBe(false);
			expect(AuditError.isAuditError('error')).toBe(false);
			expect(AuditError.isAuditError({ type: 'persistence', code: 'X' })).toBe(false);
			expect(AuditError.isAuditError(new Error('boom'))).toBe(false);
		});
	});
});

describe('AuditFailure', () => {
	it('should carry the audit error and its code', () => {
		const failure = new AuditFailure(AuditError.configuration('NOT_READY', 'Not ready'));

		expect(failure).toBeInstanceOf(Error);
		expect(failure.name).toBe('AuditFailure');
		expect(failure.message).toBe('Not ready');
		expect(failure.code).toBe('NOT_READY');
	});
});

describe('AuditWriteError', () => {
	it('should describe the failed categories and keep the cause', () => {
		const cause = new Error('connection refused');
		const error = new AuditWriteError(['operation_log'], cause);

		expect(error.name).toBe('AuditWriteError');
		expect(error.message).toBe('Failed to persist audit records (operation_log): connection refused');
		expect(error.cause).toBe(cause);
		expect(error.categories).toEqual(['operation_log']);
	});

	it('should convert to a persistence error', () => {
		const error = new AuditWriteError(['login_log', 'ftp_log'], 'timeout');

		expect(error.toAuditError()).toEqual({
			type: 'persistence',
			code: 'AUDIT_WRITE_FAILED',
			message: 'Failed to persist audit records (login_log, ftp_log): timeout',
			details: { categories: ['login_log', 'ftp_log'] },
		});
	});
});
