/**
 * Record IDs
 *
 * Time-sorted, prefixed IDs for audit records: "{prefix}_{tsid}", e.g.
 * "opl_0HZXEQ5Y8JY5Z". The TSID part is a 64-bit value (42-bit millisecond
 * timestamp since 2020-01-01, 22-bit random/counter) encoded as 13
 * Crockford Base32 characters, so IDs sort by creation time.
 */

import { randomBytes } from 'node:crypto';
import type { AuditRecordCategory } from './records.js';

const CROCKFORD_ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';
const TSID_EPOCH = 1577836800000n;
const RANDOM_BITS = 22n;
const RANDOM_MASK = (1n << RANDOM_BITS) - 1n;
const TSID_LENGTH = 13;

/**
 * Prefix per persisted record category.
 */
export const RecordIdPrefix = {
	operation_log: 'opl',
	password_change_log: 'pcl',
	login_log: 'lgl',
	ftp_log: 'ftp',
} as const satisfies Record<AuditRecordCategory, string>;

const RECORD_ID_PATTERN = /^(opl|pcl|lgl|ftp)_[0-9A-HJKMNP-TV-Z]{13}$/;

let lastTimestamp = 0n;
let counter = 0n;

function randomComponent(): bigint {
	const bytes = randomBytes(3);
	return BigInt(bytes.readUIntBE(0, 3)) & RANDOM_MASK;
}

function nextTsid(): bigint {
	let timestamp = BigInt(Date.now()) - TSID_EPOCH;

	if (timestamp <= lastTimestamp) {
		// Same millisecond (or clock moved back): keep ordering with the counter
		timestamp = lastTimestamp;
		counter = (counter + 1n) & RANDOM_MASK;
		if (counter === 0n) {
			timestamp += 1n;
		}
	} else {
		counter = randomComponent();
	}

	lastTimestamp = timestamp;
	return (timestamp << RANDOM_BITS) | counter;
}

function encode(value: bigint): string {
	const chars = new Array<string>(TSID_LENGTH);
	let remaining = value;
	for (let i = TSID_LENGTH - 1; i >= 0; i--) {
		chars[i] = CROCKFORD_ALPHABET.charAt(Number(remaining & 31n));
		remaining >>= 5n;
	}
	return chars.join('');
}

/**
 * Generate a new ID for a record of the given category.
 */
export function generateRecordId(category: AuditRecordCategory): string {
	return `${RecordIdPrefix[category]}_${encode(nextTsid())}`;
}

/**
 * Check that `id` is a well-formed record ID, optionally of a given category.
 */
export function isRecordId(id: string, category?: AuditRecordCategory): boolean {
	if (!RECORD_ID_PATTERN.test(id)) {
		return false;
	}
	return category === undefined || id.startsWith(`${RecordIdPrefix[category]}_`);
}
