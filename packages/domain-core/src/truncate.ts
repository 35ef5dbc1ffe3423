/**
 * Field caps for audit record columns. Values longer than the cap are cut,
 * never rejected.
 */
export const FieldLimits = {
	RESOURCE: 128,
	REASON: 128,
	USER_AGENT: 255,
	/** Length kept from a login "ip" value that is not a valid address */
	INVALID_IP: 15,
} as const;

/**
 * Cut `value` to at most `maxLength` Unicode code points.
 *
 * Counting code points (not UTF-16 units) keeps surrogate pairs intact and
 * matches how PostgreSQL measures varchar(n).
 */
export function truncate(value: string, maxLength: number): string {
	if (value.length <= maxLength) {
		return value;
	}
	const codePoints = Array.from(value);
	if (codePoints.length <= maxLength) {
		return value;
	}
	return codePoints.slice(0, maxLength).join('');
}
