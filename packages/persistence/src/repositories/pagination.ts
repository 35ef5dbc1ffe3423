/**
 * Pagination types shared by the audit query repositories.
 */

export interface PaginationOptions {
	readonly limit: number;
	readonly offset: number;
	/** "asc" sorts oldest first; anything else newest first */
	readonly sortOrder?: string | undefined;
}

export interface DateRange {
	readonly from?: Date | undefined;
	readonly to?: Date | undefined;
}

export interface PagedRecords<T> {
	readonly records: T[];
	readonly total: number;
	readonly limit: number;
	readonly offset: number;
}
