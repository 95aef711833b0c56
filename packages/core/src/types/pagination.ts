export interface PaginationParams {
	/** 1-based. Default: 1 */
	page?: number;
	/** Default: 20, max: 100 */
	perPage?: number;
}

export interface PaginatedResult<T> {
	data: T[];
	hasMore: boolean;
	total: number;
}

export function resolvePagination(params: PaginationParams = {}): { limit: number; offset: number } {
	const page = Math.max(1, Math.floor(params.page ?? 1));
	const perPage = Math.min(100, Math.max(1, Math.floor(params.perPage ?? 20)));
	return { limit: perPage, offset: (page - 1) * perPage };
}
