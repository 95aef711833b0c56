import type { PaginatedResult, PaginationParams } from "@instalo/core";
import { resolvePagination } from "@instalo/core";
import type { InstaloAdapter, Row, SortBy, Where } from "@instalo/core/db";

export async function listPage<T>(
	adapter: InstaloAdapter,
	params: {
		model: string;
		where: Where[];
		pagination?: PaginationParams;
		sortBy?: SortBy;
		map: (row: Row) => T;
	},
): Promise<PaginatedResult<T>> {
	const { limit, offset } = resolvePagination(params.pagination);
	const [rows, total] = await Promise.all([
		adapter.findMany({
			model: params.model,
			where: params.where,
			limit,
			offset,
			sortBy: params.sortBy ?? { field: "createdAt", direction: "desc" },
		}),
		adapter.count({ model: params.model, where: params.where }),
	]);
	const data = rows.map(params.map);
	return { data, hasMore: offset + data.length < total, total };
}
