import type { PaginationExpression } from "../../query/expressions.js";

/**
 * The page of `items` selected by `pagination`; all items when the page size
 * is unlimited.
 */
export const paginate = <T>(
	items: ReadonlyArray<T>,
	pagination: PaginationExpression | undefined,
): ReadonlyArray<T> => {
	if (pagination === undefined || pagination.pageSize === undefined) {
		return items;
	}
	const start = (pagination.pageNumber - 1) * pagination.pageSize;
	return items.slice(start, start + pagination.pageSize);
};
