// Offset pagination over an already ordered result set

export const PRICES_PAGE_SIZE = 10;
export const TRADES_PAGE_SIZE = 5;

export interface Page<T> {
    visible: T[];
    page: number;
    pageSize: number;
    start: number; // index of the first visible item
    end: number;   // exclusive
    total: number;
    hasMore: boolean;
}

/**
 * Slice one page out of `items`. A page past the end is empty with hasMore = false.
 */
export function paginate<T>(items: readonly T[], page: number, pageSize: number = PRICES_PAGE_SIZE): Page<T> {
    if (!Number.isInteger(page) || page < 0) {
        throw new RangeError(`Invalid page: ${page}`);
    }
    if (!Number.isInteger(pageSize) || pageSize <= 0) {
        throw new RangeError(`Invalid page size: ${pageSize}`);
    }

    const total = items.length;
    const start = Math.min(page * pageSize, total);
    const end = Math.min((page + 1) * pageSize, total);

    return {
        visible: items.slice(start, end),
        page,
        pageSize,
        start,
        end,
        total,
        hasMore: (page + 1) * pageSize < total,
    };
}
