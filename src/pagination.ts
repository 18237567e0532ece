import { ConfigError } from "./errors";

export const DEFAULT_PAGE_SIZE = 10;

/**
 * One step of a paginated listing. `pageSize` is the size the caller asked
 * for, {@link DEFAULT_PAGE_SIZE} when unset. `advance` moves the caller's
 * request parameters to the next page and reports whether there is one.
 */
export interface Pager<Page, Item> {
	pageSize?: number;
	fetchPage: (pageSize: number) => Promise<Page>;
	items: (page: Page) => ReadonlyArray<Item> | undefined;
	advance: (page: Page, pageSize: number) => boolean;
}

/**
 * Yields every item across pages. Stops after a short page or when
 * `advance` finds no next page. Breaking out of the loop stops fetching.
 */
export async function* paginate<Page, Item>(
	pager: Pager<Page, Item>,
): AsyncGenerator<Item, void, undefined> {
	const pageSize = resolvePageSize(pager.pageSize);
	for (;;) {
		const page = await pager.fetchPage(pageSize);
		const items = pager.items(page) ?? [];
		for (const item of items) {
			yield item;
		}
		if (items.length < pageSize) return;
		if (!pager.advance(page, pageSize)) return;
	}
}

export function resolvePageSize(size: number | undefined): number {
	if (size === undefined) return DEFAULT_PAGE_SIZE;
	if (!Number.isInteger(size) || size <= 0) {
		throw new ConfigError("page size must be a positive integer");
	}
	return size;
}

/**
 * `meta.page.after` of a cursor-paginated response.
 */
export function nextCursor(page: {
	meta?: { page?: { after?: string | null } | null } | null;
}): string | undefined {
	const after = page.meta?.page?.after;
	return after ? after : undefined;
}

/**
 * Collects an async iterable into an array.
 */
export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
	const out: T[] = [];
	for await (const item of iterable) {
		out.push(item);
	}
	return out;
}
