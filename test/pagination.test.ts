import { describe, expect, it, vi } from "vitest";

import {
	ConfigError,
	DEFAULT_PAGE_SIZE,
	collect,
	nextCursor,
	paginate,
} from "../src";
import { resolvePageSize } from "../src/pagination";

type Page = { data?: number[]; next?: string };

describe("paginate", () => {
	it("stops after a short page", async () => {
		const pages: Page[] = [{ data: [1, 2], next: "c1" }, { data: [3] }];
		let index = 0;
		const fetchPage = vi.fn(async (): Promise<Page> => pages[index++]);

		const items = await collect(
			paginate({
				pageSize: 2,
				fetchPage,
				items: (page: Page) => page.data,
				advance: (page: Page) => page.next !== undefined,
			}),
		);

		expect(items).toEqual([1, 2, 3]);
		expect(fetchPage).toHaveBeenCalledTimes(2);
	});

	it("stops when advance finds no next page", async () => {
		const fetchPage = vi.fn(async (): Promise<Page> => ({ data: [1, 2] }));

		const items = await collect(
			paginate({
				pageSize: 2,
				fetchPage,
				items: (page: Page) => page.data,
				advance: () => false,
			}),
		);

		expect(items).toEqual([1, 2]);
		expect(fetchPage).toHaveBeenCalledTimes(1);
	});

	it("stops when a page has no items", async () => {
		const items = await collect(
			paginate({
				pageSize: 2,
				fetchPage: async (): Promise<Page> => ({}),
				items: (page: Page) => page.data,
				advance: () => true,
			}),
		);
		expect(items).toEqual([]);
	});

	it("does not fetch further pages once the caller stops", async () => {
		const fetchPage = vi.fn(async (): Promise<Page> => ({ data: [1, 2] }));
		const seen: number[] = [];

		for await (const item of paginate({
			pageSize: 2,
			fetchPage,
			items: (page: Page) => page.data,
			advance: () => true,
		})) {
			seen.push(item);
			if (seen.length === 3) break;
		}

		expect(seen).toEqual([1, 2, 1]);
		expect(fetchPage).toHaveBeenCalledTimes(2);
	});

	it("propagates page errors", async () => {
		const iterator = paginate({
			pageSize: 2,
			fetchPage: async (): Promise<Page> => {
				throw new Error("boom");
			},
			items: (page: Page) => page.data,
			advance: () => true,
		});
		await expect(iterator.next()).rejects.toThrow("boom");
	});
});

describe("paginate page size", () => {
	it("passes the default size to every fetch", async () => {
		const fetchPage = vi.fn(async (): Promise<Page> => ({ data: [1] }));

		await collect(
			paginate({
				fetchPage,
				items: (page: Page) => page.data,
				advance: () => true,
			}),
		);

		expect(fetchPage).toHaveBeenCalledWith(10);
	});

	it("rejects an invalid size from the iterator", async () => {
		const fetchPage = vi.fn(async (): Promise<Page> => ({ data: [] }));
		const iterator = paginate({
			pageSize: 0,
			fetchPage,
			items: (page: Page) => page.data,
			advance: () => true,
		});

		await expect(iterator.next()).rejects.toBeInstanceOf(ConfigError);
		expect(fetchPage).not.toHaveBeenCalled();
	});
});

describe("nextCursor", () => {
	it("reads meta.page.after", () => {
		expect(nextCursor({ meta: { page: { after: "abc" } } })).toBe("abc");
		expect(nextCursor({ meta: { page: { after: "" } } })).toBeUndefined();
		expect(nextCursor({})).toBeUndefined();
	});
});

describe("resolvePageSize", () => {
	it("defaults to ten", () => {
		expect(resolvePageSize(undefined)).toBe(DEFAULT_PAGE_SIZE);
		expect(DEFAULT_PAGE_SIZE).toBe(10);
	});

	it("rejects sizes that are not positive integers", () => {
		expect(() => resolvePageSize(0)).toThrow(ConfigError);
		expect(() => resolvePageSize(2.5)).toThrow(ConfigError);
	});
});
