import { z } from "zod";

import { ConfigError } from "./errors";
import type { HTTPClient } from "./http";
import {
	CursorMetaSchema,
	PaginationLinksSchema,
	type UnparsedObject,
	model,
	tolerant,
} from "./models";
import { nextCursor, paginate } from "./pagination";
import { appendQuery } from "./params";
import type { ContentEncoding } from "./types";

export const LogsSortSchema = z.enum(["timestamp", "-timestamp"]);
export type LogsSort = z.infer<typeof LogsSortSchema>;

export const LogsStorageTierSchema = z.enum(["indexes", "online-archives"]);
export type LogsStorageTier = z.infer<typeof LogsStorageTierSchema>;

/**
 * One log sent to the intake. Extra string attributes are indexed as-is.
 */
export interface HTTPLogItem {
	message: string;
	ddsource?: string;
	ddtags?: string;
	hostname?: string;
	service?: string;
	[attribute: string]: string | undefined;
}

export interface SubmitLogParams {
	contentEncoding?: ContentEncoding;
	/** Comma-separated tags applied to every log in the batch. */
	ddtags?: string;
}

const LogModel = model({
	id: z.string().optional(),
	type: z.enum(["log"]).optional(),
	attributes: model({
		attributes: z.record(z.unknown()).optional(),
		host: z.string().optional(),
		message: z.string().optional(),
		service: z.string().optional(),
		status: z.string().optional(),
		tags: z.array(z.string()).optional(),
		timestamp: z.string().optional(),
	}).optional(),
});
export type Log = z.infer<typeof LogModel>;
export const LogSchema = tolerant(LogModel);

export const LogsListResponseSchema = model({
	data: z.array(LogSchema).optional(),
	links: PaginationLinksSchema.optional(),
	meta: CursorMetaSchema.optional(),
});
export type LogsListResponse = z.infer<typeof LogsListResponseSchema>;

export interface LogsListRequest {
	filter?: {
		query?: string;
		indexes?: string[];
		from?: string;
		to?: string;
		storage_tier?: LogsStorageTier;
	};
	options?: { timeOffset?: number; timezone?: string };
	page?: { cursor?: string; limit?: number };
	sort?: LogsSort;
}

export interface ListLogsGetParams {
	filterQuery?: string;
	filterIndex?: string;
	filterFrom?: Date;
	filterTo?: Date;
	filterStorageTier?: LogsStorageTier;
	sort?: LogsSort;
	pageCursor?: string;
	pageLimit?: number;
}

export class LogsApi {
	private readonly http: HTTPClient;

	constructor(http: HTTPClient) {
		this.http = http;
	}

	/**
	 * Sends a batch of logs to the intake host. Only the API key is sent.
	 */
	async submitLog(
		body: HTTPLogItem[],
		params: SubmitLogParams = {},
	): Promise<unknown> {
		if (!Array.isArray(body) || body.length === 0) {
			throw new ConfigError("body is required");
		}
		const query = new URLSearchParams();
		appendQuery(query, "ddtags", params.ddtags);
		return this.http.json("/api/v2/logs", {
			method: "POST",
			query,
			body,
			auth: ["apiKeyAuth"],
			contentEncoding: params.contentEncoding,
			serverKey: "v2.LogsApi.SubmitLog",
		});
	}

	async listLogs(body: LogsListRequest = {}): Promise<LogsListResponse> {
		return this.http.decode("/api/v2/logs/events/search", LogsListResponseSchema, {
			method: "POST",
			body,
		});
	}

	/**
	 * Iterates every log matching `body`, carrying the cursor in `page.cursor`.
	 */
	listLogsWithPagination(
		body: LogsListRequest = {},
	): AsyncGenerator<Log | UnparsedObject, void, undefined> {
		const current: LogsListRequest = { ...body };
		return paginate({
			pageSize: body.page?.limit,
			fetchPage: (limit) => this.listLogs({ ...current, page: { ...current.page, limit } }),
			items: (page) => page.data,
			advance: (page) => {
				const cursor = nextCursor(page);
				current.page = { ...current.page, cursor };
				return cursor !== undefined;
			},
		});
	}

	async listLogsGet(params: ListLogsGetParams = {}): Promise<LogsListResponse> {
		const query = new URLSearchParams();
		appendQuery(query, "filter[query]", params.filterQuery);
		appendQuery(query, "filter[index]", params.filterIndex);
		appendQuery(query, "filter[from]", params.filterFrom);
		appendQuery(query, "filter[to]", params.filterTo);
		appendQuery(query, "filter[storage_tier]", params.filterStorageTier);
		appendQuery(query, "sort", params.sort);
		appendQuery(query, "page[cursor]", params.pageCursor);
		appendQuery(query, "page[limit]", params.pageLimit);
		return this.http.decode("/api/v2/logs/events", LogsListResponseSchema, {
			method: "GET",
			query,
		});
	}

	listLogsGetWithPagination(
		params: ListLogsGetParams = {},
	): AsyncGenerator<Log | UnparsedObject, void, undefined> {
		const current: ListLogsGetParams = { ...params };
		return paginate({
			pageSize: params.pageLimit,
			fetchPage: (pageLimit) => this.listLogsGet({ ...current, pageLimit }),
			items: (page) => page.data,
			advance: (page) => {
				current.pageCursor = nextCursor(page);
				return current.pageCursor !== undefined;
			},
		});
	}
}
