import { z } from "zod";

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

export const EventsSortSchema = z.enum(["timestamp", "-timestamp"]);
export type EventsSort = z.infer<typeof EventsSortSchema>;

const EventResponseModel = model({
	id: z.string().optional(),
	type: z.enum(["event"]).optional(),
	attributes: model({
		attributes: z.record(z.unknown()).optional(),
		message: z.string().optional(),
		tags: z.array(z.string()).optional(),
		timestamp: z.string().optional(),
	}).optional(),
});
export type EventResponse = z.infer<typeof EventResponseModel>;
export const EventResponseSchema = tolerant(EventResponseModel);

export const EventsListResponseSchema = model({
	data: z.array(EventResponseSchema).optional(),
	links: PaginationLinksSchema.optional(),
	meta: CursorMetaSchema.optional(),
});
export type EventsListResponse = z.infer<typeof EventsListResponseSchema>;

export interface ListEventsParams {
	filterQuery?: string;
	filterFrom?: string;
	filterTo?: string;
	sort?: EventsSort;
	pageCursor?: string;
	pageLimit?: number;
}

/**
 * Body of an events search. Times accept ISO 8601, date math (`now-15m`) or
 * epoch milliseconds.
 */
export interface EventsListRequest {
	filter?: { query?: string; from?: string; to?: string };
	options?: { timeOffset?: number; timezone?: string };
	page?: { cursor?: string; limit?: number };
	sort?: EventsSort;
}

/**
 * EventsApi searches the event stream. Both operations are unstable and
 * must be enabled on the client first.
 */
export class EventsApi {
	private readonly http: HTTPClient;

	constructor(http: HTTPClient) {
		this.http = http;
	}

	async listEvents(params: ListEventsParams = {}): Promise<EventsListResponse> {
		const query = new URLSearchParams();
		appendQuery(query, "filter[query]", params.filterQuery);
		appendQuery(query, "filter[from]", params.filterFrom);
		appendQuery(query, "filter[to]", params.filterTo);
		appendQuery(query, "sort", params.sort);
		appendQuery(query, "page[cursor]", params.pageCursor);
		appendQuery(query, "page[limit]", params.pageLimit);
		return this.http.decode("/api/v2/events", EventsListResponseSchema, {
			method: "GET",
			query,
			operationId: "v2.ListEvents",
		});
	}

	/**
	 * Iterates every event matching `params`, following `meta.page.after`.
	 */
	listEventsWithPagination(
		params: ListEventsParams = {},
	): AsyncGenerator<EventResponse | UnparsedObject, void, undefined> {
		const current: ListEventsParams = { ...params };
		return paginate({
			pageSize: params.pageLimit,
			fetchPage: (pageLimit) => this.listEvents({ ...current, pageLimit }),
			items: (page) => page.data,
			advance: (page) => {
				current.pageCursor = nextCursor(page);
				return current.pageCursor !== undefined;
			},
		});
	}

	async searchEvents(body: EventsListRequest = {}): Promise<EventsListResponse> {
		return this.http.decode("/api/v2/events/search", EventsListResponseSchema, {
			method: "POST",
			body,
			operationId: "v2.SearchEvents",
		});
	}

	searchEventsWithPagination(
		body: EventsListRequest = {},
	): AsyncGenerator<EventResponse | UnparsedObject, void, undefined> {
		const current: EventsListRequest = { ...body };
		return paginate({
			pageSize: body.page?.limit,
			fetchPage: (limit) => this.searchEvents({ ...current, page: { ...current.page, limit } }),
			items: (page) => page.data,
			advance: (page) => {
				const cursor = nextCursor(page);
				current.page = { ...current.page, cursor };
				return cursor !== undefined;
			},
		});
	}
}
