import { gunzipSync } from "node:zlib";

import { describe, expect, it } from "vitest";

import { APIError, ConfigError, DatadogClient, UnparsedObject } from "../src";
import {
	callHeaders,
	createMockFetchQueue,
	jsonResponse,
	type MockFetchResponder,
} from "../src/testing";

function setup(responses: MockFetchResponder[], site = "datadoghq.com") {
	const { fetch, calls } = createMockFetchQueue(responses);
	const client = new DatadogClient(
		{ apiKey: "test-api-key", appKey: "test-app-key", site, fetch, retry: false },
		{},
	);
	return { client, calls };
}

function log(id: string) {
	return { id, type: "log", attributes: { message: `line ${id}`, service: "web" } };
}

describe("LogsApi", () => {
	it("submits logs to the intake host with the API key only", async () => {
		const { client, calls } = setup([jsonResponse({}, 202)], "us3.datadoghq.com");

		const resp = await client.logs.submitLog(
			[{ message: "hello", service: "web", ddsource: "node" }],
			{ ddtags: "env:test,team:core" },
		);

		expect(resp).toEqual({});
		const url = new URL(calls[0].url);
		expect(url.origin).toBe("https://http-intake.logs.us3.datadoghq.com");
		expect(url.pathname).toBe("/api/v2/logs");
		expect(url.searchParams.get("ddtags")).toBe("env:test,team:core");
		const headers = callHeaders(calls[0]);
		expect(headers.get("DD-API-KEY")).toBe("test-api-key");
		expect(headers.has("DD-APPLICATION-KEY")).toBe(false);
	});

	it("gzips the batch when asked", async () => {
		const { client, calls } = setup([jsonResponse({}, 202)]);

		await client.logs.submitLog([{ message: "zipped" }], { contentEncoding: "gzip" });

		expect(callHeaders(calls[0]).get("Content-Encoding")).toBe("gzip");
		const body = calls[0].init?.body;
		if (!(body instanceof Uint8Array)) throw new Error("expected binary body");
		expect(JSON.parse(gunzipSync(body).toString("utf8"))).toEqual([
			{ message: "zipped" },
		]);
	});

	it("refuses an empty batch", async () => {
		const { client } = setup([]);

		await expect(client.logs.submitLog([])).rejects.toBeInstanceOf(ConfigError);
	});

	it("surfaces intake errors", async () => {
		const { client } = setup([
			jsonResponse(
				{ errors: [{ status: "413", title: "Payload Too Large", detail: "batch too big" }] },
				413,
			),
		]);

		const err = await client.logs.submitLog([{ message: "x" }]).catch((e: unknown) => e);

		expect(err).toBeInstanceOf(APIError);
		if (!(err instanceof APIError)) return;
		expect(err.status).toBe(413);
		expect(err.errors).toEqual(["batch too big"]);
	});

	it("searches logs and follows the body cursor", async () => {
		const { client, calls } = setup([
			jsonResponse({ data: [log("l1"), log("l2")], meta: { page: { after: "next-1" } } }),
			jsonResponse({ data: [log("l3"), { id: "l4", type: "trace" }] }),
			jsonResponse({ data: [log("l5")] }),
		]);

		const items = [];
		for await (const item of client.logs.listLogsWithPagination({
			filter: { query: "service:web", indexes: ["main"] },
			page: { limit: 2 },
		})) {
			items.push(item);
		}

		expect(items).toHaveLength(4);
		expect(items[3]).toBeInstanceOf(UnparsedObject);
		expect(calls).toHaveLength(2);
		expect(calls[0].url).toBe("https://api.datadoghq.com/api/v2/logs/events/search");
		expect(JSON.parse(String(calls[1].init?.body))).toEqual({
			filter: { query: "service:web", indexes: ["main"] },
			page: { limit: 2, cursor: "next-1" },
		});
	});

	it("lists logs with query parameters", async () => {
		const { client, calls } = setup([jsonResponse({ data: [log("l1")] })]);

		await client.logs.listLogsGet({
			filterQuery: "status:error",
			filterFrom: new Date(Date.UTC(2024, 4, 1, 12, 0, 0)),
			filterStorageTier: "online-archives",
			pageLimit: 50,
		});

		const url = new URL(calls[0].url);
		expect(url.pathname).toBe("/api/v2/logs/events");
		expect(url.searchParams.get("filter[query]")).toBe("status:error");
		expect(url.searchParams.get("filter[from]")).toBe("2024-05-01T12:00:00Z");
		expect(url.searchParams.get("filter[storage_tier]")).toBe("online-archives");
		expect(url.searchParams.get("page[limit]")).toBe("50");
	});

	it("pages the GET listing through page[cursor]", async () => {
		const { client, calls } = setup([
			jsonResponse({ data: [log("l1")], meta: { page: { after: "c9" } } }),
			jsonResponse({ data: [] }),
		]);

		const ids: Array<string | undefined> = [];
		for await (const item of client.logs.listLogsGetWithPagination({ pageLimit: 1 })) {
			if (!(item instanceof UnparsedObject)) ids.push(item.id);
		}

		expect(ids).toEqual(["l1"]);
		expect(new URL(calls[1].url).searchParams.get("page[cursor]")).toBe("c9");
	});

	it("searches logs once", async () => {
		const { client, calls } = setup([jsonResponse({ data: [log("l1")] })]);

		const resp = await client.logs.listLogs({
			filter: { query: "service:web", indexes: ["main"] },
			page: { limit: 5 },
		});

		expect(resp.data).toEqual([log("l1")]);
		expect(calls[0].url).toBe("https://api.datadoghq.com/api/v2/logs/events/search");
		expect(calls[0].init?.body).toBe(
			'{"filter":{"query":"service:web","indexes":["main"]},"page":{"limit":5}}',
		);
	});
});
