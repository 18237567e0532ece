import { describe, expect, it } from "vitest";

import { ConfigError, DatadogClient, UnparsedObject } from "../src";
import { createMockFetchQueue, jsonResponse, type MockFetchResponder } from "../src/testing";

const BASE = "https://api.datadoghq.com/api/v1/synthetics/tests";

function setup(responses: MockFetchResponder[]) {
	const { fetch, calls } = createMockFetchQueue(responses);
	const client = new DatadogClient(
		{ apiKey: "test-api-key", appKey: "test-app-key", fetch, retry: false },
		{},
	);
	return { client, calls };
}

const apiTest = {
	public_id: "abc-def-ghi",
	name: "Checkout health",
	message: "Checkout is failing",
	type: "api",
	subtype: "http",
	status: "live",
	locations: ["aws:eu-central-1"],
	options: { tick_every: 60 },
	config: {
		request: { method: "GET", url: "https://shop.example.com/health" },
		assertions: [
			{ operator: "is", type: "statusCode", target: 200 },
			{
				operator: "validatesJSONPath",
				type: "body",
				target: { jsonPath: "$.status", operator: "is", targetValue: "ok" },
			},
		],
	},
};

describe("SyntheticsApi", () => {
	it("lists tests", async () => {
		const { client, calls } = setup([
			jsonResponse({ tests: [apiTest, { ...apiTest, public_id: "x", type: "mobile" }] }),
		]);

		const resp = await client.synthetics.listTests({ pageSize: 2 });

		expect(resp.tests?.[0]).toEqual(apiTest);
		expect(resp.tests?.[1]).toBeInstanceOf(UnparsedObject);
		expect(calls[0].url).toBe(`${BASE}?page_size=2`);
	});

	it("gets a test and an API test", async () => {
		const { client, calls } = setup([jsonResponse(apiTest), jsonResponse(apiTest)]);

		const details = await client.synthetics.getTest("abc-def-ghi");
		const api = await client.synthetics.getApiTest("abc-def-ghi");

		expect(details).toEqual(apiTest);
		expect(api).toEqual(apiTest);
		expect(calls[0].url).toBe(`${BASE}/abc-def-ghi`);
		expect(calls[1].url).toBe(`${BASE}/api/abc-def-ghi`);
	});

	it("keeps assertions of an unknown shape", async () => {
		const withNewAssertion = {
			...apiTest,
			config: { assertions: [{ operator: "is", type: "javascript", code: "x" }] },
		};
		const { client } = setup([jsonResponse(withNewAssertion)]);

		const test = await client.synthetics.getApiTest("abc-def-ghi");

		if (test instanceof UnparsedObject) throw new Error("expected a parsed test");
		expect(test.config.assertions?.[0]).toBeInstanceOf(UnparsedObject);
	});

	it("creates an API test", async () => {
		const { client, calls } = setup([jsonResponse(apiTest)]);

		await client.synthetics.createApiTest({
			name: "Checkout health",
			message: "Checkout is failing",
			type: "api",
			subtype: "http",
			locations: ["aws:eu-central-1"],
			options: { tick_every: 60 },
			config: {
				request: { method: "GET", url: "https://shop.example.com/health" },
				assertions: [{ operator: "is", type: "statusCode", target: 200 }],
			},
		});

		expect(calls[0].url).toBe(`${BASE}/api`);
		expect(calls[0].init?.method).toBe("POST");
	});

	it("requires locations for a new test", async () => {
		const { client } = setup([]);

		await expect(
			client.synthetics.createApiTest({
				name: "n",
				message: "m",
				type: "api",
				locations: [],
				options: {},
				config: {},
			}),
		).rejects.toBeInstanceOf(ConfigError);
	});

	it("fetches results for several locations", async () => {
		const { client, calls } = setup([
			jsonResponse({ public_id: "abc-def-ghi", results: [{ result_id: "1", status: 0 }] }),
		]);

		const resp = await client.synthetics.getApiTestResults("abc-def-ghi", {
			fromTs: 1000,
			probeDc: ["aws:eu-central-1", "aws:us-east-2"],
		});

		expect(resp.results?.[0].result_id).toBe("1");
		const url = new URL(calls[0].url);
		expect(url.pathname).toBe("/api/v1/synthetics/tests/abc-def-ghi/results");
		expect(url.searchParams.get("from_ts")).toBe("1000");
		expect(url.searchParams.getAll("probe_dc")).toEqual([
			"aws:eu-central-1",
			"aws:us-east-2",
		]);
	});

	it("pauses a test", async () => {
		const { client, calls } = setup([jsonResponse(true)]);

		const ok = await client.synthetics.updateTestPauseStatus("abc-def-ghi", "paused");

		expect(ok).toBe(true);
		expect(calls[0].url).toBe(`${BASE}/abc-def-ghi/status`);
		expect(calls[0].init?.method).toBe("PUT");
		expect(calls[0].init?.body).toBe('{"new_status":"paused"}');
	});

	it("triggers tests", async () => {
		const { client, calls } = setup([
			jsonResponse({
				batch_id: null,
				results: [{ public_id: "abc-def-ghi", result_id: "r1" }],
				triggered_check_ids: ["abc-def-ghi"],
			}),
		]);

		const resp = await client.synthetics.triggerTests([{ public_id: "abc-def-ghi" }]);

		expect(resp.batch_id).toBeNull();
		expect(resp.triggered_check_ids).toEqual(["abc-def-ghi"]);
		expect(calls[0].url).toBe(`${BASE}/trigger`);
		expect(calls[0].init?.body).toBe('{"tests":[{"public_id":"abc-def-ghi"}]}');
	});

	it("deletes tests", async () => {
		const { client, calls } = setup([
			jsonResponse({ deleted_tests: [{ public_id: "abc-def-ghi" }] }),
		]);

		const resp = await client.synthetics.deleteTests(["abc-def-ghi"]);

		expect(resp.deleted_tests).toEqual([{ public_id: "abc-def-ghi" }]);
		expect(calls[0].url).toBe(`${BASE}/delete`);
		expect(calls[0].init?.body).toBe('{"public_ids":["abc-def-ghi"]}');
	});
});
