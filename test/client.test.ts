import { describe, expect, it, vi } from "vitest";

import { ConfigError, DatadogClient, UnstableOperationError } from "../src";
import { callHeaders, createMockFetchQueue, jsonResponse } from "../src/testing";

describe("DatadogClient", () => {
	it("builds a client from the environment", async () => {
		const { fetch, calls } = createMockFetchQueue([jsonResponse({ data: [] })]);
		const client = DatadogClient.fromEnv(
			{ fetch },
			{ DD_API_KEY: "env-api", DD_APP_KEY: "env-app", DD_SITE: "datadoghq.eu" },
		);

		await client.users.listUsers();

		expect(client.site).toBe("datadoghq.eu");
		expect(calls[0].url).toBe("https://api.datadoghq.eu/api/v2/users");
		const headers = callHeaders(calls[0]);
		expect(headers.get("DD-API-KEY")).toBe("env-api");
		expect(headers.get("DD-APPLICATION-KEY")).toBe("env-app");
	});

	it("rejects an unknown site", () => {
		expect(() => new DatadogClient({ site: "example.org" }, {})).toThrow(ConfigError);
	});

	it("toggles unstable operations at run time", async () => {
		const warn = vi.fn();
		const { fetch, calls } = createMockFetchQueue([jsonResponse({ data: [] })]);
		const client = new DatadogClient(
			{ apiKey: "test-api-key", fetch, logger: { debug: vi.fn(), warn } },
			{},
		);

		client.enableUnstableOperation("v2.ListIncidents");
		expect(client.isUnstableOperationEnabled("v2.ListIncidents")).toBe(true);
		await client.incidents.listIncidents();
		client.disableUnstableOperation("v2.ListIncidents");

		await expect(client.incidents.listIncidents()).rejects.toBeInstanceOf(
			UnstableOperationError,
		);
		expect(calls).toHaveLength(1);
		expect(warn).toHaveBeenCalledTimes(1);
	});

	it("routes every request through a custom base URL", async () => {
		const { fetch, calls } = createMockFetchQueue([
			jsonResponse({}, 202),
			jsonResponse({ data: [] }),
		]);
		const client = new DatadogClient(
			{ apiKey: "test-api-key", baseUrl: "http://127.0.0.1:8126/", fetch },
			{},
		);

		await client.logs.submitLog([{ message: "local" }]);
		await client.users.listUsers();

		expect(calls.map((call) => call.url)).toEqual([
			"http://127.0.0.1:8126/api/v2/logs",
			"http://127.0.0.1:8126/api/v2/users",
		]);
	});

	it("sends default headers and a custom user agent", async () => {
		const { fetch, calls } = createMockFetchQueue([jsonResponse({ data: [] })]);
		const client = new DatadogClient(
			{
				apiKey: "test-api-key",
				fetch,
				userAgent: "my-tool/1.0",
				defaultHeaders: { "X-Team": "core" },
			},
			{},
		);

		await client.users.listUsers();

		const headers = callHeaders(calls[0]);
		expect(headers.get("User-Agent")).toBe("my-tool/1.0");
		expect(headers.get("X-Team")).toBe("core");
	});
});
