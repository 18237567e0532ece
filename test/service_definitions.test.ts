import { describe, expect, it } from "vitest";

import { ConfigError, DatadogClient, UnparsedObject } from "../src";
import { createMockFetchQueue, jsonResponse, type MockFetchResponder } from "../src/testing";

const BASE = "https://api.datadoghq.com/api/v2/services/definitions";

function setup(responses: MockFetchResponder[]) {
	const { fetch, calls } = createMockFetchQueue(responses);
	const client = new DatadogClient(
		{ apiKey: "test-api-key", appKey: "test-app-key", fetch, retry: false },
		{},
	);
	return { client, calls };
}

const v1 = {
	"schema-version": "v1",
	info: { "dd-service": "legacy-billing", "display-name": "Billing" },
};
const v2 = {
	"schema-version": "v2",
	"dd-service": "checkout",
	team: "payments",
	contacts: [{ type: "slack", contact: "https://example.slack.com/archives/C1" }],
};

function definition(schema: unknown) {
	return {
		id: "def-1",
		type: "service-definition",
		attributes: { meta: { "ingestion-source": "api" }, schema },
	};
}

describe("ServiceDefinitionApi", () => {
	it("lists definitions of both schema versions", async () => {
		const { client, calls } = setup([
			jsonResponse({ data: [definition(v1), definition(v2)] }),
		]);

		const resp = await client.serviceDefinitions.listServiceDefinitions();

		expect(resp.data).toEqual([definition(v1), definition(v2)]);
		expect(calls[0].url).toBe(BASE);
	});

	it("keeps definitions of an unknown schema version", async () => {
		const { client } = setup([
			jsonResponse({ data: definition({ "schema-version": "v9", "dd-service": "x" }) }),
		]);

		const resp = await client.serviceDefinitions.getServiceDefinition("x");

		if (!resp.data || resp.data instanceof UnparsedObject) {
			throw new Error("expected parsed data");
		}
		expect(resp.data.attributes?.schema).toBeInstanceOf(UnparsedObject);
	});

	it("escapes the service name", async () => {
		const { client, calls } = setup([jsonResponse({ data: definition(v2) })]);

		await client.serviceDefinitions.getServiceDefinition("shop/checkout");

		expect(calls[0].url).toBe(`${BASE}/shop%2Fcheckout`);
	});

	it("creates definitions from an object", async () => {
		const { client, calls } = setup([jsonResponse({ data: [definition(v2)] })]);

		const resp = await client.serviceDefinitions.createOrUpdateServiceDefinitions({
			"schema-version": "v2",
			"dd-service": "checkout",
			team: "payments",
		});

		expect(resp.data).toHaveLength(1);
		expect(calls[0].init?.method).toBe("POST");
		expect(JSON.parse(String(calls[0].init?.body))).toEqual({
			"schema-version": "v2",
			"dd-service": "checkout",
			team: "payments",
		});
	});

	it("requires a service name", async () => {
		const { client } = setup([]);

		await expect(
			client.serviceDefinitions.createOrUpdateServiceDefinitions({
				"schema-version": "v2",
				"dd-service": "",
			}),
		).rejects.toBeInstanceOf(ConfigError);
		await expect(
			client.serviceDefinitions.createOrUpdateServiceDefinitions("  "),
		).rejects.toBeInstanceOf(ConfigError);
	});

	it("deletes a definition", async () => {
		const { client, calls } = setup([new Response(null, { status: 204 })]);

		await client.serviceDefinitions.deleteServiceDefinition("checkout");

		expect(calls[0].init?.method).toBe("DELETE");
		expect(calls[0].url).toBe(`${BASE}/checkout`);
	});
});
