import { z } from "zod";

import { ConfigError } from "./errors";
import type { HTTPClient } from "./http";
import { model, oneOf, tolerant } from "./models";
import { expandPath } from "./params";

const ContactSchema = model({
	type: z.string().optional(),
	name: z.string().optional(),
	contact: z.string().optional(),
});

const LinkSchema = model({
	name: z.string(),
	type: z.string(),
	url: z.string(),
});

export const ServiceDefinitionV1Schema = model({
	"schema-version": z.enum(["v1"]),
	info: model({
		"dd-service": z.string(),
		description: z.string().optional(),
		"display-name": z.string().optional(),
		"service-tier": z.string().optional(),
	}),
	contact: model({
		email: z.string().optional(),
		slack: z.string().optional(),
	}).optional(),
	extensions: z.record(z.unknown()).optional(),
	"external-resources": z.array(LinkSchema).optional(),
	integrations: z.record(z.unknown()).optional(),
	org: model({
		application: z.string().optional(),
		team: z.string().optional(),
	}).optional(),
	tags: z.array(z.string()).optional(),
});
export type ServiceDefinitionV1 = z.infer<typeof ServiceDefinitionV1Schema>;

export const ServiceDefinitionV2Schema = model({
	"schema-version": z.enum(["v2"]),
	"dd-service": z.string(),
	"dd-team": z.string().optional(),
	team: z.string().optional(),
	contacts: z.array(ContactSchema).optional(),
	docs: z.array(model({ name: z.string(), url: z.string(), provider: z.string().optional() })).optional(),
	extensions: z.record(z.unknown()).optional(),
	integrations: z.record(z.unknown()).optional(),
	links: z.array(LinkSchema).optional(),
	repos: z.array(model({ name: z.string(), url: z.string(), provider: z.string().optional() })).optional(),
	tags: z.array(z.string()).optional(),
});
export type ServiceDefinitionV2 = z.infer<typeof ServiceDefinitionV2Schema>;

/**
 * A service definition in either schema version, told apart by
 * `schema-version`.
 */
export const ServiceDefinitionSchemaSchema = oneOf("ServiceDefinitionSchema", [
	ServiceDefinitionV1Schema,
	ServiceDefinitionV2Schema,
]);
export type ServiceDefinitionSchema = z.output<typeof ServiceDefinitionSchemaSchema>;

const MetaSchema = model({
	"github-html-url": z.string().optional(),
	"ingested-schema-version": z.string().optional(),
	"ingestion-source": z.string().optional(),
	"last-modified-time": z.string().optional(),
	warnings: z
		.array(
			model({
				"instance-location": z.string().optional(),
				"keyword-location": z.string().optional(),
				message: z.string().optional(),
			}),
		)
		.optional(),
});

export const ServiceDefinitionDataSchema = tolerant(
	model({
		id: z.string().optional(),
		type: z.enum(["service-definition"]).optional(),
		attributes: model({
			meta: MetaSchema.optional(),
			schema: ServiceDefinitionSchemaSchema.optional(),
		}).optional(),
	}),
);
export type ServiceDefinitionData = z.output<typeof ServiceDefinitionDataSchema>;

export const ServiceDefinitionGetResponseSchema = model({
	data: ServiceDefinitionDataSchema.optional(),
});
export type ServiceDefinitionGetResponse = z.infer<
	typeof ServiceDefinitionGetResponseSchema
>;

export const ServiceDefinitionsListResponseSchema = model({
	data: z.array(ServiceDefinitionDataSchema).optional(),
});
export type ServiceDefinitionsListResponse = z.infer<
	typeof ServiceDefinitionsListResponseSchema
>;

export const ServiceDefinitionCreateResponseSchema = model({
	data: z.array(ServiceDefinitionDataSchema).optional(),
});
export type ServiceDefinitionCreateResponse = z.infer<
	typeof ServiceDefinitionCreateResponseSchema
>;

export interface ServiceDefinitionV2Input {
	"schema-version": "v2";
	"dd-service": string;
	"dd-team"?: string;
	team?: string;
	contacts?: Array<{ type: string; contact: string; name?: string }>;
	docs?: Array<{ name: string; url: string; provider?: string }>;
	extensions?: Record<string, unknown>;
	integrations?: Record<string, unknown>;
	links?: Array<{ name: string; type: string; url: string }>;
	repos?: Array<{ name: string; url: string; provider?: string }>;
	tags?: string[];
}

/**
 * ServiceDefinitionApi manages the service catalog.
 */
export class ServiceDefinitionApi {
	private readonly http: HTTPClient;

	constructor(http: HTTPClient) {
		this.http = http;
	}

	async listServiceDefinitions(): Promise<ServiceDefinitionsListResponse> {
		return this.http.decode(
			"/api/v2/services/definitions",
			ServiceDefinitionsListResponseSchema,
			{ method: "GET" },
		);
	}

	async getServiceDefinition(serviceName: string): Promise<ServiceDefinitionGetResponse> {
		return this.http.decode(
			expandPath("/api/v2/services/definitions/{service_name}", {
				service_name: serviceName,
			}),
			ServiceDefinitionGetResponseSchema,
			{ method: "GET" },
		);
	}

	/**
	 * Creates or updates definitions. A string body is a raw YAML or JSON
	 * document.
	 */
	async createOrUpdateServiceDefinitions(
		body: ServiceDefinitionV2Input | string,
	): Promise<ServiceDefinitionCreateResponse> {
		if (typeof body === "string" ? !body.trim() : !body?.["dd-service"]?.trim()) {
			throw new ConfigError("dd-service is required");
		}
		return this.http.decode(
			"/api/v2/services/definitions",
			ServiceDefinitionCreateResponseSchema,
			{ method: "POST", body },
		);
	}

	async deleteServiceDefinition(serviceName: string): Promise<void> {
		await this.http.request(
			expandPath("/api/v2/services/definitions/{service_name}", {
				service_name: serviceName,
			}),
			{ method: "DELETE", accept: "*/*" },
		);
	}
}
