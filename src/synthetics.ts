import { z } from "zod";

import { ConfigError } from "./errors";
import type { HTTPClient } from "./http";
import {
	type UnparsedObject,
	model,
	nullable,
	oneOf,
	tolerant,
} from "./models";
import { appendQuery, expandPath } from "./params";

export const SyntheticsTestPauseStatusSchema = z.enum(["live", "paused"]);
export type SyntheticsTestPauseStatus = z.infer<typeof SyntheticsTestPauseStatusSchema>;

export const SyntheticsTestTypeSchema = z.enum(["api", "browser"]);
export const SyntheticsTestSubtypeSchema = z.enum([
	"http",
	"ssl",
	"tcp",
	"dns",
	"multi",
	"icmp",
	"udp",
	"websocket",
	"grpc",
]);
export type SyntheticsTestSubtype = z.infer<typeof SyntheticsTestSubtypeSchema>;

export const SyntheticsAssertionTypeSchema = z.enum([
	"body",
	"header",
	"statusCode",
	"certificate",
	"responseTime",
	"property",
	"recordEvery",
	"recordSome",
	"tlsVersion",
	"minTlsVersion",
	"latency",
	"packetLossPercentage",
	"packetsReceived",
	"networkHop",
	"receivedMessage",
	"grpcHealthcheckStatus",
	"grpcMetadata",
	"grpcProto",
	"connection",
]);
export type SyntheticsAssertionType = z.infer<typeof SyntheticsAssertionTypeSchema>;

export const SyntheticsAssertionOperatorSchema = z.enum([
	"contains",
	"doesNotContain",
	"is",
	"isNot",
	"lessThan",
	"lessThanOrEqual",
	"moreThan",
	"moreThanOrEqual",
	"matches",
	"doesNotMatch",
	"validates",
	"isInMoreThan",
	"isInLessThan",
	"doesNotExist",
	"isUndefined",
]);
export type SyntheticsAssertionOperator = z.infer<
	typeof SyntheticsAssertionOperatorSchema
>;

const AssertionTargetSchema = model({
	operator: SyntheticsAssertionOperatorSchema,
	type: SyntheticsAssertionTypeSchema,
	property: z.string().optional(),
	target: z.unknown().optional(),
	timingsScope: z.enum(["all", "withoutDNS"]).optional(),
});

const AssertionJSONPathSchema = model({
	operator: z.enum(["validatesJSONPath"]),
	type: SyntheticsAssertionTypeSchema,
	property: z.string().optional(),
	target: model({
		jsonPath: z.string().optional(),
		operator: z.string().optional(),
		targetValue: z.unknown().optional(),
	}).optional(),
});

/**
 * Assertion on a test response: a plain comparison or a JSON path check.
 */
export const SyntheticsAssertionSchema = oneOf("SyntheticsAssertion", [
	AssertionTargetSchema,
	AssertionJSONPathSchema,
]);
export type SyntheticsAssertion = z.output<typeof SyntheticsAssertionSchema>;

export type SyntheticsAssertionInput =
	| {
			operator: SyntheticsAssertionOperator;
			type: SyntheticsAssertionType;
			property?: string;
			target?: unknown;
			timingsScope?: "all" | "withoutDNS";
	  }
	| {
			operator: "validatesJSONPath";
			type: SyntheticsAssertionType;
			property?: string;
			target?: { jsonPath?: string; operator?: string; targetValue?: unknown };
	  };

const TestConfigSchema = model({
	assertions: z.array(SyntheticsAssertionSchema).optional(),
	request: z.record(z.unknown()).optional(),
	configVariables: z.array(z.record(z.unknown())).optional(),
	steps: z.array(z.record(z.unknown())).optional(),
	variables: z.array(z.record(z.unknown())).optional(),
});

const CreatorSchema = model({
	email: z.string().optional(),
	handle: z.string().optional(),
	name: z.string().optional(),
});

const SyntheticsTestDetailsModel = model({
	public_id: z.string().optional(),
	name: z.string().optional(),
	message: z.string().optional(),
	type: SyntheticsTestTypeSchema.optional(),
	subtype: SyntheticsTestSubtypeSchema.optional(),
	status: SyntheticsTestPauseStatusSchema.optional(),
	config: TestConfigSchema.optional(),
	creator: CreatorSchema.optional(),
	locations: z.array(z.string()).optional(),
	monitor_id: z.number().optional(),
	options: z.record(z.unknown()).optional(),
	tags: z.array(z.string()).optional(),
});
export type SyntheticsTestDetails = z.infer<typeof SyntheticsTestDetailsModel>;
export const SyntheticsTestDetailsSchema = tolerant(SyntheticsTestDetailsModel);

export const SyntheticsListTestsResponseSchema = model({
	tests: z.array(SyntheticsTestDetailsSchema).optional(),
});
export type SyntheticsListTestsResponse = z.infer<
	typeof SyntheticsListTestsResponseSchema
>;

const SyntheticsAPITestModel = model({
	public_id: z.string().optional(),
	name: z.string(),
	message: z.string(),
	type: z.enum(["api"]),
	subtype: SyntheticsTestSubtypeSchema.optional(),
	status: SyntheticsTestPauseStatusSchema.optional(),
	config: TestConfigSchema,
	locations: z.array(z.string()),
	monitor_id: z.number().optional(),
	options: z.record(z.unknown()),
	tags: z.array(z.string()).optional(),
});
export type SyntheticsAPITest = z.infer<typeof SyntheticsAPITestModel>;
export const SyntheticsAPITestSchema = tolerant(SyntheticsAPITestModel);

export interface SyntheticsAPITestInput {
	name: string;
	message: string;
	type: "api";
	subtype?: SyntheticsTestSubtype;
	status?: SyntheticsTestPauseStatus;
	config: {
		assertions?: SyntheticsAssertionInput[];
		request?: Record<string, unknown>;
		configVariables?: Array<Record<string, unknown>>;
		steps?: Array<Record<string, unknown>>;
	};
	locations: string[];
	options: Record<string, unknown>;
	tags?: string[];
}

export const SyntheticsAPITestResultsResponseSchema = model({
	last_timestamp_fetched: z.number().optional(),
	public_id: z.string().optional(),
	results: z
		.array(
			model({
				check_time: z.number().optional(),
				probe_dc: z.string().optional(),
				result_id: z.string().optional(),
				status: z.number().optional(),
				result: z.record(z.unknown()).optional(),
			}),
		)
		.optional(),
});
export type SyntheticsAPITestResultsResponse = z.infer<
	typeof SyntheticsAPITestResultsResponseSchema
>;

export interface GetAPITestResultsParams {
	fromTs?: number;
	toTs?: number;
	/** Locations to keep; sent as one `probe_dc` entry each. */
	probeDc?: string[];
}

export interface SyntheticsTriggerTest {
	public_id: string;
	metadata?: { ci?: Record<string, unknown>; git?: Record<string, unknown> };
}

export const SyntheticsTriggerResponseSchema = model({
	batch_id: nullable(z.string()),
	locations: z.array(z.record(z.unknown())).optional(),
	results: z
		.array(
			model({
				device: z.string().optional(),
				location: z.number().optional(),
				public_id: z.string().optional(),
				result_id: z.string().optional(),
			}),
		)
		.optional(),
	triggered_check_ids: z.array(z.string()).optional(),
});
export type SyntheticsTriggerResponse = z.infer<typeof SyntheticsTriggerResponseSchema>;

export const SyntheticsDeleteTestsResponseSchema = model({
	deleted_tests: z
		.array(
			model({
				deleted_at: z.string().optional(),
				public_id: z.string().optional(),
			}),
		)
		.optional(),
});
export type SyntheticsDeleteTestsResponse = z.infer<
	typeof SyntheticsDeleteTestsResponseSchema
>;

/**
 * SyntheticsApi manages Synthetic tests and triggers their runs.
 */
export class SyntheticsApi {
	private readonly http: HTTPClient;

	constructor(http: HTTPClient) {
		this.http = http;
	}

	async listTests(
		params: { pageSize?: number; pageNumber?: number } = {},
	): Promise<SyntheticsListTestsResponse> {
		const query = new URLSearchParams();
		appendQuery(query, "page_size", params.pageSize);
		appendQuery(query, "page_number", params.pageNumber);
		return this.http.decode("/api/v1/synthetics/tests", SyntheticsListTestsResponseSchema, {
			method: "GET",
			query,
		});
	}

	async getTest(publicId: string): Promise<SyntheticsTestDetails | UnparsedObject> {
		return this.http.decode(
			expandPath("/api/v1/synthetics/tests/{public_id}", { public_id: publicId }),
			SyntheticsTestDetailsSchema,
			{ method: "GET" },
		);
	}

	async getApiTest(publicId: string): Promise<SyntheticsAPITest | UnparsedObject> {
		return this.http.decode(
			expandPath("/api/v1/synthetics/tests/api/{public_id}", { public_id: publicId }),
			SyntheticsAPITestSchema,
			{ method: "GET" },
		);
	}

	async createApiTest(
		body: SyntheticsAPITestInput,
	): Promise<SyntheticsAPITest | UnparsedObject> {
		if (!body?.name?.trim()) {
			throw new ConfigError("name is required");
		}
		if (!body.locations?.length) {
			throw new ConfigError("locations is required");
		}
		return this.http.decode("/api/v1/synthetics/tests/api", SyntheticsAPITestSchema, {
			method: "POST",
			body,
		});
	}

	async getApiTestResults(
		publicId: string,
		params: GetAPITestResultsParams = {},
	): Promise<SyntheticsAPITestResultsResponse> {
		const query = new URLSearchParams();
		appendQuery(query, "from_ts", params.fromTs);
		appendQuery(query, "to_ts", params.toTs);
		appendQuery(query, "probe_dc", params.probeDc, "multi");
		return this.http.decode(
			expandPath("/api/v1/synthetics/tests/{public_id}/results", { public_id: publicId }),
			SyntheticsAPITestResultsResponseSchema,
			{ method: "GET", query },
		);
	}

	/**
	 * Pauses or resumes a test. Resolves to the server's boolean answer.
	 */
	async updateTestPauseStatus(
		publicId: string,
		newStatus: SyntheticsTestPauseStatus,
	): Promise<boolean> {
		return this.http.decode(
			expandPath("/api/v1/synthetics/tests/{public_id}/status", { public_id: publicId }),
			z.boolean(),
			{ method: "PUT", body: { new_status: newStatus } },
		);
	}

	async triggerTests(tests: SyntheticsTriggerTest[]): Promise<SyntheticsTriggerResponse> {
		if (!tests?.length) {
			throw new ConfigError("tests is required");
		}
		return this.http.decode(
			"/api/v1/synthetics/tests/trigger",
			SyntheticsTriggerResponseSchema,
			{ method: "POST", body: { tests } },
		);
	}

	async deleteTests(
		publicIds: string[],
		forceDeleteDependencies?: boolean,
	): Promise<SyntheticsDeleteTestsResponse> {
		if (!publicIds?.length) {
			throw new ConfigError("publicIds is required");
		}
		return this.http.decode(
			"/api/v1/synthetics/tests/delete",
			SyntheticsDeleteTestsResponseSchema,
			{
				method: "POST",
				body: {
					public_ids: publicIds,
					force_delete_dependencies: forceDeleteDependencies,
				},
			},
		);
	}
}
