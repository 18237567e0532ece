import { z } from "zod";

import { ConfigError } from "./errors";
import type { HTTPClient } from "./http";
import {
	CursorMetaSchema,
	PaginationLinksSchema,
	type UnparsedObject,
	model,
	oneOf,
	tolerant,
} from "./models";
import { nextCursor, paginate } from "./pagination";
import { appendQuery, expandPath } from "./params";

export const RuleSeveritySchema = z.enum(["info", "low", "medium", "high", "critical"]);
export type RuleSeverity = z.infer<typeof RuleSeveritySchema>;

export const StandardRuleTypeSchema = z.enum([
	"log_detection",
	"infrastructure_configuration",
	"workload_security",
	"cloud_configuration",
	"application_security",
]);
export type StandardRuleType = z.infer<typeof StandardRuleTypeSchema>;

export const SignalStateSchema = z.enum(["open", "archived", "under_review"]);
export type SignalState = z.infer<typeof SignalStateSchema>;

export const SignalArchiveReasonSchema = z.enum([
	"none",
	"false_positive",
	"testing_or_maintenance",
	"investigated_case_opened",
	"other",
]);
export type SignalArchiveReason = z.infer<typeof SignalArchiveReasonSchema>;

const RuleCaseSchema = model({
	condition: z.string().optional(),
	name: z.string().optional(),
	notifications: z.array(z.string()).optional(),
	status: RuleSeveritySchema.optional(),
});

const RuleFilterSchema = model({
	action: z.enum(["require", "suppress"]).optional(),
	query: z.string().optional(),
});

// Fields shared by both rule kinds.
const ruleFields = {
	id: z.string().optional(),
	name: z.string().optional(),
	message: z.string().optional(),
	cases: z.array(RuleCaseSchema).optional(),
	filters: z.array(RuleFilterSchema).optional(),
	options: z.record(z.unknown()).optional(),
	tags: z.array(z.string()).optional(),
	createdAt: z.number().optional(),
	creationAuthorId: z.number().optional(),
	updateAuthorId: z.number().optional(),
	deprecationDate: z.number().optional(),
	hasExtendedTitle: z.boolean().optional(),
	isDefault: z.boolean().optional(),
	isDeleted: z.boolean().optional(),
	isEnabled: z.boolean().optional(),
	version: z.number().optional(),
};

export const StandardRuleSchema = model({
	...ruleFields,
	type: StandardRuleTypeSchema.optional(),
	queries: z
		.array(
			model({
				query: z.string().optional(),
				name: z.string().optional(),
				aggregation: z.string().optional(),
				groupByFields: z.array(z.string()).optional(),
				distinctFields: z.array(z.string()).optional(),
			}),
		)
		.optional(),
});
export type StandardRule = z.infer<typeof StandardRuleSchema>;

export const SignalRuleSchema = model({
	...ruleFields,
	type: z.enum(["signal_correlation"]).optional(),
	queries: z
		.array(
			model({
				ruleId: z.string().optional(),
				name: z.string().optional(),
				aggregation: z.string().optional(),
				correlatedByFields: z.array(z.string()).optional(),
				correlatedQueryIndex: z.number().optional(),
				defaultRuleId: z.string().optional(),
			}),
		)
		.optional(),
});
export type SignalRule = z.infer<typeof SignalRuleSchema>;

/**
 * A detection rule: standard rules query logs or configuration, signal
 * rules correlate other rules' signals.
 */
export const RuleResponseSchema = oneOf("SecurityMonitoringRuleResponse", [
	StandardRuleSchema,
	SignalRuleSchema,
]);
export type RuleResponse = z.output<typeof RuleResponseSchema>;

export const RulesListResponseSchema = model({
	data: z.array(RuleResponseSchema).optional(),
	meta: model({
		page: model({
			total_count: z.number().optional(),
			total_filtered_count: z.number().optional(),
		}).optional(),
	}).optional(),
});
export type RulesListResponse = z.infer<typeof RulesListResponseSchema>;

interface RuleCaseCreate {
	status: RuleSeverity;
	condition?: string;
	name?: string;
	notifications?: string[];
}

export interface StandardRuleCreatePayload {
	name: string;
	message: string;
	isEnabled: boolean;
	cases: RuleCaseCreate[];
	options: Record<string, unknown>;
	queries: Array<{
		query: string;
		name?: string;
		aggregation?: string;
		groupByFields?: string[];
		distinctFields?: string[];
	}>;
	filters?: Array<{ action?: "require" | "suppress"; query?: string }>;
	hasExtendedTitle?: boolean;
	tags?: string[];
	type?: "log_detection" | "workload_security";
}

export interface SignalRuleCreatePayload {
	name: string;
	message: string;
	isEnabled: boolean;
	cases: RuleCaseCreate[];
	options: Record<string, unknown>;
	queries: Array<{
		ruleId: string;
		name?: string;
		aggregation?: string;
		correlatedByFields?: string[];
		correlatedQueryIndex?: number;
	}>;
	filters?: Array<{ action?: "require" | "suppress"; query?: string }>;
	hasExtendedTitle?: boolean;
	tags?: string[];
	type: "signal_correlation";
}

export type RuleCreatePayload = StandardRuleCreatePayload | SignalRuleCreatePayload;

export type RuleUpdatePayload = Partial<
	Omit<StandardRuleCreatePayload, "type"> & { version: number }
>;

const SignalModel = model({
	id: z.string().optional(),
	type: z.enum(["signal"]).optional(),
	attributes: model({
		attributes: z.record(z.unknown()).optional(),
		message: z.string().optional(),
		tags: z.array(z.string()).optional(),
		timestamp: z.string().optional(),
	}).optional(),
});
export type Signal = z.infer<typeof SignalModel>;
export const SignalSchema = tolerant(SignalModel);

export const SignalsListResponseSchema = model({
	data: z.array(SignalSchema).optional(),
	links: PaginationLinksSchema.optional(),
	meta: CursorMetaSchema.optional(),
});
export type SignalsListResponse = z.infer<typeof SignalsListResponseSchema>;

export interface ListSignalsParams {
	filterQuery?: string;
	filterFrom?: Date;
	filterTo?: Date;
	sort?: "timestamp" | "-timestamp";
	pageCursor?: string;
	pageLimit?: number;
}

const TriageUserSchema = model({
	id: z.number().optional(),
	uuid: z.string(),
	handle: z.string().optional(),
	name: z.string().optional(),
	icon: z.string().optional(),
});

const SignalTriageModel = model({
	id: z.string().optional(),
	type: z.enum(["signal_metadata"]).optional(),
	attributes: model({
		state: SignalStateSchema,
		archive_reason: SignalArchiveReasonSchema.optional(),
		archive_comment: z.string().optional(),
		archive_comment_timestamp: z.number().optional(),
		archive_comment_user: TriageUserSchema.optional(),
		assignee: TriageUserSchema,
		incident_ids: z.array(z.number()),
		state_update_timestamp: z.number().optional(),
		state_update_user: TriageUserSchema.optional(),
	}),
});
export type SignalTriage = z.infer<typeof SignalTriageModel>;

export const SignalTriageUpdateResponseSchema = model({
	data: tolerant(SignalTriageModel),
});
export type SignalTriageUpdateResponse = z.infer<
	typeof SignalTriageUpdateResponseSchema
>;

export interface SignalStateUpdateRequest {
	data: {
		type?: "signal_metadata";
		id?: string;
		attributes: {
			state: SignalState;
			archive_reason?: SignalArchiveReason;
			archive_comment?: string;
			version?: number;
		};
	};
}

/**
 * SecurityMonitoringApi manages detection rules and the signals they raise.
 */
export class SecurityMonitoringApi {
	private readonly http: HTTPClient;

	constructor(http: HTTPClient) {
		this.http = http;
	}

	async listRules(
		params: { pageSize?: number; pageNumber?: number } = {},
	): Promise<RulesListResponse> {
		const query = new URLSearchParams();
		appendQuery(query, "page[size]", params.pageSize);
		appendQuery(query, "page[number]", params.pageNumber);
		return this.http.decode("/api/v2/security_monitoring/rules", RulesListResponseSchema, {
			method: "GET",
			query,
		});
	}

	async getRule(ruleId: string): Promise<RuleResponse> {
		return this.http.decode(
			expandPath("/api/v2/security_monitoring/rules/{rule_id}", { rule_id: ruleId }),
			RuleResponseSchema,
			{ method: "GET" },
		);
	}

	async createRule(body: RuleCreatePayload): Promise<RuleResponse> {
		if (!body?.name?.trim()) {
			throw new ConfigError("name is required");
		}
		if (!body.queries?.length) {
			throw new ConfigError("queries is required");
		}
		return this.http.decode("/api/v2/security_monitoring/rules", RuleResponseSchema, {
			method: "POST",
			body,
		});
	}

	async updateRule(ruleId: string, body: RuleUpdatePayload): Promise<RuleResponse> {
		return this.http.decode(
			expandPath("/api/v2/security_monitoring/rules/{rule_id}", { rule_id: ruleId }),
			RuleResponseSchema,
			{ method: "PUT", body },
		);
	}

	async deleteRule(ruleId: string): Promise<void> {
		await this.http.request(
			expandPath("/api/v2/security_monitoring/rules/{rule_id}", { rule_id: ruleId }),
			{ method: "DELETE", accept: "*/*" },
		);
	}

	async listSignals(params: ListSignalsParams = {}): Promise<SignalsListResponse> {
		const query = new URLSearchParams();
		appendQuery(query, "filter[query]", params.filterQuery);
		appendQuery(query, "filter[from]", params.filterFrom);
		appendQuery(query, "filter[to]", params.filterTo);
		appendQuery(query, "sort", params.sort);
		appendQuery(query, "page[cursor]", params.pageCursor);
		appendQuery(query, "page[limit]", params.pageLimit);
		return this.http.decode(
			"/api/v2/security_monitoring/signals",
			SignalsListResponseSchema,
			{ method: "GET", query },
		);
	}

	listSignalsWithPagination(
		params: ListSignalsParams = {},
	): AsyncGenerator<Signal | UnparsedObject, void, undefined> {
		const current: ListSignalsParams = { ...params };
		return paginate({
			pageSize: params.pageLimit,
			fetchPage: (pageLimit) => this.listSignals({ ...current, pageLimit }),
			items: (page) => page.data,
			advance: (page) => {
				current.pageCursor = nextCursor(page);
				return current.pageCursor !== undefined;
			},
		});
	}

	/**
	 * Changes the triage state of a signal (open, under review, archived).
	 */
	async editSignalState(
		signalId: string,
		body: SignalStateUpdateRequest,
	): Promise<SignalTriageUpdateResponse> {
		if (!body?.data?.attributes?.state) {
			throw new ConfigError("state is required");
		}
		return this.http.decode(
			expandPath("/api/v2/security_monitoring/signals/{signal_id}/state", {
				signal_id: signalId,
			}),
			SignalTriageUpdateResponseSchema,
			{ method: "PATCH", body },
		);
	}
}
