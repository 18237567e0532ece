import { z } from "zod";

import { ConfigError } from "./errors";
import type { HTTPClient } from "./http";
import { model, nullable, tolerant } from "./models";
import { expandPath } from "./params";

const AGENT_RULES_PATH =
	"/api/v2/security_monitoring/cloud_workload_security/agent_rules";
const AGENT_RULE_PATH = `${AGENT_RULES_PATH}/{agent_rule_id}`;

const UserAttributesSchema = model({
	handle: z.string().optional(),
	name: nullable(z.string()),
});

const AgentRuleDataModel = model({
	id: z.string().optional(),
	type: z.enum(["agent_rule"]).optional(),
	attributes: model({
		category: z.string().optional(),
		creationDate: z.number().optional(),
		creator: UserAttributesSchema.optional(),
		defaultRule: z.boolean().optional(),
		description: z.string().optional(),
		enabled: z.boolean().optional(),
		expression: z.string().optional(),
		name: z.string().optional(),
		updatedAt: z.number().optional(),
		updater: UserAttributesSchema.optional(),
		version: z.number().optional(),
	}).optional(),
});
export type AgentRuleData = z.infer<typeof AgentRuleDataModel>;
export const AgentRuleDataSchema = tolerant(AgentRuleDataModel);

export const AgentRuleResponseSchema = model({
	data: AgentRuleDataSchema.optional(),
});
export type AgentRuleResponse = z.infer<typeof AgentRuleResponseSchema>;

export const AgentRulesListResponseSchema = model({
	data: z.array(AgentRuleDataSchema).optional(),
});
export type AgentRulesListResponse = z.infer<typeof AgentRulesListResponseSchema>;

export interface AgentRuleCreateRequest {
	data: {
		type: "agent_rule";
		attributes: {
			name: string;
			expression: string;
			description?: string;
			enabled?: boolean;
		};
	};
}

export interface AgentRuleUpdateRequest {
	data: {
		type: "agent_rule";
		attributes: {
			expression?: string;
			description?: string;
			enabled?: boolean;
		};
	};
}

/**
 * CloudWorkloadSecurityApi manages the agent rules evaluated by the
 * runtime security agent.
 */
export class CloudWorkloadSecurityApi {
	private readonly http: HTTPClient;

	constructor(http: HTTPClient) {
		this.http = http;
	}

	async createAgentRule(body: AgentRuleCreateRequest): Promise<AgentRuleResponse> {
		const attributes = body?.data?.attributes;
		if (!attributes?.name?.trim()) {
			throw new ConfigError("name is required");
		}
		if (!attributes.expression?.trim()) {
			throw new ConfigError("expression is required");
		}
		return this.http.decode(AGENT_RULES_PATH, AgentRuleResponseSchema, {
			method: "POST",
			body,
		});
	}

	async getAgentRule(agentRuleId: string): Promise<AgentRuleResponse> {
		return this.http.decode(
			expandPath(AGENT_RULE_PATH, { agent_rule_id: agentRuleId }),
			AgentRuleResponseSchema,
			{ method: "GET" },
		);
	}

	async listAgentRules(): Promise<AgentRulesListResponse> {
		return this.http.decode(AGENT_RULES_PATH, AgentRulesListResponseSchema, {
			method: "GET",
		});
	}

	async updateAgentRule(
		agentRuleId: string,
		body: AgentRuleUpdateRequest,
	): Promise<AgentRuleResponse> {
		return this.http.decode(
			expandPath(AGENT_RULE_PATH, { agent_rule_id: agentRuleId }),
			AgentRuleResponseSchema,
			{ method: "PATCH", body },
		);
	}

	async deleteAgentRule(agentRuleId: string): Promise<void> {
		await this.http.request(
			expandPath(AGENT_RULE_PATH, { agent_rule_id: agentRuleId }),
			{ method: "DELETE", accept: "*/*" },
		);
	}

	/**
	 * Downloads the policy file built from every enabled agent rule.
	 */
	async downloadPolicyFile(): Promise<Uint8Array> {
		return this.http.bytes("/api/v2/security/cloud_workload/policy/download", {
			method: "GET",
		});
	}
}
