import { z } from "zod";

import { ConfigError } from "./errors";
import type { HTTPClient } from "./http";
import { model } from "./models";
import { appendQuery } from "./params";

const AWS_PATH = "/api/v1/integration/aws";

export const AWSAccountSchema = model({
	account_id: z.string().optional(),
	role_name: z.string().optional(),
	access_key_id: z.string().optional(),
	account_specific_namespace_rules: z.record(z.boolean()).optional(),
	cspm_resource_collection_enabled: z.boolean().optional(),
	excluded_regions: z.array(z.string()).optional(),
	filter_tags: z.array(z.string()).optional(),
	host_tags: z.array(z.string()).optional(),
	metrics_collection_enabled: z.boolean().optional(),
	resource_collection_enabled: z.boolean().optional(),
});
export type AWSAccount = z.infer<typeof AWSAccountSchema>;

export const AWSAccountListResponseSchema = model({
	accounts: z.array(AWSAccountSchema),
});
export type AWSAccountListResponse = z.infer<typeof AWSAccountListResponseSchema>;

export const AWSAccountCreateResponseSchema = model({
	external_id: z.string().optional(),
});
export type AWSAccountCreateResponse = z.infer<typeof AWSAccountCreateResponseSchema>;

/**
 * An account is addressed by `account_id` and `role_name` for role
 * delegation, or by `access_key_id` for access keys.
 */
export interface AWSAccountRef {
	account_id?: string;
	role_name?: string;
	access_key_id?: string;
}

export interface AWSAccountInput extends AWSAccountRef {
	secret_access_key?: string;
	account_specific_namespace_rules?: Record<string, boolean>;
	cspm_resource_collection_enabled?: boolean;
	excluded_regions?: string[];
	filter_tags?: string[];
	host_tags?: string[];
	metrics_collection_enabled?: boolean;
	resource_collection_enabled?: boolean;
}

/**
 * AWSIntegrationApi manages the AWS accounts Datadog collects from.
 */
export class AWSIntegrationApi {
	private readonly http: HTTPClient;

	constructor(http: HTTPClient) {
		this.http = http;
	}

	async listAccounts(ref: AWSAccountRef = {}): Promise<AWSAccountListResponse> {
		return this.http.decode(AWS_PATH, AWSAccountListResponseSchema, {
			method: "GET",
			query: refQuery(ref),
		});
	}

	/**
	 * Resolves the external id to put in the IAM role trust policy.
	 */
	async createAccount(body: AWSAccountInput): Promise<AWSAccountCreateResponse> {
		requireRef(body);
		return this.http.decode(AWS_PATH, AWSAccountCreateResponseSchema, {
			method: "POST",
			body,
		});
	}

	async updateAccount(ref: AWSAccountRef, body: AWSAccountInput): Promise<unknown> {
		requireRef(ref);
		return this.http.json(AWS_PATH, {
			method: "PUT",
			query: refQuery(ref),
			body,
		});
	}

	async deleteAccount(ref: AWSAccountRef): Promise<unknown> {
		requireRef(ref);
		return this.http.json(AWS_PATH, { method: "DELETE", body: ref });
	}
}

function refQuery(ref: AWSAccountRef): URLSearchParams {
	const query = new URLSearchParams();
	appendQuery(query, "account_id", ref.account_id);
	appendQuery(query, "role_name", ref.role_name);
	appendQuery(query, "access_key_id", ref.access_key_id);
	return query;
}

function requireRef(ref: AWSAccountRef): void {
	if (ref?.access_key_id?.trim()) return;
	if (!ref?.account_id?.trim()) {
		throw new ConfigError("account_id or access_key_id is required");
	}
	if (!ref.role_name?.trim()) {
		throw new ConfigError("role_name is required");
	}
}
