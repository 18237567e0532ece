import { z } from "zod";

import { ConfigError } from "./errors";
import type { HTTPClient } from "./http";
import { model, nullable, tolerant } from "./models";
import { appendQuery, expandPath } from "./params";

const UserModel = model({
	id: z.string().optional(),
	type: z.enum(["users"]).optional(),
	attributes: model({
		created_at: z.string().optional(),
		modified_at: z.string().optional(),
		disabled: z.boolean().optional(),
		email: z.string().optional(),
		handle: z.string().optional(),
		icon: z.string().optional(),
		name: nullable(z.string()),
		service_account: z.boolean().optional(),
		status: z.string().optional(),
		title: nullable(z.string()),
		verified: z.boolean().optional(),
	}).optional(),
	relationships: z.record(z.unknown()).optional(),
});
export type User = z.infer<typeof UserModel>;
export const UserSchema = tolerant(UserModel);

export const UserResponseSchema = model({
	data: UserSchema.optional(),
	included: z.array(z.record(z.unknown())).optional(),
});
export type UserResponse = z.infer<typeof UserResponseSchema>;

export const UsersResponseSchema = model({
	data: z.array(UserSchema).optional(),
	included: z.array(z.record(z.unknown())).optional(),
	meta: model({
		page: model({
			total_count: z.number().optional(),
			total_filtered_count: z.number().optional(),
		}).optional(),
	}).optional(),
});
export type UsersResponse = z.infer<typeof UsersResponseSchema>;

export interface ListUsersParams {
	pageSize?: number;
	pageNumber?: number;
	/** Attribute to sort by, e.g. `name` or `-created_at`. */
	sort?: string;
	sortDir?: "asc" | "desc";
	filter?: string;
	/** Comma-separated statuses: `Active`, `Pending`, `Disabled`. */
	filterStatus?: string;
}

export interface UserCreateRequest {
	data: {
		type: "users";
		attributes: { email: string; name?: string; title?: string };
		relationships?: {
			roles?: { data: Array<{ id: string; type: "roles" }> };
		};
	};
}

export interface UserUpdateRequest {
	data: {
		id: string;
		type: "users";
		attributes: { disabled?: boolean; email?: string; name?: string };
	};
}

export class UsersApi {
	private readonly http: HTTPClient;

	constructor(http: HTTPClient) {
		this.http = http;
	}

	async listUsers(params: ListUsersParams = {}): Promise<UsersResponse> {
		const query = new URLSearchParams();
		appendQuery(query, "page[size]", params.pageSize);
		appendQuery(query, "page[number]", params.pageNumber);
		appendQuery(query, "sort", params.sort);
		appendQuery(query, "sort_dir", params.sortDir);
		appendQuery(query, "filter", params.filter);
		appendQuery(query, "filter[status]", params.filterStatus);
		return this.http.decode("/api/v2/users", UsersResponseSchema, {
			method: "GET",
			query,
		});
	}

	async getUser(userId: string): Promise<UserResponse> {
		return this.http.decode(
			expandPath("/api/v2/users/{user_id}", { user_id: userId }),
			UserResponseSchema,
			{ method: "GET" },
		);
	}

	async createUser(body: UserCreateRequest): Promise<UserResponse> {
		if (!body?.data?.attributes?.email?.trim()) {
			throw new ConfigError("email is required");
		}
		return this.http.decode("/api/v2/users", UserResponseSchema, {
			method: "POST",
			body,
		});
	}

	async updateUser(userId: string, body: UserUpdateRequest): Promise<UserResponse> {
		if (body?.data?.id !== userId) {
			throw new ConfigError("body id must match userId");
		}
		return this.http.decode(
			expandPath("/api/v2/users/{user_id}", { user_id: userId }),
			UserResponseSchema,
			{ method: "PATCH", body },
		);
	}

	/**
	 * Disables a user. The account is kept and can be re-enabled.
	 */
	async disableUser(userId: string): Promise<void> {
		await this.http.request(
			expandPath("/api/v2/users/{user_id}", { user_id: userId }),
			{ method: "DELETE", accept: "*/*" },
		);
	}
}
