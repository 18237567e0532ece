import { z } from "zod";

import { ConfigError } from "./errors";
import type { HTTPClient } from "./http";
import { type UnparsedObject, model, nullable, oneOf, tolerant } from "./models";
import { paginate } from "./pagination";
import { appendQuery, expandPath } from "./params";

export const IncidentRelatedObjectSchema = z.enum(["users", "attachments"]);
export type IncidentRelatedObject = z.infer<typeof IncidentRelatedObjectSchema>;

const IncidentFieldSingleValueModel = model({
	type: z.enum(["dropdown", "textbox"]).optional(),
	value: nullable(z.string()),
});
const IncidentFieldMultipleValueModel = model({
	type: z.enum(["multiselect", "textarray", "metrictag", "autocomplete"]).optional(),
	value: nullable(z.array(z.string())),
});

/**
 * Value of a custom incident field: a single value (`dropdown`, `textbox`)
 * or a list (`multiselect`, `textarray`, `metrictag`, `autocomplete`).
 */
export const IncidentFieldAttributesSchema = oneOf("IncidentFieldAttributes", [
	IncidentFieldSingleValueModel,
	IncidentFieldMultipleValueModel,
]);
export type IncidentFieldAttributes = z.output<typeof IncidentFieldAttributesSchema>;

export type IncidentFieldValue =
	| { type?: "dropdown" | "textbox"; value?: string | null }
	| {
			type?: "multiselect" | "textarray" | "metrictag" | "autocomplete";
			value?: string[] | null;
	  };

const NotificationHandleSchema = model({
	display_name: z.string().optional(),
	handle: z.string().optional(),
});

const RelationshipSchema = model({
	data: nullable(
		model({
			id: z.string(),
			type: z.string(),
		}),
	),
});

const IncidentResponseDataModel = model({
	id: z.string(),
	type: z.enum(["incidents"]),
	attributes: model({
		title: z.string(),
		created: z.string().optional(),
		modified: z.string().optional(),
		customer_impact_duration: z.number().optional(),
		customer_impact_end: nullable(z.string()),
		customer_impact_scope: nullable(z.string()),
		customer_impact_start: nullable(z.string()),
		customer_impacted: z.boolean().optional(),
		detected: nullable(z.string()),
		fields: z.record(IncidentFieldAttributesSchema).optional(),
		notification_handles: z.array(NotificationHandleSchema).optional(),
		public_id: z.number().optional(),
		resolved: nullable(z.string()),
		time_to_detect: z.number().optional(),
		time_to_internal_response: z.number().optional(),
		time_to_repair: z.number().optional(),
		time_to_resolve: z.number().optional(),
	}).optional(),
	relationships: z.record(RelationshipSchema).optional(),
});
export type IncidentResponseData = z.infer<typeof IncidentResponseDataModel>;
export const IncidentResponseDataSchema = tolerant(IncidentResponseDataModel);

export const IncidentResponseSchema = model({
	data: IncidentResponseDataSchema,
	included: z.array(z.record(z.unknown())).optional(),
});
export type IncidentResponse = z.infer<typeof IncidentResponseSchema>;

export const IncidentsResponseSchema = model({
	data: z.array(IncidentResponseDataSchema),
	included: z.array(z.record(z.unknown())).optional(),
	meta: model({
		pagination: model({
			next_offset: z.number().optional(),
			offset: z.number().optional(),
			size: z.number().optional(),
		}).optional(),
	}).optional(),
});
export type IncidentsResponse = z.infer<typeof IncidentsResponseSchema>;

interface UserRelationship {
	data: { id: string; type: "users" } | null;
}

export interface IncidentCreateRequest {
	data: {
		type: "incidents";
		attributes: {
			title: string;
			customer_impacted: boolean;
			customer_impact_scope?: string;
			fields?: Record<string, IncidentFieldValue>;
			notification_handles?: Array<{ display_name?: string; handle?: string }>;
		};
		relationships?: { commander_user?: UserRelationship };
	};
}

export interface IncidentUpdateRequest {
	data: {
		id: string;
		type: "incidents";
		attributes?: {
			title?: string;
			customer_impacted?: boolean;
			customer_impact_scope?: string;
			customer_impact_start?: string | null;
			customer_impact_end?: string | null;
			detected?: string | null;
			resolved?: string | null;
			fields?: Record<string, IncidentFieldValue>;
			notification_handles?: Array<{ display_name?: string; handle?: string }>;
		};
		relationships?: { commander_user?: UserRelationship };
	};
}

export interface ListIncidentsParams {
	include?: IncidentRelatedObject[];
	pageSize?: number;
	pageOffset?: number;
}

/**
 * IncidentsApi manages incidents. Every operation here is unstable.
 */
export class IncidentsApi {
	private readonly http: HTTPClient;

	constructor(http: HTTPClient) {
		this.http = http;
	}

	async createIncident(body: IncidentCreateRequest): Promise<IncidentResponse> {
		if (!body?.data?.attributes?.title?.trim()) {
			throw new ConfigError("title is required");
		}
		return this.http.decode("/api/v2/incidents", IncidentResponseSchema, {
			method: "POST",
			body,
			operationId: "v2.CreateIncident",
		});
	}

	async getIncident(
		incidentId: string,
		include?: IncidentRelatedObject[],
	): Promise<IncidentResponse> {
		const query = new URLSearchParams();
		appendQuery(query, "include", include, "csv");
		return this.http.decode(
			expandPath("/api/v2/incidents/{incident_id}", { incident_id: incidentId }),
			IncidentResponseSchema,
			{ method: "GET", query, operationId: "v2.GetIncident" },
		);
	}

	async updateIncident(
		incidentId: string,
		body: IncidentUpdateRequest,
		include?: IncidentRelatedObject[],
	): Promise<IncidentResponse> {
		const query = new URLSearchParams();
		appendQuery(query, "include", include, "csv");
		return this.http.decode(
			expandPath("/api/v2/incidents/{incident_id}", { incident_id: incidentId }),
			IncidentResponseSchema,
			{ method: "PATCH", query, body, operationId: "v2.UpdateIncident" },
		);
	}

	async deleteIncident(incidentId: string): Promise<void> {
		await this.http.request(
			expandPath("/api/v2/incidents/{incident_id}", { incident_id: incidentId }),
			{ method: "DELETE", accept: "*/*", operationId: "v2.DeleteIncident" },
		);
	}

	async listIncidents(params: ListIncidentsParams = {}): Promise<IncidentsResponse> {
		const query = new URLSearchParams();
		appendQuery(query, "include", params.include, "csv");
		appendQuery(query, "page[size]", params.pageSize);
		appendQuery(query, "page[offset]", params.pageOffset);
		return this.http.decode("/api/v2/incidents", IncidentsResponseSchema, {
			method: "GET",
			query,
			operationId: "v2.ListIncidents",
		});
	}

	/**
	 * Iterates every incident, moving `page[offset]` forward by the page size.
	 */
	listIncidentsWithPagination(
		params: ListIncidentsParams = {},
	): AsyncGenerator<IncidentResponseData | UnparsedObject, void, undefined> {
		const current: ListIncidentsParams = { ...params };
		return paginate({
			pageSize: params.pageSize,
			fetchPage: (pageSize) => this.listIncidents({ ...current, pageSize }),
			items: (page) => page.data,
			advance: (_page, pageSize) => {
				current.pageOffset = (current.pageOffset ?? 0) + pageSize;
				return true;
			},
		});
	}
}
