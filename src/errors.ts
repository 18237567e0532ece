import { APIErrorResponseSchema } from "./models";
import type { RetryMetadata, TransportErrorKind } from "./types";

export type ErrorCategory = "config" | "transport" | "api";

export class DatadogError extends Error {
	category: ErrorCategory;
	status?: number;
	requestId?: string;
	data?: unknown;
	retries?: RetryMetadata;
	cause?: unknown;

	constructor(
		message: string,
		opts: {
			category: ErrorCategory;
			status?: number;
			requestId?: string;
			data?: unknown;
			retries?: RetryMetadata;
			cause?: unknown;
		},
	) {
		super(message);
		this.name = this.constructor.name;
		this.category = opts.category;
		this.status = opts.status;
		this.requestId = opts.requestId;
		this.data = opts.data;
		this.retries = opts.retries;
		this.cause = opts.cause;
	}
}

export class ConfigError extends DatadogError {
	constructor(message: string, data?: unknown) {
		super(message, { category: "config", status: 400, data });
	}
}

/**
 * Raised before any request is sent when an operation is still flagged
 * unstable and has not been enabled on the client.
 */
export class UnstableOperationError extends ConfigError {
	readonly operationId: string;

	constructor(operationId: string) {
		super(`Unstable operation '${operationId}' is disabled`);
		this.operationId = operationId;
	}
}

export class TransportError extends DatadogError {
	kind: TransportErrorKind;

	constructor(
		message: string,
		opts: { kind: TransportErrorKind; retries?: RetryMetadata; cause?: unknown },
	) {
		super(message, {
			category: "transport",
			status: opts.kind === "timeout" ? 408 : 0,
			retries: opts.retries,
			cause: opts.cause,
			data: opts.cause,
		});
		this.kind = opts.kind;
	}
}

export class APIError extends DatadogError {
	/** Error strings from the response's error model. */
	readonly errors: string[];
	/** Raw response body. */
	readonly body: string;

	constructor(
		message: string,
		opts: {
			status: number;
			requestId?: string;
			errors?: string[];
			body?: string;
			data?: unknown;
			retries?: RetryMetadata;
		},
	) {
		super(message, {
			category: "api",
			status: opts.status,
			requestId: opts.requestId,
			data: opts.data,
			retries: opts.retries,
		});
		this.errors = opts.errors ?? [];
		this.body = opts.body ?? "";
	}

	isNotFound(): boolean {
		return this.status === 404;
	}

	isUnauthorized(): boolean {
		return this.status === 401;
	}

	isForbidden(): boolean {
		return this.status === 403;
	}

	isConflict(): boolean {
		return this.status === 409;
	}

	isRateLimit(): boolean {
		return this.status === 429;
	}

	isServerError(): boolean {
		return this.status !== undefined && this.status >= 500;
	}
}

export interface DecodeIssue {
	path: string;
	message: string;
}

/**
 * A 2xx response whose body is not JSON or does not match the expected model.
 */
export class DecodeError extends DatadogError {
	readonly issues: ReadonlyArray<DecodeIssue>;
	readonly body: string;

	constructor(
		message: string,
		opts: {
			status: number;
			requestId?: string;
			issues?: ReadonlyArray<DecodeIssue>;
			body: string;
			cause?: unknown;
		},
	) {
		super(message, {
			category: "api",
			status: opts.status,
			requestId: opts.requestId,
			cause: opts.cause,
		});
		this.issues = opts.issues ?? [];
		this.body = opts.body;
	}
}

export function requestIdFrom(headers: Headers): string | undefined {
	return (
		headers.get("X-Datadog-Request-Id") ||
		headers.get("X-Request-Id") ||
		undefined
	);
}

export async function parseErrorResponse(
	response: Response,
	retries?: RetryMetadata,
): Promise<DatadogError> {
	const requestId = requestIdFrom(response.headers);
	const fallbackMessage = response.statusText || "Request failed";
	const status = response.status || 500;

	let bodyText = "";
	let bodyReadErr: unknown | undefined;
	try {
		bodyText = await response.text();
	} catch (err) {
		bodyReadErr = err;
	}

	if (!bodyText) {
		return new APIError(fallbackMessage, {
			status,
			requestId,
			retries,
			data: bodyReadErr
				? {
						body_read_error:
							bodyReadErr instanceof Error
								? bodyReadErr.message
								: String(bodyReadErr),
					}
				: undefined,
		});
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(bodyText);
	} catch {
		// Not JSON, use raw text
		return new APIError(bodyText, { status, requestId, retries, body: bodyText });
	}

	const errors = errorStrings(parsed);
	return new APIError(errors[0] || fallbackMessage, {
		status,
		requestId,
		errors,
		body: bodyText,
		data: parsed,
		retries,
	});
}

function errorStrings(parsed: unknown): string[] {
	const result = APIErrorResponseSchema.safeParse(parsed);
	if (!result.success) return [];
	const out: string[] = [];
	for (const entry of result.data.errors) {
		if (typeof entry === "string") {
			out.push(entry);
		} else if (entry.detail) {
			out.push(entry.detail);
		} else if (entry.title) {
			out.push(entry.title);
		}
	}
	return out;
}
