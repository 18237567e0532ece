import pkg from "../package.json";

export const SDK_VERSION = pkg.version || "0.0.0";
export const DEFAULT_USER_AGENT = `dd-api-client-ts/${SDK_VERSION}`;
export const DEFAULT_SITE = "datadoghq.com";
export const DEFAULT_CONNECT_TIMEOUT_MS = 5_000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

export const Sites = [
	"datadoghq.com",
	"us3.datadoghq.com",
	"us5.datadoghq.com",
	"ap1.datadoghq.com",
	"datadoghq.eu",
	"ddog-gov.com",
] as const;
export type Site = (typeof Sites)[number];

/**
 * Security schemes an operation can require. Each maps to one request header.
 */
export type AuthScheme = "apiKeyAuth" | "appKeyAuth";

export const AuthHeaders: Record<AuthScheme, string> = {
	apiKeyAuth: "DD-API-KEY",
	appKeyAuth: "DD-APPLICATION-KEY",
};

/** Request body encodings accepted by the intake endpoints. */
export type ContentEncoding = "gzip" | "deflate";

export interface Logger {
	debug(message: string): void;
	warn(message: string): void;
}

export interface RetryConfig {
	maxAttempts?: number;
	baseBackoffMs?: number;
	maxBackoffMs?: number;
	retryPost?: boolean;
}

export interface RetryMetadata {
	attempts: number;
	lastStatus?: number;
	lastError?: string;
}

export type TransportErrorKind = "timeout" | "connect" | "request" | "other";

export interface RequestContext {
	method: string;
	path: string;
	operationId?: string;
	requestId?: string;
}

export interface HttpRequestMetrics {
	latencyMs: number;
	status?: number;
	error?: string;
	retries?: RetryMetadata;
	context: RequestContext;
}

export interface MetricsCallbacks {
	httpRequest?: (metrics: HttpRequestMetrics) => void;
}

export interface TraceCallbacks {
	requestStart?: (context: RequestContext) => void;
	requestFinish?: (info: {
		context: RequestContext;
		status?: number;
		error?: unknown;
		retries?: RetryMetadata;
		latencyMs: number;
	}) => void;
}

/**
 * Client configuration. Keys and site fall back to `DD_API_KEY`,
 * `DD_APP_KEY` and `DD_SITE` when omitted.
 *
 * @example
 * ```typescript
 * import { DatadogClient } from "dd-api-client";
 *
 * const client = new DatadogClient({
 *   apiKey: "<api key>",
 *   appKey: "<application key>",
 *   site: "datadoghq.eu",
 * });
 * ```
 */
export interface ClientOptions {
	apiKey?: string;
	appKey?: string;
	/**
	 * Bearer token sent as `Authorization` in addition to any keys.
	 */
	accessToken?: string;
	site?: string;
	/**
	 * Replaces every operation server, including the log intake host.
	 */
	baseUrl?: string;
	fetch?: typeof fetch;
	userAgent?: string;
	/**
	 * Default connect timeout in milliseconds (applies to each attempt).
	 */
	connectTimeoutMs?: number;
	/**
	 * Default request timeout in milliseconds. Set to 0 to disable.
	 */
	timeoutMs?: number;
	/**
	 * Retry configuration applied to all requests. Set to `false` to disable retries.
	 */
	retry?: RetryConfig | false;
	defaultHeaders?: Record<string, string>;
	/**
	 * When false, ask the server for uncompressed responses.
	 */
	compress?: boolean;
	/**
	 * Dump every request and response through `logger.debug`, keys redacted.
	 */
	debug?: boolean;
	logger?: Logger;
	/**
	 * Unstable operation ids to enable, e.g. `["v2.ListIncidents"]`.
	 */
	unstableOperations?: string[];
	metrics?: MetricsCallbacks;
	trace?: TraceCallbacks;
}

export function mergeMetrics(
	base?: MetricsCallbacks,
	override?: MetricsCallbacks,
): MetricsCallbacks | undefined {
	if (!base && !override) return undefined;
	return {
		...(base || {}),
		...(override || {}),
	};
}

export function mergeTrace(
	base?: TraceCallbacks,
	override?: TraceCallbacks,
): TraceCallbacks | undefined {
	if (!base && !override) return undefined;
	return {
		...(base || {}),
		...(override || {}),
	};
}
