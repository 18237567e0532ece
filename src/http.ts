import { deflateSync, gzipSync } from "node:zlib";
import type { z } from "zod";

import { type ResolvedConfig, serverUrl } from "./config";
import {
	ConfigError,
	DatadogError,
	DecodeError,
	TransportError,
	parseErrorResponse,
	requestIdFrom,
} from "./errors";
import {
	AuthHeaders,
	DEFAULT_CONNECT_TIMEOUT_MS,
	DEFAULT_REQUEST_TIMEOUT_MS,
	DEFAULT_USER_AGENT,
	type AuthScheme,
	type ContentEncoding,
	type Logger,
	type MetricsCallbacks,
	type RequestContext,
	type RetryConfig,
	type RetryMetadata,
	type TraceCallbacks,
	type TransportErrorKind,
	mergeMetrics,
	mergeTrace,
} from "./types";

const DEFAULT_AUTH: AuthScheme[] = ["apiKeyAuth", "appKeyAuth"];

export interface RequestOptions {
	method?: string;
	headers?: HeadersInit;
	query?: URLSearchParams;
	body?: unknown;
	signal?: AbortSignal;
	accept?: string;
	/**
	 * Operation id such as `v2.ListIncidents`; unstable ones are gated.
	 */
	operationId?: string;
	/**
	 * `<version>.<Api>.<Operation>` key used to pick an operation server.
	 */
	serverKey?: string;
	/**
	 * Security schemes to send. Defaults to API key and application key.
	 */
	auth?: AuthScheme[];
	contentEncoding?: ContentEncoding;
	timeoutMs?: number;
	/**
	 * Override retry behavior for this request. Set to `false` to disable retries.
	 */
	retry?: RetryConfig | false;
	/**
	 * Override the per-request connect timeout in milliseconds (set to 0 to disable).
	 */
	connectTimeoutMs?: number;
	metrics?: MetricsCallbacks;
	trace?: TraceCallbacks;
}

interface NormalizedRetryConfig {
	maxAttempts: number;
	baseBackoffMs: number;
	maxBackoffMs: number;
	retryPost: boolean;
}

export class HTTPClient {
	readonly config: ResolvedConfig;
	private readonly accessToken?: string;
	private readonly fetchImpl?: typeof fetch;
	private readonly userAgent: string;
	private readonly defaultTimeoutMs: number;
	private readonly defaultConnectTimeoutMs: number;
	private readonly retry?: NormalizedRetryConfig;
	private readonly defaultHeaders: Record<string, string>;
	private readonly compress: boolean;
	private readonly debug: boolean;
	private readonly logger?: Logger;
	private readonly metrics?: MetricsCallbacks;
	private readonly trace?: TraceCallbacks;

	constructor(cfg: {
		config: ResolvedConfig;
		accessToken?: string;
		fetchImpl?: typeof fetch;
		userAgent?: string;
		connectTimeoutMs?: number;
		timeoutMs?: number;
		retry?: RetryConfig | false;
		defaultHeaders?: Record<string, string>;
		compress?: boolean;
		debug?: boolean;
		logger?: Logger;
		metrics?: MetricsCallbacks;
		trace?: TraceCallbacks;
	}) {
		this.config = cfg.config;
		this.accessToken = cfg.accessToken?.trim();
		this.fetchImpl = cfg.fetchImpl;
		this.userAgent = cfg.userAgent?.trim() || DEFAULT_USER_AGENT;
		this.defaultConnectTimeoutMs =
			cfg.connectTimeoutMs === undefined
				? DEFAULT_CONNECT_TIMEOUT_MS
				: Math.max(0, cfg.connectTimeoutMs);
		this.defaultTimeoutMs =
			cfg.timeoutMs === undefined
				? DEFAULT_REQUEST_TIMEOUT_MS
				: Math.max(0, cfg.timeoutMs);
		this.retry = normalizeRetryConfig(cfg.retry);
		this.defaultHeaders = normalizeHeaders(cfg.defaultHeaders);
		this.compress = cfg.compress ?? true;
		this.debug = cfg.debug ?? false;
		this.logger = cfg.logger;
		this.metrics = cfg.metrics;
		this.trace = cfg.trace;
	}

	async request(path: string, options: RequestOptions = {}): Promise<Response> {
		if (options.operationId) {
			this.config.unstable.check(options.operationId);
		}
		const fetchFn = this.fetchImpl ?? globalThis.fetch;
		if (!fetchFn) {
			throw new ConfigError(
				"fetch is not available; provide a fetch implementation",
			);
		}

		const method = options.method || "GET";
		const url = buildUrl(
			serverUrl(this.config, options.serverKey),
			path,
			options.query,
		);
		const metrics = mergeMetrics(this.metrics, options.metrics);
		const trace = mergeTrace(this.trace, options.trace);
		const context: RequestContext = {
			method,
			path,
			operationId: options.operationId,
		};
		trace?.requestStart?.(context);
		const start = metrics?.httpRequest || trace?.requestFinish ? Date.now() : 0;
		const headers = new Headers({
			...this.defaultHeaders,
			...(options.headers || {}),
		});

		const accepts = options.accept || "application/json";
		if (!headers.has("Accept")) {
			headers.set("Accept", accepts);
		}

		const payload = encodeBody(options.body, options.contentEncoding);
		if (payload !== undefined && !headers.has("Content-Type")) {
			headers.set("Content-Type", "application/json");
		}
		if (payload !== undefined && options.contentEncoding) {
			headers.set("Content-Encoding", options.contentEncoding);
		}

		const secrets = this.applyAuth(headers, options.auth ?? DEFAULT_AUTH);

		if (!headers.has("User-Agent")) {
			headers.set("User-Agent", this.userAgent);
		}
		if (!this.compress) {
			headers.set("Accept-Encoding", "identity");
		}

		const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
		const connectTimeoutMs =
			options.connectTimeoutMs ?? this.defaultConnectTimeoutMs;
		const retryCfg = normalizeRetryConfig(
			options.retry === undefined ? this.retry : options.retry,
		);
		const attempts = retryCfg ? Math.max(1, retryCfg.maxAttempts) : 1;
		let lastError: unknown;
		let lastStatus: number | undefined;

		for (let attempt = 1; attempt <= attempts; attempt++) {
			let connectTimedOut = false;
			let requestTimedOut = false;
			const connectController =
				connectTimeoutMs > 0 ? new AbortController() : undefined;
			const requestController =
				timeoutMs > 0 ? new AbortController() : undefined;
			const signal = mergeSignals(
				options.signal,
				connectController?.signal,
				requestController?.signal,
			);
			const connectTimer =
				connectController &&
				setTimeout(() => {
					connectTimedOut = true;
					connectController.abort(
						new DOMException("connect timeout", "AbortError"),
					);
				}, connectTimeoutMs);
			const requestTimer =
				requestController &&
				setTimeout(() => {
					requestTimedOut = true;
					requestController.abort(
						new DOMException("timeout", "AbortError"),
					);
				}, timeoutMs);
			try {
				if (this.debug) {
					this.dumpRequest(method, url, headers, options.body, secrets);
				}
				const response = await fetchFn(url, {
					method,
					headers,
					body: payload,
					signal,
				});
				if (connectTimer) {
					clearTimeout(connectTimer);
				}
				if (this.debug) {
					await this.dumpResponse(method, url, response, secrets);
				}

				if (!response.ok) {
					const shouldRetry =
						retryCfg &&
						shouldRetryStatus(
							response.status,
							method,
							retryCfg.retryPost,
						) &&
						attempt < attempts;
					if (shouldRetry) {
						lastStatus = response.status;
						await response.body?.cancel();
						await backoff(attempt, retryCfg, rateLimitResetMs(response));
						continue;
					}
					const retries = buildRetryMetadata(attempt, response.status, lastError);
					const finishedCtx = withRequestId(context, response.headers);
					recordHttpMetrics(metrics, trace, start, retries, {
						status: response.status,
						context: finishedCtx,
					});
					throw await parseErrorResponse(response, retries);
				}
				const finishedCtx = withRequestId(context, response.headers);
				recordHttpMetrics(metrics, trace, start, undefined, {
					status: response.status,
					context: finishedCtx,
				});
				return response;
			} catch (err) {
				if (options.signal?.aborted && !(err instanceof DatadogError)) {
					// Caller requested abort; never retry.
					const retries = buildRetryMetadata(attempt, lastStatus, lastError);
					recordHttpMetrics(metrics, trace, start, retries, {
						error: err,
						context,
					});
					throw toTransportError(err, "request", retries);
				}
				if (err instanceof DatadogError) {
					recordHttpMetrics(metrics, trace, start, undefined, {
						error: err,
						context,
					});
					throw err;
				}
				const transportKind = classifyTransportErrorKind(
					err,
					connectTimedOut,
					requestTimedOut,
				);
				const shouldRetry =
					retryCfg &&
					isRetryableError(err, transportKind) &&
					(method !== "POST" || retryCfg.retryPost) &&
					attempt < attempts;
				if (!shouldRetry) {
					const retries = buildRetryMetadata(
						attempt,
						lastStatus,
						err instanceof Error ? err.message : String(err),
					);
					recordHttpMetrics(metrics, trace, start, retries, {
						error: err,
						context,
					});
					throw toTransportError(err, transportKind, retries);
				}
				lastError = err;
				await backoff(attempt, retryCfg);
			} finally {
				if (connectTimer) {
					clearTimeout(connectTimer);
				}
				if (requestTimer) {
					clearTimeout(requestTimer);
				}
			}
		}
		throw lastError instanceof Error
			? lastError
			: new TransportError("request failed", {
					kind: "other",
					retries: buildRetryMetadata(attempts, lastStatus),
				});
	}

	/**
	 * Parsed JSON body without validation. Resolves `undefined` for empty bodies.
	 */
	async json(path: string, options: RequestOptions = {}): Promise<unknown> {
		const response = await this.request(path, options);
		const text = await response.text();
		if (response.status === 204 || !text) {
			return undefined;
		}
		try {
			return JSON.parse(text);
		} catch (err) {
			throw new DecodeError("failed to parse response JSON", {
				status: response.status,
				requestId: requestIdFrom(response.headers),
				body: text,
				cause: err,
			});
		}
	}

	/**
	 * JSON body validated against `schema`.
	 */
	async decode<S extends z.ZodTypeAny>(
		path: string,
		schema: S,
		options: RequestOptions = {},
	): Promise<z.output<S>> {
		const response = await this.request(path, options);
		const text = await response.text();
		let raw: unknown;
		try {
			raw = text ? JSON.parse(text) : undefined;
		} catch (err) {
			throw new DecodeError("failed to parse response JSON", {
				status: response.status,
				requestId: requestIdFrom(response.headers),
				body: text,
				cause: err,
			});
		}
		const result = schema.safeParse(raw);
		if (!result.success) {
			const issues = result.error.issues.map((issue) => ({
				path: issue.path.join("."),
				message: issue.message,
			}));
			throw new DecodeError(
				`response does not match model: ${issues[0]?.path || "<root>"}: ${issues[0]?.message}`,
				{
					status: response.status,
					requestId: requestIdFrom(response.headers),
					issues,
					body: text,
				},
			);
		}
		const value: z.output<S> = result.data;
		return value;
	}

	/**
	 * Raw response body, for file downloads.
	 */
	async bytes(path: string, options: RequestOptions = {}): Promise<Uint8Array> {
		const response = await this.request(path, options);
		return new Uint8Array(await response.arrayBuffer());
	}

	private applyAuth(headers: Headers, schemes: AuthScheme[]): string[] {
		const secrets: string[] = [];
		for (const scheme of schemes) {
			const value =
				scheme === "apiKeyAuth" ? this.config.apiKey : this.config.appKey;
			if (value) {
				headers.set(AuthHeaders[scheme], value);
				secrets.push(value);
			}
		}
		if (this.accessToken) {
			const bearer = this.accessToken.toLowerCase().startsWith("bearer ")
				? this.accessToken
				: `Bearer ${this.accessToken}`;
			headers.set("Authorization", bearer);
			secrets.push(this.accessToken);
		}
		return secrets;
	}

	private dumpRequest(
		method: string,
		url: string,
		headers: Headers,
		body: unknown,
		secrets: string[],
	): void {
		const lines = [`${method} ${url}`];
		headers.forEach((value, key) => {
			lines.push(`${key}: ${value}`);
		});
		if (body !== undefined) {
			lines.push("", JSON.stringify(body));
		}
		this.logger?.debug(redact(lines.join("\n"), secrets));
	}

	private async dumpResponse(
		method: string,
		url: string,
		response: Response,
		secrets: string[],
	): Promise<void> {
		const lines = [`${response.status} ${response.statusText} ${method} ${url}`];
		response.headers.forEach((value, key) => {
			lines.push(`${key}: ${value}`);
		});
		const body = await response.clone().text();
		if (body) {
			lines.push("", body);
		}
		this.logger?.debug(redact(lines.join("\n"), secrets));
	}
}

function encodeBody(
	body: unknown,
	encoding?: ContentEncoding,
): BodyInit | undefined {
	if (body === undefined || body === null) return undefined;
	const json = JSON.stringify(body);
	if (encoding === "gzip") return new Uint8Array(gzipSync(json));
	if (encoding === "deflate") return new Uint8Array(deflateSync(json));
	return json;
}

function buildUrl(
	baseUrl: string,
	path: string,
	query?: URLSearchParams,
): string {
	if (!path.startsWith("/")) {
		path = `/${path}`;
	}
	const qs = query?.toString();
	return qs ? `${baseUrl}${path}?${qs}` : `${baseUrl}${path}`;
}

export function redact(text: string, secrets: string[]): string {
	let out = text;
	for (const secret of secrets) {
		if (secret) {
			out = out.split(secret).join("REDACTED");
		}
	}
	return out;
}

function normalizeRetryConfig(
	retry?: RetryConfig | NormalizedRetryConfig | false,
): NormalizedRetryConfig | undefined {
	if (retry === false) return undefined;
	const cfg = retry || {};
	return {
		maxAttempts: Math.max(1, cfg.maxAttempts ?? 3),
		baseBackoffMs: Math.max(0, cfg.baseBackoffMs ?? 2_000),
		maxBackoffMs: Math.max(0, cfg.maxBackoffMs ?? 60_000),
		retryPost: cfg.retryPost ?? true,
	};
}

function shouldRetryStatus(
	status: number,
	method: string,
	retryPost: boolean,
): boolean {
	if (status === 408 || status === 429) {
		return method !== "POST" || retryPost;
	}
	if (status >= 500 && status < 600 && status !== 501) {
		return method !== "POST" || retryPost;
	}
	return false;
}

function isRetryableError(
	err: unknown,
	kind: TransportErrorKind,
): boolean {
	if (!err) return false;
	if (kind === "timeout" || kind === "connect") return true;
	// DOMException name matches AbortError for timeouts/abort; TypeError for network failures.
	return err instanceof DOMException || err instanceof TypeError;
}

// 429 responses say how long until the rate limit window resets.
function rateLimitResetMs(response: Response): number | undefined {
	if (response.status !== 429) return undefined;
	const header = response.headers.get("x-ratelimit-reset")?.trim();
	if (!header) return undefined;
	const reset = Number(header);
	if (!Number.isFinite(reset) || reset < 0) return undefined;
	return reset * 1_000;
}

function backoff(
	attempt: number,
	cfg: NormalizedRetryConfig,
	resetMs?: number,
): Promise<void> {
	let delay: number;
	if (resetMs !== undefined) {
		delay = Math.min(resetMs, cfg.maxBackoffMs);
	} else {
		const exp = Math.max(0, attempt - 1);
		const base = cfg.baseBackoffMs * Math.pow(2, Math.min(exp, 10));
		const capped = Math.min(base, cfg.maxBackoffMs);
		const jitter = 0.5 + Math.random(); // 0.5x .. 1.5x
		delay = Math.min(cfg.maxBackoffMs, capped * jitter);
	}
	if (delay <= 0) return Promise.resolve();
	return new Promise((resolve) => setTimeout(resolve, delay));
}

function mergeSignals(
	...signals: Array<AbortSignal | undefined>
): AbortSignal | undefined {
	const active = signals.filter((s): s is AbortSignal => s !== undefined);
	if (active.length === 0) return undefined;
	if (active.length === 1) return active[0];
	const controller = new AbortController();
	for (const src of active) {
		if (src.aborted) {
			controller.abort(src.reason);
			break;
		}
		src.addEventListener(
			"abort",
			() => controller.abort(src.reason),
			{ once: true },
		);
	}
	return controller.signal;
}

function normalizeHeaders(
	headers?: Record<string, string>,
): Record<string, string> {
	if (!headers) return {};
	const normalized: Record<string, string> = {};
	for (const [key, value] of Object.entries(headers)) {
		if (!key || !value) continue;
		const k = key.trim();
		const v = value.trim();
		if (k && v) {
			normalized[k] = v;
		}
	}
	return normalized;
}

function buildRetryMetadata(
	attempt: number,
	lastStatus?: number,
	lastError?: unknown,
): RetryMetadata | undefined {
	if (!attempt || attempt <= 1) return undefined;
	return {
		attempts: attempt,
		lastStatus,
		lastError:
			typeof lastError === "string"
				? lastError
				: lastError instanceof Error
					? lastError.message
					: lastError
						? String(lastError)
						: undefined,
	};
}

function classifyTransportErrorKind(
	err: unknown,
	connectTimedOut: boolean,
	requestTimedOut: boolean,
): TransportErrorKind {
	if (connectTimedOut) return "connect";
	if (requestTimedOut) return "timeout";
	if (err instanceof DOMException && err.name === "AbortError") {
		return "request";
	}
	if (err instanceof TypeError) return "request";
	return "other";
}

function toTransportError(
	err: unknown,
	kind: TransportErrorKind,
	retries?: RetryMetadata,
): TransportError {
	const message =
		err instanceof Error
			? err.message
			: typeof err === "string"
				? err
				: "request failed";
	return new TransportError(message, { kind, retries, cause: err });
}

function recordHttpMetrics(
	metrics: MetricsCallbacks | undefined,
	trace: TraceCallbacks | undefined,
	start: number,
	retries: RetryMetadata | undefined,
	info: {
		status?: number;
		error?: unknown;
		context: RequestContext;
	},
): void {
	if (!metrics?.httpRequest && !trace?.requestFinish) return;
	const latencyMs = start ? Date.now() - start : 0;
	if (metrics?.httpRequest) {
		metrics.httpRequest({
			latencyMs,
			status: info.status,
			error: info.error ? String(info.error) : undefined,
			retries,
			context: info.context,
		});
	}
	trace?.requestFinish?.({
		context: info.context,
		status: info.status,
		error: info.error,
		retries,
		latencyMs,
	});
}

function withRequestId(
	context: RequestContext,
	headers: Headers,
): RequestContext {
	const requestId = requestIdFrom(headers) || context.requestId;
	if (!requestId) return context;
	return { ...context, requestId };
}
