import { ConfigError, UnstableOperationError } from "./errors";
import {
	DEFAULT_SITE,
	Sites,
	type ClientOptions,
	type Logger,
	type Site,
} from "./types";

/**
 * Operations that the API still flags as unstable. They are refused unless
 * enabled explicitly on the client.
 */
export const UNSTABLE_OPERATIONS = [
	"v2.ListEvents",
	"v2.SearchEvents",
	"v2.CreateIncident",
	"v2.GetIncident",
	"v2.UpdateIncident",
	"v2.DeleteIncident",
	"v2.ListIncidents",
] as const;

// Operations served from a host other than `api.{site}`.
const OPERATION_SERVERS: Record<string, (site: Site) => string> = {
	"v2.LogsApi.SubmitLog": (site) => `https://http-intake.logs.${site}`,
};

export interface ResolvedConfig {
	apiKey?: string;
	appKey?: string;
	site: Site;
	baseUrl?: string;
	unstable: UnstableOperations;
}

type Env = Record<string, string | undefined>;

export function resolveConfig(
	options: ClientOptions = {},
	env: Env = process.env,
	logger?: Logger,
): ResolvedConfig {
	const apiKey = nonEmpty(options.apiKey) ?? nonEmpty(env.DD_API_KEY);
	const appKey = nonEmpty(options.appKey) ?? nonEmpty(env.DD_APP_KEY);
	const site = parseSite(nonEmpty(options.site) ?? nonEmpty(env.DD_SITE) ?? DEFAULT_SITE);
	const baseUrl = options.baseUrl ? normalizeBaseUrl(options.baseUrl) : undefined;
	if (baseUrl && !/^https?:\/\//i.test(baseUrl)) {
		throw new ConfigError("baseUrl must start with http:// or https://");
	}
	const unstable = new UnstableOperations(logger);
	for (const id of options.unstableOperations ?? []) {
		unstable.enable(id);
	}
	return { apiKey, appKey, site, baseUrl, unstable };
}

/**
 * Accepts `datadoghq.eu`, `api.datadoghq.eu` or `https://api.datadoghq.eu/`.
 */
export function parseSite(raw: string): Site {
	const host = raw
		.trim()
		.toLowerCase()
		.replace(/^https?:\/\//, "")
		.replace(/\/+$/, "")
		.replace(/^api\./, "");
	const site = Sites.find((s) => s === host);
	if (!site) {
		throw new ConfigError(`unknown site '${raw}'`, { allowed: [...Sites] });
	}
	return site;
}

/**
 * Base URL for an operation, `serverKey` being `<version>.<Api>.<Operation>`.
 */
export function serverUrl(cfg: ResolvedConfig, serverKey?: string): string {
	if (cfg.baseUrl) return cfg.baseUrl;
	const override = serverKey ? OPERATION_SERVERS[serverKey] : undefined;
	return override ? override(cfg.site) : `https://api.${cfg.site}`;
}

export class UnstableOperations {
	private readonly enabled = new Map<string, boolean>();
	private readonly logger?: Logger;

	constructor(logger?: Logger) {
		this.logger = logger;
		for (const id of UNSTABLE_OPERATIONS) {
			this.enabled.set(id, false);
		}
	}

	isUnstable(operationId: string): boolean {
		return this.enabled.has(operationId);
	}

	isEnabled(operationId: string): boolean {
		return this.enabled.get(operationId) === true;
	}

	enable(operationId: string): void {
		this.set(operationId, true);
	}

	disable(operationId: string): void {
		this.set(operationId, false);
	}

	/**
	 * Throws for a disabled unstable operation, warns for an enabled one.
	 * Stable operations pass silently.
	 */
	check(operationId: string): void {
		if (!this.isUnstable(operationId)) return;
		if (!this.isEnabled(operationId)) {
			throw new UnstableOperationError(operationId);
		}
		this.logger?.warn(`Using unstable operation '${operationId}'`);
	}

	private set(operationId: string, value: boolean): void {
		if (!this.enabled.has(operationId)) {
			throw new ConfigError(`'${operationId}' is not an unstable operation`);
		}
		this.enabled.set(operationId, value);
	}
}

function nonEmpty(value?: string): string | undefined {
	const trimmed = value?.trim();
	return trimmed ? trimmed : undefined;
}

function normalizeBaseUrl(value: string): string {
	return value.trim().replace(/\/+$/, "");
}
