import { AWSIntegrationApi } from "./aws_integration";
import { CloudWorkloadSecurityApi } from "./cloud_workload_security";
import { type ResolvedConfig, resolveConfig } from "./config";
import { EventsApi } from "./events";
import { HTTPClient } from "./http";
import { IncidentsApi } from "./incidents";
import { LogsApi } from "./logs";
import { SecurityMonitoringApi } from "./security_monitoring";
import { ServiceDefinitionApi } from "./service_definitions";
import { SyntheticsApi } from "./synthetics";
import type { ClientOptions, Site } from "./types";
import { UsersApi } from "./users";

export class DatadogClient {
	readonly events: EventsApi;
	readonly incidents: IncidentsApi;
	readonly logs: LogsApi;
	readonly cloudWorkloadSecurity: CloudWorkloadSecurityApi;
	readonly securityMonitoring: SecurityMonitoringApi;
	readonly synthetics: SyntheticsApi;
	readonly serviceDefinitions: ServiceDefinitionApi;
	readonly awsIntegration: AWSIntegrationApi;
	readonly users: UsersApi;
	readonly site: Site;
	private readonly config: ResolvedConfig;

	/**
	 * Builds a client from `DD_API_KEY`, `DD_APP_KEY` and `DD_SITE` only.
	 */
	static fromEnv(
		options: Omit<ClientOptions, "apiKey" | "appKey" | "site"> = {},
		env: Record<string, string | undefined> = process.env,
	): DatadogClient {
		return new DatadogClient(options, env);
	}

	constructor(
		options: ClientOptions = {},
		env: Record<string, string | undefined> = process.env,
	) {
		const logger = options.logger ?? console;
		this.config = resolveConfig(options, env, logger);
		this.site = this.config.site;
		const http = new HTTPClient({
			config: this.config,
			accessToken: options.accessToken,
			fetchImpl: options.fetch,
			userAgent: options.userAgent,
			connectTimeoutMs: options.connectTimeoutMs,
			timeoutMs: options.timeoutMs,
			retry: options.retry,
			defaultHeaders: options.defaultHeaders,
			compress: options.compress,
			debug: options.debug,
			logger,
			metrics: options.metrics,
			trace: options.trace,
		});
		this.events = new EventsApi(http);
		this.incidents = new IncidentsApi(http);
		this.logs = new LogsApi(http);
		this.cloudWorkloadSecurity = new CloudWorkloadSecurityApi(http);
		this.securityMonitoring = new SecurityMonitoringApi(http);
		this.synthetics = new SyntheticsApi(http);
		this.serviceDefinitions = new ServiceDefinitionApi(http);
		this.awsIntegration = new AWSIntegrationApi(http);
		this.users = new UsersApi(http);
	}

	enableUnstableOperation(operationId: string): void {
		this.config.unstable.enable(operationId);
	}

	disableUnstableOperation(operationId: string): void {
		this.config.unstable.disable(operationId);
	}

	isUnstableOperationEnabled(operationId: string): boolean {
		return this.config.unstable.isEnabled(operationId);
	}
}

export { HTTPClient } from "./http";
export type { RequestOptions } from "./http";
export {
	UNSTABLE_OPERATIONS,
	UnstableOperations,
	parseSite,
	resolveConfig,
	serverUrl,
} from "./config";
export type { ResolvedConfig } from "./config";
export { appendQuery, expandPath, parameterToString } from "./params";
export type { CollectionFormat, ParameterValue } from "./params";
export {
	DEFAULT_PAGE_SIZE,
	collect,
	nextCursor,
	paginate,
} from "./pagination";
export type { Pager } from "./pagination";

export * from "./models";
export * from "./types";
export * from "./errors";
export * from "./events";
export * from "./incidents";
export * from "./logs";
export * from "./cloud_workload_security";
export * from "./security_monitoring";
export * from "./synthetics";
export * from "./service_definitions";
export * from "./aws_integration";
export * from "./users";
export * from "./testing";
