/**
 * Lists active users and the most recent security signals.
 *
 * Reads DD_API_KEY, DD_APP_KEY and DD_SITE from the environment.
 */

import { DatadogClient, UnparsedObject, collect } from "../src";

async function main() {
	const client = DatadogClient.fromEnv({ retry: { maxAttempts: 5 } });

	const users = await client.users.listUsers({ filterStatus: "Active", pageSize: 50 });
	for (const user of users.data ?? []) {
		if (user instanceof UnparsedObject) continue;
		console.log(user.attributes?.email, user.attributes?.name ?? "(no name)");
	}

	const signals = await collect(
		client.securityMonitoring.listSignalsWithPagination({
			filterQuery: "status:high",
			pageLimit: 25,
		}),
	);
	console.log(`${signals.length} high severity signals`);
}

main().catch((err: unknown) => {
	console.error(err);
	process.exitCode = 1;
});
