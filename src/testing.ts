export type MockFetchCall = { url: string; init?: RequestInit };
export type MockFetchResponder =
	| Response
	| ((call: MockFetchCall, index: number) => Response | Promise<Response>);

/**
 * Fake `fetch` that records every call and answers from a queue.
 */
export function createMockFetchQueue(responses: MockFetchResponder[]) {
	const calls: MockFetchCall[] = [];
	const queue = [...responses];
	const fetchImpl = async (
		input: RequestInfo | URL,
		init?: RequestInit,
	): Promise<Response> => {
		const url =
			typeof input === "string"
				? input
				: input instanceof URL
					? input.toString()
					: input.url;
		const call = { url, init };
		calls.push(call);
		const responder = queue.shift();
		if (!responder) {
			throw new Error("mock fetch queue exhausted");
		}
		if (typeof responder === "function") {
			return responder(call, calls.length - 1);
		}
		return responder;
	};
	const mockFetch: typeof fetch = fetchImpl;
	return { fetch: mockFetch, calls };
}

export function jsonResponse(
	payload: unknown,
	status = 200,
	headers: Record<string, string> = {},
): Response {
	return new Response(JSON.stringify(payload), {
		status,
		headers: { "Content-Type": "application/json", ...headers },
	});
}

/**
 * Headers of a recorded call, whatever form they were passed in.
 */
export function callHeaders(call: MockFetchCall): Headers {
	return new Headers(call.init?.headers);
}
