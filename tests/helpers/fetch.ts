import { vi } from "vitest";

export const baseUrl = "http://vault.test:8200";

export function jsonResponse(payload: unknown, status = 200, headers?: Record<string, string>) {
	return new Response(JSON.stringify(payload), { status, headers });
}

export function emptyResponse(status = 204) {
	return new Response(null, { status });
}

/**
 * fetch stand-in that answers with `responses` in order (the last one repeats).
 */
export function queuedFetch(...responses: Array<Response | Error>) {
	let index = 0;
	return vi.fn(async (_url: string | URL, _init?: RequestInit): Promise<Response> => {
		const next = responses[Math.min(index, responses.length - 1)];
		index++;
		if (next instanceof Error) {
			throw next;
		}
		return next.clone();
	});
}

export type FetchMock = ReturnType<typeof queuedFetch>;

export function callUrl(fetchImpl: FetchMock, call = 0): string {
	return String(fetchImpl.mock.calls[call]?.[0]);
}

export function callInit(fetchImpl: FetchMock, call = 0): RequestInit {
	return fetchImpl.mock.calls[call]?.[1] ?? {};
}

export function callHeader(fetchImpl: FetchMock, name: string, call = 0): string | null {
	return new Headers(callInit(fetchImpl, call).headers).get(name);
}

export function callBody(fetchImpl: FetchMock, call = 0): unknown {
	const body = callInit(fetchImpl, call).body;
	return typeof body === "string" ? JSON.parse(body) : undefined;
}
