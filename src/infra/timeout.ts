export class TimeoutError extends Error {
	constructor(
		message: string,
		public readonly timeoutMs: number,
	) {
		super(message);
		this.name = "TimeoutError";
	}
}

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

/**
 * fetch() with an AbortController-based timeout. The underlying request is
 * aborted when the timeout fires, and a caller-supplied `init.signal` is
 * still honoured.
 */
export async function fetchWithTimeout(
	fetchImpl: FetchLike,
	url: string | URL,
	init: RequestInit | undefined,
	timeoutMs: number,
): Promise<Response> {
	if (timeoutMs <= 0 || !Number.isFinite(timeoutMs)) {
		return fetchImpl(url, init);
	}

	const controller = new AbortController();

	let externalAbortCleanup: (() => void) | undefined;
	const externalSignal = init?.signal;
	if (externalSignal) {
		if (externalSignal.aborted) {
			controller.abort(externalSignal.reason);
		} else {
			const onAbort = () => controller.abort(externalSignal.reason);
			externalSignal.addEventListener("abort", onAbort, { once: true });
			externalAbortCleanup = () => externalSignal.removeEventListener("abort", onAbort);
		}
	}

	const timer = setTimeout(() => {
		controller.abort(new TimeoutError(`request timed out after ${timeoutMs}ms`, timeoutMs));
	}, timeoutMs);
	timer.unref();

	try {
		return await fetchImpl(url, { ...init, signal: controller.signal });
	} finally {
		clearTimeout(timer);
		externalAbortCleanup?.();
	}
}
