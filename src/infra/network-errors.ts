/**
 * Error classification for the HTTP transport.
 *
 * Decides which failures are worth another attempt (connection resets,
 * timeouts, 5xx) and formats errors for logs without leaking URLs.
 */

/** Error codes that indicate a transient network issue. */
const TRANSIENT_NETWORK_CODES = new Set([
	"ECONNRESET",
	"ECONNREFUSED",
	"ECONNABORTED",
	"ETIMEDOUT",
	"EPIPE",
	"ENETUNREACH",
	"EHOSTUNREACH",
	"EAI_AGAIN",
	"UND_ERR_CONNECT_TIMEOUT",
	"UND_ERR_SOCKET",
	"UND_ERR_HEADERS_TIMEOUT",
	"UND_ERR_BODY_TIMEOUT",
]);

const TRANSIENT_MESSAGE_PATTERNS = [
	"fetch failed",
	"socket hang up",
	"other side closed",
	"client network socket disconnected",
	"timed out after",
];

/** Statuses the service returns while sealed, in standby or overloaded. */
const RETRYABLE_STATUSES = new Set([429, 500, 502, 503, 504]);

/**
 * Collect all error candidates from a (potentially nested) error.
 * BFS through `.cause` and `.errors`.
 */
export function collectErrorCandidates(err: unknown, maxDepth = 5): unknown[] {
	const candidates: unknown[] = [];
	const queue: Array<{ value: unknown; depth: number }> = [{ value: err, depth: 0 }];
	const seen = new WeakSet<object>();

	while (queue.length > 0) {
		const item = queue.shift();
		if (!item) break;
		if (item.depth > maxDepth) continue;

		const val = item.value;
		if (val == null) continue;
		if (typeof val !== "object") {
			candidates.push(val);
			continue;
		}

		if (seen.has(val)) continue;
		seen.add(val);
		candidates.push(val);

		const nextDepth = item.depth + 1;
		if ("cause" in val && val.cause != null) {
			queue.push({ value: val.cause, depth: nextDepth });
		}
		if ("errors" in val && Array.isArray(val.errors)) {
			for (const e of val.errors) {
				queue.push({ value: e, depth: nextDepth });
			}
		}
	}

	return candidates;
}

/**
 * Check if an error (or any error in its cause chain) is a transient network
 * error. TimeoutError counts as transient.
 */
export function isTransientNetworkError(err: unknown): boolean {
	for (const candidate of collectErrorCandidates(err)) {
		if (typeof candidate === "object" && candidate !== null) {
			if ("code" in candidate && typeof candidate.code === "string") {
				if (TRANSIENT_NETWORK_CODES.has(candidate.code)) return true;
			}
			if ("name" in candidate && candidate.name === "TimeoutError") {
				return true;
			}
		}

		const message = extractMessage(candidate);
		if (message && matchesTransientPattern(message)) {
			return true;
		}
	}

	return false;
}

/**
 * Check if an error is an AbortError raised by a caller-supplied signal.
 */
export function isAbortError(err: unknown): boolean {
	for (const candidate of collectErrorCandidates(err)) {
		if (typeof candidate === "object" && candidate !== null) {
			if ("name" in candidate && candidate.name === "AbortError") return true;
			if ("code" in candidate && candidate.code === "ABORT_ERR") return true;
		}
	}
	return false;
}

export function isRetryableStatus(status: number): boolean {
	return RETRYABLE_STATUSES.has(status);
}

/**
 * Parse a `Retry-After` header (delta-seconds or HTTP date) into ms.
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
	if (!value) return undefined;
	const trimmed = value.trim();
	if (/^\d+$/.test(trimmed)) {
		return Number.parseInt(trimmed, 10) * 1000;
	}
	const date = Date.parse(trimmed);
	if (Number.isNaN(date)) return undefined;
	return Math.max(0, date - now);
}

/**
 * Format an error to a single line, redacting URLs that might carry tokens.
 */
export function formatErrorSafe(err: unknown, maxLength = 500): string {
	if (err == null) return "unknown error";

	try {
		if (err instanceof Error) {
			let msg = `${err.name}: ${err.message}`;
			if (err.cause) {
				msg += ` [cause: ${formatErrorSafe(err.cause, maxLength / 2)}]`;
			}
			return truncate(redactUrls(msg), maxLength);
		}
		return truncate(redactUrls(String(err)), maxLength);
	} catch {
		return "error (could not format)";
	}
}

function extractMessage(val: unknown): string | null {
	if (typeof val === "string") return val;
	if (typeof val === "object" && val !== null && "message" in val && typeof val.message === "string") {
		return val.message;
	}
	return null;
}

function matchesTransientPattern(message: string): boolean {
	const lower = message.toLowerCase();
	return TRANSIENT_MESSAGE_PATTERNS.some((pattern) => lower.includes(pattern));
}

function redactUrls(str: string): string {
	return str.replace(/https?:\/\/[^\s]+/g, "[URL]");
}

function truncate(str: string, maxLength: number): string {
	if (str.length <= maxLength) return str;
	return `${str.slice(0, maxLength - 3)}...`;
}
