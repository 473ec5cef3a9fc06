import type { RetrySettings } from "../config/config.js";
import { sleep } from "../utils.js";

export type RetryPolicy = RetrySettings & {
	/** Exponential backoff factor. */
	factor: number;
	/** Jitter factor (0–1). Randomizes delay by ±jitter. */
	jitter: number;
};

export type RetryInfo = {
	/** 1-based attempt number that just failed. */
	attempt: number;
	maxAttempts: number;
	/** Delay before the next attempt (ms). */
	delayMs: number;
};

export type RetryOptions = Partial<RetryPolicy> & {
	/** Return true if the error is worth another attempt. Defaults to always. */
	shouldRetry?: (err: unknown, info: RetryInfo) => boolean;
	onRetry?: (err: unknown, info: RetryInfo) => void;
	/** Server-suggested delay (ms) carried by the error, e.g. from Retry-After. */
	retryAfterMs?: (err: unknown) => number | undefined;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
	maxAttempts: 3,
	baseDelayMs: 250,
	maxDelayMs: 5_000,
	factor: 2,
	jitter: 0.2,
};

export function resolveRetryPolicy(opts?: Partial<RetryPolicy>): RetryPolicy {
	return {
		maxAttempts: Math.max(1, opts?.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts),
		baseDelayMs: Math.max(0, opts?.baseDelayMs ?? DEFAULT_RETRY_POLICY.baseDelayMs),
		maxDelayMs: Math.max(0, opts?.maxDelayMs ?? DEFAULT_RETRY_POLICY.maxDelayMs),
		factor: Math.max(1, opts?.factor ?? DEFAULT_RETRY_POLICY.factor),
		jitter: Math.min(1, Math.max(0, opts?.jitter ?? DEFAULT_RETRY_POLICY.jitter)),
	};
}

/**
 * Backoff delay for a given attempt (1-based), capped at `maxDelayMs`.
 */
export function computeRetryDelay(policy: RetryPolicy, attempt: number): number {
	const capped = Math.min(policy.baseDelayMs * policy.factor ** (attempt - 1), policy.maxDelayMs);
	const jitter = (Math.random() - 0.5) * 2 * capped * policy.jitter;
	return Math.max(0, Math.round(capped + jitter));
}

/**
 * Run `fn` until it resolves, `shouldRetry` declines, or attempts run out.
 * Rejects with the last error.
 */
export async function retryAsync<T>(fn: (attempt: number) => Promise<T>, opts?: RetryOptions): Promise<T> {
	const policy = resolveRetryPolicy(opts);
	const { shouldRetry, onRetry, retryAfterMs } = opts ?? {};

	for (let attempt = 1; ; attempt++) {
		try {
			return await fn(attempt);
		} catch (err) {
			if (attempt >= policy.maxAttempts) {
				throw err;
			}

			const info: RetryInfo = { attempt, maxAttempts: policy.maxAttempts, delayMs: 0 };
			if (shouldRetry && !shouldRetry(err, info)) {
				throw err;
			}

			const serverDelay = retryAfterMs?.(err);
			info.delayMs =
				serverDelay !== undefined && serverDelay > 0
					? Math.min(serverDelay, policy.maxDelayMs)
					: computeRetryDelay(policy, attempt);

			onRetry?.(err, info);

			if (info.delayMs > 0) {
				await sleep(info.delayMs);
			}
		}
	}
}
