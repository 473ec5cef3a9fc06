/**
 * HTTP transport shared by the clients and the login providers.
 *
 * Builds `${url}/v1/${path}` requests, attaches the token from the
 * credentials provider, retries transient failures and maps error bodies to
 * `VaultServerError`.
 */

import type { Logger } from "pino";
import type { z } from "zod";

import type { VaultCredentialsProvider } from "../auth/types.js";
import { DEFAULT_HTTP_TIMEOUT_MS, loadConfig, type VaultClientConfig } from "../config/config.js";
import { CredentialsResolutionError, VaultClientError, VaultServerError } from "../errors.js";
import {
	formatErrorSafe,
	isAbortError,
	isRetryableStatus,
	isTransientNetworkError,
	parseRetryAfter,
} from "../infra/network-errors.js";
import { type RetryPolicy, retryAsync } from "../infra/retry.js";
import { type FetchLike, fetchWithTimeout } from "../infra/timeout.js";
import { getChildLogger } from "../logging.js";
import { DefaultUrlResolver, StaticUrlResolver, type UrlResolver } from "../url-resolver.js";
import { isBlank, normalizeApiPath } from "../utils.js";
import { ErrorBodySchema } from "./models.js";

export const TOKEN_HEADER = "X-Vault-Token";
export const NAMESPACE_HEADER = "X-Vault-Namespace";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export type VaultHttpOptions = {
	/** Fixed base URL; takes precedence over `urlResolver`. */
	url?: string;
	urlResolver?: UrlResolver;
	fetchImpl?: FetchLike;
	/** Per-attempt timeout. Defaults to `http.timeoutMs` from the config file. */
	timeoutMs?: number;
	retry?: Partial<RetryPolicy>;
	namespace?: string;
	config?: () => VaultClientConfig;
	logger?: Logger;
};

export type RequestOptions = {
	method: HttpMethod;
	body?: unknown;
	query?: Record<string, string>;
	/** Token source for the call; omitted for unauthenticated endpoints. */
	credentials?: VaultCredentialsProvider;
	signal?: AbortSignal;
	/** false for non-idempotent calls: a single attempt, even on timeout or 5xx. */
	retry?: boolean;
};

export type VaultHttpResponse = {
	status: number;
	/** Parsed JSON body; null for empty bodies such as 204. */
	body: unknown;
};

function safeJsonParse(input: string): { ok: true; value: unknown } | { ok: false } {
	try {
		return { ok: true, value: JSON.parse(input) };
	} catch {
		return { ok: false };
	}
}

function errorMessages(raw: string, payload: unknown): string[] {
	const parsed = ErrorBodySchema.safeParse(payload);
	if (parsed.success) {
		return parsed.data.errors;
	}
	return raw ? [raw] : [];
}

export class VaultHttp {
	private readonly urlResolver: UrlResolver;
	private readonly fetchImpl: FetchLike;
	private readonly timeoutMs: number;
	private readonly retry: Partial<RetryPolicy>;
	private readonly namespace: string | undefined;
	private readonly logger: Logger;

	constructor(options: VaultHttpOptions = {}) {
		const config = options.config ?? loadConfig;
		this.urlResolver = options.url
			? new StaticUrlResolver(options.url)
			: (options.urlResolver ?? new DefaultUrlResolver({ config }));
		this.fetchImpl = options.fetchImpl ?? fetch;

		const settings = config();
		this.timeoutMs = options.timeoutMs ?? settings.http?.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
		this.retry = options.retry ?? settings.http?.retry ?? {};
		this.namespace = options.namespace ?? settings.vault?.namespace;
		this.logger = options.logger ?? getChildLogger({ module: "vault-http" });
	}

	resolveUrl(): string {
		return this.urlResolver.resolve();
	}

	async request(path: string, options: RequestOptions): Promise<VaultHttpResponse> {
		const url = new URL(`${this.resolveUrl()}/v1/${normalizeApiPath(path)}`);
		for (const [key, value] of Object.entries(options.query ?? {})) {
			url.searchParams.set(key, value);
		}

		const headers = new Headers({ Accept: "application/json" });
		if (options.credentials) {
			const credentials = await options.credentials.getCredentials();
			if (isBlank(credentials.token)) {
				throw new CredentialsResolutionError("Credentials provider returned a blank token");
			}
			headers.set(TOKEN_HEADER, credentials.token);
		}
		if (this.namespace) {
			headers.set(NAMESPACE_HEADER, this.namespace);
		}
		let body: string | undefined;
		if (options.body !== undefined) {
			headers.set("Content-Type", "application/json");
			body = JSON.stringify(options.body);
		}

		const logPath = url.pathname;
		const send = async (attempt: number): Promise<VaultHttpResponse> => {
			this.logger.debug({ method: options.method, path: logPath, attempt }, "vault request");
			const response = await fetchWithTimeout(
				this.fetchImpl,
				url,
				{ method: options.method, headers, body, signal: options.signal },
				this.timeoutMs,
			);
			return this.readResponse(response, options.method, logPath);
		};

		if (options.retry === false) {
			return send(1);
		}
		return retryAsync(
			send,
			{
				...this.retry,
				shouldRetry: (err) => {
					if (isAbortError(err)) return false;
					if (err instanceof VaultServerError) return isRetryableStatus(err.status);
					if (err instanceof VaultClientError) return false;
					return isTransientNetworkError(err);
				},
				retryAfterMs: (err) => (err instanceof VaultServerError ? err.retryAfterMs : undefined),
				onRetry: (err, info) => {
					this.logger.warn(
						{
							method: options.method,
							path: logPath,
							attempt: info.attempt,
							delayMs: info.delayMs,
							error: formatErrorSafe(err),
						},
						"vault request failed; retrying",
					);
				},
			},
		);
	}

	/**
	 * Issue a request and validate the JSON body against `schema`.
	 */
	async requestJson<S extends z.ZodTypeAny>(
		schema: S,
		path: string,
		options: RequestOptions,
	): Promise<z.infer<S>> {
		const response = await this.request(path, options);
		if (response.body === null) {
			throw new VaultClientError(
				`Empty response body for ${options.method} ${normalizeApiPath(path)} (${response.status})`,
			);
		}
		return this.parseBody(schema, response.body, options.method, path);
	}

	parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown, method: HttpMethod, path: string): z.infer<S> {
		const parsed = schema.safeParse(body);
		if (!parsed.success) {
			throw new VaultClientError(`Malformed response body for ${method} ${normalizeApiPath(path)}`, {
				cause: parsed.error,
			});
		}
		return parsed.data;
	}

	private async readResponse(
		response: Response,
		method: HttpMethod,
		path: string,
	): Promise<VaultHttpResponse> {
		const status = response.status;
		const raw = status === 204 ? "" : await response.text();
		const parsed = raw ? safeJsonParse(raw) : null;

		if (!response.ok) {
			const errors = errorMessages(raw, parsed?.ok ? parsed.value : null);
			const detail = errors.length > 0 ? `: ${errors.join(", ")}` : "";
			throw new VaultServerError(
				`Vault request failed (${status}) ${method} ${path}${detail}`,
				status,
				errors,
				parseRetryAfter(response.headers.get("Retry-After")),
			);
		}

		if (parsed === null) {
			return { status, body: null };
		}
		if (!parsed.ok) {
			throw new VaultClientError(`Response to ${method} ${path} is not valid JSON (${status})`);
		}
		return { status, body: parsed.value };
	}
}
