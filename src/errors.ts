/**
 * Error hierarchy for the client.
 *
 * Everything the library throws on purpose is a `VaultClientError`; callers
 * that only care about "the client failed" can catch the base class.
 */

export class VaultClientError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "VaultClientError";
	}
}

/**
 * A specific source could not produce a credential (missing env var, blank
 * config value, rejected login). Credential chains treat it as "try next".
 */
export class CredentialsResolutionError extends VaultClientError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "CredentialsResolutionError";
	}
}

/**
 * Invalid or missing client configuration: no providers given to a chain,
 * no resolvable service URL, bad init parameters.
 */
export class VaultConfigurationError extends VaultClientError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "VaultConfigurationError";
	}
}

export class CredentialsChainExhaustedError extends VaultClientError {
	constructor(
		message: string,
		public readonly providerCount: number,
	) {
		super(message);
		this.name = "CredentialsChainExhaustedError";
	}
}

/**
 * Non-2xx response from the service. `errors` holds the messages from the
 * `{ "errors": [...] }` body the service returns.
 */
export class VaultServerError extends VaultClientError {
	constructor(
		message: string,
		public readonly status: number,
		public readonly errors: readonly string[],
		/** Server-suggested wait from `Retry-After`, when present. */
		public readonly retryAfterMs?: number,
	) {
		super(message);
		this.name = "VaultServerError";
	}
}
