import { type VaultClientConfig, loadConfig } from "./config/config.js";
import { VaultConfigurationError } from "./errors.js";
import { isBlank, trimTrailingSlashes } from "./utils.js";

export const VAULT_ADDR_ENV_VAR = "VAULT_ADDR";
export const VAULT_ADDR_PROPERTY = "vault.addr";

export interface UrlResolver {
	/**
	 * Resolve the service base URL.
	 * @throws VaultConfigurationError when no source holds a valid URL
	 */
	resolve(): string;
}

/**
 * Sources consulted by the built-in resolvers and providers. Defaults to the
 * real process environment and the config file.
 */
export type PropertySources = {
	env?: NodeJS.ProcessEnv;
	config?: () => VaultClientConfig;
};

/**
 * Returns the trimmed value when it is an http(s) URL, otherwise null.
 */
export function parseServiceUrl(value: string | undefined): string | null {
	if (value === undefined || isBlank(value)) return null;
	const candidate = value.trim();
	try {
		const url = new URL(candidate);
		if (url.protocol !== "http:" && url.protocol !== "https:") return null;
		if (!url.hostname) return null;
		return trimTrailingSlashes(candidate);
	} catch {
		return null;
	}
}

/**
 * Resolves the URL from, in order:
 * 1. `VAULT_ADDR` environment variable
 * 2. `vault.addr` in the config file
 */
export class DefaultUrlResolver implements UrlResolver {
	private readonly env: NodeJS.ProcessEnv;
	private readonly config: () => VaultClientConfig;

	constructor(sources: PropertySources = {}) {
		this.env = sources.env ?? process.env;
		this.config = sources.config ?? loadConfig;
	}

	resolve(): string {
		const envUrl = parseServiceUrl(this.env[VAULT_ADDR_ENV_VAR]);
		if (envUrl) {
			return envUrl;
		}

		const propertyUrl = parseServiceUrl(this.config().vault?.addr);
		if (propertyUrl) {
			return propertyUrl;
		}

		throw new VaultConfigurationError(
			"Failed to resolve the Vault URL from the environment and/or configuration file.",
		);
	}
}

export class StaticUrlResolver implements UrlResolver {
	private readonly url: string;

	constructor(url: string) {
		const parsed = parseServiceUrl(url);
		if (!parsed) {
			throw new VaultConfigurationError(`Invalid Vault URL: ${url}`);
		}
		this.url = parsed;
	}

	resolve(): string {
		return this.url;
	}
}
