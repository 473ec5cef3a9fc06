import type { Logger } from "pino";

import type { VaultClientConfig } from "../config/config.js";
import { CredentialsChainExhaustedError, VaultClientError, VaultConfigurationError } from "../errors.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import { getChildLogger } from "../logging.js";
import { isBlank } from "../utils.js";
import { ConfigCredentialsProvider } from "./config-provider.js";
import { EnvironmentCredentialsProvider } from "./env-provider.js";
import type { VaultCredentials, VaultCredentialsProvider } from "./types.js";

/**
 * Outcome of asking one provider for credentials.
 */
export type ProviderAttempt =
	| { kind: "ok"; credentials: VaultCredentials }
	| { kind: "blank" }
	| { kind: "resolution-error"; error: VaultClientError }
	| { kind: "unexpected-error"; error: unknown };

export async function attemptProvider(provider: VaultCredentialsProvider): Promise<ProviderAttempt> {
	try {
		const credentials = await provider.getCredentials();
		if (isBlank(credentials.token)) {
			return { kind: "blank" };
		}
		return { kind: "ok", credentials };
	} catch (err) {
		if (err instanceof VaultClientError) {
			return { kind: "resolution-error", error: err };
		}
		return { kind: "unexpected-error", error: err };
	}
}

export type CredentialsProviderChainOptions = {
	/** Defaults to true. */
	reuseLastProvider?: boolean;
	logger?: Logger;
};

function providerName(provider: VaultCredentialsProvider): string {
	return provider.constructor.name || "anonymous provider";
}

/**
 * Tries each provider in order and returns the first non-blank token.
 *
 * The provider that succeeded is remembered and, while `reuseLastProvider` is
 * on, answers every later call by itself: its failures propagate and the rest
 * of the chain is not consulted again. This keeps login-based providers from
 * being re-walked on every request.
 *
 * Concurrent callers may each walk the chain; the remembered provider is a
 * single reference, so it always holds one of the winners.
 */
export class VaultCredentialsProviderChain implements VaultCredentialsProvider {
	private readonly providers: readonly VaultCredentialsProvider[];
	private readonly logger: Logger;
	private reuseLastProvider: boolean;
	private lastUsedProvider: VaultCredentialsProvider | null = null;

	constructor(
		providers: readonly VaultCredentialsProvider[] | null | undefined,
		options: CredentialsProviderChainOptions = {},
	) {
		if (!providers || providers.length === 0) {
			throw new VaultConfigurationError("No credentials providers specified");
		}
		this.providers = Object.freeze([...providers]);
		this.reuseLastProvider = options.reuseLastProvider ?? true;
		this.logger = options.logger ?? getChildLogger({ module: "credentials-chain" });
	}

	static of(...providers: VaultCredentialsProvider[]): VaultCredentialsProviderChain {
		return new VaultCredentialsProviderChain(providers);
	}

	async getCredentials(): Promise<VaultCredentials> {
		const remembered = this.lastUsedProvider;
		if (this.reuseLastProvider && remembered) {
			return remembered.getCredentials();
		}

		for (const provider of this.providers) {
			const attempt = await attemptProvider(provider);
			const name = providerName(provider);

			switch (attempt.kind) {
				case "ok":
					this.lastUsedProvider = provider;
					this.logger.debug({ provider: name }, "resolved Vault credentials");
					return attempt.credentials;
				case "blank":
					this.logger.debug({ provider: name }, "provider returned a blank token; moving on");
					break;
				case "resolution-error":
					if (this.logger.isLevelEnabled("debug")) {
						this.logger.debug(
							{ provider: name, error: formatErrorSafe(attempt.error) },
							"failed to resolve Vault credentials; moving on to next provider",
						);
					} else {
						this.logger.info(
							{ provider: name, reason: attempt.error.message },
							"failed to resolve Vault credentials; moving on to next provider",
						);
					}
					break;
				case "unexpected-error":
					this.logger.warn(
						{ provider: name, error: formatErrorSafe(attempt.error) },
						"unexpected error getting Vault credentials; moving on to next provider",
					);
					break;
			}
		}

		throw new CredentialsChainExhaustedError(
			"Unable to find credentials from any provider in the specified chain!",
			this.providers.length,
		);
	}

	isReuseLastProvider(): boolean {
		return this.reuseLastProvider;
	}

	setReuseLastProvider(reuseLastProvider: boolean): void {
		this.reuseLastProvider = reuseLastProvider;
	}

	/** The provider that last produced credentials, if any. */
	getLastUsedProvider(): VaultCredentialsProvider | null {
		return this.lastUsedProvider;
	}
}

/**
 * `VAULT_TOKEN`, then `vault.token` from the config file.
 */
export function defaultCredentialsProviderChain(
	sources: { env?: NodeJS.ProcessEnv; config?: () => VaultClientConfig } = {},
): VaultCredentialsProviderChain {
	return new VaultCredentialsProviderChain([
		new EnvironmentCredentialsProvider(sources.env),
		new ConfigCredentialsProvider(sources.config),
	]);
}
