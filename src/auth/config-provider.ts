import { loadConfig, type VaultClientConfig } from "../config/config.js";
import { CredentialsResolutionError } from "../errors.js";
import { isBlank } from "../utils.js";
import { createCredentials, type VaultCredentials, type VaultCredentialsProvider } from "./types.js";

export const VAULT_TOKEN_PROPERTY = "vault.token";

/**
 * Reads the token from `vault.token` in the config file. The file is re-read
 * when it changes, so an updated token is picked up without a restart.
 */
export class ConfigCredentialsProvider implements VaultCredentialsProvider {
	private readonly config: () => VaultClientConfig;

	constructor(config: () => VaultClientConfig = loadConfig) {
		this.config = config;
	}

	async getCredentials(): Promise<VaultCredentials> {
		const token = this.config().vault?.token;
		if (token === undefined || isBlank(token)) {
			throw new CredentialsResolutionError(`${VAULT_TOKEN_PROPERTY} is not set in the config file`);
		}
		return createCredentials(token.trim());
	}
}
