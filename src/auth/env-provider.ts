import { CredentialsResolutionError } from "../errors.js";
import { isBlank } from "../utils.js";
import { createCredentials, type VaultCredentials, type VaultCredentialsProvider } from "./types.js";

export const VAULT_TOKEN_ENV_VAR = "VAULT_TOKEN";

/**
 * Reads the token from the `VAULT_TOKEN` environment variable on every call.
 */
export class EnvironmentCredentialsProvider implements VaultCredentialsProvider {
	private readonly env: NodeJS.ProcessEnv;

	constructor(env: NodeJS.ProcessEnv = process.env) {
		this.env = env;
	}

	async getCredentials(): Promise<VaultCredentials> {
		const token = this.env[VAULT_TOKEN_ENV_VAR];
		if (token === undefined || isBlank(token)) {
			throw new CredentialsResolutionError(
				`${VAULT_TOKEN_ENV_VAR} environment variable is not set or blank`,
			);
		}
		return createCredentials(token.trim());
	}
}
