import { CredentialsResolutionError } from "../errors.js";
import { isBlank } from "../utils.js";
import { createCredentials, type VaultCredentials, type VaultCredentialsProvider } from "./types.js";

/**
 * Always returns the token it was built with.
 */
export class StaticTokenCredentialsProvider implements VaultCredentialsProvider {
	private readonly credentials: VaultCredentials;

	constructor(token: string) {
		this.credentials = createCredentials(token);
	}

	async getCredentials(): Promise<VaultCredentials> {
		if (isBlank(this.credentials.token)) {
			throw new CredentialsResolutionError("Static Vault token is blank");
		}
		return this.credentials;
	}
}
