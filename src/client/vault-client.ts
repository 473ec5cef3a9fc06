import { defaultCredentialsProviderChain } from "../auth/chain.js";
import type { VaultCredentialsProvider } from "../auth/types.js";
import { VaultServerError } from "../errors.js";
import { VaultHttp, type VaultHttpOptions } from "./http.js";
import {
	ListBodySchema,
	SecretBodySchema,
	TokenLookupDataSchema,
	toTokenInfo,
	toVaultResponse,
	type VaultResponse,
	type VaultTokenInfo,
} from "./models.js";

export type VaultClientOptions = VaultHttpOptions & {
	/** Defaults to `VAULT_TOKEN`, then `vault.token` from the config file. */
	credentialsProvider?: VaultCredentialsProvider;
};

function isNotFound(err: unknown): boolean {
	return err instanceof VaultServerError && err.status === 404;
}

/**
 * Secrets CRUD against the service's HTTP API. Every call is authenticated
 * with a token from the credentials provider.
 *
 * Paths are relative to `/v1/`, e.g. `secret/app/db`.
 */
export class VaultClient {
	protected readonly http: VaultHttp;
	protected readonly credentialsProvider: VaultCredentialsProvider;

	constructor(options: VaultClientOptions = {}) {
		this.http = new VaultHttp(options);
		this.credentialsProvider =
			options.credentialsProvider ?? defaultCredentialsProviderChain({ config: options.config });
	}

	getCredentialsProvider(): VaultCredentialsProvider {
		return this.credentialsProvider;
	}

	/**
	 * Read a secret. Resolves to null when nothing exists at `path`.
	 */
	async read(path: string): Promise<VaultResponse | null> {
		try {
			const body = await this.http.requestJson(SecretBodySchema, path, {
				method: "GET",
				credentials: this.credentialsProvider,
			});
			return toVaultResponse(body);
		} catch (err) {
			if (isNotFound(err)) return null;
			throw err;
		}
	}

	/**
	 * Write `data` to `path`. Most secret engines answer 204, which resolves
	 * to null; engines that return data (e.g. transit) resolve to the response.
	 */
	async write(path: string, data: Record<string, unknown>): Promise<VaultResponse | null> {
		const response = await this.http.request(path, {
			method: "POST",
			body: data,
			credentials: this.credentialsProvider,
		});
		if (response.body === null) return null;
		return toVaultResponse(this.http.parseBody(SecretBodySchema, response.body, "POST", path));
	}

	/**
	 * List the keys under `path`. Keys ending in `/` are folders.
	 */
	async list(path: string): Promise<string[]> {
		try {
			const body = await this.http.requestJson(ListBodySchema, path, {
				method: "GET",
				query: { list: "true" },
				credentials: this.credentialsProvider,
			});
			return body.data.keys;
		} catch (err) {
			if (isNotFound(err)) return [];
			throw err;
		}
	}

	async delete(path: string): Promise<void> {
		await this.http.request(path, { method: "DELETE", credentials: this.credentialsProvider });
	}

	/**
	 * Describe the token the client is currently using.
	 */
	async lookupSelf(): Promise<VaultTokenInfo> {
		const body = await this.http.requestJson(SecretBodySchema, "auth/token/lookup-self", {
			method: "GET",
			credentials: this.credentialsProvider,
		});
		return toTokenInfo(this.http.parseBody(TokenLookupDataSchema, body.data, "GET", "auth/token/lookup-self"));
	}
}
