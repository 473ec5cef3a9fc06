import { VaultConfigurationError, VaultServerError } from "../errors.js";
import {
	InitBodySchema,
	InitStatusBodySchema,
	PolicyBodySchema,
	PolicyListBodySchema,
	SealStatusBodySchema,
	toInitResponse,
	toSealStatus,
	type VaultInitRequest,
	type VaultInitResponse,
	type VaultPolicy,
	type VaultSealStatus,
} from "./models.js";
import { VaultClient } from "./vault-client.js";

function policyPath(name: string): string {
	if (!/^[A-Za-z0-9_.-]+$/.test(name)) {
		throw new VaultConfigurationError(`Invalid policy name: ${name}`);
	}
	return `sys/policy/${name}`;
}

/**
 * Operator endpoints: initialization, seal state and ACL policies.
 *
 * `sys/init`, `sys/seal-status` and `sys/unseal` are unauthenticated, so
 * they work before any token exists.
 */
export class VaultAdminClient extends VaultClient {
	async initStatus(): Promise<boolean> {
		const body = await this.http.requestJson(InitStatusBodySchema, "sys/init", { method: "GET" });
		return body.initialized;
	}

	/**
	 * Initialize a new server. The returned unseal keys and root token are
	 * shown exactly once; store them before doing anything else.
	 */
	async initialize(request: VaultInitRequest): Promise<VaultInitResponse> {
		const { secretShares, secretThreshold } = request;
		if (!Number.isInteger(secretShares) || !Number.isInteger(secretThreshold)) {
			throw new VaultConfigurationError("secretShares and secretThreshold must be integers");
		}
		if (secretThreshold < 1 || secretThreshold > secretShares) {
			throw new VaultConfigurationError(
				`secretThreshold must be between 1 and secretShares (${secretShares}), got ${secretThreshold}`,
			);
		}
		if (request.pgpKeys && request.pgpKeys.length !== secretShares) {
			throw new VaultConfigurationError("pgpKeys must contain one key per secret share");
		}

		// Keys and root token come back once; a retried PUT would only see "already initialized".
		const body = await this.http.requestJson(InitBodySchema, "sys/init", {
			method: "PUT",
			retry: false,
			body: {
				secret_shares: secretShares,
				secret_threshold: secretThreshold,
				pgp_keys: request.pgpKeys,
				root_token_pgp_key: request.rootTokenPgpKey,
			},
		});
		return toInitResponse(body);
	}

	async sealStatus(): Promise<VaultSealStatus> {
		const body = await this.http.requestJson(SealStatusBodySchema, "sys/seal-status", {
			method: "GET",
		});
		return toSealStatus(body);
	}

	/**
	 * Submit one unseal key share. `reset` discards the shares submitted so far.
	 */
	async unseal(key: string, options: { reset?: boolean } = {}): Promise<VaultSealStatus> {
		const body = await this.http.requestJson(SealStatusBodySchema, "sys/unseal", {
			method: "PUT",
			retry: false,
			body: options.reset ? { reset: true } : { key },
		});
		return toSealStatus(body);
	}

	async listPolicies(): Promise<string[]> {
		const body = await this.http.requestJson(PolicyListBodySchema, "sys/policy", {
			method: "GET",
			credentials: this.credentialsProvider,
		});
		return body.data?.policies ?? body.policies ?? [];
	}

	async getPolicy(name: string): Promise<VaultPolicy | null> {
		try {
			const body = await this.http.requestJson(PolicyBodySchema, policyPath(name), {
				method: "GET",
				credentials: this.credentialsProvider,
			});
			return { name: body.name, rules: body.rules };
		} catch (err) {
			if (err instanceof VaultServerError && err.status === 404) return null;
			throw err;
		}
	}

	async putPolicy(name: string, rules: string): Promise<void> {
		await this.http.request(policyPath(name), {
			method: "PUT",
			body: { policy: rules },
			credentials: this.credentialsProvider,
		});
	}

	async deletePolicy(name: string): Promise<void> {
		await this.http.request(policyPath(name), {
			method: "DELETE",
			credentials: this.credentialsProvider,
		});
	}
}
