import { VaultHttp, type VaultHttpOptions } from "../client/http.js";
import { LoginBodySchema } from "../client/models.js";
import { CredentialsResolutionError, VaultServerError } from "../errors.js";
import { isBlank } from "../utils.js";
import { createCredentials, type VaultCredentials, type VaultCredentialsProvider } from "./types.js";

/** Refresh this long before the lease runs out. */
const EXPIRY_SKEW_MS = 30_000;

export type LoginProviderOptions = VaultHttpOptions & {
	/** Auth method mount path. */
	mount?: string;
	now?: () => number;
};

type LoginRequest = {
	path: string;
	body: Record<string, string>;
	label: string;
};

/**
 * Client errors (bad password, unknown role) surface as
 * `CredentialsResolutionError`; anything else is left as-is.
 */
async function performLogin(
	http: VaultHttp,
	request: LoginRequest,
	now: number,
): Promise<VaultCredentials> {
	const body = await http
		.requestJson(LoginBodySchema, request.path, { method: "POST", body: request.body })
		.catch((err: unknown) => {
			if (err instanceof VaultServerError && err.status >= 400 && err.status < 500) {
				throw new CredentialsResolutionError(`${request.label} login rejected (${err.status})`, {
					cause: err,
				});
			}
			throw err;
		});

	const { auth } = body;
	if (isBlank(auth.client_token)) {
		throw new CredentialsResolutionError(`${request.label} login returned no client token`);
	}
	return createCredentials(auth.client_token, {
		leaseDuration: auth.lease_duration,
		renewable: auth.renewable,
		policies: auth.policies ?? [],
		expiresAt: auth.lease_duration > 0 ? now + auth.lease_duration * 1000 : undefined,
	});
}

/**
 * Holds a login token until 30 seconds before its lease expires. Callers that
 * arrive while a login is running share it.
 */
class CachedLogin {
	private cached: VaultCredentials | null = null;
	private inFlight: Promise<VaultCredentials> | null = null;

	constructor(private readonly now: () => number) {}

	async get(fetchCredentials: (now: number) => Promise<VaultCredentials>): Promise<VaultCredentials> {
		const now = this.now();
		const expiresAt = this.cached?.lease?.expiresAt;
		if (this.cached && (expiresAt === undefined || expiresAt - EXPIRY_SKEW_MS > now)) {
			return this.cached;
		}
		if (this.inFlight) {
			return this.inFlight;
		}

		this.cached = null;
		const pending = fetchCredentials(now);
		this.inFlight = pending;
		try {
			const fresh = await pending;
			if (this.inFlight === pending) {
				this.cached = fresh;
			}
			return fresh;
		} finally {
			if (this.inFlight === pending) {
				this.inFlight = null;
			}
		}
	}

	clear(): void {
		this.cached = null;
		this.inFlight = null;
	}
}

export type UserPassLogin = {
	username: string;
	password: string;
};

/**
 * Username/password login (`auth/<mount>/login/<username>`).
 */
export class UserPassCredentialsProvider implements VaultCredentialsProvider {
	private readonly http: VaultHttp;
	private readonly mount: string;
	private readonly cache: CachedLogin;

	constructor(
		private readonly login: UserPassLogin,
		options: LoginProviderOptions = {},
	) {
		if (isBlank(login.username)) {
			throw new CredentialsResolutionError("Username must not be blank");
		}
		this.http = new VaultHttp(options);
		this.mount = options.mount ?? "userpass";
		this.cache = new CachedLogin(options.now ?? Date.now);
	}

	async getCredentials(): Promise<VaultCredentials> {
		return this.cache.get((now) =>
			performLogin(
				this.http,
				{
					path: `auth/${this.mount}/login/${encodeURIComponent(this.login.username)}`,
					body: { password: this.login.password },
					label: "userpass",
				},
				now,
			),
		);
	}

	/** Drop the cached token so the next call logs in again. */
	invalidate(): void {
		this.cache.clear();
	}
}

export type AppRoleLogin = {
	roleId: string;
	secretId?: string;
};

/**
 * AppRole login (`auth/<mount>/login`) for machine identities.
 */
export class AppRoleCredentialsProvider implements VaultCredentialsProvider {
	private readonly http: VaultHttp;
	private readonly mount: string;
	private readonly cache: CachedLogin;

	constructor(
		private readonly login: AppRoleLogin,
		options: LoginProviderOptions = {},
	) {
		if (isBlank(login.roleId)) {
			throw new CredentialsResolutionError("AppRole role_id must not be blank");
		}
		this.http = new VaultHttp(options);
		this.mount = options.mount ?? "approle";
		this.cache = new CachedLogin(options.now ?? Date.now);
	}

	async getCredentials(): Promise<VaultCredentials> {
		const body: Record<string, string> = { role_id: this.login.roleId };
		if (this.login.secretId) {
			body.secret_id = this.login.secretId;
		}
		return this.cache.get((now) =>
			performLogin(this.http, { path: `auth/${this.mount}/login`, body, label: "approle" }, now),
		);
	}

	invalidate(): void {
		this.cache.clear();
	}
}
