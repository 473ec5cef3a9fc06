export type VaultLease = {
	/** Seconds; 0 means the token does not expire. */
	leaseDuration: number;
	renewable: boolean;
	policies: readonly string[];
	/** Epoch ms after which the token should be considered expired. */
	expiresAt?: number;
};

export type VaultCredentials = Readonly<{
	token: string;
	lease?: Readonly<VaultLease>;
}>;

/**
 * A source of credentials. Rejects with `CredentialsResolutionError` when the
 * source is unavailable or empty.
 */
export interface VaultCredentialsProvider {
	getCredentials(): Promise<VaultCredentials>;
}

export function createCredentials(token: string, lease?: VaultLease): VaultCredentials {
	return Object.freeze(
		lease ? { token, lease: Object.freeze({ ...lease, policies: [...lease.policies] }) } : { token },
	);
}
