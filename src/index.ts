/**
 * Client library for a Vault-compatible secrets service.
 *
 * @example
 * ```ts
 * import { VaultClient } from "vault-client";
 *
 * // VAULT_ADDR / vault.addr for the URL, VAULT_TOKEN / vault.token for the token
 * const client = new VaultClient();
 * const secret = await client.read("secret/app/db");
 * ```
 */

export { attemptProvider, defaultCredentialsProviderChain, VaultCredentialsProviderChain } from "./auth/chain.js";
export type { CredentialsProviderChainOptions, ProviderAttempt } from "./auth/chain.js";
export { ConfigCredentialsProvider, VAULT_TOKEN_PROPERTY } from "./auth/config-provider.js";
export { EnvironmentCredentialsProvider, VAULT_TOKEN_ENV_VAR } from "./auth/env-provider.js";
export { AppRoleCredentialsProvider, UserPassCredentialsProvider } from "./auth/login-provider.js";
export type { AppRoleLogin, LoginProviderOptions, UserPassLogin } from "./auth/login-provider.js";
export { StaticTokenCredentialsProvider } from "./auth/static-provider.js";
export { createCredentials } from "./auth/types.js";
export type { VaultCredentials, VaultCredentialsProvider, VaultLease } from "./auth/types.js";
export { VaultAdminClient } from "./client/admin-client.js";
export { VaultHttp } from "./client/http.js";
export type { VaultHttpOptions } from "./client/http.js";
export type {
	VaultInitRequest,
	VaultInitResponse,
	VaultPolicy,
	VaultResponse,
	VaultSealStatus,
	VaultTokenInfo,
} from "./client/models.js";
export { VaultClient } from "./client/vault-client.js";
export type { VaultClientOptions } from "./client/vault-client.js";
export type { VaultClientConfig } from "./config/config.js";
export {
	CredentialsChainExhaustedError,
	CredentialsResolutionError,
	VaultClientError,
	VaultConfigurationError,
	VaultServerError,
} from "./errors.js";
export {
	DefaultUrlResolver,
	StaticUrlResolver,
	VAULT_ADDR_ENV_VAR,
	VAULT_ADDR_PROPERTY,
} from "./url-resolver.js";
export type { PropertySources, UrlResolver } from "./url-resolver.js";
