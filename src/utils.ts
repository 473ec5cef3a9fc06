import os from "node:os";
import path from "node:path";

export function sleep(ms: number) {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * True for null, undefined, empty and whitespace-only strings.
 */
export function isBlank(value: string | null | undefined): boolean {
	return value == null || value.trim().length === 0;
}

export function trimTrailingSlashes(value: string): string {
	return value.replace(/\/+$/, "");
}

/**
 * Strip leading slashes and a leading `v1/` so callers may pass either
 * `secret/app` or `/v1/secret/app`.
 */
export function normalizeApiPath(p: string): string {
	return p.replace(/^\/+/, "").replace(/^v1\//, "");
}

export const CONFIG_DIR = process.env.VAULT_CLIENT_DATA_DIR ?? path.join(os.homedir(), ".vault-client");
