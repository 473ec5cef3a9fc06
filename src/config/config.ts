import fs from "node:fs";

import JSON5 from "json5";
import { z } from "zod";

import { resolveConfigPath } from "./path.js";

// Connection settings; the dotted names mirror the `vault.addr` / `vault.token`
// property keys used by the URL resolver and the config credentials provider.
const VaultConnectionConfigSchema = z.object({
	addr: z.string().optional(),
	token: z.string().optional(),
	namespace: z.string().optional(),
});

const RetryConfigSchema = z.object({
	maxAttempts: z.number().int().positive().default(3),
	baseDelayMs: z.number().int().nonnegative().default(250),
	maxDelayMs: z.number().int().nonnegative().default(5_000),
});

const HttpConfigSchema = z.object({
	timeoutMs: z.number().int().positive().default(15_000),
	retry: RetryConfigSchema.optional(),
});

const LoggingConfigSchema = z.object({
	level: z.enum(["silent", "fatal", "error", "warn", "info", "debug", "trace"]).optional(),
	file: z.string().optional(),
});

// Main config schema
const VaultClientConfigSchema = z.object({
	vault: VaultConnectionConfigSchema.optional(),
	http: HttpConfigSchema.optional(),
	logging: LoggingConfigSchema.optional(),
});

export type VaultClientConfig = z.infer<typeof VaultClientConfigSchema>;
export type VaultConnectionConfig = z.infer<typeof VaultConnectionConfigSchema>;
export type HttpConfig = z.infer<typeof HttpConfigSchema>;
export type RetrySettings = z.infer<typeof RetryConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

export const DEFAULT_HTTP_TIMEOUT_MS = 15_000;

let cachedConfig: VaultClientConfig | null = null;
let configMtime: number | null = null;
let cachedConfigPath: string | null = null;

/**
 * Load and validate the config file. A missing or unreadable file yields `{}`.
 */
export function loadConfig(): VaultClientConfig {
	const configPath = resolveConfigPath();

	try {
		const stat = fs.statSync(configPath);
		// Invalidate cache if path changed or mtime changed
		if (cachedConfig && cachedConfigPath === configPath && configMtime === stat.mtimeMs) {
			return cachedConfig;
		}

		const raw = fs.readFileSync(configPath, "utf-8");
		const validated = parseConfig(JSON5.parse(raw));

		cachedConfig = validated;
		configMtime = stat.mtimeMs;
		cachedConfigPath = configPath;

		return validated;
	} catch (err) {
		const code = (err as NodeJS.ErrnoException).code;
		if (code === "ENOENT" || code === "EACCES") {
			return {};
		}
		throw err;
	}
}

export function parseConfig(input: unknown): VaultClientConfig {
	return VaultClientConfigSchema.parse(input);
}

/**
 * Reset the config cache (useful for testing).
 */
export function resetConfigCache() {
	cachedConfig = null;
	configMtime = null;
	cachedConfigPath = null;
}
