import os from "node:os";
import path from "node:path";
import { CONFIG_DIR } from "../utils.js";

export const CONFIG_PATH_ENV_VAR = "VAULT_CLIENT_CONFIG";

export type ConfigPathSource = "override" | "env" | "default";

export type ConfigLocation = {
	path: string;
	source: ConfigPathSource;
};

let configPathOverride: string | null = null;

function expandHome(p: string): string {
	if (p === "~") return os.homedir();
	if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
	return p;
}

/**
 * Where the config file lives: `--config` / `setConfigPath`, then
 * `VAULT_CLIENT_CONFIG`, then `<data dir>/config.json`.
 */
export function resolveConfigLocation(env: NodeJS.ProcessEnv = process.env): ConfigLocation {
	if (configPathOverride) {
		return { path: expandHome(configPathOverride), source: "override" };
	}
	const fromEnv = env[CONFIG_PATH_ENV_VAR]?.trim();
	if (fromEnv) {
		return { path: expandHome(fromEnv), source: "env" };
	}
	return { path: path.join(CONFIG_DIR, "config.json"), source: "default" };
}

export function resolveConfigPath(): string {
	return resolveConfigLocation().path;
}

export function setConfigPath(configPath: string | null): void {
	configPathOverride = configPath;
}

/** Drop the override (tests). */
export function resetConfigPath(): void {
	configPathOverride = null;
}
