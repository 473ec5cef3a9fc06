import { createRequire } from "node:module";
import { Command } from "commander";

const require = createRequire(import.meta.url);

function getVersion(): string {
	try {
		// Resolve package.json relative to this module (works from src or dist)
		const pkg: { version?: string } = require("../../package.json");
		return pkg.version ?? "0.0.0";
	} catch {
		return "0.0.0";
	}
}

export function createProgram(): Command {
	const program = new Command();

	program
		.name("vault-client")
		.description("Read and manage secrets on a Vault server")
		.version(getVersion())
		.option("-v, --verbose", "Enable verbose output")
		.option("-c, --config <path>", "Path to config file")
		.option("-a, --address <url>", "Server URL (overrides VAULT_ADDR and vault.addr)")
		.option("-t, --token <token>", "Token to use before any other credentials source");

	return program;
}
