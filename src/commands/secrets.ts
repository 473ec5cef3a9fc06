/**
 * Secret commands.
 *
 * - vault-client read <path> [--field <name>] [--json]
 * - vault-client write <path> key=value... (value "@file" reads the file)
 * - vault-client list <path>
 * - vault-client delete <path>
 * - vault-client whoami
 */

import fs from "node:fs";
import type { Command } from "commander";

import type { VaultResponse } from "../client/models.js";
import { VaultClientError, VaultConfigurationError } from "../errors.js";
import { type CommandContext, defaultContext, type GlobalOptions, printJson, runAction } from "../cli/context.js";

/**
 * Turn `key=value` arguments into a secret payload. A value of the form
 * `@path` is replaced by the contents of that file.
 */
export function parseKeyValuePairs(
	pairs: readonly string[],
	readFile: (file: string) => string = (file) => fs.readFileSync(file, "utf-8"),
): Record<string, string> {
	const data: Record<string, string> = {};
	for (const pair of pairs) {
		const eq = pair.indexOf("=");
		if (eq <= 0) {
			throw new VaultConfigurationError(`Expected key=value, got "${pair}"`);
		}
		const key = pair.slice(0, eq);
		const value = pair.slice(eq + 1);
		data[key] = value.startsWith("@") ? readFile(value.slice(1)) : value;
	}
	if (Object.keys(data).length === 0) {
		throw new VaultConfigurationError("No data given; pass at least one key=value pair");
	}
	return data;
}

/**
 * Render a secret as aligned `key  value` lines, with lease details first.
 */
export function formatSecret(response: VaultResponse): string[] {
	const rows: Array<[string, string]> = [];
	if (response.leaseId) {
		rows.push(["lease_id", response.leaseId]);
		rows.push(["lease_duration", `${response.leaseDuration}s`]);
		rows.push(["lease_renewable", String(response.renewable)]);
	}
	for (const [key, value] of Object.entries(response.data)) {
		rows.push([key, typeof value === "string" ? value : JSON.stringify(value)]);
	}
	const width = Math.max(3, ...rows.map(([key]) => key.length));
	return [`${"Key".padEnd(width)}  Value`, `${"---".padEnd(width)}  -----`].concat(
		rows.map(([key, value]) => `${key.padEnd(width)}  ${value}`),
	);
}

export function registerSecretCommands(program: Command, ctx: CommandContext = defaultContext): void {
	program
		.command("read")
		.description("Read a secret")
		.argument("<path>", "Secret path, e.g. secret/app/db")
		.option("-f, --field <name>", "Print only this field")
		.option("--json", "Output as JSON")
		.action(async (path: string, opts: { field?: string; json?: boolean }, cmd: Command) => {
			await runAction(ctx, async () => {
				const client = ctx.createClient(cmd.optsWithGlobals<GlobalOptions>());
				const response = await client.read(path);
				if (!response) {
					throw new VaultClientError(`No value found at ${path}`);
				}

				if (opts.field) {
					if (!Object.hasOwn(response.data, opts.field)) {
						throw new VaultConfigurationError(`Field "${opts.field}" not present in secret`);
					}
					const value = response.data[opts.field];
					ctx.print(typeof value === "string" ? value : JSON.stringify(value));
					return;
				}
				if (opts.json) {
					printJson(ctx, response);
					return;
				}
				for (const line of formatSecret(response)) {
					ctx.print(line);
				}
			});
		});

	program
		.command("write")
		.description("Write a secret")
		.argument("<path>", "Secret path")
		.argument("<pairs...>", "key=value pairs (value @file reads a file)")
		.action(async (path: string, pairs: string[], _opts: unknown, cmd: Command) => {
			await runAction(ctx, async () => {
				const data = parseKeyValuePairs(pairs);
				const client = ctx.createClient(cmd.optsWithGlobals<GlobalOptions>());
				const response = await client.write(path, data);
				if (response) {
					printJson(ctx, response);
					return;
				}
				ctx.print(`Success! Data written to: ${path}`);
			});
		});

	program
		.command("list")
		.description("List keys under a path")
		.argument("<path>", "Folder path")
		.option("--json", "Output as JSON")
		.action(async (path: string, opts: { json?: boolean }, cmd: Command) => {
			await runAction(ctx, async () => {
				const client = ctx.createClient(cmd.optsWithGlobals<GlobalOptions>());
				const keys = await client.list(path);
				if (opts.json) {
					printJson(ctx, keys);
					return;
				}
				if (keys.length === 0) {
					ctx.print(`No entries found at ${path}`);
					return;
				}
				for (const key of keys) {
					ctx.print(key);
				}
			});
		});

	program
		.command("delete")
		.description("Delete a secret")
		.argument("<path>", "Secret path")
		.action(async (path: string, _opts: unknown, cmd: Command) => {
			await runAction(ctx, async () => {
				const client = ctx.createClient(cmd.optsWithGlobals<GlobalOptions>());
				await client.delete(path);
				ctx.print(`Success! Data deleted (if it existed) at: ${path}`);
			});
		});

	program
		.command("whoami")
		.description("Show the token the client resolves to")
		.option("--json", "Output as JSON")
		.action(async (opts: { json?: boolean }, cmd: Command) => {
			await runAction(ctx, async () => {
				const client = ctx.createClient(cmd.optsWithGlobals<GlobalOptions>());
				const info = await client.lookupSelf();
				if (opts.json) {
					printJson(ctx, info);
					return;
				}
				ctx.print(`display_name  ${info.displayName ?? "-"}`);
				ctx.print(`policies      ${info.policies.join(", ") || "-"}`);
				ctx.print(`ttl           ${info.ttl}s`);
				ctx.print(`renewable     ${info.renewable}`);
			});
		});
}
