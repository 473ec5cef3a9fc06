/**
 * Operator commands: init, status, unseal.
 */

import { type Command, InvalidArgumentError } from "commander";

import type { VaultInitResponse, VaultSealStatus } from "../client/models.js";
import { type CommandContext, defaultContext, type GlobalOptions, printJson, runAction } from "../cli/context.js";

function parsePositiveInt(value: string): number {
	const parsed = Number.parseInt(value, 10);
	if (!/^\d+$/.test(value) || parsed < 1) {
		throw new InvalidArgumentError("Must be a positive integer.");
	}
	return parsed;
}

export function formatInitResponse(response: VaultInitResponse): string[] {
	const lines = response.keys.map((key, i) => `Unseal Key ${i + 1}: ${key}`);
	lines.push("", `Initial Root Token: ${response.rootToken}`);
	return lines;
}

export function formatSealStatus(status: VaultSealStatus): string[] {
	const rows: Array<[string, string]> = [
		["Initialized", status.initialized === undefined ? "unknown" : String(status.initialized)],
		["Sealed", String(status.sealed)],
		["Total Shares", String(status.shares)],
		["Threshold", String(status.threshold)],
	];
	if (status.sealed) {
		rows.push(["Unseal Progress", `${status.progress}/${status.threshold}`]);
	}
	if (status.version) {
		rows.push(["Version", status.version]);
	}
	const width = Math.max(...rows.map(([key]) => key.length));
	return rows.map(([key, value]) => `${key.padEnd(width)}  ${value}`);
}

export function registerOperatorCommands(program: Command, ctx: CommandContext = defaultContext): void {
	program
		.command("init")
		.description("Initialize a new server and print its unseal keys and root token")
		.option("--shares <n>", "Number of key shares", parsePositiveInt, 5)
		.option("--threshold <n>", "Key shares required to unseal", parsePositiveInt, 3)
		.option("--json", "Output as JSON")
		.action(async (opts: { shares: number; threshold: number; json?: boolean }, cmd: Command) => {
			await runAction(ctx, async () => {
				const client = ctx.createClient(cmd.optsWithGlobals<GlobalOptions>());
				if (await client.initStatus()) {
					ctx.printError("Vault is already initialized.");
					process.exitCode = 1;
					return;
				}
				const response = await client.initialize({
					secretShares: opts.shares,
					secretThreshold: opts.threshold,
				});
				if (opts.json) {
					printJson(ctx, response);
					return;
				}
				for (const line of formatInitResponse(response)) {
					ctx.print(line);
				}
			});
		});

	program
		.command("status")
		.description("Show initialization and seal status")
		.option("--json", "Output as JSON")
		.action(async (opts: { json?: boolean }, cmd: Command) => {
			await runAction(ctx, async () => {
				const client = ctx.createClient(cmd.optsWithGlobals<GlobalOptions>());
				const status = await client.sealStatus();
				if (opts.json) {
					printJson(ctx, status);
					return;
				}
				for (const line of formatSealStatus(status)) {
					ctx.print(line);
				}
			});
		});

	program
		.command("unseal")
		.description("Submit one unseal key share")
		.argument("[key]", "Unseal key share")
		.option("--reset", "Discard the key shares submitted so far")
		.action(async (key: string | undefined, opts: { reset?: boolean }, cmd: Command) => {
			await runAction(ctx, async () => {
				if (!key && !opts.reset) {
					ctx.printError("Pass an unseal key, or --reset.");
					process.exitCode = 1;
					return;
				}
				const client = ctx.createClient(cmd.optsWithGlobals<GlobalOptions>());
				const status = await client.unseal(key ?? "", { reset: opts.reset });
				for (const line of formatSealStatus(status)) {
					ctx.print(line);
				}
			});
		});
}
