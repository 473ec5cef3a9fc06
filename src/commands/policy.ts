import fs from "node:fs";
import type { Command } from "commander";

import { type CommandContext, defaultContext, type GlobalOptions, printJson, runAction } from "../cli/context.js";
import { VaultConfigurationError } from "../errors.js";

export function registerPolicyCommands(program: Command, ctx: CommandContext = defaultContext): void {
	const policy = program.command("policy").description("Manage ACL policies");

	policy
		.command("list")
		.description("List policy names")
		.option("--json", "Output as JSON")
		.action(async (opts: { json?: boolean }, cmd: Command) => {
			await runAction(ctx, async () => {
				const client = ctx.createClient(cmd.optsWithGlobals<GlobalOptions>());
				const names = await client.listPolicies();
				if (opts.json) {
					printJson(ctx, names);
					return;
				}
				for (const name of names) {
					ctx.print(name);
				}
			});
		});

	policy
		.command("read")
		.description("Print a policy's rules")
		.argument("<name>", "Policy name")
		.action(async (name: string, _opts: unknown, cmd: Command) => {
			await runAction(ctx, async () => {
				const client = ctx.createClient(cmd.optsWithGlobals<GlobalOptions>());
				const found = await client.getPolicy(name);
				if (!found) {
					throw new VaultConfigurationError(`No policy named "${name}"`);
				}
				ctx.print(found.rules);
			});
		});

	policy
		.command("write")
		.description("Create or replace a policy from a rules file")
		.argument("<name>", "Policy name")
		.argument("<file>", "Path to an HCL or JSON rules file")
		.action(async (name: string, file: string, _opts: unknown, cmd: Command) => {
			await runAction(ctx, async () => {
				const rules = fs.readFileSync(file, "utf-8");
				const client = ctx.createClient(cmd.optsWithGlobals<GlobalOptions>());
				await client.putPolicy(name, rules);
				ctx.print(`Success! Uploaded policy: ${name}`);
			});
		});

	policy
		.command("delete")
		.description("Delete a policy")
		.argument("<name>", "Policy name")
		.action(async (name: string, _opts: unknown, cmd: Command) => {
			await runAction(ctx, async () => {
				const client = ctx.createClient(cmd.optsWithGlobals<GlobalOptions>());
				await client.deletePolicy(name);
				ctx.print(`Success! Deleted policy: ${name}`);
			});
		});
}
