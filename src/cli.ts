#!/usr/bin/env node

import { createProgram } from "./cli/program.js";
import { registerOperatorCommands } from "./commands/operator.js";
import { registerPolicyCommands } from "./commands/policy.js";
import { registerSecretCommands } from "./commands/secrets.js";
import { resolveConfigLocation, setConfigPath } from "./config/path.js";
import { setVerbose } from "./globals.js";
import { closeLogger, getChildLogger } from "./logging.js";

const program = createProgram();

registerSecretCommands(program);
registerOperatorCommands(program);
registerPolicyCommands(program);

// Apply --config and --verbose before any command loads config or logs
program.hook("preAction", (thisCommand) => {
	const opts = thisCommand.opts();
	if (opts.config) {
		setConfigPath(opts.config);
	}
	if (opts.verbose) {
		setVerbose(true);
	}
	getChildLogger({ module: "cli" }).debug(resolveConfigLocation(), "using config file");
});

async function main(): Promise<void> {
	await program.parseAsync();
}

main()
	.catch((err) => {
		console.error(`Error: ${String(err)}`);
		process.exitCode = 1;
	})
	.finally(() => {
		closeLogger();
	});
