import type { Command } from "commander";

import { StaticTokenCredentialsProvider } from "../../src/auth/static-provider.js";
import { createProgram } from "../../src/cli/program.js";
import type { CommandContext, GlobalOptions } from "../../src/cli/context.js";
import { VaultAdminClient } from "../../src/client/admin-client.js";
import { baseUrl, type FetchMock } from "./fetch.js";

export type CliRun = {
	lines: string[];
	errors: string[];
	globals: GlobalOptions[];
	exitCode: number | undefined;
};

/**
 * Run the program in-process against `fetchImpl`, capturing output.
 */
export async function runCli(
	register: (program: Command, ctx: CommandContext) => void,
	fetchImpl: FetchMock,
	args: string[],
): Promise<CliRun> {
	const run: CliRun = { lines: [], errors: [], globals: [], exitCode: undefined };
	const ctx: CommandContext = {
		createClient: (opts) => {
			run.globals.push(opts);
			return new VaultAdminClient({
				url: baseUrl,
				fetchImpl,
				credentialsProvider: new StaticTokenCredentialsProvider(opts.token ?? "test-token"),
				config: () => ({}),
				retry: { maxAttempts: 1 },
			});
		},
		print: (line) => run.lines.push(line),
		printError: (line) => run.errors.push(line),
	};

	const program = createProgram().exitOverride();
	register(program, ctx);
	const previousExitCode = process.exitCode;
	try {
		await program.parseAsync(args, { from: "user" });
		run.exitCode = typeof process.exitCode === "number" ? process.exitCode : undefined;
	} finally {
		process.exitCode = previousExitCode;
	}
	return run;
}
