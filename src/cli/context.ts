import chalk from "chalk";
import { VaultCredentialsProviderChain } from "../auth/chain.js";
import { ConfigCredentialsProvider } from "../auth/config-provider.js";
import { EnvironmentCredentialsProvider } from "../auth/env-provider.js";
import { AppRoleCredentialsProvider, UserPassCredentialsProvider } from "../auth/login-provider.js";
import { StaticTokenCredentialsProvider } from "../auth/static-provider.js";
import type { VaultCredentialsProvider } from "../auth/types.js";
import { VaultAdminClient } from "../client/admin-client.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import { getChildLogger } from "../logging.js";
import { DefaultUrlResolver, StaticUrlResolver, type UrlResolver } from "../url-resolver.js";

export type GlobalOptions = {
	address?: string;
	token?: string;
	verbose?: boolean;
	config?: string;
};

/**
 * What commands need from the outside world; swapped out in tests.
 */
export type CommandContext = {
	createClient: (opts: GlobalOptions) => VaultAdminClient;
	print: (line: string) => void;
	printError: (line: string) => void;
};

/**
 * Providers tried by the CLI, in order:
 * 1. `--token`
 * 2. `VAULT_TOKEN`
 * 3. `vault.token` in the config file
 * 4. userpass login when `VAULT_USERNAME` and `VAULT_PASSWORD` are set
 * 5. AppRole login when `VAULT_ROLE_ID` is set
 */
export function buildCliCredentialsChain(
	opts: GlobalOptions,
	urlResolver: UrlResolver,
	env: NodeJS.ProcessEnv = process.env,
): VaultCredentialsProviderChain {
	const providers: VaultCredentialsProvider[] = [];
	if (opts.token) {
		providers.push(new StaticTokenCredentialsProvider(opts.token));
	}
	providers.push(new EnvironmentCredentialsProvider(env), new ConfigCredentialsProvider());

	const username = env.VAULT_USERNAME;
	const password = env.VAULT_PASSWORD;
	if (username && password) {
		providers.push(new UserPassCredentialsProvider({ username, password }, { urlResolver }));
	}
	const roleId = env.VAULT_ROLE_ID;
	if (roleId) {
		providers.push(
			new AppRoleCredentialsProvider({ roleId, secretId: env.VAULT_SECRET_ID }, { urlResolver }),
		);
	}

	return new VaultCredentialsProviderChain(providers, {
		logger: getChildLogger({ module: "cli-credentials" }),
	});
}

export function createCliClient(opts: GlobalOptions): VaultAdminClient {
	const urlResolver = opts.address ? new StaticUrlResolver(opts.address) : new DefaultUrlResolver();
	return new VaultAdminClient({
		urlResolver,
		credentialsProvider: buildCliCredentialsChain(opts, urlResolver),
	});
}

export const defaultContext: CommandContext = {
	createClient: createCliClient,
	print: (line) => console.log(line),
	printError: (line) => console.error(chalk.red(line)),
};

/**
 * Run a command body, printing failures instead of throwing so the process
 * can close its logger and exit with code 1.
 */
export async function runAction(ctx: CommandContext, action: () => Promise<void>): Promise<void> {
	try {
		await action();
	} catch (err) {
		ctx.printError(`Error: ${formatErrorSafe(err)}`);
		process.exitCode = 1;
	}
}

export function printJson(ctx: CommandContext, value: unknown): void {
	ctx.print(JSON.stringify(value, null, 2));
}
