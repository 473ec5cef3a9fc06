import { describe, expect, it, vi } from "vitest";

const logger = vi.hoisted(() => ({
	info: vi.fn(),
	warn: vi.fn(),
	error: vi.fn(),
	debug: vi.fn(),
	isLevelEnabled: vi.fn((_level: string) => false),
}));

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => logger,
}));

import { StaticTokenCredentialsProvider } from "../../src/auth/static-provider.js";
import { EnvironmentCredentialsProvider } from "../../src/auth/env-provider.js";
import { buildCliCredentialsChain, type CommandContext, runAction } from "../../src/cli/context.js";
import { VaultServerError } from "../../src/errors.js";
import { StaticUrlResolver } from "../../src/url-resolver.js";

const urlResolver = new StaticUrlResolver("http://vault.test:8200");

describe("buildCliCredentialsChain", () => {
	it("prefers --token over the environment", async () => {
		const chain = buildCliCredentialsChain({ token: "test-flag-token" }, urlResolver, {
			VAULT_TOKEN: "test-env-token",
		});

		await expect(chain.getCredentials()).resolves.toEqual({ token: "test-flag-token" });
		expect(chain.getLastUsedProvider()).toBeInstanceOf(StaticTokenCredentialsProvider);
	});

	it("falls back to VAULT_TOKEN", async () => {
		const chain = buildCliCredentialsChain({}, urlResolver, { VAULT_TOKEN: "test-env-token" });

		await expect(chain.getCredentials()).resolves.toEqual({ token: "test-env-token" });
		expect(chain.getLastUsedProvider()).toBeInstanceOf(EnvironmentCredentialsProvider);
	});
});

describe("runAction", () => {
	function captureContext() {
		const errors: string[] = [];
		const ctx: CommandContext = {
			createClient: () => {
				throw new Error("not used");
			},
			print: () => {},
			printError: (line) => errors.push(line),
		};
		return { ctx, errors };
	}

	it("prints failures and sets the exit code", async () => {
		const { ctx, errors } = captureContext();
		const previous = process.exitCode;

		try {
			await runAction(ctx, async () => {
				throw new VaultServerError("Vault request failed (503) GET /v1/sys/health", 503, []);
			});
			expect(process.exitCode).toBe(1);
		} finally {
			process.exitCode = previous;
		}
		expect(errors).toEqual(["Error: VaultServerError: Vault request failed (503) GET /v1/sys/health"]);
	});

	it("leaves the exit code alone on success", async () => {
		const { ctx, errors } = captureContext();
		const previous = process.exitCode;

		await runAction(ctx, async () => {});

		expect(process.exitCode).toBe(previous);
		expect(errors).toEqual([]);
	});
});
