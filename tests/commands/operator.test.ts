import { describe, expect, it, vi } from "vitest";

const logger = vi.hoisted(() => ({
	info: vi.fn(),
	warn: vi.fn(),
	error: vi.fn(),
	debug: vi.fn(),
}));

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => logger,
}));

import { formatInitResponse, formatSealStatus, registerOperatorCommands } from "../../src/commands/operator.js";
import { runCli } from "../helpers/cli.js";
import { callBody, callUrl, jsonResponse, queuedFetch } from "../helpers/fetch.js";

const sealStatusBody = {
	type: "shamir",
	initialized: true,
	sealed: true,
	t: 3,
	n: 5,
	progress: 1,
	version: "1.15.0",
};

describe("formatSealStatus", () => {
	it("shows unseal progress while sealed", () => {
		expect(
			formatSealStatus({
				sealed: true,
				initialized: true,
				threshold: 3,
				shares: 5,
				progress: 1,
				version: "1.15.0",
			}),
		).toEqual([
			"Initialized      true",
			"Sealed           true",
			"Total Shares     5",
			"Threshold        3",
			"Unseal Progress  1/3",
			"Version          1.15.0",
		]);
	});

	it("omits progress once unsealed", () => {
		expect(
			formatSealStatus({ sealed: false, initialized: true, threshold: 3, shares: 5, progress: 0 }),
		).toEqual(["Initialized   true", "Sealed        false", "Total Shares  5", "Threshold     3"]);
	});

	it("marks an unknown init state", () => {
		expect(formatSealStatus({ sealed: false, threshold: 1, shares: 1, progress: 0 })[0]).toBe(
			"Initialized   unknown",
		);
	});
});

describe("formatInitResponse", () => {
	it("numbers the unseal keys", () => {
		expect(formatInitResponse({ keys: ["k1", "k2"], keysBase64: [], rootToken: "test-root" })).toEqual([
			"Unseal Key 1: k1",
			"Unseal Key 2: k2",
			"",
			"Initial Root Token: test-root",
		]);
	});
});

describe("operator commands", () => {
	it("initializes a fresh server", async () => {
		const fetchImpl = queuedFetch(
			jsonResponse({ initialized: false }),
			jsonResponse({ keys: ["k1", "k2"], keys_base64: ["b1", "b2"], root_token: "test-root" }),
		);

		const run = await runCli(registerOperatorCommands, fetchImpl, ["init", "--shares", "2", "--threshold", "2"]);

		expect(callBody(fetchImpl, 1)).toEqual({ secret_shares: 2, secret_threshold: 2 });
		expect(run.lines).toEqual(["Unseal Key 1: k1", "Unseal Key 2: k2", "", "Initial Root Token: test-root"]);
	});

	it("uses five shares and a threshold of three by default", async () => {
		const fetchImpl = queuedFetch(
			jsonResponse({ initialized: false }),
			jsonResponse({ keys: ["k1", "k2", "k3", "k4", "k5"], root_token: "test-root" }),
		);

		await runCli(registerOperatorCommands, fetchImpl, ["init"]);

		expect(callBody(fetchImpl, 1)).toEqual({ secret_shares: 5, secret_threshold: 3 });
	});

	it("refuses to initialize twice", async () => {
		const fetchImpl = queuedFetch(jsonResponse({ initialized: true }));

		const run = await runCli(registerOperatorCommands, fetchImpl, ["init"]);

		expect(run.errors).toEqual(["Vault is already initialized."]);
		expect(run.exitCode).toBe(1);
		expect(fetchImpl).toHaveBeenCalledTimes(1);
	});

	it("rejects a non-numeric share count", async () => {
		const fetchImpl = queuedFetch(jsonResponse({ initialized: false }));

		await expect(
			runCli(registerOperatorCommands, fetchImpl, ["init", "--shares", "many"]),
		).rejects.toMatchObject({ code: "commander.invalidArgument" });
		expect(fetchImpl).not.toHaveBeenCalled();
	});

	it("prints the seal status", async () => {
		const fetchImpl = queuedFetch(jsonResponse({ ...sealStatusBody, sealed: false, progress: 0 }));

		const run = await runCli(registerOperatorCommands, fetchImpl, ["status"]);

		expect(callUrl(fetchImpl)).toBe("http://vault.test:8200/v1/sys/seal-status");
		expect(run.lines).toEqual([
			"Initialized   true",
			"Sealed        false",
			"Total Shares  5",
			"Threshold     3",
			"Version       1.15.0",
		]);
	});

	it("submits an unseal key share", async () => {
		const fetchImpl = queuedFetch(jsonResponse({ ...sealStatusBody, progress: 2 }));

		const run = await runCli(registerOperatorCommands, fetchImpl, ["unseal", "k1"]);

		expect(callBody(fetchImpl)).toEqual({ key: "k1" });
		expect(run.lines).toContain("Unseal Progress  2/3");
	});

	it("requires a key unless resetting", async () => {
		const fetchImpl = queuedFetch(jsonResponse(sealStatusBody));

		const run = await runCli(registerOperatorCommands, fetchImpl, ["unseal"]);

		expect(run.errors).toEqual(["Pass an unseal key, or --reset."]);
		expect(run.exitCode).toBe(1);
		expect(fetchImpl).not.toHaveBeenCalled();
	});
});
