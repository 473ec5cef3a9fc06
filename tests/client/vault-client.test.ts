import { beforeEach, describe, expect, it, vi } from "vitest";

const logger = vi.hoisted(() => ({
	info: vi.fn(),
	warn: vi.fn(),
	error: vi.fn(),
	debug: vi.fn(),
}));

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => logger,
}));

import { StaticTokenCredentialsProvider } from "../../src/auth/static-provider.js";
import { createCredentials } from "../../src/auth/types.js";
import { VaultClient, type VaultClientOptions } from "../../src/client/vault-client.js";
import { CredentialsResolutionError, VaultClientError, VaultServerError } from "../../src/errors.js";
import {
	baseUrl,
	callBody,
	callHeader,
	callInit,
	callUrl,
	emptyResponse,
	type FetchMock,
	jsonResponse,
	queuedFetch,
} from "../helpers/fetch.js";

function createClient(fetchImpl: FetchMock, options: Partial<VaultClientOptions> = {}) {
	return new VaultClient({
		url: baseUrl,
		fetchImpl,
		credentialsProvider: new StaticTokenCredentialsProvider("test-token"),
		config: () => ({}),
		retry: { maxAttempts: 1 },
		...options,
	});
}

describe("VaultClient", () => {
	beforeEach(() => {
		logger.warn.mockClear();
	});

	it("reads a secret with the resolved token", async () => {
		const fetchImpl = queuedFetch(
			jsonResponse({
				request_id: "req-1",
				lease_id: "",
				renewable: false,
				lease_duration: 2764800,
				data: { password: "hunter2" },
				warnings: null,
			}),
		);
		const client = createClient(fetchImpl);

		const secret = await client.read("secret/app/db");

		expect(callUrl(fetchImpl)).toBe(`${baseUrl}/v1/secret/app/db`);
		expect(callInit(fetchImpl).method).toBe("GET");
		expect(callHeader(fetchImpl, "X-Vault-Token")).toBe("test-token");
		expect(secret).toEqual({
			requestId: "req-1",
			leaseId: "",
			renewable: false,
			leaseDuration: 2764800,
			data: { password: "hunter2" },
			warnings: [],
		});
	});

	it("accepts paths with a leading /v1/", async () => {
		const fetchImpl = queuedFetch(jsonResponse({ data: { a: "b" } }));
		await createClient(fetchImpl).read("/v1/secret/app");
		expect(callUrl(fetchImpl)).toBe(`${baseUrl}/v1/secret/app`);
	});

	it("returns null when a secret does not exist", async () => {
		const fetchImpl = queuedFetch(jsonResponse({ errors: [] }, 404));
		await expect(createClient(fetchImpl).read("secret/missing")).resolves.toBeNull();
	});

	it("maps error bodies to VaultServerError", async () => {
		const fetchImpl = queuedFetch(jsonResponse({ errors: ["permission denied"] }, 403));

		const err = await createClient(fetchImpl)
			.read("secret/app")
			.catch((e: unknown) => e);

		expect(err).toBeInstanceOf(VaultServerError);
		expect(err).toMatchObject({
			status: 403,
			errors: ["permission denied"],
			message: "Vault request failed (403) GET /v1/secret/app: permission denied",
		});
	});

	it("writes JSON and resolves to null on 204", async () => {
		const fetchImpl = queuedFetch(emptyResponse());
		const result = await createClient(fetchImpl).write("secret/app", { user: "svc", port: 5432 });

		expect(result).toBeNull();
		expect(callInit(fetchImpl).method).toBe("POST");
		expect(callHeader(fetchImpl, "Content-Type")).toBe("application/json");
		expect(callBody(fetchImpl)).toEqual({ user: "svc", port: 5432 });
	});

	it("returns the body when a write answers with data", async () => {
		const fetchImpl = queuedFetch(jsonResponse({ data: { ciphertext: "vault:v1:abc" } }));
		const result = await createClient(fetchImpl).write("transit/encrypt/app", { plaintext: "aGk=" });
		expect(result?.data).toEqual({ ciphertext: "vault:v1:abc" });
	});

	it("lists keys with list=true", async () => {
		const fetchImpl = queuedFetch(jsonResponse({ data: { keys: ["db", "api/"] } }));
		const keys = await createClient(fetchImpl).list("secret/app");

		expect(callUrl(fetchImpl)).toBe(`${baseUrl}/v1/secret/app?list=true`);
		expect(keys).toEqual(["db", "api/"]);
	});

	it("lists nothing for a missing folder", async () => {
		const fetchImpl = queuedFetch(jsonResponse({ errors: [] }, 404));
		await expect(createClient(fetchImpl).list("secret/none")).resolves.toEqual([]);
	});

	it("deletes with DELETE", async () => {
		const fetchImpl = queuedFetch(emptyResponse());
		await createClient(fetchImpl).delete("secret/app");
		expect(callInit(fetchImpl).method).toBe("DELETE");
		expect(callUrl(fetchImpl)).toBe(`${baseUrl}/v1/secret/app`);
	});

	it("looks up its own token", async () => {
		const fetchImpl = queuedFetch(
			jsonResponse({
				data: {
					accessor: "acc-1",
					display_name: "userpass-alice",
					policies: ["default", "dev"],
					ttl: 3600,
					renewable: true,
					expire_time: null,
					meta: null,
				},
			}),
		);

		const info = await createClient(fetchImpl).lookupSelf();

		expect(callUrl(fetchImpl)).toBe(`${baseUrl}/v1/auth/token/lookup-self`);
		expect(info).toEqual({
			accessor: "acc-1",
			displayName: "userpass-alice",
			policies: ["default", "dev"],
			ttl: 3600,
			renewable: true,
			expireTime: undefined,
			entityId: undefined,
			meta: {},
		});
	});

	it("refuses to send a blank token", async () => {
		const fetchImpl = queuedFetch(jsonResponse({ data: {} }));
		const client = createClient(fetchImpl, {
			credentialsProvider: { getCredentials: async () => createCredentials(" ") },
		});

		await expect(client.read("secret/app")).rejects.toBeInstanceOf(CredentialsResolutionError);
		expect(fetchImpl).not.toHaveBeenCalled();
	});

	it("sends the namespace header when configured", async () => {
		const fetchImpl = queuedFetch(jsonResponse({ data: {} }));
		const client = createClient(fetchImpl, { config: () => ({ vault: { namespace: "team-a" } }) });

		await client.read("secret/app");

		expect(callHeader(fetchImpl, "X-Vault-Namespace")).toBe("team-a");
	});

	it("rejects a body that is not JSON", async () => {
		const fetchImpl = queuedFetch(new Response("<html>proxy error</html>", { status: 200 }));
		await expect(createClient(fetchImpl).read("secret/app")).rejects.toThrow(
			"Response to GET /v1/secret/app is not valid JSON (200)",
		);
	});

	it("rejects a body of the wrong shape", async () => {
		const fetchImpl = queuedFetch(jsonResponse({ data: { keys: "not-a-list" } }));
		const err = await createClient(fetchImpl)
			.list("secret/app")
			.catch((e: unknown) => e);
		expect(err).toBeInstanceOf(VaultClientError);
		expect(err).toMatchObject({ message: "Malformed response body for GET secret/app" });
	});
});

describe("VaultClient retries", () => {
	beforeEach(() => {
		logger.warn.mockClear();
	});

	it("retries 5xx responses", async () => {
		const fetchImpl = queuedFetch(
			jsonResponse({ errors: ["Vault is sealed"] }, 503),
			jsonResponse({ data: { ok: true } }),
		);
		const client = createClient(fetchImpl, { retry: { maxAttempts: 2, baseDelayMs: 0 } });

		await expect(client.read("secret/app")).resolves.toMatchObject({ data: { ok: true } });
		expect(fetchImpl).toHaveBeenCalledTimes(2);
		expect(logger.warn).toHaveBeenCalledTimes(1);
	});

	it("retries transient network failures", async () => {
		const fetchImpl = queuedFetch(new TypeError("fetch failed"), jsonResponse({ data: { ok: true } }));
		const client = createClient(fetchImpl, { retry: { maxAttempts: 3, baseDelayMs: 0 } });

		await expect(client.read("secret/app")).resolves.toMatchObject({ data: { ok: true } });
		expect(fetchImpl).toHaveBeenCalledTimes(2);
	});

	it("does not retry client errors", async () => {
		const fetchImpl = queuedFetch(jsonResponse({ errors: ["invalid path"] }, 400));
		const client = createClient(fetchImpl, { retry: { maxAttempts: 3, baseDelayMs: 0 } });

		await expect(client.read("secret/app")).rejects.toMatchObject({ status: 400 });
		expect(fetchImpl).toHaveBeenCalledTimes(1);
	});

	it("gives up after the configured attempts", async () => {
		const fetchImpl = queuedFetch(jsonResponse({ errors: ["internal error"] }, 500));
		const client = createClient(fetchImpl, {
			retry: undefined,
			config: () => ({ http: { timeoutMs: 1000, retry: { maxAttempts: 2, baseDelayMs: 0, maxDelayMs: 0 } } }),
		});

		await expect(client.read("secret/app")).rejects.toMatchObject({ status: 500 });
		expect(fetchImpl).toHaveBeenCalledTimes(2);
	});
});
