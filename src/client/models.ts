/**
 * Wire schemas for the service's JSON API and the camelCase models the
 * clients return.
 *
 * Schemas are lenient about fields we do not use; the service adds fields
 * between releases.
 */

import { z } from "zod";

// ═══════════════════════════════════════════════════════════════════════════════
// Wire Schemas
// ═══════════════════════════════════════════════════════════════════════════════

export const ErrorBodySchema = z.object({
	errors: z.array(z.string()).default([]),
});

export const AuthBlockSchema = z.object({
	client_token: z.string(),
	accessor: z.string().optional(),
	policies: z.array(z.string()).nullish(),
	metadata: z.record(z.string()).nullish(),
	lease_duration: z.number().int().nonnegative().default(0),
	renewable: z.boolean().default(false),
});

export const SecretBodySchema = z.object({
	request_id: z.string().optional(),
	lease_id: z.string().default(""),
	renewable: z.boolean().default(false),
	lease_duration: z.number().int().nonnegative().default(0),
	data: z.record(z.unknown()).nullish(),
	warnings: z.array(z.string()).nullish(),
	auth: AuthBlockSchema.nullish(),
});

export const ListBodySchema = SecretBodySchema.extend({
	data: z.object({ keys: z.array(z.string()).default([]) }),
});

export const LoginBodySchema = SecretBodySchema.extend({
	auth: AuthBlockSchema,
});

export const InitStatusBodySchema = z.object({
	initialized: z.boolean(),
});

export const InitBodySchema = z.object({
	keys: z.array(z.string()),
	keys_base64: z.array(z.string()).default([]),
	root_token: z.string(),
});

export const SealStatusBodySchema = z.object({
	type: z.string().optional(),
	initialized: z.boolean().optional(),
	sealed: z.boolean(),
	t: z.number().int(),
	n: z.number().int(),
	progress: z.number().int(),
	nonce: z.string().optional(),
	version: z.string().optional(),
	cluster_name: z.string().optional(),
	cluster_id: z.string().optional(),
});

// Newer servers nest the list under `data`, older ones return it top-level.
export const PolicyListBodySchema = z.object({
	policies: z.array(z.string()).optional(),
	data: z.object({ policies: z.array(z.string()) }).nullish(),
});

export const PolicyBodySchema = z.object({
	name: z.string(),
	rules: z.string().default(""),
});

export const TokenLookupDataSchema = z.object({
	accessor: z.string().optional(),
	display_name: z.string().optional(),
	policies: z.array(z.string()).default([]),
	ttl: z.number().int().default(0),
	renewable: z.boolean().default(false),
	expire_time: z.string().nullish(),
	entity_id: z.string().optional(),
	meta: z.record(z.string()).nullish(),
});

// ═══════════════════════════════════════════════════════════════════════════════
// Models
// ═══════════════════════════════════════════════════════════════════════════════

export type VaultResponse = {
	requestId?: string;
	leaseId: string;
	renewable: boolean;
	leaseDuration: number;
	data: Record<string, unknown>;
	warnings: string[];
};

export type VaultInitRequest = {
	secretShares: number;
	secretThreshold: number;
	pgpKeys?: string[];
	rootTokenPgpKey?: string;
};

export type VaultInitResponse = {
	keys: string[];
	keysBase64: string[];
	rootToken: string;
};

export type VaultSealStatus = {
	sealed: boolean;
	initialized?: boolean;
	/** Unseal threshold. */
	threshold: number;
	/** Total key shares. */
	shares: number;
	progress: number;
	version?: string;
	clusterName?: string;
};

export type VaultPolicy = {
	name: string;
	rules: string;
};

export type VaultTokenInfo = {
	accessor?: string;
	displayName?: string;
	policies: string[];
	ttl: number;
	renewable: boolean;
	expireTime?: string;
	entityId?: string;
	meta: Record<string, string>;
};

// ═══════════════════════════════════════════════════════════════════════════════
// Mappers
// ═══════════════════════════════════════════════════════════════════════════════

export function toVaultResponse(body: z.infer<typeof SecretBodySchema>): VaultResponse {
	return {
		requestId: body.request_id,
		leaseId: body.lease_id,
		renewable: body.renewable,
		leaseDuration: body.lease_duration,
		data: body.data ?? {},
		warnings: body.warnings ?? [],
	};
}

export function toInitResponse(body: z.infer<typeof InitBodySchema>): VaultInitResponse {
	return { keys: body.keys, keysBase64: body.keys_base64, rootToken: body.root_token };
}

export function toSealStatus(body: z.infer<typeof SealStatusBodySchema>): VaultSealStatus {
	return {
		sealed: body.sealed,
		initialized: body.initialized,
		threshold: body.t,
		shares: body.n,
		progress: body.progress,
		version: body.version,
		clusterName: body.cluster_name,
	};
}

export function toTokenInfo(data: z.infer<typeof TokenLookupDataSchema>): VaultTokenInfo {
	return {
		accessor: data.accessor,
		displayName: data.display_name,
		policies: data.policies,
		ttl: data.ttl,
		renewable: data.renewable,
		expireTime: data.expire_time ?? undefined,
		entityId: data.entity_id,
		meta: data.meta ?? {},
	};
}
