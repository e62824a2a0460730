import { subtle } from "node:crypto";
import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { RulesConfig } from "./types";

const domainConfigSchema = z
	.object({
		subdomains: z.array(z.string()).optional(),
		redirect: z.boolean().default(false),
		denylist: z.array(z.string()).default([]),
		hooks: z.array(z.string().min(1)).default([]),
	})
	.strict();

export const rulesConfigSchema = z.record(z.string().min(1), domainConfigSchema);

export function parseRulesConfig(input: unknown): RulesConfig {
	return rulesConfigSchema.parse(input);
}

export async function loadRulesFile(path: string) {
	const text = await readFile(path, "utf8");
	const rules = parseRulesConfig(JSON.parse(text));
	console.log(`Loaded ${Object.keys(rules).length} rule entries from ${path}`);
	return rules;
}

/**
 * Downloads a JSON rules file. With `hashUrl`, the body must match the
 * SHA-256 hex digest published there.
 */
export async function fetchRules(rulesUrl: string, hashUrl?: string, fetchImpl: typeof fetch = fetch) {
	const [rulesResponse, hashResponse] = await Promise.all([
		fetchImpl(rulesUrl),
		hashUrl ? fetchImpl(hashUrl) : Promise.resolve(undefined),
	]);
	if (!rulesResponse.ok) {
		throw new Error(`Failed to fetch rules: ${rulesResponse.status}`);
	}
	if (hashResponse && !hashResponse.ok) {
		throw new Error(`Failed to fetch hash: ${hashResponse.status}`);
	}

	const rulesText = await rulesResponse.text();
	if (hashResponse) {
		const expectedHash = (await hashResponse.text()).trim();
		const actualHash = await calculateSHA256(rulesText);
		if (actualHash !== expectedHash) {
			throw new Error(`Hash validation failed. Expected: ${expectedHash}, Actual: ${actualHash}`);
		}
	}

	const rules = parseRulesConfig(JSON.parse(rulesText));
	console.log(`Fetched ${Object.keys(rules).length} rule entries from ${rulesUrl}`);
	return rules;
}

export async function calculateSHA256(text: string) {
	const data = new TextEncoder().encode(text);
	const hashBuffer = await subtle.digest("SHA-256", data);
	return Array.from(new Uint8Array(hashBuffer))
		.map((b) => b.toString(16).padStart(2, "0"))
		.join("");
}
