import { z } from "zod";
import { DEFAULT_MAX_REDIRECTS, DEFAULT_REDIRECT_TIMEOUT_MS } from "./redirect";

const envSchema = z.object({
	CLEANER_RULES_PATH: z.string().min(1).default("rules.json"),
	CLEANER_RULES_URL: z.string().url().optional(),
	CLEANER_RULES_HASH_URL: z.string().url().optional(),
	CLEANER_REDIRECT_TIMEOUT_MS: z.coerce.number().int().min(100).default(DEFAULT_REDIRECT_TIMEOUT_MS),
	CLEANER_MAX_REDIRECTS: z.coerce.number().int().min(1).max(20).default(DEFAULT_MAX_REDIRECTS),
	PORT: z.coerce.number().int().min(1).max(65535).default(8787),
});

export type CleanerEnv = z.infer<typeof envSchema>;

export function loadEnv(env: NodeJS.ProcessEnv = process.env): CleanerEnv {
	return envSchema.parse(env);
}
