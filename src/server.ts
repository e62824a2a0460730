import { createServer } from "node:http";
import { loadEnv } from "./config";
import { createHandler } from "./index";
import { createListener } from "./listener";
import { fetchRules, loadRulesFile } from "./rules-loader";
import { UrlCleaner } from "./url-cleaner";

async function main() {
	const env = loadEnv();
	const rules = env.CLEANER_RULES_URL
		? await fetchRules(env.CLEANER_RULES_URL, env.CLEANER_RULES_HASH_URL)
		: await loadRulesFile(env.CLEANER_RULES_PATH);

	const cleaner = UrlCleaner.fromConfig(rules, {
		maxRedirects: env.CLEANER_MAX_REDIRECTS,
		timeoutMs: env.CLEANER_REDIRECT_TIMEOUT_MS,
	});
	console.log(`Rule store ready with ${cleaner.store.size} domains`);

	const server = createServer(createListener(createHandler(cleaner)));
	server.listen(env.PORT, () => {
		console.log(`Listening on http://localhost:${env.PORT}`);
	});
}

main().catch((error: unknown) => {
	console.error("Failed to start", error);
	process.exitCode = 1;
});
