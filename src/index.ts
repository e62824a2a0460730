import { isNoop, type CleanError } from "./errors";
import type { UrlCleaner } from "./url-cleaner";

export { clear, filterQuery, runHooks, type ClearOptions } from "./cleaner";
export * from "./errors";
export { BUILTIN_HOOKS, createDomainSubstitutionHook, createHookRegistry, decodeVideoId, type BuiltinHookName } from "./hooks";
export { createFetchRedirectResolver, type FetchRedirectResolverOptions } from "./redirect";
export { buildRuleStore, DEFAULT_RULE_KEY, RuleStore } from "./rules";
export { fetchRules, loadRulesFile, parseRulesConfig, rulesConfigSchema } from "./rules-loader";
export type * from "./types";
export { UrlCleaner, type UrlCleanerOptions } from "./url-cleaner";

export type Handler = {
	fetch(request: Request): Promise<Response>;
};

export function createHandler(cleaner: UrlCleaner): Handler {
	return {
		async fetch(request) {
			if (request.method !== "GET") {
				return new Response("Method not allowed", { status: 405, headers: { Allow: "GET" } });
			}

			const url = new URL(request.url);
			const targetUrl = url.searchParams.get("url");

			if (!targetUrl) {
				return new Response("Missing url parameter", { status: 400 });
			}

			const result = await cleaner.clear(targetUrl, request.signal);
			if (result.ok) {
				return textResponse(result.url.href);
			}

			if (isNoop(result.error)) {
				return textResponse(targetUrl);
			}

			console.error(`Error processing URL ${targetUrl}`, result.error);
			return new Response(`Error processing URL: ${result.error.message}`, { status: statusFor(result.error) });
		},
	};
}

function textResponse(body: string) {
	return new Response(body, {
		headers: {
			"Content-Type": "text/plain",
			"Access-Control-Allow-Origin": "*",
		},
	});
}

function statusFor(error: CleanError) {
	switch (error.kind) {
		case "UrlParseError":
		case "NoDomain":
			return 400;
		case "RedirectFail":
			return 502;
		default:
			return 500;
	}
}
