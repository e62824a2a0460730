import {
	HookExecutionError,
	NoDomainError,
	NoMatchRuleError,
	NoQueryError,
	NothingToClearError,
	RedirectFailError,
	UrlParseError,
	type CleanError,
} from "./errors";
import { createFetchRedirectResolver } from "./redirect";
import type { RuleStore } from "./rules";
import type { CleanResult, HookRegistry, HookResult, RedirectResolver, Rule } from "./types";

export type ClearOptions = {
	resolveRedirect?: RedirectResolver;
	signal?: AbortSignal;
};

const defaultResolveRedirect = createFetchRedirectResolver();

/**
 * Cleans `rawUrl` against the rule of its domain: resolves redirects when the
 * rule asks for it, strips denied query keys, then runs the rule's hooks.
 *
 * Runtime failures are returned, never thrown. When the rule has hooks, an
 * empty query and a filter with nothing to do both hand the URL to the hooks
 * unchanged.
 */
export async function clear(
	rawUrl: string,
	store: RuleStore,
	hooks: HookRegistry,
	options: ClearOptions = {},
): Promise<CleanResult> {
	let url: URL;
	try {
		url = new URL(rawUrl);
	} catch {
		return failure(new UrlParseError(rawUrl));
	}

	if (!url.hostname) {
		return failure(new NoDomainError(url.href));
	}

	let rule = store.lookup(url.hostname);
	if (!rule) {
		return failure(new NoMatchRuleError(url.hostname));
	}

	if (rule.redirect) {
		const resolveRedirect = options.resolveRedirect ?? defaultResolveRedirect;
		try {
			url = await resolveRedirect(url, options.signal);
		} catch (error) {
			return failure(new RedirectFailError(url.href, error));
		}

		if (!url.hostname) {
			return failure(new NoDomainError(url.href));
		}

		// Resolved once: a redirect rule on the destination is not followed again.
		rule = store.lookup(url.hostname);
		if (!rule) {
			return failure(new NoMatchRuleError(url.hostname));
		}
	}

	const filtered = filterQuery(url, rule);
	if (!filtered.ok && rule.hooks.length === 0) {
		return filtered;
	}

	return runHooks(filtered.ok ? filtered.url : url, rule.hooks, hooks);
}

export function filterQuery(url: URL, rule: Rule): CleanResult {
	const query = url.search.slice(1);
	if (!query) {
		return failure(new NoQueryError(url.href));
	}

	if (rule.denylist.length === 0) {
		return failure(new NoMatchRuleError(url.hostname));
	}

	const cleaned = query
		.split("&")
		.filter((pair) => !isDenied(decodeKey(pair), rule.denylist))
		.join("&");

	if (cleaned === query) {
		return failure(new NothingToClearError(url.href));
	}

	const output = new URL(url.href);
	output.search = cleaned;
	return { ok: true, url: output };
}

export function runHooks(url: URL, names: readonly string[], hooks: HookRegistry): CleanResult {
	let current = url;

	for (const name of names) {
		const hook = hooks.get(name);
		if (!hook) {
			return failure(new HookExecutionError(name, "not found"));
		}

		let result: HookResult;
		try {
			result = hook(current);
		} catch (error) {
			return failure(new HookExecutionError(name, error instanceof Error ? error.message : String(error)));
		}

		if (!result.ok) {
			return failure(new HookExecutionError(name, result.error));
		}
		current = result.url;
	}

	return { ok: true, url: current };
}

function isDenied(key: string, denylist: readonly RegExp[]) {
	return denylist.some((pattern) => pattern.test(key));
}

function decodeKey(pair: string) {
	const separator = pair.indexOf("=");
	const key = (separator === -1 ? pair : pair.slice(0, separator)).replaceAll("+", " ");
	try {
		return decodeURIComponent(key);
	} catch {
		return key;
	}
}

function failure(error: CleanError): CleanResult {
	return { ok: false, error };
}
