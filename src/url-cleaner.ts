import { clear } from "./cleaner";
import { isNoop } from "./errors";
import { createHookRegistry } from "./hooks";
import { createFetchRedirectResolver, type FetchRedirectResolverOptions } from "./redirect";
import { buildRuleStore, type RuleStore } from "./rules";
import { loadRulesFile } from "./rules-loader";
import type { CleanResult, Hook, HookRegistry, RedirectResolver, RulesConfig } from "./types";

export type UrlCleanerOptions = FetchRedirectResolverOptions & {
	hooks?: Record<string, Hook>;
	resolveRedirect?: RedirectResolver;
};

/** Holds one rule store, hook registry and redirect resolver for the life of the process. */
export class UrlCleaner {
	constructor(
		readonly store: RuleStore,
		readonly hooks: HookRegistry,
		private readonly resolveRedirect: RedirectResolver,
	) {}

	static fromConfig(config: RulesConfig, options: UrlCleanerOptions = {}) {
		return new UrlCleaner(
			buildRuleStore(config),
			createHookRegistry(options.hooks),
			options.resolveRedirect ?? createFetchRedirectResolver(options),
		);
	}

	static async fromFile(path: string, options: UrlCleanerOptions = {}) {
		return UrlCleaner.fromConfig(await loadRulesFile(path), options);
	}

	clear(rawUrl: string, signal?: AbortSignal): Promise<CleanResult> {
		return clear(rawUrl, this.store, this.hooks, { resolveRedirect: this.resolveRedirect, signal });
	}

	/** Cleaned href, or `rawUrl` untouched when cleaning fails for any reason. */
	async cleanOrOriginal(rawUrl: string) {
		const result = await this.clear(rawUrl);
		if (result.ok) {
			return result.url.href;
		}

		if (!isNoop(result.error)) {
			console.warn(`Error caught when trying to clean url ${rawUrl}`, result.error);
		}
		return rawUrl;
	}
}
