import type { CleanError } from "./errors";

export type DomainConfig = {
	subdomains?: string[];
	redirect?: boolean;
	denylist?: string[];
	hooks?: string[];
};

export type RulesConfig = Record<string, DomainConfig>;

export type Rule = {
	readonly redirect: boolean;
	readonly denylist: readonly RegExp[];
	readonly hooks: readonly string[];
};

export type HookResult = { ok: true; url: URL } | { ok: false; error: string };

export type Hook = (input: URL) => HookResult;

export type HookRegistry = ReadonlyMap<string, Hook>;

export type CleanResult = { ok: true; url: URL } | { ok: false; error: CleanError };

export type RedirectResolver = (url: URL, signal?: AbortSignal) => Promise<URL>;
