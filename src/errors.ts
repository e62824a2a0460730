export class UrlParseError extends Error {
	readonly kind = "UrlParseError";

	constructor(readonly input: string) {
		super(`Invalid URL: ${input}`);
		this.name = "UrlParseError";
	}
}

export class NoDomainError extends Error {
	readonly kind = "NoDomain";

	constructor(readonly url: string) {
		super(`URL has no domain: ${url}`);
		this.name = "NoDomainError";
	}
}

export class NoQueryError extends Error {
	readonly kind = "NoQuery";

	constructor(readonly url: string) {
		super(`URL has no query to clean: ${url}`);
		this.name = "NoQueryError";
	}
}

export class RedirectFailError extends Error {
	readonly kind = "RedirectFail";

	constructor(
		readonly url: string,
		cause: unknown,
	) {
		super(`Failed to resolve redirect for ${url}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
		this.name = "RedirectFailError";
	}
}

export class NoMatchRuleError extends Error {
	readonly kind = "NoMatchRule";

	constructor(readonly domain: string) {
		super(`No rule for domain: <${domain}>`);
		this.name = "NoMatchRuleError";
	}
}

export class NothingToClearError extends Error {
	readonly kind = "NothingToClear";

	constructor(readonly url: string) {
		super(`Nothing to clear in ${url}`);
		this.name = "NothingToClearError";
	}
}

export class HookExecutionError extends Error {
	readonly kind = "HookExecutionError";

	constructor(
		readonly hook: string,
		readonly reason: string,
	) {
		super(`Hook ${hook} failed: ${reason}`);
		this.name = "HookExecutionError";
	}
}

export type CleanError =
	| UrlParseError
	| NoDomainError
	| NoQueryError
	| RedirectFailError
	| NoMatchRuleError
	| NothingToClearError
	| HookExecutionError;

// Thrown while building a rule store; never returned from clear().
export class FatalConfigError extends Error {
	constructor(
		message: string,
		readonly domain: string,
		readonly pattern?: string,
		cause?: unknown,
	) {
		super(message, { cause });
		this.name = "FatalConfigError";
	}

	static invalidPattern(domain: string, pattern: string, cause: unknown) {
		return new FatalConfigError(`Invalid denylist pattern for domain ${domain}: ${pattern}`, domain, pattern, cause);
	}

	static duplicateDomain(domain: string, first: string, second: string) {
		return new FatalConfigError(`Domain ${domain} is defined by both ${first} and ${second}`, domain);
	}
}

export function isNoop(error: CleanError) {
	return error.kind === "NoQuery" || error.kind === "NothingToClear" || error.kind === "NoMatchRule";
}
