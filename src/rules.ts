import { FatalConfigError } from "./errors";
import type { Rule, RulesConfig } from "./types";

export const DEFAULT_RULE_KEY = "default";

export class RuleStore {
	private readonly rules: ReadonlyMap<string, Rule>;

	constructor(rules: Map<string, Rule>) {
		this.rules = new Map(rules);
	}

	get size() {
		return this.rules.size;
	}

	domains() {
		return [...this.rules.keys()];
	}

	get(domain: string) {
		return this.rules.get(domain);
	}

	/** Exact domain first, then the `default` entry. */
	lookup(domain: string) {
		return this.rules.get(domain) ?? this.rules.get(DEFAULT_RULE_KEY);
	}
}

/**
 * Expands a rules configuration into a store. Every subdomain of an entry maps
 * to the same frozen {@link Rule}; an empty subdomain stands for the base itself.
 * Keys are lowercased to match `URL#hostname`.
 *
 * @throws {FatalConfigError} when a denylist pattern does not compile or two
 * entries expand to the same domain.
 */
export function buildRuleStore(config: RulesConfig) {
	const rules = new Map<string, Rule>();
	const origins = new Map<string, string>();

	for (const [base, data] of Object.entries(config)) {
		const rule: Rule = Object.freeze({
			redirect: data.redirect ?? false,
			denylist: Object.freeze((data.denylist ?? []).map((pattern) => compilePattern(base, pattern))),
			hooks: Object.freeze([...(data.hooks ?? [])]),
		});

		const subdomains = data.subdomains ?? [];
		const keys = subdomains.length === 0 ? [base] : subdomains.map((sub) => (sub === "" ? base : `${sub}.${base}`));

		for (const key of keys.map((key) => key.toLowerCase())) {
			const origin = origins.get(key);
			if (origin !== undefined) {
				throw FatalConfigError.duplicateDomain(key, origin, base);
			}
			origins.set(key, base);
			rules.set(key, rule);
		}
	}

	return new RuleStore(rules);
}

function compilePattern(domain: string, pattern: string) {
	try {
		return new RegExp(pattern);
	} catch (error) {
		throw FatalConfigError.invalidPattern(domain, pattern, error);
	}
}
