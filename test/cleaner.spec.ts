import { describe, it, expect, vi } from "vitest";

import { clear, filterQuery, runHooks } from "../src/cleaner";
import { createHookRegistry } from "../src/hooks";
import { buildRuleStore } from "../src/rules";
import type { CleanResult, Hook, RulesConfig } from "../src/types";

const hooks = createHookRegistry();

function cleaned(result: CleanResult) {
	return result.ok ? result.url.href : result.error.kind;
}

function fixedResolver(target: string) {
	return vi.fn(async (_url: URL, _signal?: AbortSignal) => new URL(target));
}

const config: RulesConfig = {
	default: { denylist: ["^utm_"] },
	"plain.example": {},
	"video.example": { denylist: ["^spm_id_from$"], hooks: ["video-id-decode"] },
	"hooked.example": { hooks: ["unknown-hook"] },
};

describe("clear", () => {
	const store = buildRuleStore(config);

	it("strips denied query keys", async () => {
		const result = await clear("https://example.com/?utm_source=ios", store, hooks);
		expect(cleaned(result)).toBe("https://example.com/");
	});

	it("reports NothingToClear when no key is denied", async () => {
		const result = await clear("https://example.com/?a=1&b=2", store, hooks);
		expect(cleaned(result)).toBe("NothingToClear");
	});

	it("keeps surviving pairs in order with their original encoding", async () => {
		const result = await clear(
			"https://example.com/search?q=a%20b&utm_medium=x&flag&empty=&utm_source=y&z=1",
			store,
			hooks,
		);
		expect(cleaned(result)).toBe("https://example.com/search?q=a%20b&flag&empty=&z=1");
	});

	it("reports NothingToClear for an already cleaned URL", async () => {
		const result = await clear("https://example.com/search?q=a%20b&flag&empty=&z=1", store, hooks);
		expect(cleaned(result)).toBe("NothingToClear");
	});

	it("keeps the fragment", async () => {
		const result = await clear("https://example.com/page?utm_campaign=x&id=3#section", store, hooks);
		expect(cleaned(result)).toBe("https://example.com/page?id=3#section");
	});

	it("matches patterns against decoded keys", async () => {
		const result = await clear("https://example.com/?utm%5Fsource=1&a=2", store, hooks);
		expect(cleaned(result)).toBe("https://example.com/?a=2");
	});

	it("matches patterns anywhere in the key", async () => {
		const substringStore = buildRuleStore({ "example.com": { denylist: ["id"] } });
		const result = await clear("https://example.com/?video_id=1&name=x", substringStore, hooks);
		expect(cleaned(result)).toBe("https://example.com/?name=x");
	});

	it("never matches patterns against values", async () => {
		const result = await clear("https://example.com/?ref=utm_source", store, hooks);
		expect(cleaned(result)).toBe("NothingToClear");
	});

	it("reports NoQuery for URLs without a query", async () => {
		expect(cleaned(await clear("https://example.com/path", store, hooks))).toBe("NoQuery");
		expect(cleaned(await clear("https://example.com/path?", store, hooks))).toBe("NoQuery");
	});

	it("reports NoMatchRule for unknown domains without a default entry", async () => {
		const strictStore = buildRuleStore({ "example.com": { denylist: ["^utm_"] } });
		const result = await clear("https://unknown.example/?utm_source=x", strictStore, hooks);

		expect(result.ok).toBe(false);
		if (!result.ok && result.error.kind === "NoMatchRule") {
			expect(result.error.domain).toBe("unknown.example");
		}
		expect(cleaned(result)).toBe("NoMatchRule");
	});

	it("reports NoMatchRule when the rule has an empty denylist", async () => {
		const result = await clear("https://plain.example/?a=1", store, hooks);
		expect(cleaned(result)).toBe("NoMatchRule");
	});

	it("reports UrlParseError for strings that are not URLs", async () => {
		const result = await clear("not a url", store, hooks);

		expect(cleaned(result)).toBe("UrlParseError");
		expect(result.ok ? "" : result.error.message).toBe("Invalid URL: not a url");
	});

	it("reports NoDomain for URLs without a host", async () => {
		const result = await clear("mailto:someone@example.com", store, hooks);
		expect(cleaned(result)).toBe("NoDomain");
	});

	describe("hooks", () => {
		it("runs hooks on a query with nothing to clear", async () => {
			const result = await clear("https://video.example/video/BV1nY411r7o1/?p=1", store, hooks);
			expect(cleaned(result)).toBe("https://video.example/video/av267692137/?p=1");
		});

		it("runs hooks after filtering", async () => {
			const result = await clear("https://video.example/video/BV1nY411r7o1/?p=1&spm_id_from=333.1007", store, hooks);
			expect(cleaned(result)).toBe("https://video.example/video/av267692137/?p=1");
		});

		it("runs hooks on URLs without a query", async () => {
			const result = await clear("https://video.example/video/BV1nY411r7o1", store, hooks);
			expect(cleaned(result)).toBe("https://video.example/video/av267692137");
		});

		it("fails with HookExecutionError for a missing hook", async () => {
			for (const input of ["https://hooked.example/path", "https://hooked.example/path?a=1"]) {
				const result = await clear(input, store, hooks);

				expect(result.ok).toBe(false);
				if (!result.ok && result.error.kind === "HookExecutionError") {
					expect(result.error.hook).toBe("unknown-hook");
					expect(result.error.reason).toBe("not found");
				}
				expect(cleaned(result)).toBe("HookExecutionError");
			}
		});

		it("carries the failure text of a hook", async () => {
			const result = await clear("https://video.example/bangumi/BV1nY411r7o1", store, hooks);

			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error.message).toBe("Hook video-id-decode failed: not a valid video URL: not a video URL");
			}
		});
	});

	describe("redirects", () => {
		it("cleans the resolved URL with the rule of its domain", async () => {
			const redirectStore = buildRuleStore({
				"short.example": { redirect: true },
				default: { denylist: ["^utm_"] },
			});
			const resolveRedirect = fixedResolver("https://example.com/?utm_source=ios");

			const result = await clear("https://short.example/abc", redirectStore, hooks, { resolveRedirect });

			expect(cleaned(result)).toBe("https://example.com/");
			expect(resolveRedirect).toHaveBeenCalledTimes(1);
			expect(resolveRedirect.mock.calls[0][0].href).toBe("https://short.example/abc");
		});

		it("filters with the destination rule, not the origin rule", async () => {
			const redirectStore = buildRuleStore({
				"short.example": { redirect: true, denylist: ["^keep$"] },
				"dest.example": { denylist: ["^ref$"] },
			});
			const resolveRedirect = fixedResolver("https://dest.example/?keep=1&ref=2");

			const result = await clear("https://short.example/abc", redirectStore, hooks, { resolveRedirect });

			expect(cleaned(result)).toBe("https://dest.example/?keep=1");
		});

		it("resolves redirects only once", async () => {
			const redirectStore = buildRuleStore({
				"a.example": { redirect: true },
				"b.example": { redirect: true, denylist: ["^utm_"] },
			});
			const resolveRedirect = fixedResolver("https://b.example/?utm_source=x");

			const result = await clear("https://a.example/", redirectStore, hooks, { resolveRedirect });

			expect(cleaned(result)).toBe("https://b.example/");
			expect(resolveRedirect).toHaveBeenCalledTimes(1);
		});

		it("reports NoMatchRule when the destination has no rule", async () => {
			const redirectStore = buildRuleStore({ "short.example": { redirect: true } });
			const resolveRedirect = fixedResolver("https://nowhere.example/?a=1");

			const result = await clear("https://short.example/abc", redirectStore, hooks, { resolveRedirect });

			expect(cleaned(result)).toBe("NoMatchRule");
		});

		it("wraps transport failures in RedirectFail", async () => {
			const redirectStore = buildRuleStore({ "short.example": { redirect: true } });
			const transportError = new Error("connect ECONNREFUSED");
			const resolveRedirect = vi.fn(async (_url: URL, _signal?: AbortSignal): Promise<URL> => {
				throw transportError;
			});

			const result = await clear("https://short.example/abc", redirectStore, hooks, { resolveRedirect });

			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error.kind).toBe("RedirectFail");
				expect(result.error.message).toBe(
					"Failed to resolve redirect for https://short.example/abc: connect ECONNREFUSED",
				);
				expect(result.error.cause).toBe(transportError);
			}
		});

		it("passes the caller's abort signal to the resolver", async () => {
			const redirectStore = buildRuleStore({ "short.example": { redirect: true } });
			const controller = new AbortController();
			const resolveRedirect = vi.fn(
				(_url: URL, signal?: AbortSignal) =>
					new Promise<URL>((_resolve, reject) => {
						signal?.addEventListener("abort", () => reject(new Error("aborted")));
					}),
			);

			const pending = clear("https://short.example/abc", redirectStore, hooks, {
				resolveRedirect,
				signal: controller.signal,
			});
			controller.abort();

			expect(cleaned(await pending)).toBe("RedirectFail");
			expect(resolveRedirect.mock.calls[0][1]).toBe(controller.signal);
		});
	});
});

describe("filterQuery", () => {
	it("does not modify its input", () => {
		const rule = buildRuleStore({ "example.com": { denylist: ["^utm_"] } }).get("example.com");
		const input = new URL("https://example.com/?utm_source=x&a=1");

		expect(rule).toBeDefined();
		if (rule) {
			expect(cleaned(filterQuery(input, rule))).toBe("https://example.com/?a=1");
		}
		expect(input.href).toBe("https://example.com/?utm_source=x&a=1");
	});
});

describe("runHooks", () => {
	function appending(suffix: string) {
		return vi.fn<Hook>((input) => ({ ok: true, url: new URL(input.href + suffix) }));
	}

	it("applies hooks in declared order", () => {
		const a = appending("a");
		const b = appending("b");
		const registry = new Map<string, Hook>([
			["a", a],
			["b", b],
		]);

		const result = runHooks(new URL("https://example.com/p"), ["a", "b"], registry);

		expect(cleaned(result)).toBe("https://example.com/pab");
		expect(b.mock.calls[0][0].href).toBe("https://example.com/pa");
	});

	it("stops at the first failing hook", () => {
		const b = appending("b");
		const registry = new Map<string, Hook>([
			["a", () => ({ ok: false, error: "boom" })],
			["b", b],
		]);

		const result = runHooks(new URL("https://example.com/p"), ["a", "b"], registry);

		expect(result.ok ? "" : result.error.message).toBe("Hook a failed: boom");
		expect(b).not.toHaveBeenCalled();
	});

	it("turns a thrown error into a HookExecutionError", () => {
		const registry = new Map<string, Hook>([
			[
				"thrower",
				() => {
					throw new Error("unexpected");
				},
			],
		]);

		const result = runHooks(new URL("https://example.com/"), ["thrower"], registry);

		expect(result.ok ? "" : result.error.message).toBe("Hook thrower failed: unexpected");
	});

	it("returns the input when there are no hooks", () => {
		const input = new URL("https://example.com/");
		const result = runHooks(input, [], new Map());

		expect(result.ok && result.url).toBe(input);
	});
});
