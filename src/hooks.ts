import type { Hook, HookRegistry, HookResult } from "./types";

const VIDEO_ID_TABLE = "fZodR9XQDSUm21yCkr6zBqiveYah8bt4xsWpHnJE7jL5VG3guMTKNPAwcF";
const VIDEO_ID_SELECT = [11, 10, 3, 8, 4, 6] as const;
const VIDEO_ID_XOR = 177451812n;
const VIDEO_ID_ADD = 8728348608n;
const VIDEO_ID_PREFIX = "BV";
const VIDEO_ID_LENGTH = 12;

const TRANSLATE = new Map<string, bigint>([...VIDEO_ID_TABLE].map((char, index) => [char, BigInt(index)]));

// Privacy front-ends for the sites they mirror
const MIRRORS: Record<string, string> = {
	"twitter.com": "nitter.net",
	"www.twitter.com": "nitter.net",
	"mobile.twitter.com": "nitter.net",
	"x.com": "nitter.net",
	"youtube.com": "yewtu.be",
	"www.youtube.com": "yewtu.be",
	"m.youtube.com": "yewtu.be",
};

export const BUILTIN_HOOKS = {
	"video-id-decode": decodeVideoId,
	"mirror-rewrite": createDomainSubstitutionHook(MIRRORS),
} satisfies Record<string, Hook>;

export type BuiltinHookName = keyof typeof BUILTIN_HOOKS;

/**
 * Builds the registry handed to `clear`. Extra hooks are registered after the
 * built-ins and replace a built-in of the same name.
 */
export function createHookRegistry(extra: Record<string, Hook> = {}): HookRegistry {
	return new Map<string, Hook>([...Object.entries(BUILTIN_HOOKS), ...Object.entries(extra)]);
}

export function createDomainSubstitutionHook(table: Record<string, string>): Hook {
	const mirrors = new Map(Object.entries(table));

	return (input) => {
		const replacement = mirrors.get(input.hostname);
		if (!replacement) {
			return fail(`no mirror for domain ${input.hostname || "<empty>"}`);
		}

		const output = new URL(input.href);
		output.hostname = replacement;
		return { ok: true, url: output };
	};
}

/** `/video/BV1nY411r7o1/` becomes `/video/av267692137/`. */
export function decodeVideoId(input: URL): HookResult {
	if (!input.hostname) {
		return fail("domain is empty");
	}

	const segments = input.pathname.split("/").slice(1);
	if (segments.length < 2) {
		return fail("not a valid video URL: path segment is too short");
	}

	const [first, id, ...rest] = segments;
	if (first !== "video") {
		return fail("not a valid video URL: not a video URL");
	}
	if (!id.startsWith(VIDEO_ID_PREFIX) || id.length !== VIDEO_ID_LENGTH) {
		return fail(`not a valid video URL: ${id} is not a ${VIDEO_ID_LENGTH}-character ${VIDEO_ID_PREFIX} identifier`);
	}

	let sum = 0n;
	for (const [power, position] of VIDEO_ID_SELECT.entries()) {
		const value = TRANSLATE.get(id[position]);
		if (value === undefined) {
			return fail(`not a valid video URL: unexpected character ${id[position]} in ${id}`);
		}
		sum += value * 58n ** BigInt(power);
	}

	if (sum < VIDEO_ID_ADD) {
		return fail(`not a valid video URL: ${id} is out of range`);
	}

	const output = new URL(input.href);
	output.pathname = "/" + [first, `av${(sum - VIDEO_ID_ADD) ^ VIDEO_ID_XOR}`, ...rest].join("/");
	return { ok: true, url: output };
}

function fail(error: string): HookResult {
	return { ok: false, error };
}
