import type { RedirectResolver } from "./types";

export const DEFAULT_MAX_REDIRECTS = 10;
export const DEFAULT_REDIRECT_TIMEOUT_MS = 10_000;

export type FetchRedirectResolverOptions = {
	maxRedirects?: number;
	timeoutMs?: number;
	fetch?: typeof fetch;
};

const HEADERS: Record<string, string> = {
	"User-Agent": "Mozilla/5.0 (X11; Linux x86_64; rv:143.0) Gecko/20100101 Firefox/143.0",
	Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
	"Accept-Language": "en-US,en;q=0.5",
	"Sec-GPC": "1",
	"Upgrade-Insecure-Requests": "1",
	"Sec-Fetch-Dest": "document",
	"Sec-Fetch-Mode": "navigate",
	"Sec-Fetch-Site": "none",
	"Sec-Fetch-User": "?1",
};

/**
 * Walks the redirect chain hop by hop and resolves to the last location.
 * Throws on network failure, on timeout and when the chain is longer than
 * `maxRedirects`.
 */
export function createFetchRedirectResolver(options: FetchRedirectResolverOptions = {}): RedirectResolver {
	const maxRedirects = options.maxRedirects ?? DEFAULT_MAX_REDIRECTS;
	const timeoutMs = options.timeoutMs ?? DEFAULT_REDIRECT_TIMEOUT_MS;
	const fetchImpl = options.fetch ?? fetch;

	return async (url, signal) => {
		const timeout = AbortSignal.timeout(timeoutMs);
		const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;

		let current = url;
		for (let hop = 0; hop <= maxRedirects; hop++) {
			const next = await followRedirect(fetchImpl, current, combined);
			if (!next) {
				return current;
			}
			current = next;
		}

		throw new Error(`Too many redirects (more than ${maxRedirects}) starting at ${url.href}`);
	};
}

async function followRedirect(fetchImpl: typeof fetch, url: URL, signal: AbortSignal) {
	const headResponse = await fetchImpl(url, { method: "HEAD", redirect: "manual", headers: HEADERS, signal });
	const redirect = extractRedirectLocation(url, headResponse);
	if (redirect) return redirect;

	if (headResponse.status === 404 || headResponse.status === 405 || headResponse.status === 501) {
		const getResponse = await fetchImpl(url, { method: "GET", redirect: "manual", headers: HEADERS, signal });
		await getResponse.body?.cancel();
		return extractRedirectLocation(url, getResponse);
	}

	return null;
}

function extractRedirectLocation(current: URL, response: Response) {
	if (response.status < 300 || response.status >= 400) return null;
	const location = response.headers.get("Location");
	if (!location) return null;
	return new URL(location, current);
}
