import type { RequestListener } from "node:http";
import type { Handler } from "./index";

/** Bridges `node:http` to a fetch-style handler. Only GET reaches the handler. */
export function createListener(handler: Handler): RequestListener {
	return (req, res) => {
		if (req.method !== "GET") {
			res.writeHead(405, { Allow: "GET", "Content-Type": "text/plain" });
			res.end("Method not allowed");
			return;
		}

		const abort = new AbortController();
		res.on("close", () => abort.abort());

		Promise.resolve()
			.then(() => {
				let url: URL;
				try {
					url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
				} catch {
					return new Response("Bad request", { status: 400 });
				}
				return handler.fetch(new Request(url, { signal: abort.signal }));
			})
			.then(async (response) => {
				res.writeHead(response.status, Object.fromEntries(response.headers));
				res.end(await response.text());
			})
			.catch((error: unknown) => {
				console.error("Unhandled error while serving request", error);
				if (!res.headersSent) {
					res.writeHead(500);
				}
				res.end("Internal error");
			});
	};
}
