// ---------------------------------------------------------------------------
// AuthenticatedRequester: one authenticated fetch per call
// ---------------------------------------------------------------------------

import type { Logger } from "@tracklane/core";
import type { Connection, HttpMethod, OutboundRequest } from "./types";

const JSON_CONTENT_TYPE = "application/json";

/**
 * Sends requests against the connection's REST root with Basic auth attached.
 *
 * Uses global `fetch`. Transport failures are not caught: a rejected fetch
 * rejects the returned promise unchanged. HTTP-level failures come back as
 * ordinary responses for {@link import("./classify").decodeResponse} to judge.
 */
export class AuthenticatedRequester {
	readonly #apiUrl: string;
	readonly #authHeader: string;
	readonly #logger: Logger;

	constructor(connection: Connection, logger: Logger) {
		this.#apiUrl = connection.apiUrl;
		const credentials = `${connection.username}:${connection.password}`;
		this.#authHeader = `Basic ${Buffer.from(credentials, "utf8").toString("base64")}`;
		this.#logger = logger;
	}

	/** Send a request and return the raw response. */
	async send(request: OutboundRequest): Promise<Response> {
		const headers: Record<string, string> = {
			...request.headers,
			Authorization: this.#authHeader,
			Accept: JSON_CONTENT_TYPE,
		};

		const init: RequestInit = { method: request.method, headers };

		if (request.body !== undefined) {
			if (request.contentType !== undefined) {
				headers["Content-Type"] = request.contentType;
			}
			init.body = request.body;
		}

		const response = await fetch(`${this.#apiUrl}${request.path}`, init);
		this.#logger("debug", `${request.method} ${request.path} -> ${response.status}`, {
			method: request.method,
			path: request.path,
			status: response.status,
		});
		return response;
	}

	/** Send a request whose body is `payload` encoded as JSON. */
	sendJson(method: HttpMethod, path: string, payload: unknown): Promise<Response> {
		return this.send({
			method,
			path,
			body: JSON.stringify(payload),
			contentType: JSON_CONTENT_TYPE,
		});
	}
}
