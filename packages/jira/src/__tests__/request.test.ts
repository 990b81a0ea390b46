import type { Logger } from "@tracklane/core";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createConnection } from "../connection";
import { AuthenticatedRequester } from "../request";
import type { Connection } from "../types";
import { API_URL, config, jsonResponse, mockFetch, requestAt } from "./helpers";

beforeEach(() => {
	vi.stubGlobal("fetch", mockFetch);
});

afterEach(() => {
	mockFetch.mockReset();
	vi.unstubAllGlobals();
});

function connection(): Connection {
	const result = createConnection(config);
	if (!result.ok) throw result.error;
	return result.value;
}

describe("AuthenticatedRequester", () => {
	it("resolves the path against the API root and sends Basic auth", async () => {
		mockFetch.mockResolvedValueOnce(jsonResponse({ key: "OPS-1" }));
		const requester = new AuthenticatedRequester(connection(), vi.fn<Logger>());

		await requester.send({ method: "GET", path: "issue/OPS-1" });

		expect(mockFetch).toHaveBeenCalledOnce();
		const request = requestAt(0);
		expect(request.url).toBe(`${API_URL}issue/OPS-1`);
		expect(request.method).toBe("GET");
		expect(request.headers).toEqual({
			Authorization: `Basic ${Buffer.from("bot:test-secret").toString("base64")}`,
			Accept: "application/json",
		});
		expect(request.rawBody).toBeUndefined();
	});

	it("encodes non-ASCII credentials as UTF-8", async () => {
		mockFetch.mockResolvedValueOnce(jsonResponse({}));
		const result = createConnection({ ...config, password: "pässwörd" });
		if (!result.ok) throw result.error;
		const requester = new AuthenticatedRequester(result.value, vi.fn<Logger>());

		await requester.send({ method: "GET", path: "issue/OPS-1" });

		expect(requestAt(0).headers.Authorization).toBe(
			`Basic ${Buffer.from("bot:pässwörd", "utf8").toString("base64")}`,
		);
	});

	it("sets the content type only when a body is present", async () => {
		mockFetch.mockResolvedValueOnce(jsonResponse({ id: "1" }, 201));
		const requester = new AuthenticatedRequester(connection(), vi.fn<Logger>());

		await requester.sendJson("POST", "issue/OPS-1/comment", { body: "hello" });

		const request = requestAt(0);
		expect(request.headers["Content-Type"]).toBe("application/json");
		expect(request.rawBody).toBe('{"body":"hello"}');
	});

	it("keeps extra headers but never lets them replace the credentials", async () => {
		mockFetch.mockResolvedValueOnce(jsonResponse([]));
		const requester = new AuthenticatedRequester(connection(), vi.fn<Logger>());

		await requester.send({
			method: "POST",
			path: "issue/OPS-1/attachments",
			headers: { "X-Atlassian-Token": "no-check", Authorization: "Bearer other" },
		});

		const headers = requestAt(0).headers;
		expect(headers["X-Atlassian-Token"]).toBe("no-check");
		expect(headers.Authorization).toBe(
			`Basic ${Buffer.from("bot:test-secret").toString("base64")}`,
		);
	});

	it("logs method, path and status without credentials", async () => {
		mockFetch.mockResolvedValueOnce(jsonResponse({}, 404, "Not Found"));
		const logger = vi.fn<Logger>();
		const requester = new AuthenticatedRequester(connection(), logger);

		await requester.send({ method: "DELETE", path: "issue/OPS-9" });

		expect(logger).toHaveBeenCalledOnce();
		expect(logger).toHaveBeenCalledWith("debug", "DELETE issue/OPS-9 -> 404", {
			method: "DELETE",
			path: "issue/OPS-9",
			status: 404,
		});
	});

	it("returns non-2xx responses instead of throwing", async () => {
		mockFetch.mockResolvedValueOnce(jsonResponse({}, 500, "Internal Server Error"));
		const requester = new AuthenticatedRequester(connection(), vi.fn<Logger>());

		const response = await requester.send({ method: "GET", path: "issue/OPS-1" });

		expect(response.status).toBe(500);
	});

	it("lets transport failures propagate", async () => {
		mockFetch.mockRejectedValueOnce(new TypeError("fetch failed"));
		const logger = vi.fn<Logger>();
		const requester = new AuthenticatedRequester(connection(), logger);

		await expect(requester.send({ method: "GET", path: "issue/OPS-1" })).rejects.toThrow(
			"fetch failed",
		);
		expect(logger).not.toHaveBeenCalled();
	});
});
