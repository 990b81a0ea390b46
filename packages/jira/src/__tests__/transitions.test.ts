import type { Logger } from "@tracklane/core";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createConnection } from "../connection";
import { JiraOperationError } from "../errors";
import { AuthenticatedRequester } from "../request";
import { findTransitionId, resolveTransitionId } from "../transitions";
import { API_URL, config, jsonResponse, mockFetch, requestAt } from "./helpers";

beforeEach(() => {
	vi.stubGlobal("fetch", mockFetch);
});

afterEach(() => {
	mockFetch.mockReset();
	vi.unstubAllGlobals();
});

function requester(): AuthenticatedRequester {
	const result = createConnection(config);
	if (!result.ok) throw result.error;
	return new AuthenticatedRequester(result.value, vi.fn<Logger>());
}

describe("findTransitionId", () => {
	const transitions = [
		{ id: "11", name: "Start Progress" },
		{ id: "21", name: "Resolve Issue" },
		{ id: "2", name: "Close Issue" },
	];

	it("returns the id of the matching name", () => {
		expect(findTransitionId(transitions, "Resolve Issue")).toBe("21");
	});

	it("matches case and spacing exactly", () => {
		expect(findTransitionId(transitions, "close issue")).toBeUndefined();
		expect(findTransitionId(transitions, "Close Issue ")).toBeUndefined();
	});

	it("takes the last entry when a name is listed twice", () => {
		expect(
			findTransitionId([...transitions, { id: "701", name: "Close Issue" }], "Close Issue"),
		).toBe("701");
	});

	it("returns undefined for an empty list", () => {
		expect(findTransitionId([], "Close Issue")).toBeUndefined();
	});
});

describe("resolveTransitionId", () => {
	it("fetches the issue's current transitions", async () => {
		mockFetch.mockResolvedValueOnce(
			jsonResponse({ transitions: [{ id: "11", name: "Start Progress" }] }),
		);

		const result = await resolveTransitionId(requester(), "OPS-7", "Start Progress");

		expect(result).toEqual({ ok: true, value: "11" });
		expect(requestAt(0).url).toBe(`${API_URL}issue/OPS-7/transitions`);
		expect(requestAt(0).method).toBe("GET");
	});

	it("resolves to undefined when nothing matches", async () => {
		mockFetch.mockResolvedValueOnce(jsonResponse({ transitions: [{ id: "2", name: "Close Issue" }] }));

		const result = await resolveTransitionId(requester(), "OPS-7", "Start Progress");

		expect(result).toEqual({ ok: true, value: undefined });
	});

	it("treats a missing transitions list as empty", async () => {
		mockFetch.mockResolvedValueOnce(jsonResponse({}));

		const result = await resolveTransitionId(requester(), "OPS-7", "Close Issue");

		expect(result).toEqual({ ok: true, value: undefined });
	});

	it("reports a failed lookup as an operation error", async () => {
		mockFetch.mockResolvedValueOnce(
			jsonResponse({ errorMessages: ["Issue does not exist"] }, 404, "Not Found"),
		);

		const result = await resolveTransitionId(requester(), "OPS-404", "Close Issue");

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error).toBeInstanceOf(JiraOperationError);
			expect(result.error.description).toBe("Failed to list transitions for issue OPS-404");
		}
	});
});
