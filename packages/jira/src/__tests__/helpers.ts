import { vi } from "vitest";
import type { JiraIssue } from "../types";

export const mockFetch = vi.fn<(...args: Parameters<typeof fetch>) => Promise<Response>>();

export const API_URL = "https://jira.example.com/rest/api/latest/";

export const config = {
	url: "https://jira.example.com",
	username: "bot",
	password: "test-secret",
};

export function jsonResponse(body: unknown, status = 200, statusText = ""): Response {
	return new Response(JSON.stringify(body), {
		status,
		statusText,
		headers: { "Content-Type": "application/json" },
	});
}

export function emptyResponse(status = 204): Response {
	return new Response(null, { status });
}

export function makeIssue(n: number): JiraIssue {
	return { id: String(1000 + n), key: `OPS-${n}`, fields: { summary: `Issue ${n}` } };
}

export function searchResponse(
	issues: JiraIssue[],
	startAt: number,
	maxResults: number,
	total: number,
): Response {
	return jsonResponse({ total, startAt, maxResults, issues });
}

/** Decoded view of the `index`-th recorded fetch call. */
export function requestAt(index: number): {
	url: string;
	method: string | undefined;
	headers: Record<string, string>;
	rawBody: unknown;
	body: unknown;
} {
	const [input, init] = mockFetch.mock.calls[index]!;
	const request = init as RequestInit;
	const rawBody = request.body;
	return {
		url: String(input),
		method: request.method,
		headers: request.headers as Record<string, string>,
		rawBody,
		body: typeof rawBody === "string" ? JSON.parse(rawBody) : undefined,
	};
}
