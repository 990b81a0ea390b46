// ---------------------------------------------------------------------------
// Jira Automation Client: Type Definitions
// ---------------------------------------------------------------------------

import type { Logger } from "@tracklane/core";

/** A JSON-compatible field value, mirroring Jira's untyped issue fields. */
export type FieldValue = string | number | boolean | null | FieldValue[] | FieldMap;

/** String-keyed bag of field values, e.g. `{ summary: "...", labels: ["ops"] }`. */
export interface FieldMap {
	[field: string]: FieldValue;
}

/** Options accepted by {@link import("./client").JiraAutomationClient}. */
export interface JiraClientConfig {
	/** Jira base URL, e.g. "https://jira.example.com/". */
	url: string;
	/** Username for Basic auth. */
	username: string;
	/** Password or API token paired with the username. */
	password: string;
	/** Optional logger callback. Defaults to `console[level]`. */
	logger?: Logger;
}

/**
 * Immutable connection details derived from {@link JiraClientConfig}.
 *
 * `password` is never written to a URL or a log line.
 */
export interface Connection {
	/** Caller's base URL with a trailing slash, used for browse links. */
	readonly baseUrl: string;
	/** Versioned REST root every request path is resolved against. */
	readonly apiUrl: string;
	readonly username: string;
	readonly password: string;
}

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

/** A request relative to the API root, before credentials are attached. */
export interface OutboundRequest {
	method: HttpMethod;
	/** Path relative to {@link Connection.apiUrl}, e.g. `issue/ENG-1`. */
	path: string;
	body?: string | FormData;
	contentType?: string;
	headers?: Record<string, string>;
}

/** File contents to upload as an issue attachment. */
export interface AttachmentUpload {
	filename: string;
	content: Blob | Uint8Array | string;
}

// ---------------------------------------------------------------------------
// Jira REST API: Response Types
// ---------------------------------------------------------------------------

/**
 * A Jira issue snapshot, exactly as the tracker returned it.
 *
 * Only `key` is relied upon; everything else is passed through untouched.
 */
export interface JiraIssue {
	readonly key: string;
	readonly id?: string;
	readonly self?: string;
	readonly fields?: Readonly<FieldMap>;
	readonly [property: string]: unknown;
}

/** Response from POST /issue/. */
export interface CreatedIssue {
	readonly id: string;
	readonly key: string;
	readonly self: string;
}

/** Response from POST /issue/{key}/comment. */
export interface JiraComment {
	readonly id: string;
	readonly body: unknown;
	readonly self?: string;
	readonly [property: string]: unknown;
}

/** One entry of the POST /issue/{key}/attachments response. */
export interface JiraAttachment {
	readonly id: string;
	readonly filename: string;
	readonly size?: number;
	readonly mimeType?: string;
	readonly content?: string;
	readonly [property: string]: unknown;
}

/** A workflow transition currently available on an issue. */
export interface JiraTransition {
	readonly id: string;
	readonly name: string;
}

/** Response from GET /issue/{key}/transitions. */
export interface JiraTransitionList {
	transitions?: JiraTransition[];
}

/** Raw response from POST /search/. */
export interface JiraSearchResponse {
	total: number;
	startAt: number;
	maxResults: number;
	issues: JiraIssue[];
}

/** One page of JQL search results. */
export interface SearchPage {
	/** Tracker-reported hit count; may shift between pages. */
	readonly total: number;
	readonly startAt: number;
	readonly maxResults: number;
	readonly issues: readonly JiraIssue[];
	/** Present when the tracker rejected the query (e.g. a JQL syntax error). */
	readonly errors?: readonly string[];
}

/** Body Jira sends with most 4xx responses. */
export interface JiraErrorBody {
	errorMessages?: unknown;
	errors?: unknown;
}
