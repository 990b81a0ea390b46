// ---------------------------------------------------------------------------
// JiraAutomationClient: issue operations for automated scripts
// ---------------------------------------------------------------------------

import { defaultLogger, type Logger, mapResult, type Result, unwrapOrThrow } from "@tracklane/core";
import { checkResponse, decodeResponse } from "./classify";
import { createConnection, makeBrowseUrl, validateClientConfig } from "./connection";
import type { JiraOperationError, JiraQueryError } from "./errors";
import {
	buildAttachmentForm,
	buildClosePayload,
	buildCommentPayload,
	buildCreatePayload,
	buildTransitionPayload,
	buildUpdatePayload,
	CLOSE_TRANSITION,
} from "./mapping";
import { AuthenticatedRequester } from "./request";
import { collectAllPages, DEFAULT_PAGE_SIZE, fetchSearchPage } from "./search";
import { resolveTransitionId } from "./transitions";
import type {
	AttachmentUpload,
	Connection,
	CreatedIssue,
	FieldMap,
	JiraAttachment,
	JiraClientConfig,
	JiraComment,
	JiraIssue,
	SearchPage,
} from "./types";

/** Header Jira requires on attachment uploads to skip its XSRF check. */
const XSRF_HEADER = { "X-Atlassian-Token": "no-check" };

/**
 * Client for creating, searching, updating and closing Jira issues from
 * scripts.
 *
 * Issues are plain data: every call returns a fresh snapshot and nothing is
 * cached. HTTP failures come back as `Err` values; transport failures reject.
 * Nothing is retried.
 *
 * @example
 * ```ts
 * const jira = new JiraAutomationClient({ url, username, password });
 * const found = await jira.searchIssues('project = OPS AND summary ~ "nightly import"');
 * if (found.ok && found.value.issues.length === 0) {
 *   await jira.createIssue("OPS", "Bug", "nightly import failed", log);
 * }
 * ```
 */
export class JiraAutomationClient {
	/** Immutable connection details; the password stays out of serialised output. */
	readonly connection: Connection;
	readonly #requester: AuthenticatedRequester;
	readonly #logger: Logger;

	/** @throws ConfigurationError when url, username or password is missing, or the URL is not absolute. */
	constructor(config: JiraClientConfig) {
		const validated = unwrapOrThrow(validateClientConfig(config));
		this.connection = unwrapOrThrow(createConnection(validated));
		this.#logger = validated.logger ?? defaultLogger;
		this.#requester = new AuthenticatedRequester(this.connection, this.#logger);
	}

	/** Create an issue and return Jira's `{ id, key, self }` reply. */
	async createIssue(
		project: string,
		type: string,
		summary: string,
		description: string,
	): Promise<Result<CreatedIssue, JiraOperationError>> {
		const response = await this.#requester.sendJson(
			"POST",
			"issue/",
			buildCreatePayload(project, type, summary, description),
		);
		return decodeResponse<CreatedIssue>(response, `Failed to create issue "${summary}"`);
	}

	async getIssue(key: string): Promise<Result<JiraIssue, JiraOperationError>> {
		const response = await this.#requester.send({ method: "GET", path: issuePath(key) });
		return decodeResponse<JiraIssue>(response, `Failed to get issue ${key}`);
	}

	/**
	 * Replace the given fields. The map is sent as `{ fields }` without
	 * validation; Jira rejects fields that are not on the edit screen.
	 */
	async updateIssue(key: string, fields: FieldMap): Promise<Result<string, JiraOperationError>> {
		const response = await this.#requester.sendJson("PUT", issuePath(key), buildUpdatePayload(fields));
		return mapResult(await checkResponse(response, `Failed to update issue ${key}`), () => key);
	}

	async deleteIssue(key: string): Promise<Result<string, JiraOperationError>> {
		const response = await this.#requester.send({ method: "DELETE", path: issuePath(key) });
		return mapResult(await checkResponse(response, `Failed to delete issue ${key}`), () => key);
	}

	async createComment(key: string, text: string): Promise<Result<JiraComment, JiraOperationError>> {
		const response = await this.#requester.sendJson(
			"POST",
			`${issuePath(key)}/comment`,
			buildCommentPayload(text),
		);
		return decodeResponse<JiraComment>(response, `Failed to comment on issue ${key}`);
	}

	/** Upload a file as a multipart attachment. The caller supplies the bytes. */
	async attachFileToIssue(
		key: string,
		upload: AttachmentUpload,
	): Promise<Result<JiraAttachment[], JiraOperationError>> {
		const response = await this.#requester.send({
			method: "POST",
			path: `${issuePath(key)}/attachments`,
			body: buildAttachmentForm(upload),
			headers: XSRF_HEADER,
		});
		return decodeResponse<JiraAttachment[]>(
			response,
			`Failed to attach ${upload.filename} to issue ${key}`,
		);
	}

	/**
	 * Apply the workflow transition called `name` (spacing and case matter).
	 *
	 * `payload` carries any transition-screen fields, e.g.
	 * `{ fields: { resolution: { name: "Fixed" } } }`. If no transition has that
	 * name the request still goes out without an id and Jira's rejection is
	 * returned.
	 */
	async transitionIssue(
		key: string,
		name: string,
		payload?: FieldMap,
	): Promise<Result<string, JiraOperationError>> {
		const transitionId = await resolveTransitionId(this.#requester, key, name);
		if (!transitionId.ok) return transitionId;

		const response = await this.#requester.sendJson(
			"POST",
			`${issuePath(key)}/transitions`,
			buildTransitionPayload(transitionId.value, payload),
		);
		return mapResult(
			await checkResponse(response, `Failed to apply transition "${name}" to issue ${key}`),
			() => key,
		);
	}

	/**
	 * Close via the "Close Issue" transition, adding a comment (default
	 * "Issue closed by script") and, when given, a resolution.
	 */
	closeIssue(
		key: string,
		resolution?: string,
		comment?: string,
	): Promise<Result<string, JiraOperationError>> {
		return this.transitionIssue(key, CLOSE_TRANSITION, buildClosePayload(resolution, comment));
	}

	/** One page of JQL results. A rejected query yields a page with `errors`. */
	searchIssues(
		jql: string,
		startAt = 0,
		maxResults = DEFAULT_PAGE_SIZE,
	): Promise<Result<SearchPage, JiraOperationError>> {
		return fetchSearchPage(this.#requester, jql, startAt, maxResults);
	}

	/** Every issue matching `jql`, fetched `pageSize` at a time. */
	allSearchResults(
		jql: string,
		pageSize = DEFAULT_PAGE_SIZE,
	): Promise<Result<JiraIssue[], JiraOperationError | JiraQueryError>> {
		return collectAllPages(
			(startAt, maxResults) => this.searchIssues(jql, startAt, maxResults),
			jql,
			pageSize,
			this.#logger,
		);
	}

	/** Web UI link for an issue. No request is made. */
	makeBrowseUrl(key: string): string {
		return makeBrowseUrl(this.connection, key);
	}
}

function issuePath(key: string): string {
	return `issue/${encodeURIComponent(key)}`;
}

