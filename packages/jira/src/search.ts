// ---------------------------------------------------------------------------
// Search paging: single JQL pages and full-result accumulation
// ---------------------------------------------------------------------------

import { ConfigurationError, Err, type Logger, Ok, type Result } from "@tracklane/core";
import { decodeResponse } from "./classify";
import { type JiraOperationError, JiraQueryError, JiraRequestRejectedError } from "./errors";
import { buildSearchQuery } from "./mapping";
import type { AuthenticatedRequester } from "./request";
import type { JiraIssue, JiraSearchResponse, SearchPage } from "./types";

/** Page size used when the caller does not pick one. */
export const DEFAULT_PAGE_SIZE = 100;

/** Fetches the page of a fixed query that starts at `startAt`. */
export type PageFetcher = (
	startAt: number,
	maxResults: number,
) => Promise<Result<SearchPage, JiraOperationError>>;

/**
 * Run one page of a JQL query via POST /search/.
 *
 * A rejected query (400 with error messages, e.g. bad JQL) resolves to an
 * empty page carrying `errors` instead of an `Err`, so callers can tell a
 * query problem from an auth or server problem. A 401/403/404 stays an `Err`
 * even when its body lists messages.
 */
export async function fetchSearchPage(
	requester: AuthenticatedRequester,
	jql: string,
	startAt: number,
	maxResults: number,
): Promise<Result<SearchPage, JiraOperationError>> {
	const response = await requester.sendJson(
		"POST",
		"search/",
		buildSearchQuery(jql, startAt, maxResults),
	);
	const result = await decodeResponse<JiraSearchResponse>(
		response,
		`Failed to search for "${jql}" from ${startAt} for ${maxResults} results`,
	);

	if (result.ok) {
		const { total, issues } = result.value;
		return Ok({
			total,
			startAt: result.value.startAt,
			maxResults: result.value.maxResults,
			issues,
		});
	}

	if (result.error instanceof JiraRequestRejectedError && result.error.statusCode === 400) {
		return Ok({ total: 0, startAt, maxResults, issues: [], errors: result.error.errorMessages });
	}

	return result;
}

/**
 * Collect every page of a query, in order.
 *
 * Starts at offset 0 and advances by the page size actually used. Stops on the
 * first page holding fewer issues than that size. A page carrying errors
 * aborts the whole collection and drops what was gathered so far.
 *
 * @throws ConfigurationError when `pageSize` is not a positive integer.
 */
export async function collectAllPages(
	fetchPage: PageFetcher,
	jql: string,
	pageSize: number,
	logger: Logger,
): Promise<Result<JiraIssue[], JiraOperationError | JiraQueryError>> {
	if (!Number.isInteger(pageSize) || pageSize <= 0) {
		throw new ConfigurationError(`Search page size must be a positive integer, got ${pageSize}`);
	}

	const allIssues: JiraIssue[] = [];
	let startAt = 0;

	while (true) {
		const result = await fetchPage(startAt, pageSize);
		if (!result.ok) return result;

		const page = result.value;
		if (page.errors !== undefined && page.errors.length > 0) {
			return Err(new JiraQueryError(jql, page.errors));
		}

		for (const issue of page.issues) {
			allIssues.push(issue);
		}

		// Jira silently caps maxResults server-side; page by what it actually used
		const used = page.maxResults > 0 && page.maxResults < pageSize ? page.maxResults : pageSize;

		// A short page is taken as the last one. This trusts Jira never to return
		// a short page mid-stream; the reported total is only cross-checked.
		if (page.issues.length < used) {
			if (allIssues.length < page.total) {
				logger(
					"warn",
					`Search stopped on a short page with ${allIssues.length} of ${page.total} reported issues`,
					{ jql, startAt, pageSize: used },
				);
			}
			break;
		}

		startAt += used;
	}

	return Ok(allIssues);
}
