import { TracklaneError } from "@tracklane/core";

/**
 * Non-2xx response from the Jira REST API.
 *
 * Carries the operation's description (issue key, summary, ...) and the HTTP
 * status line for diagnostics.
 */
export class JiraOperationError extends TracklaneError {
	/** HTTP status code returned by Jira. */
	readonly statusCode: number;
	/** Status code plus reason phrase, e.g. `404 Not Found`. */
	readonly statusLine: string;
	/** What the client was doing when the request failed. */
	readonly description: string;
	/** Raw response body from Jira. */
	readonly responseBody: string;

	constructor(
		description: string,
		statusCode: number,
		statusLine: string,
		responseBody: string,
		code = "JIRA_OPERATION_FAILED",
		cause?: Error,
	) {
		super(`${description}: ${statusLine}`, code, cause);
		this.statusCode = statusCode;
		this.statusLine = statusLine;
		this.description = description;
		this.responseBody = responseBody;
	}
}

/**
 * 4xx response whose body lists error messages, e.g. a JQL syntax error.
 *
 * Search turns a 400 of this kind into a page carrying `errors`; every other case
 * surfaces it like any {@link JiraOperationError}.
 */
export class JiraRequestRejectedError extends JiraOperationError {
	/** Messages from the body's `errorMessages` array. */
	readonly errorMessages: readonly string[];

	constructor(
		description: string,
		statusCode: number,
		statusLine: string,
		responseBody: string,
		errorMessages: readonly string[],
		cause?: Error,
	) {
		super(description, statusCode, statusLine, responseBody, "JIRA_REQUEST_REJECTED", cause);
		this.errorMessages = errorMessages;
		this.message = `${this.message}: ${errorMessages.join("\n")}`;
	}
}

/** A search page came back with tracker errors while collecting every page of a query. */
export class JiraQueryError extends TracklaneError {
	/** The JQL that was rejected. */
	readonly jql: string;
	readonly errorMessages: readonly string[];

	constructor(jql: string, errorMessages: readonly string[], cause?: Error) {
		super(errorMessages.join("\n"), "JIRA_QUERY_REJECTED", cause);
		this.jql = jql;
		this.errorMessages = errorMessages;
	}
}
