import { Err, Ok, type Result } from "@tracklane/core";
import { JiraOperationError, JiraRequestRejectedError } from "./errors";
import type { JiraErrorBody } from "./types";

/**
 * Decode a 2xx JSON body, or classify the failure.
 *
 * @param description - What the caller was doing, used in the error message.
 */
export async function decodeResponse<T>(
	response: Response,
	description: string,
): Promise<Result<T, JiraOperationError>> {
	if (response.ok) {
		const data = (await response.json()) as T;
		return Ok(data);
	}
	return Err(await classifyFailure(response, description));
}

/** Like {@link decodeResponse} for endpoints whose success body is ignored (204s). */
export async function checkResponse(
	response: Response,
	description: string,
): Promise<Result<void, JiraOperationError>> {
	if (response.ok) {
		return Ok(undefined);
	}
	return Err(await classifyFailure(response, description));
}

/**
 * Turn a non-2xx response into a typed error.
 *
 * A 4xx whose JSON body lists error messages becomes a
 * {@link JiraRequestRejectedError}; anything else a plain
 * {@link JiraOperationError}.
 */
export async function classifyFailure(
	response: Response,
	description: string,
): Promise<JiraOperationError> {
	const body = await response.text();
	const statusLine = response.statusText
		? `${response.status} ${response.statusText}`
		: String(response.status);

	if (response.status >= 400 && response.status < 500) {
		const messages = parseErrorMessages(body);
		if (messages.length > 0) {
			return new JiraRequestRejectedError(description, response.status, statusLine, body, messages);
		}
	}

	return new JiraOperationError(description, response.status, statusLine, body);
}

/**
 * Pull messages out of a Jira error body.
 *
 * `errorMessages` entries come first, then field errors as `field: message`.
 * Bodies that are not JSON yield no messages.
 */
export function parseErrorMessages(body: string): string[] {
	let parsed: unknown;
	try {
		parsed = JSON.parse(body);
	} catch {
		return [];
	}
	if (typeof parsed !== "object" || parsed === null) return [];

	const { errorMessages, errors } = parsed as JiraErrorBody;
	const messages: string[] = [];

	if (Array.isArray(errorMessages)) {
		for (const message of errorMessages) {
			if (typeof message === "string") messages.push(message);
		}
	}

	if (typeof errors === "object" && errors !== null && !Array.isArray(errors)) {
		for (const [field, message] of Object.entries(errors)) {
			if (typeof message === "string") messages.push(`${field}: ${message}`);
		}
	}

	return messages;
}
