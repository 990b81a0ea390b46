// ---------------------------------------------------------------------------
// Payload mapping: caller-side field maps to Jira's nested JSON shapes
// ---------------------------------------------------------------------------

import type { AttachmentUpload, FieldMap } from "./types";

/** Name of the workflow transition used by `closeIssue`. */
export const CLOSE_TRANSITION = "Close Issue";

/** Comment added on close when the caller supplies none. */
export const DEFAULT_CLOSE_COMMENT = "Issue closed by script";

/** Field-selection directive meaning "every navigable field". */
export const SEARCH_FIELDS = ["*navigable"];

/** Body of POST /issue/. */
export interface CreateIssuePayload {
	fields: {
		summary: string;
		description: string;
		issuetype: { name: string };
		project: { key: string };
	};
}

/** Body of POST /search/. */
export interface SearchQuery {
	jql: string;
	startAt: number;
	maxResults: number;
	fields: string[];
}

export function buildCreatePayload(
	project: string,
	type: string,
	summary: string,
	description: string,
): CreateIssuePayload {
	return {
		fields: {
			summary,
			description,
			issuetype: { name: type },
			project: { key: project },
		},
	};
}

/** Wrap a field map as `{ fields }`. Field legality is left to Jira. */
export function buildUpdatePayload(fields: FieldMap): { fields: FieldMap } {
	return { fields };
}

export function buildCommentPayload(text: string): { body: string } {
	return { body: text };
}

/**
 * Transition screen payload for closing an issue.
 *
 * Always adds a comment; sets `fields.resolution` only when a resolution
 * name is given.
 */
export function buildClosePayload(resolution?: string, comment?: string): FieldMap {
	const update: FieldMap = {
		comment: [{ add: { body: comment ?? DEFAULT_CLOSE_COMMENT } }],
	};
	if (resolution) {
		return { update, fields: { resolution: { name: resolution } } };
	}
	return { update };
}

/**
 * Copy `payload` and add the `transition` entry.
 *
 * An unresolved id is sent as `transition: {}` so that Jira rejects the
 * request rather than the client guessing.
 */
export function buildTransitionPayload(
	transitionId: string | undefined,
	payload: FieldMap = {},
): FieldMap {
	return {
		...payload,
		transition: transitionId === undefined ? {} : { id: transitionId },
	};
}

export function buildSearchQuery(jql: string, startAt: number, maxResults: number): SearchQuery {
	return { jql, startAt, maxResults, fields: [...SEARCH_FIELDS] };
}

/** Multipart body with a single `file` part. */
export function buildAttachmentForm(upload: AttachmentUpload): FormData {
	const blob = upload.content instanceof Blob ? upload.content : new Blob([upload.content]);
	const form = new FormData();
	form.append("file", blob, upload.filename);
	return form;
}
