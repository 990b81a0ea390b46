export { checkResponse, classifyFailure, decodeResponse, parseErrorMessages } from "./classify";
export { JiraAutomationClient } from "./client";
export { createConnection, deriveApiUrl, makeBrowseUrl, validateClientConfig } from "./connection";
export { JiraOperationError, JiraQueryError, JiraRequestRejectedError } from "./errors";
export {
	buildAttachmentForm,
	buildClosePayload,
	buildCommentPayload,
	buildCreatePayload,
	buildSearchQuery,
	buildTransitionPayload,
	buildUpdatePayload,
	CLOSE_TRANSITION,
	type CreateIssuePayload,
	DEFAULT_CLOSE_COMMENT,
	SEARCH_FIELDS,
	type SearchQuery,
} from "./mapping";
export { AuthenticatedRequester } from "./request";
export { collectAllPages, DEFAULT_PAGE_SIZE, fetchSearchPage, type PageFetcher } from "./search";
export { findTransitionId, resolveTransitionId } from "./transitions";
export type {
	AttachmentUpload,
	Connection,
	CreatedIssue,
	FieldMap,
	FieldValue,
	HttpMethod,
	JiraAttachment,
	JiraClientConfig,
	JiraComment,
	JiraErrorBody,
	JiraIssue,
	JiraSearchResponse,
	JiraTransition,
	JiraTransitionList,
	OutboundRequest,
	SearchPage,
} from "./types";
