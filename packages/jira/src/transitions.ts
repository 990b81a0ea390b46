import { Ok, type Result } from "@tracklane/core";
import { decodeResponse } from "./classify";
import type { JiraOperationError } from "./errors";
import type { AuthenticatedRequester } from "./request";
import type { JiraTransition, JiraTransitionList } from "./types";

/**
 * Look up the id of the transition called `name` on an issue's current status.
 *
 * Each issue may sit in a different workflow, and the same name can map to
 * different ids (or none) as the issue moves, so this always asks Jira.
 * Resolves to `Ok(undefined)` when nothing matches.
 */
export async function resolveTransitionId(
	requester: AuthenticatedRequester,
	key: string,
	name: string,
): Promise<Result<string | undefined, JiraOperationError>> {
	const response = await requester.send({
		method: "GET",
		path: `issue/${encodeURIComponent(key)}/transitions`,
	});
	const result = await decodeResponse<JiraTransitionList>(
		response,
		`Failed to list transitions for issue ${key}`,
	);
	if (!result.ok) return result;
	return Ok(findTransitionId(result.value.transitions ?? [], name));
}

/**
 * Exact, case-sensitive match on `name`. If Jira lists a name twice the
 * last entry wins.
 */
export function findTransitionId(
	transitions: readonly JiraTransition[],
	name: string,
): string | undefined {
	let id: string | undefined;
	for (const transition of transitions) {
		if (transition.name === name) {
			id = transition.id;
		}
	}
	return id;
}
