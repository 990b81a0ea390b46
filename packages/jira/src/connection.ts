import { ConfigurationError, Err, Ok, type Result } from "@tracklane/core";
import type { Connection, JiraClientConfig } from "./types";

/** Appended to base URLs that do not already point into the REST API. */
const API_PATH = "/rest/api/latest/";

/**
 * Validate raw client options.
 *
 * Checks that `url`, `username` and `password` are non-empty strings and that
 * `logger`, when given, is a function. Error messages name the offending
 * field and never echo its value.
 */
export function validateClientConfig(input: unknown): Result<JiraClientConfig, ConfigurationError> {
	if (typeof input !== "object" || input === null) {
		return Err(new ConfigurationError("Jira client config must be an object"));
	}

	const obj = input as Record<string, unknown>;

	const url = requireString(obj, "url");
	if (!url.ok) return url;
	const username = requireString(obj, "username");
	if (!username.ok) return username;
	const password = requireString(obj, "password");
	if (!password.ok) return password;

	const logger = obj.logger;
	if (logger !== undefined && typeof logger !== "function") {
		return Err(new ConfigurationError("Jira client logger must be a function"));
	}

	const config: JiraClientConfig = {
		url: url.value,
		username: username.value,
		password: password.value,
	};
	if (typeof logger === "function") {
		config.logger = (level, message, meta) => logger(level, message, meta);
	}
	return Ok(config);
}

function requireString(
	obj: Record<string, unknown>,
	field: "url" | "username" | "password",
): Result<string, ConfigurationError> {
	const value = obj[field];
	if (typeof value !== "string" || value.length === 0) {
		return Err(
			new ConfigurationError(
				`Need to specify url, username, and password to access Jira (${field} is missing)`,
			),
		);
	}
	return Ok(value);
}

/**
 * Derive the versioned REST root from a base URL (which must end in `/`).
 *
 * `https://jira.example.com/` becomes `https://jira.example.com/rest/api/latest/`;
 * URLs already containing `/rest/api/` are kept. Doubled slashes are collapsed
 * everywhere except the scheme separator.
 */
export function deriveApiUrl(baseUrl: string): string {
	let apiUrl = baseUrl;
	if (!apiUrl.includes("/rest/api/")) {
		apiUrl += API_PATH;
	}
	if (!apiUrl.endsWith("/")) {
		apiUrl += "/";
	}
	return apiUrl.replace(/\/\/+/g, "/").replace(":/", "://");
}

/** Connection record whose password lives in a private field behind a getter. */
class JiraConnection implements Connection {
	readonly baseUrl: string;
	readonly apiUrl: string;
	readonly username: string;
	readonly #password: string;

	constructor(baseUrl: string, apiUrl: string, username: string, password: string) {
		this.baseUrl = baseUrl;
		this.apiUrl = apiUrl;
		this.username = username;
		this.#password = password;
		Object.freeze(this);
	}

	get password(): string {
		return this.#password;
	}
}

/**
 * Build the immutable {@link Connection} for a validated config.
 *
 * Fails when the derived API URL is not absolute (no http/https scheme).
 * The password stays out of `JSON.stringify`, spreads and `Object.keys`.
 */
export function createConnection(config: JiraClientConfig): Result<Connection, ConfigurationError> {
	const baseUrl = config.url.endsWith("/") ? config.url : `${config.url}/`;
	const apiUrl = deriveApiUrl(baseUrl);

	if (!/^https?:\/\//.test(apiUrl)) {
		return Err(
			new ConfigurationError("URL for Jira must be absolute, including 'http://' or 'https://'"),
		);
	}

	return Ok(new JiraConnection(baseUrl, apiUrl, config.username, config.password));
}

/** Link to an issue in the Jira web UI. Pure string work, no request. */
export function makeBrowseUrl(connection: Connection, key: string): string {
	return `${connection.baseUrl}browse/${key}`;
}
