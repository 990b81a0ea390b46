/** Base error class for all Tracklane errors */
export class TracklaneError extends Error {
	readonly code: string;
	override readonly cause?: Error;

	constructor(message: string, code: string, cause?: Error) {
		super(message);
		this.name = this.constructor.name;
		this.code = code;
		this.cause = cause;
	}
}

/** Missing or invalid client configuration. Raised at construction, never retried. */
export class ConfigurationError extends TracklaneError {
	constructor(message: string, cause?: Error) {
		super(message, "CONFIGURATION_ERROR", cause);
	}
}
