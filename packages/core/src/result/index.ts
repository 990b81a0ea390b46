export { ConfigurationError, TracklaneError } from "./errors";
export { Err, mapResult, Ok, type Result, unwrapOrThrow } from "./result";
