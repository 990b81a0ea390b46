export { defaultLogger, type Logger, type LogLevel } from "./logger";
export * from "./result";
