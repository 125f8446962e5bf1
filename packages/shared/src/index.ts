export { createLogger, setLogLevel } from "./logger/index.js";
export type { Logger, LogLevel, LogContext } from "./logger/index.js";

export { validateInput, formatZodError } from "./utils/validation.js";
export type { ValidationResult } from "./utils/validation.js";

export { AppInfoSchema, AuthorSchema } from "./utils/app-schema.js";
export type { AppInfo } from "./utils/app-schema.js";
