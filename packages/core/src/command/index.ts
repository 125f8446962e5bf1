export { App, createApp } from "./app.js";
export type { AppOptions, ExecOptions } from "./app.js";
export { Command } from "./command.js";
export type { CommandHost } from "./command.js";
export { ExecContext } from "./context.js";
export { resolveRoute, HELP_TOKENS } from "./router.js";
export type { Route, RouteEnv } from "./router.js";
export { FilterBinding, ActionBinding, BINDING_POLICY } from "./binding.js";
export type { FilterInstance, ParseEnv } from "./binding.js";
export { defaultUsageRenderer, formatAuthor, collectCommands } from "./usage.js";
export type { UsageData, UsageCommand, UsageRenderer } from "./usage.js";
export { createSchemaValidator } from "./validator.js";
