// Typed values
export * from "./values/index.js";

// Flag sets & struct binding
export * from "./flags/index.js";

// Command tree, routing & App
export * from "./command/index.js";
