export { NamedFlagSet, ErrorHandling } from "./named-flag-set.js";
export type { FlagSetOptions } from "./named-flag-set.js";
export { FlagSet } from "./flag-set.js";
export { describeStruct, structVars, fieldCell } from "./struct-binder.js";
export type { FieldSpec, FieldSpecs, FieldBinding, KindsFor, BindingTarget } from "./struct-binder.js";
export { readFlagToken, splitArgs, isBareToken, TERMINATOR } from "./token.js";
export type { FlagToken } from "./token.js";
export { formatFlagDefaults, formatFlagDefault, unquoteUsage } from "./usage.js";
export { positionalName, positionalIndex, POSITIONAL_PREFIX } from "./names.js";
