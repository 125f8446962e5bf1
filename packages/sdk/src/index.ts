// Types
export type {
  Value,
  Getter,
  BoolFlagValue,
  ValueKind,
  KindValues,
  Flag,
} from "./types/value.js";

export { isBoolFlagValue } from "./types/value.js";

export type {
  Context,
  HandlerResult,
  ActionFunc,
  FilterFunc,
  Action,
  Filter,
  ActionCopier,
  FilterCopier,
  ActionClass,
  FilterClass,
  ActionInput,
  FilterInput,
  ValidateFunc,
  Author,
  OutputSink,
} from "./types/command.js";

// Errors
export {
  FlagrouteError,
  ConfigError,
  FlagDefinitionError,
  StructBindingError,
  CommandTreeError,
  ParseError,
  ValueSyntaxError,
  ValidationError,
  isHelpRequested,
} from "./errors/base.js";

export { ErrorCode } from "./errors/codes.js";
export type { ErrorCodeValue } from "./errors/codes.js";

// Status
export { Status, StatusCode, StatusError } from "./status/status.js";
