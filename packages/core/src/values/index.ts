export {
  cell,
  newValue,
  formatKind,
  ZERO_VALUES,
  BoolValue,
  IntValue,
  UintValue,
  Int64Value,
  Uint64Value,
  Float64Value,
  StringValue,
  DurationValue,
} from "./adapters.js";
export type { Cell, TypedValue } from "./adapters.js";

export { parseDuration, formatDuration } from "./duration.js";
export { parseInteger, parseFloat64, parseBool, formatFloat64 } from "./numeric.js";
