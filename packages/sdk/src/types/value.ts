/**
 * Value - the dynamic storage behind a flag or positional entry.
 *
 * set() is called once per occurrence, in command-line order. toString() may
 * be called on a value whose cell was never written and must not throw.
 */
export interface Value {
  set(text: string): void;
  toString(): string;
}

/** A Value whose contents can be read back. All built-in adapters are Getters. */
export interface Getter<T = unknown> extends Value {
  get(): T;
}

/**
 * A Value with isBoolFlag() returning true makes `-name` equivalent to
 * `-name=true` instead of consuming the next argument.
 */
export interface BoolFlagValue extends Value {
  isBoolFlag(): boolean;
}

export type ValueKind =
  | "bool"
  | "int"
  | "uint"
  | "int64"
  | "uint64"
  | "float64"
  | "string"
  | "duration";

/** TypeScript storage type for each kind. Durations are milliseconds. */
export interface KindValues {
  bool: boolean;
  int: number;
  uint: number;
  int64: bigint;
  uint64: bigint;
  float64: number;
  string: string;
  duration: number;
}

/** The state of one registered flag or positional entry. */
export interface Flag {
  /** Name as it appears on the command line; positional entries are named `?<index>`. */
  readonly name: string;
  readonly usage: string;
  readonly value: Value;
  /** Default value as text, captured at registration. */
  readonly defValue: string;
}

export function isBoolFlagValue(value: Value): value is BoolFlagValue {
  const isBoolFlag: unknown = Reflect.get(value, "isBoolFlag");
  return typeof isBoolFlag === "function" && Reflect.apply(isBoolFlag, value, []) === true;
}
