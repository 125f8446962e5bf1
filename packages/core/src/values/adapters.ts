/**
 * Typed value adapters.
 *
 * Each adapter wraps a Cell of one primitive type. set() parses text into the
 * cell and throws ValueSyntaxError on malformed input; toString() renders the
 * cell and falls back to the zero value when the cell is empty.
 */

import type { Getter, KindValues, ValueKind } from "@flagroute/sdk";
import {
  formatFloat64,
  parseBool,
  parseFloat64,
  parseInt64,
  parseSafeInt,
  parseSafeUint,
  parseUint64,
} from "./numeric.js";
import { formatDuration, parseDuration } from "./duration.js";

/** A single addressable storage location. */
export interface Cell<T> {
  get(): T;
  set(value: T): void;
}

/** Create a free-standing cell holding `initial`. */
export function cell<T>(initial: T): Cell<T> {
  let current = initial;
  return {
    get: () => current,
    set: (value) => {
      current = value;
    },
  };
}

export interface TypedValue<T> extends Getter<T> {
  readonly kind: ValueKind;
  /** Type word shown in usage text; empty for booleans. */
  readonly typeName: string;
}

abstract class CellValue<T> implements TypedValue<T> {
  abstract readonly kind: ValueKind;
  abstract readonly typeName: string;

  constructor(protected readonly cell: Cell<T>) {}

  get(): T {
    return this.cell.get();
  }

  set(text: string): void {
    this.cell.set(this.parse(text));
  }

  toString(): string {
    const current: T | undefined = this.cell.get();
    return current === undefined || current === null ? this.zeroText() : this.format(current);
  }

  protected abstract parse(text: string): T;
  protected abstract format(value: T): string;
  protected abstract zeroText(): string;
}

export class BoolValue extends CellValue<boolean> {
  readonly kind = "bool";
  readonly typeName = "";

  isBoolFlag(): boolean {
    return true;
  }

  protected parse(text: string): boolean {
    return parseBool(text);
  }

  protected format(value: boolean): string {
    return String(value);
  }

  protected zeroText(): string {
    return "false";
  }
}

export class IntValue extends CellValue<number> {
  readonly kind = "int";
  readonly typeName = "int";

  protected parse(text: string): number {
    return parseSafeInt(text);
  }

  protected format(value: number): string {
    return String(value);
  }

  protected zeroText(): string {
    return "0";
  }
}

export class UintValue extends CellValue<number> {
  readonly kind = "uint";
  readonly typeName = "uint";

  protected parse(text: string): number {
    return parseSafeUint(text);
  }

  protected format(value: number): string {
    return String(value);
  }

  protected zeroText(): string {
    return "0";
  }
}

export class Int64Value extends CellValue<bigint> {
  readonly kind = "int64";
  readonly typeName = "int";

  protected parse(text: string): bigint {
    return parseInt64(text);
  }

  protected format(value: bigint): string {
    return value.toString();
  }

  protected zeroText(): string {
    return "0";
  }
}

export class Uint64Value extends CellValue<bigint> {
  readonly kind = "uint64";
  readonly typeName = "uint";

  protected parse(text: string): bigint {
    return parseUint64(text);
  }

  protected format(value: bigint): string {
    return value.toString();
  }

  protected zeroText(): string {
    return "0";
  }
}

export class Float64Value extends CellValue<number> {
  readonly kind = "float64";
  readonly typeName = "float";

  protected parse(text: string): number {
    return parseFloat64(text);
  }

  protected format(value: number): string {
    return formatFloat64(value);
  }

  protected zeroText(): string {
    return "0";
  }
}

export class StringValue extends CellValue<string> {
  readonly kind = "string";
  readonly typeName = "string";

  protected parse(text: string): string {
    return text;
  }

  protected format(value: string): string {
    return value;
  }

  protected zeroText(): string {
    return "";
  }
}

/** Duration in milliseconds, written as "1h30m", "250ms", ... */
export class DurationValue extends CellValue<number> {
  readonly kind = "duration";
  readonly typeName = "duration";

  protected parse(text: string): number {
    return parseDuration(text);
  }

  protected format(value: number): string {
    return formatDuration(value);
  }

  protected zeroText(): string {
    return "0s";
  }
}

type ValueFactories = {
  [K in ValueKind]: (cell: Cell<KindValues[K]>) => TypedValue<KindValues[K]>;
};

const FACTORIES: ValueFactories = {
  bool: (c) => new BoolValue(c),
  int: (c) => new IntValue(c),
  uint: (c) => new UintValue(c),
  int64: (c) => new Int64Value(c),
  uint64: (c) => new Uint64Value(c),
  float64: (c) => new Float64Value(c),
  string: (c) => new StringValue(c),
  duration: (c) => new DurationValue(c),
};

/** Build the adapter for `kind` over an existing cell. */
export function newValue<K extends ValueKind>(kind: K, target: Cell<KindValues[K]>): TypedValue<KindValues[K]> {
  return FACTORIES[kind](target);
}

/** The zero value of each kind, used when a struct field is missing. */
export const ZERO_VALUES: Readonly<KindValues> = {
  bool: false,
  int: 0,
  uint: 0,
  int64: 0n,
  uint64: 0n,
  float64: 0,
  string: "",
  duration: 0,
};

/** Render a value of `kind` the way its adapter would. */
export function formatKind<K extends ValueKind>(kind: K, value: KindValues[K]): string {
  return newValue(kind, cell(value)).toString();
}
