/**
 * Struct binder - turns a plain option object into flag and positional
 * definitions.
 *
 * The object's class declares which fields are options:
 *
 *   class ServeOptions {
 *     port = 8080;
 *     root = "";
 *     static flags: FieldSpecs<ServeOptions> = {
 *       port: { tag: "port;usage=listen `port`", kind: "int" },
 *       root: { tag: "?0;usage=directory to serve", kind: "string" },
 *     };
 *   }
 *
 * Tag grammar: `name[;def=value][;usage=text]`, `?N[;...]` for the N'th
 * positional slot, or `-` to skip the field. An empty name uses the field name.
 * Only top-level primitive fields are bound; object fields are rejected.
 */

import { z } from "zod";
import { ErrorCode, StructBindingError } from "@flagroute/sdk";
import type { KindValues, Value, ValueKind } from "@flagroute/sdk";
import { formatZodError } from "@flagroute/shared";
import { newValue, ZERO_VALUES } from "../values/adapters.js";
import type { Cell } from "../values/adapters.js";
import { positionalIndex } from "./names.js";

/** Kinds whose storage type is exactly V. */
export type KindsFor<V> = {
  [K in ValueKind]: KindValues[K] extends V ? (V extends KindValues[K] ? K : never) : never;
}[ValueKind];

export interface FieldSpec<K extends ValueKind = ValueKind> {
  readonly tag: string;
  readonly kind: K;
}

/** Per-field option declarations; `kind` must match the field's type. */
export type FieldSpecs<T> = {
  readonly [P in keyof T]?: FieldSpec<KindsFor<T[P]>>;
};

export interface FieldBinding {
  readonly field: string;
  /** Flag name, or "?N" for a positional slot. */
  readonly name: string;
  /** Positional slot, when the tag used the "?N" form. */
  readonly index: number | undefined;
  readonly kind: ValueKind;
  readonly usage: string;
  /** Text of a `def=` segment, applied to the field before registration. */
  readonly defaultText: string | undefined;
}

/** The registration primitives structVars() needs; FlagSet implements them. */
export interface BindingTarget {
  var(value: Value, name: string, usage: string): void;
  nonVar(value: Value, index: number, usage: string): void;
}

const VALUE_KINDS = ["bool", "int", "uint", "int64", "uint64", "float64", "string", "duration"] as const satisfies readonly ValueKind[];

const RUNTIME_TYPES: Readonly<Record<ValueKind, "boolean" | "number" | "bigint" | "string">> = {
  bool: "boolean",
  int: "number",
  uint: "number",
  int64: "bigint",
  uint64: "bigint",
  float64: "number",
  string: "string",
  duration: "number",
};

const FieldSpecsSchema = z.record(
  z.object({
    tag: z.string(),
    kind: z.enum(VALUE_KINDS),
  }),
);

type CheckedSpecs = z.infer<typeof FieldSpecsSchema>;

function isKindValue<K extends ValueKind>(kind: K, value: unknown): value is KindValues[K] {
  return typeof value === RUNTIME_TYPES[kind];
}

function describeTarget(target: unknown): string {
  if (target === null) return "null";
  if (Array.isArray(target)) return "array";
  return typeof target;
}

function assertStruct(target: unknown): asserts target is object {
  if (typeof target !== "object" || target === null || Array.isArray(target)) {
    throw new StructBindingError(`want a struct object, but got ${describeTarget(target)}`, {
      code: ErrorCode.NOT_A_STRUCT,
    });
  }
}

/** Specs given explicitly, else `static flags` on the target's class. */
function resolveSpecs(target: object, specs: unknown): CheckedSpecs {
  const source: unknown = specs ?? Reflect.get(target.constructor, "flags");
  if (source === undefined) return {};
  const result = FieldSpecsSchema.safeParse(source);
  if (!result.success) {
    throw new StructBindingError(`invalid field specs: ${formatZodError(result.error)}`, {
      code: ErrorCode.BAD_FIELD_SPEC,
      cause: result.error,
    });
  }
  return result.data;
}

function parseTag(field: string, tag: string, kind: ValueKind): FieldBinding | undefined {
  const [head, ...segments] = tag.split(";");
  const name = head.trim() === "" ? field : head.trim();
  if (name === "-") return undefined;

  const index = positionalIndex(name);
  if (index !== undefined && !Number.isSafeInteger(index)) {
    throw new StructBindingError(`field ${field}: bad positional tag ${JSON.stringify(name)}`, { field });
  }

  let usage = "";
  let defaultText: string | undefined;
  for (const segment of segments) {
    const eq = segment.indexOf("=");
    if (eq < 0) {
      throw new StructBindingError(`field ${field}: tag segment ${JSON.stringify(segment)} has no "="`, { field });
    }
    const key = segment.slice(0, eq).trim();
    const value = segment.slice(eq + 1);
    if (key === "usage") {
      usage = value;
    } else if (key === "def") {
      defaultText = value;
    } else {
      throw new StructBindingError(`field ${field}: unknown tag key ${JSON.stringify(key)}`, { field });
    }
  }
  return { field, name, index, kind, usage, defaultText };
}

/**
 * Read the option declarations of target as a list of bindings. Checks the
 * target's shape and each field's runtime type; does not modify target.
 */
export function describeStruct(target: unknown, specs?: unknown): FieldBinding[] {
  assertStruct(target);
  const bindings: FieldBinding[] = [];
  for (const [field, spec] of Object.entries(resolveSpecs(target, specs))) {
    const binding = parseTag(field, spec.tag, spec.kind);
    if (!binding) continue;

    const current: unknown = Reflect.get(target, field);
    if (typeof current === "object" && current !== null) {
      throw new StructBindingError(`field ${field}: nested structs are not supported`, {
        code: ErrorCode.NESTED_FIELD,
        field,
      });
    }
    if (current !== undefined && !isKindValue(spec.kind, current)) {
      throw new StructBindingError(
        `field ${field}: holds a ${typeof current}, but kind ${spec.kind} wants a ${RUNTIME_TYPES[spec.kind]}`,
        { code: ErrorCode.FIELD_KIND_MISMATCH, field },
      );
    }
    bindings.push(binding);
  }
  return bindings;
}

/** A cell reading and writing one field of target. */
export function fieldCell<K extends ValueKind>(target: object, field: string, kind: K): Cell<KindValues[K]> {
  return {
    get: () => {
      const current: unknown = Reflect.get(target, field);
      return isKindValue(kind, current) ? current : ZERO_VALUES[kind];
    },
    set: (value) => {
      if (!Reflect.set(target, field, value)) {
        throw new StructBindingError(`field ${field} is not writable`, { field });
      }
    },
  };
}

/**
 * Register every declared field of target on set. A `def=` default is
 * written to the field first; a missing field starts at its kind's zero value.
 */
export function structVars(set: BindingTarget, target: unknown, specs?: unknown): FieldBinding[] {
  const bindings = describeStruct(target, specs);
  assertStruct(target);
  for (const binding of bindings) {
    const storage = fieldCell(target, binding.field, binding.kind);
    const value = newValue(binding.kind, storage);
    if (binding.defaultText !== undefined) {
      try {
        value.set(binding.defaultText);
      } catch (err) {
        throw new StructBindingError(
          `field ${binding.field}: bad default ${JSON.stringify(binding.defaultText)}`,
          { field: binding.field, cause: err },
        );
      }
    } else if (Reflect.get(target, binding.field) === undefined) {
      storage.set(storage.get());
    }

    if (binding.index !== undefined) {
      set.nonVar(value, binding.index, binding.usage);
    } else {
      set.var(value, binding.name, binding.usage);
    }
  }
  return bindings;
}
