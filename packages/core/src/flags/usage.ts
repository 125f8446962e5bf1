import { isBoolFlagValue } from "@flagroute/sdk";
import type { Flag, Value } from "@flagroute/sdk";
import { formatKind, ZERO_VALUES } from "../values/adapters.js";
import type { TypedValue } from "../values/adapters.js";
import { POSITIONAL_PREFIX } from "./names.js";

function isTypedValue(value: Value): value is TypedValue<unknown> {
  return typeof Reflect.get(value, "kind") === "string" && typeof Reflect.get(value, "typeName") === "string";
}

/**
 * Extract a back-quoted name from usage text and return it with the quotes
 * removed. With no back quotes the name is the value's type word.
 */
export function unquoteUsage(flag: Flag): [name: string, usage: string] {
  const usage = flag.usage;
  const open = usage.indexOf("`");
  if (open >= 0) {
    const close = usage.indexOf("`", open + 1);
    if (close >= 0) {
      const name = usage.slice(open + 1, close);
      return [name, usage.slice(0, open) + name + usage.slice(close + 1)];
    }
  }
  if (isBoolFlagValue(flag.value)) return ["", usage];
  return [isTypedValue(flag.value) ? flag.value.typeName : "value", usage];
}

function isZeroDefault(flag: Flag): boolean {
  const value = flag.value;
  if (isTypedValue(value)) {
    return flag.defValue === formatKind(value.kind, ZERO_VALUES[value.kind]);
  }
  return flag.defValue === "" || flag.defValue === "0" || flag.defValue === "false";
}

function isStringKind(value: Value): boolean {
  return isTypedValue(value) && value.kind === "string";
}

/** One entry of the defaults listing, without the trailing newline. */
export function formatFlagDefault(flag: Flag): string {
  const dash = flag.name.startsWith(POSITIONAL_PREFIX) ? "" : "-";
  let line = `  ${dash}${flag.name}`;
  const [name, usage] = unquoteUsage(flag);
  if (name.length > 0) line += ` ${name}`;

  // single-letter flags without a type word keep their usage on the same line
  line += line.length <= 4 ? "\t" : "\n    \t";
  line += usage.replaceAll("\n", "\n    \t");

  if (!isZeroDefault(flag)) {
    const shown = isStringKind(flag.value) ? JSON.stringify(flag.defValue) : flag.defValue;
    line += ` (default ${shown})`;
  }
  return line;
}

/** Render flags in the conventional "  -name type\n    \tusage" layout. */
export function formatFlagDefaults(flags: readonly Flag[]): string {
  return flags.map((flag) => `${formatFlagDefault(flag)}\n`).join("");
}
