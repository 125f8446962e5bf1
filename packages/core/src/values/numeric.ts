/**
 * Integer and float text parsing shared by the numeric adapters.
 *
 * Integers accept an optional sign (signed kinds only), the base prefixes
 * 0x / 0o / 0b, a legacy leading-0 octal form, and `_` between digits
 * after one of those prefixes.
 */

import { ErrorCode, ValueSyntaxError } from "@flagroute/sdk";

export const PARSE_ERROR = "parse error";
export const RANGE_ERROR = "value out of range";

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;
const UINT64_MAX = 2n ** 64n - 1n;
const SAFE_MAX = BigInt(Number.MAX_SAFE_INTEGER);

const PREFIX_BASES: Readonly<Record<string, number>> = { x: 16, o: 8, b: 2 };
const BIGINT_PREFIX: Readonly<Record<number, string>> = { 16: "0x", 8: "0o", 2: "0b", 10: "" };
const DIGIT_GROUPS = /^[0-9a-f]+(?:_[0-9a-f]+)*$/i;

function syntaxError(input: string): ValueSyntaxError {
  return new ValueSyntaxError(input, PARSE_ERROR, ErrorCode.VALUE_SYNTAX);
}

function rangeError(input: string): ValueSyntaxError {
  return new ValueSyntaxError(input, RANGE_ERROR, ErrorCode.VALUE_RANGE);
}

function digitFitsBase(digit: string, base: number): boolean {
  const n = Number.parseInt(digit, 16);
  return !Number.isNaN(n) && n < base;
}

/** Parse integer text with automatic base detection. */
export function parseInteger(input: string, signed: boolean): bigint {
  let s = input;
  let negative = false;
  if (signed && (s.startsWith("+") || s.startsWith("-"))) {
    negative = s.startsWith("-");
    s = s.slice(1);
  }

  let base = 10;
  let digits = s;
  let prefixed = false;
  if (s.length >= 2 && s[0] === "0") {
    prefixed = true;
    const prefixBase = PREFIX_BASES[s[1].toLowerCase()];
    if (prefixBase !== undefined) {
      base = prefixBase;
      digits = s.slice(2);
    } else {
      base = 8;
      digits = s.slice(1);
    }
    // a single underscore may separate the prefix from the first digit
    if (digits.startsWith("_")) digits = digits.slice(1);
  }

  if (!DIGIT_GROUPS.test(digits)) throw syntaxError(input);
  if (!prefixed && digits.includes("_")) throw syntaxError(input);
  const plain = digits.replaceAll("_", "");
  for (const digit of plain) {
    if (!digitFitsBase(digit, base)) throw syntaxError(input);
  }

  const magnitude = BigInt(`${BIGINT_PREFIX[base]}${plain}`);
  return negative ? -magnitude : magnitude;
}

export function parseInt64(input: string): bigint {
  const v = parseInteger(input, true);
  if (v < INT64_MIN || v > INT64_MAX) throw rangeError(input);
  return v;
}

export function parseUint64(input: string): bigint {
  const v = parseInteger(input, false);
  if (v > UINT64_MAX) throw rangeError(input);
  return v;
}

/** Integers stored as number are limited to the safe-integer range. */
export function parseSafeInt(input: string): number {
  const v = parseInteger(input, true);
  if (v > SAFE_MAX || v < -SAFE_MAX) throw rangeError(input);
  return Number(v);
}

export function parseSafeUint(input: string): number {
  const v = parseInteger(input, false);
  if (v > SAFE_MAX) throw rangeError(input);
  return Number(v);
}

const DECIMAL_FLOAT = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;
const SIGNED_INF = /^[+-]?inf(?:inity)?$/i;

export function parseFloat64(input: string): number {
  if (SIGNED_INF.test(input)) {
    return input.startsWith("-") ? -Infinity : Infinity;
  }
  if (input.toLowerCase() === "nan") return Number.NaN;
  if (!DECIMAL_FLOAT.test(input)) throw syntaxError(input);
  const v = Number(input);
  if (!Number.isFinite(v)) throw rangeError(input);
  return v;
}

export function formatFloat64(v: number): string {
  if (Number.isNaN(v)) return "NaN";
  if (v === Infinity) return "+Inf";
  if (v === -Infinity) return "-Inf";
  return String(v);
}

const TRUE_WORDS = new Set(["1", "t", "T", "TRUE", "true", "True"]);
const FALSE_WORDS = new Set(["0", "f", "F", "FALSE", "false", "False"]);

export function parseBool(input: string): boolean {
  if (TRUE_WORDS.has(input)) return true;
  if (FALSE_WORDS.has(input)) return false;
  throw syntaxError(input);
}
