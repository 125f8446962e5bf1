/**
 * Parse and format human-readable durations such as "1h30m", "1.5ms", "-2m3s".
 *
 * Durations are held as milliseconds. Formatting goes through integer
 * nanoseconds so "1h30m0s" and "1.5µs" come back unchanged.
 */

import { ErrorCode, ValueSyntaxError } from "@flagroute/sdk";

const NANOS_PER_UNIT: Readonly<Record<string, number>> = {
  ns: 1,
  us: 1e3,
  "µs": 1e3, // U+00B5 micro sign
  "μs": 1e3, // U+03BC Greek mu
  ms: 1e6,
  s: 1e9,
  m: 60e9,
  h: 3600e9,
};

const SEGMENT = /^(\d*)(?:\.(\d*))?([^\d.]*)/;

function invalid(input: string, message: string): ValueSyntaxError {
  return new ValueSyntaxError(input, message, ErrorCode.VALUE_SYNTAX);
}

/** Parse a duration into milliseconds. Accepts `[-+]?(\d*(\.\d*)?unit)+` or "0". */
export function parseDuration(input: string): number {
  const quoted = JSON.stringify(input);
  let s = input;
  let negative = false;
  if (s.startsWith("-") || s.startsWith("+")) {
    negative = s.startsWith("-");
    s = s.slice(1);
  }
  if (s === "0") return 0;
  if (s === "") throw invalid(input, `invalid duration ${quoted}`);

  let nanos = 0;
  while (s !== "") {
    const match = SEGMENT.exec(s);
    if (!match) throw invalid(input, `invalid duration ${quoted}`);
    const [segment, whole, fraction, unit] = match;
    if (whole === "" && (fraction === undefined || fraction === "")) {
      throw invalid(input, `invalid duration ${quoted}`);
    }
    if (unit === "") throw invalid(input, `missing unit in duration ${quoted}`);
    const scale = NANOS_PER_UNIT[unit];
    if (scale === undefined) {
      throw invalid(input, `unknown unit ${JSON.stringify(unit)} in duration ${quoted}`);
    }
    nanos += Number(`${whole || "0"}.${fraction ?? ""}0`) * scale;
    s = s.slice(segment.length);
  }

  if (!Number.isFinite(nanos)) {
    throw new ValueSyntaxError(input, `invalid duration ${quoted}`, ErrorCode.VALUE_RANGE);
  }
  const millis = nanos / 1e6;
  return negative ? -millis : millis;
}

/** Render digits below `precision` as ".ddd" without trailing zeros. */
function splitFraction(v: bigint, precision: number): [string, bigint] {
  let digits = "";
  let seen = false;
  let rest = v;
  for (let i = 0; i < precision; i++) {
    const digit = rest % 10n;
    seen = seen || digit !== 0n;
    if (seen) digits = `${digit}${digits}`;
    rest /= 10n;
  }
  return [seen ? `.${digits}` : "", rest];
}

/** Format milliseconds in the canonical form: "0s", "1.5ms", "1h30m0s". */
export function formatDuration(millis: number): string {
  if (!Number.isFinite(millis)) return "0s";
  let nanos = BigInt(Math.round(millis * 1e6));
  const negative = nanos < 0n;
  if (negative) nanos = -nanos;

  let text: string;
  if (nanos === 0n) {
    return "0s";
  } else if (nanos < 1_000_000_000n) {
    let unit = "ms";
    let precision = 6;
    if (nanos < 1_000n) {
      unit = "ns";
      precision = 0;
    } else if (nanos < 1_000_000n) {
      unit = "µs";
      precision = 3;
    }
    const [fraction, whole] = splitFraction(nanos, precision);
    text = `${whole}${fraction}${unit}`;
  } else {
    const [fraction, seconds] = splitFraction(nanos, 9);
    text = `${seconds % 60n}${fraction}s`;
    const minutes = seconds / 60n;
    if (minutes > 0n) {
      text = `${minutes % 60n}m${text}`;
      const hours = minutes / 60n;
      if (hours > 0n) text = `${hours}h${text}`;
    }
  }
  return negative ? `-${text}` : text;
}
