/**
 * Command-line token grammar.
 *
 * A token is a flag when it starts with "-" and is at least two characters
 * long. "--" on its own is the terminator. A flag's value is either inline
 * after the first "=" (never at position 0 of the name) or the following
 * token, unless that token starts with "-".
 */

export const TERMINATOR = "--";

export type FlagToken =
  /** args is empty or starts with a bare token. */
  | { readonly type: "end"; readonly rest: readonly string[] }
  | { readonly type: "terminator"; readonly rest: readonly string[] }
  | {
      readonly type: "flag";
      readonly name: string;
      readonly value: string | undefined;
      /** The tokens this flag occupied, as written. */
      readonly consumed: readonly string[];
      readonly rest: readonly string[];
    }
  | { readonly type: "bad"; readonly token: string; readonly rest: readonly string[] };

/** Anything that is not a flag or the terminator. */
export function isBareToken(token: string): boolean {
  return token.length < 2 || token[0] !== "-";
}

/**
 * Read one flag from the head of args.
 *
 * takesValue(name) returning false stops the following token from being
 * taken as the value (boolean flags).
 */
export function readFlagToken(
  args: readonly string[],
  takesValue?: (name: string) => boolean,
): FlagToken {
  if (args.length === 0) return { type: "end", rest: args };
  const token = args[0];
  if (isBareToken(token)) return { type: "end", rest: args };

  let minuses = 1;
  if (token[1] === "-") {
    minuses++;
    if (token.length === 2) return { type: "terminator", rest: args.slice(1) };
  }

  const body = token.slice(minuses);
  if (body.length === 0 || body[0] === "-" || body[0] === "=") {
    return { type: "bad", token, rest: args };
  }

  const rest = args.slice(1);
  const eq = body.indexOf("=", 1);
  if (eq > 0) {
    return {
      type: "flag",
      name: body.slice(0, eq),
      value: body.slice(eq + 1),
      consumed: [token],
      rest,
    };
  }

  const name = body;
  if (rest.length > 0 && (takesValue?.(name) ?? true)) {
    const next = rest[0];
    if (next.length === 0 || next[0] !== "-") {
      return { type: "flag", name, value: next, consumed: [token, next], rest: rest.slice(1) };
    }
  }
  return { type: "flag", name, value: undefined, consumed: [token], rest };
}

/** Split off a leading bare token, such as a subcommand name. */
export function splitArgs(args: readonly string[]): [head: string | undefined, rest: string[]] {
  if (args.length > 0 && isBareToken(args[0])) {
    return [args[0], args.slice(1)];
  }
  return [undefined, [...args]];
}
