/**
 * NamedFlagSet - the conventional table of named flags.
 *
 * Scanning stops at the first bare token or after a "--". Boolean flags take
 * `-x` or `-x=false`; every other flag takes `-x=v` or `-x v`, where the next
 * token is taken even when it starts with "-".
 */

import { ErrorCode, FlagDefinitionError, ParseError, isBoolFlagValue } from "@flagroute/sdk";
import type { ErrorCodeValue, Flag, KindValues, OutputSink, Value, ValueKind } from "@flagroute/sdk";
import { cell, newValue } from "../values/adapters.js";
import type { Cell, TypedValue } from "../values/adapters.js";
import { POSITIONAL_PREFIX } from "./names.js";
import { TERMINATOR } from "./token.js";
import { formatFlagDefaults } from "./usage.js";

/** What parse() does after a failure has been written to the output sink. */
export const ErrorHandling = {
  /** Return the ParseError. */
  ContinueOnError: 0,
  /** Call the exit hook with 2, or 0 when help was requested. */
  ExitOnError: 1,
  /** Throw the ParseError. */
  PanicOnError: 2,
  /** Extended sets only: skip flags that were never defined. */
  ContinueOnUndefined: 1 << 30,
} as const;

export type ErrorHandling = number;

export interface FlagSetOptions {
  /** Defaults to process.stderr. */
  output?: OutputSink;
  /** Defaults to process.exit. */
  exit?: (code: number) => void;
  /** A leading argument equal to this name (or a path ending in it) is dropped by FlagSet.parse. */
  programName?: string;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function byName(a: Flag, b: Flag): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

export class NamedFlagSet {
  /** Replaces the default "Usage of <name>:" listing when set. */
  usage: (() => void) | undefined;

  protected readonly formal = new Map<string, Flag>();
  protected readonly actual = new Map<string, Flag>();
  protected remaining: string[] = [];
  /** Set when the last parse consumed a "--". */
  protected sawTerminator = false;
  protected readonly exitHook: (code: number) => void;

  private out: OutputSink;
  private wasParsed = false;

  constructor(
    readonly name: string,
    readonly errorHandling: ErrorHandling = ErrorHandling.ContinueOnError,
    protected readonly options: FlagSetOptions = {},
  ) {
    this.out = options.output ?? process.stderr;
    this.exitHook = options.exit ?? ((code) => process.exit(code));
  }

  /** The policy without the ContinueOnUndefined bit. */
  get policy(): number {
    return this.errorHandling & ~ErrorHandling.ContinueOnUndefined;
  }

  output(): OutputSink {
    return this.out;
  }

  setOutput(output: OutputSink): void {
    this.out = output;
  }

  // ─── Definition ───

  var(value: Value, name: string, usage: string): void {
    if (name.length === 0) {
      throw new FlagDefinitionError(name, "flag name is empty", ErrorCode.INVALID_FLAG_NAME);
    }
    if (name.startsWith("-") || name.startsWith(POSITIONAL_PREFIX)) {
      throw new FlagDefinitionError(name, `flag ${JSON.stringify(name)} begins with ${name[0]}`, ErrorCode.INVALID_FLAG_NAME);
    }
    if (name.includes("=")) {
      throw new FlagDefinitionError(name, `flag ${JSON.stringify(name)} contains =`, ErrorCode.INVALID_FLAG_NAME);
    }
    if (this.formal.has(name)) throw this.redefined(name);
    this.formal.set(name, { name, usage, value, defValue: value.toString() });
  }

  /** Define a typed flag stored in `target`, which is first set to `def`. */
  typedVar<K extends ValueKind>(
    kind: K,
    target: Cell<KindValues[K]>,
    name: string,
    def: KindValues[K],
    usage: string,
  ): TypedValue<KindValues[K]> {
    target.set(def);
    const value = newValue(kind, target);
    this.var(value, name, usage);
    return value;
  }

  typed<K extends ValueKind>(kind: K, name: string, def: KindValues[K], usage: string): TypedValue<KindValues[K]> {
    return this.typedVar(kind, cell(def), name, def, usage);
  }

  bool(name: string, def: boolean, usage: string): TypedValue<boolean> {
    return this.typed("bool", name, def, usage);
  }

  boolVar(target: Cell<boolean>, name: string, def: boolean, usage: string): void {
    this.typedVar("bool", target, name, def, usage);
  }

  int(name: string, def: number, usage: string): TypedValue<number> {
    return this.typed("int", name, def, usage);
  }

  intVar(target: Cell<number>, name: string, def: number, usage: string): void {
    this.typedVar("int", target, name, def, usage);
  }

  uint(name: string, def: number, usage: string): TypedValue<number> {
    return this.typed("uint", name, def, usage);
  }

  uintVar(target: Cell<number>, name: string, def: number, usage: string): void {
    this.typedVar("uint", target, name, def, usage);
  }

  int64(name: string, def: bigint, usage: string): TypedValue<bigint> {
    return this.typed("int64", name, def, usage);
  }

  int64Var(target: Cell<bigint>, name: string, def: bigint, usage: string): void {
    this.typedVar("int64", target, name, def, usage);
  }

  uint64(name: string, def: bigint, usage: string): TypedValue<bigint> {
    return this.typed("uint64", name, def, usage);
  }

  uint64Var(target: Cell<bigint>, name: string, def: bigint, usage: string): void {
    this.typedVar("uint64", target, name, def, usage);
  }

  float64(name: string, def: number, usage: string): TypedValue<number> {
    return this.typed("float64", name, def, usage);
  }

  float64Var(target: Cell<number>, name: string, def: number, usage: string): void {
    this.typedVar("float64", target, name, def, usage);
  }

  string(name: string, def: string, usage: string): TypedValue<string> {
    return this.typed("string", name, def, usage);
  }

  stringVar(target: Cell<string>, name: string, def: string, usage: string): void {
    this.typedVar("string", target, name, def, usage);
  }

  /** Durations are milliseconds. */
  duration(name: string, def: number, usage: string): TypedValue<number> {
    return this.typed("duration", name, def, usage);
  }

  durationVar(target: Cell<number>, name: string, def: number, usage: string): void {
    this.typedVar("duration", target, name, def, usage);
  }

  // ─── Inspection ───

  lookup(name: string): Flag | undefined {
    return this.formal.get(name);
  }

  /** Set a defined flag by name, as if it had been given on the command line. */
  set(name: string, text: string): void {
    const flag = this.formal.get(name);
    if (!flag) {
      throw new ParseError(`no such flag -${name}`, { code: ErrorCode.UNDEFINED_FLAG });
    }
    flag.value.set(text);
    this.actual.set(name, flag);
  }

  /** Flags that have been set, in name order. */
  visit(fn: (flag: Flag) => void): void {
    [...this.actual.values()].sort(byName).forEach(fn);
  }

  /** All defined flags, in name order. */
  visitAll(fn: (flag: Flag) => void): void {
    [...this.formal.values()].sort(byName).forEach(fn);
  }

  nFlag(): number {
    return this.actual.size;
  }

  /** Arguments left after the flags. */
  args(): string[] {
    return [...this.remaining];
  }

  nArg(): number {
    return this.remaining.length;
  }

  /** The i'th remaining argument, or "" when there is none. */
  arg(i: number): string {
    return this.remaining[i] ?? "";
  }

  parsed(): boolean {
    return this.wasParsed;
  }

  // ─── Usage ───

  /** Entries listed by printDefaults. */
  protected defaultFlags(): Flag[] {
    return [...this.formal.values()].sort(byName);
  }

  defaultsText(): string {
    return formatFlagDefaults(this.defaultFlags());
  }

  printDefaults(): void {
    this.out.write(this.defaultsText());
  }

  protected printUsage(): void {
    if (this.usage) {
      this.usage();
      return;
    }
    this.out.write(this.name === "" ? "Usage:\n" : `Usage of ${this.name}:\n`);
    this.printDefaults();
  }

  // ─── Parsing ───

  /** Parse flags from args, which must not include the program name. */
  parse(args: readonly string[]): ParseError | undefined {
    this.wasParsed = true;
    this.actual.clear();
    this.remaining = [...args];
    this.sawTerminator = false;
    for (;;) {
      const step = this.parseOne();
      if (step === true) continue;
      if (step === false) return undefined;
      return this.applyPolicy(step);
    }
  }

  /** true: a flag was consumed; false: scanning is over; ParseError: failure. */
  private parseOne(): boolean | ParseError {
    if (this.remaining.length === 0) return false;
    const token = this.remaining[0];
    if (token.length < 2 || token[0] !== "-") return false;

    let minuses = 1;
    if (token[1] === "-") {
      minuses++;
      if (token === TERMINATOR) {
        this.remaining = this.remaining.slice(1);
        this.sawTerminator = true;
        return false;
      }
    }
    let name = token.slice(minuses);
    if (name.length === 0 || name[0] === "-" || name[0] === "=") {
      return this.fail(`bad flag syntax: ${token}`, ErrorCode.BAD_FLAG_SYNTAX);
    }

    this.remaining = this.remaining.slice(1);
    let value: string | undefined;
    const eq = name.indexOf("=", 1);
    if (eq > 0) {
      value = name.slice(eq + 1);
      name = name.slice(0, eq);
    }

    const flag = this.formal.get(name);
    if (!flag) {
      if (name === "help" || name === "h") {
        this.printUsage();
        return new ParseError("flag: help requested", { code: ErrorCode.HELP_REQUESTED });
      }
      return this.fail(`flag provided but not defined: -${name}`, ErrorCode.UNDEFINED_FLAG);
    }

    if (isBoolFlagValue(flag.value)) {
      try {
        flag.value.set(value ?? "true");
      } catch (err) {
        const message = value === undefined
          ? `invalid boolean flag ${name}: ${describeError(err)}`
          : `invalid boolean value ${JSON.stringify(value)} for -${name}: ${describeError(err)}`;
        return this.fail(message, ErrorCode.INVALID_FLAG_VALUE, err);
      }
    } else {
      if (value === undefined && this.remaining.length > 0) {
        value = this.remaining[0];
        this.remaining = this.remaining.slice(1);
      }
      if (value === undefined) {
        return this.fail(`flag needs an argument: -${name}`, ErrorCode.MISSING_FLAG_VALUE);
      }
      try {
        flag.value.set(value);
      } catch (err) {
        return this.fail(
          `invalid value ${JSON.stringify(value)} for flag -${name}: ${describeError(err)}`,
          ErrorCode.INVALID_FLAG_VALUE,
          err,
        );
      }
    }
    this.actual.set(name, flag);
    return true;
  }

  /** Write the message and the usage text, then build the error. */
  protected fail(message: string, code: ErrorCodeValue, cause?: unknown): ParseError {
    this.out.write(`${message}\n`);
    this.printUsage();
    return new ParseError(message, { code, cause });
  }

  /** Returns err unless the policy exits or throws first. */
  protected applyPolicy(err: ParseError): ParseError {
    switch (this.policy) {
      case ErrorHandling.ExitOnError:
        this.exitHook(err.code === ErrorCode.HELP_REQUESTED ? 0 : 2);
        break;
      case ErrorHandling.PanicOnError:
        throw err;
    }
    return err;
  }

  protected redefined(name: string): FlagDefinitionError {
    const message = this.name === "" ? `flag redefined: ${name}` : `${this.name} flag redefined: ${name}`;
    this.out.write(`${message}\n`);
    return new FlagDefinitionError(name, message, ErrorCode.FLAG_REDEFINED);
  }
}
