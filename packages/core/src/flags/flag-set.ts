/**
 * FlagSet - named flags plus positional entries bound by index.
 *
 * With ContinueOnUndefined set, every token up to the first "--" is
 * pre-scanned: defined flags are parsed first and everything else (bare
 * tokens, unknown flags and the values the grammar gives them) is kept in
 * order for binding positionals and for nextArgs().
 *
 * A "--" closes this level when nothing unrecognized came before it: the
 * set is then terminated and nextArgs() is the tail after it. Otherwise the
 * "--" stays in nextArgs() in place, so the level that owns the preceding
 * tokens sees it.
 */

import { basename } from "node:path";
import { ErrorCode, FlagDefinitionError, ParseError, isBoolFlagValue } from "@flagroute/sdk";
import type { Flag, KindValues, Value, ValueKind } from "@flagroute/sdk";
import { cell, newValue } from "../values/adapters.js";
import type { Cell, TypedValue } from "../values/adapters.js";
import { positionalName } from "./names.js";
import { ErrorHandling, NamedFlagSet, describeError } from "./named-flag-set.js";
import { structVars } from "./struct-binder.js";
import type { FieldBinding } from "./struct-binder.js";
import { TERMINATOR, isBareToken, readFlagToken } from "./token.js";

interface PendingToken {
  readonly token: string;
  /** Bare tokens are candidates for positional binding. */
  readonly bare: boolean;
}

export class FlagSet extends NamedFlagSet {
  private readonly nonFormal = new Map<number, Flag>();
  private readonly nonActual = new Map<number, Flag>();
  private isTerminated = false;
  private rest: string[] = [];

  /** True when flags this set never defined are tolerated. */
  get continueOnUndefined(): boolean {
    return (this.errorHandling & ErrorHandling.ContinueOnUndefined) !== 0;
  }

  // ─── Positional definition ───

  nonVar(value: Value, index: number, usage: string): void {
    const name = positionalName(index);
    if (!Number.isSafeInteger(index) || index < 0) {
      throw new FlagDefinitionError(name, `invalid positional index: ${index}`, ErrorCode.INVALID_POSITIONAL_INDEX);
    }
    if (this.nonFormal.has(index)) throw this.redefined(name);
    this.nonFormal.set(index, { name, usage, value, defValue: value.toString() });
  }

  positionalVar<K extends ValueKind>(
    kind: K,
    target: Cell<KindValues[K]>,
    index: number,
    def: KindValues[K],
    usage: string,
  ): TypedValue<KindValues[K]> {
    target.set(def);
    const value = newValue(kind, target);
    this.nonVar(value, index, usage);
    return value;
  }

  positional<K extends ValueKind>(kind: K, index: number, def: KindValues[K], usage: string): TypedValue<KindValues[K]> {
    return this.positionalVar(kind, cell(def), index, def, usage);
  }

  /** Define flags and positionals from the fields of an option object. */
  structVars(target: unknown, specs?: unknown): FieldBinding[] {
    return structVars(this, target, specs);
  }

  // ─── Inspection ───

  lookupPositional(index: number): Flag | undefined {
    return this.nonFormal.get(index);
  }

  /** Positional entries bound by the last parse, in index order. */
  visitPositionals(fn: (flag: Flag) => void): void {
    [...this.nonActual.entries()].sort(([a], [b]) => a - b).forEach(([, flag]) => fn(flag));
  }

  /** All declared positional entries, in index order. */
  visitAllPositionals(fn: (flag: Flag) => void): void {
    [...this.nonFormal.entries()].sort(([a], [b]) => a - b).forEach(([, flag]) => fn(flag));
  }

  nPositional(): number {
    return this.nonActual.size;
  }

  terminated(): boolean {
    return this.isTerminated;
  }

  /** The arguments left for a nested command after the last parse. */
  nextArgs(): string[] {
    return [...this.rest];
  }

  protected override defaultFlags(): Flag[] {
    const positionals: Flag[] = [];
    this.visitAllPositionals((flag) => positionals.push(flag));
    return [...super.defaultFlags(), ...positionals];
  }

  // ─── Parsing ───

  override parse(args: readonly string[]): ParseError | undefined {
    this.nonActual.clear();
    this.isTerminated = false;
    this.rest = [];
    const list = this.stripProgramName(args);
    return this.continueOnUndefined ? this.parseTolerant(list) : this.parseStrict(list);
  }

  private stripProgramName(args: readonly string[]): readonly string[] {
    const programName = this.options.programName;
    if (!programName || args.length === 0 || !isBareToken(args[0])) return args;
    const first = args[0];
    return first === programName || basename(first) === programName ? args.slice(1) : args;
  }

  private takesValue(name: string): boolean {
    const flag = this.lookup(name);
    return flag === undefined || !isBoolFlagValue(flag.value);
  }

  private parseTolerant(list: readonly string[]): ParseError | undefined {
    const front: string[] = [];
    const pending: PendingToken[] = [];
    let afterTerminator: string[] | undefined;

    let cursor = list;
    while (cursor.length > 0) {
      if (isBareToken(cursor[0])) {
        pending.push({ token: cursor[0], bare: true });
        cursor = cursor.slice(1);
        continue;
      }
      const read = readFlagToken(cursor, (name) => this.takesValue(name));
      if (read.type === "terminator") {
        afterTerminator = [...read.rest];
        break;
      }
      if (read.type === "bad") {
        return this.applyPolicy(this.fail(`bad flag syntax: ${read.token}`, ErrorCode.BAD_FLAG_SYNTAX));
      }
      if (read.type === "end") break;

      const defined = this.lookup(read.name);
      if (defined && read.value === undefined && !isBoolFlagValue(defined.value)) {
        return this.applyPolicy(this.fail(`flag needs an argument: -${read.name}`, ErrorCode.MISSING_FLAG_VALUE));
      }
      if (defined) {
        front.push(read.value === undefined ? `-${read.name}` : `-${read.name}=${read.value}`);
      } else {
        for (const token of read.consumed) pending.push({ token, bare: false });
      }
      cursor = read.rest;
    }

    const err = super.parse(front);
    if (err) return err;

    if (afterTerminator !== undefined && pending.length === 0) {
      this.isTerminated = true;
      this.rest = afterTerminator;
      return undefined;
    }

    const bound = new Set<PendingToken>();
    const bare = pending.filter((entry) => entry.bare);
    for (let k = 0; k < bare.length; k++) {
      const flag = this.nonFormal.get(k);
      if (!flag) continue;
      const failure = this.bindPositional(flag, k, bare[k].token);
      if (failure) return failure;
      bound.add(bare[k]);
    }

    this.rest = pending.filter((entry) => !bound.has(entry)).map((entry) => entry.token);
    if (afterTerminator !== undefined) this.rest.push(TERMINATOR, ...afterTerminator);
    return undefined;
  }

  private parseStrict(list: readonly string[]): ParseError | undefined {
    const err = super.parse(list);
    if (err) return err;

    const args = this.args();
    if (this.sawTerminator) {
      this.isTerminated = true;
      this.rest = args;
      return undefined;
    }

    for (let k = 0; k < args.length; k++) {
      const flag = this.nonFormal.get(k);
      if (args[k] === TERMINATOR) {
        if (flag) {
          return this.applyPolicy(
            this.fail(`non-flag defined but not provided: ${k}`, ErrorCode.MISSING_POSITIONAL_VALUE),
          );
        }
        this.isTerminated = true;
        this.rest = args.slice(k + 1);
        return undefined;
      }
      if (!flag) {
        this.rest = args.slice(k);
        return undefined;
      }
      const failure = this.bindPositional(flag, k, args[k]);
      if (failure) return failure;
    }
    return undefined;
  }

  private bindPositional(flag: Flag, index: number, text: string): ParseError | undefined {
    try {
      flag.value.set(text);
    } catch (err) {
      return this.applyPolicy(
        this.fail(
          `invalid value ${JSON.stringify(text)} for non-flag ${index}: ${describeError(err)}`,
          ErrorCode.INVALID_POSITIONAL_VALUE,
          err,
        ),
      );
    }
    this.nonActual.set(index, flag);
    return undefined;
  }
}
