/**
 * Filter and action bindings.
 *
 * A binding wraps what was registered on a command: a plain function, or a
 * way to make a fresh option object per invocation (a class, or an instance
 * with deepCopy()). Option objects get their flags from the struct binder;
 * the flags are derived once at registration so tag errors surface there.
 */

import {
  CommandTreeError,
  ErrorCode,
  Status,
  StatusCode,
  StatusError,
} from "@flagroute/sdk";
import type {
  Action,
  ActionClass,
  ActionFunc,
  ActionInput,
  ErrorCodeValue,
  Filter,
  FilterClass,
  FilterFunc,
  FilterInput,
  Flag,
  OutputSink,
  ValidateFunc,
} from "@flagroute/sdk";
import { ErrorHandling } from "../flags/named-flag-set.js";
import { FlagSet } from "../flags/flag-set.js";

/** Filters and actions parse in tolerant mode so sibling options never collide. */
export const BINDING_POLICY = ErrorHandling.ContinueOnError | ErrorHandling.ContinueOnUndefined;

export interface ParseEnv {
  readonly validator: ValidateFunc | undefined;
  readonly output: OutputSink;
}

const DISCARD: OutputSink = { write: () => true };

function hasMethod(target: unknown, method: string): boolean {
  return (typeof target === "object" || typeof target === "function") &&
    target !== null &&
    typeof Reflect.get(target, method) === "function";
}

function isFilterClass(input: FilterFunc | FilterClass): input is FilterClass {
  return hasMethod(Reflect.get(input, "prototype"), "filter");
}

function isActionClass(input: ActionFunc | ActionClass): input is ActionClass {
  return hasMethod(Reflect.get(input, "prototype"), "handle");
}

/** Grammar errors are the caller's fault; anything else is a failed parse. */
function parseStatusCode(code: ErrorCodeValue): number {
  return code === ErrorCode.BAD_FLAG_SYNTAX ? StatusCode.BadArgs : StatusCode.ParseFailed;
}

/**
 * Bind a fresh option object to a new flag set, parse args into it and run
 * the validator. Failures are thrown as StatusError.
 */
function populate(cmdName: string, options: object, args: readonly string[], env: ParseEnv): FlagSet {
  const set = new FlagSet(cmdName, BINDING_POLICY, { output: env.output });
  set.structVars(options);
  const err = set.parse(args);
  if (err) {
    throw new StatusError(Status.withStack(parseStatusCode(err.code), "", err));
  }
  if (env.validator) {
    let invalid: unknown;
    try {
      const result = env.validator(options);
      if (result instanceof Error) invalid = result;
    } catch (thrown) {
      invalid = thrown;
    }
    if (invalid !== undefined) {
      throw new StatusError(Status.withStack(StatusCode.ValidateFailed, "", invalid));
    }
  }
  return set;
}

/** Registration-time flag set, kept for usage text. */
function describeOptions(cmdName: string, options: object): FlagSet {
  const set = new FlagSet(cmdName, BINDING_POLICY, { output: DISCARD });
  set.structVars(options);
  return set;
}

function flagsOf(set: FlagSet): Flag[] {
  const flags: Flag[] = [];
  set.visitAll((flag) => flags.push(flag));
  set.visitAllPositionals((flag) => flags.push(flag));
  return flags;
}

/** A plain function, or a factory for option objects plus their declared flags. */
type Source<F, S> =
  | { readonly type: "func"; readonly fn: F }
  | { readonly type: "struct"; readonly create: () => S; readonly defaults: FlagSet };

// ─── Filters ───

export interface FilterInstance {
  readonly filter: FilterFunc;
  /** Arguments left over by this filter's options; undefined for plain functions. */
  readonly nextArgs: string[] | undefined;
}

export class FilterBinding {
  private constructor(
    private readonly cmdName: string,
    private readonly source: Source<FilterFunc, Filter>,
  ) {}

  static from(input: FilterInput, cmdName: string): FilterBinding {
    let create: () => Filter;
    if (typeof input === "function") {
      if (!isFilterClass(input)) return new FilterBinding(cmdName, { type: "func", fn: input });
      const ctor = input;
      create = () => new ctor();
    } else if (hasMethod(input, "filter") && hasMethod(input, "deepCopy")) {
      const copier = input;
      create = () => copier.deepCopy();
    } else {
      throw new CommandTreeError(cmdName, "filter must be a function, a class or an object with deepCopy()", ErrorCode.INVALID_HANDLER);
    }
    return new FilterBinding(cmdName, { type: "struct", create, defaults: describeOptions(cmdName, create()) });
  }

  /** Option flags declared by this filter. */
  flags(): Flag[] {
    return this.source.type === "struct" ? flagsOf(this.source.defaults) : [];
  }

  instantiate(args: readonly string[], env: ParseEnv): FilterInstance {
    if (this.source.type === "func") return { filter: this.source.fn, nextArgs: undefined };
    const options = this.source.create();
    const set = populate(this.cmdName, options, args, env);
    return { filter: (ctx, next) => options.filter(ctx, next), nextArgs: set.nextArgs() };
  }
}

// ─── Actions ───

export class ActionBinding {
  private constructor(
    private readonly cmdName: string,
    private readonly source: Source<ActionFunc, Action>,
  ) {}

  static from(input: ActionInput, cmdName: string): ActionBinding {
    let create: () => Action;
    if (typeof input === "function") {
      if (!isActionClass(input)) return new ActionBinding(cmdName, { type: "func", fn: input });
      const ctor = input;
      create = () => new ctor();
    } else if (hasMethod(input, "handle") && hasMethod(input, "deepCopy")) {
      const copier = input;
      create = () => copier.deepCopy();
    } else {
      throw new CommandTreeError(cmdName, "action must be a function, a class or an object with deepCopy()", ErrorCode.INVALID_HANDLER);
    }
    return new ActionBinding(cmdName, { type: "struct", create, defaults: describeOptions(cmdName, create()) });
  }

  flags(): Flag[] {
    return this.source.type === "struct" ? flagsOf(this.source.defaults) : [];
  }

  instantiate(args: readonly string[], env: ParseEnv): ActionFunc {
    if (this.source.type === "func") return this.source.fn;
    const options = this.source.create();
    populate(this.cmdName, options, args, env);
    return (ctx) => options.handle(ctx);
  }
}
