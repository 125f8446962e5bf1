/**
 * Handler contracts for the command tree.
 *
 * Handlers signal failure by throwing; Context.throwStatus() throws a
 * StatusError so the code reaches the caller of App.exec unchanged.
 */

/** Per-invocation context handed to every filter and the action. */
export interface Context {
  /** Caller-supplied cancellation carrier, passed through untouched. */
  readonly signal: AbortSignal | undefined;
  /** The original argument list given to App.exec. */
  args(): readonly string[];
  /** Program name followed by the resolved subcommand names. */
  cmdPath(): readonly string[];
  cmdPathString(): string;
  throwStatus(code: number, msg: string, cause?: unknown): never;
  /** Throws a Status built from err when err is set; calls whenError first. */
  checkStatus(err: unknown, code: number, msg: string, whenError?: () => void): void;
}

export type HandlerResult = void | Promise<void>;

export type ActionFunc = (ctx: Context) => HandlerResult;

export type FilterFunc = (ctx: Context, next: ActionFunc) => HandlerResult;

export interface Action {
  handle(ctx: Context): HandlerResult;
}

export interface Filter {
  filter(ctx: Context, next: ActionFunc): HandlerResult;
}

/** An Action able to produce a fresh copy of itself for each invocation. */
export interface ActionCopier {
  deepCopy(): Action;
}

export interface FilterCopier {
  deepCopy(): Filter;
}

/** Class form: a fresh instance is constructed for each invocation. */
export type ActionClass = new () => Action;
export type FilterClass = new () => Filter;

export type ActionInput = ActionFunc | ActionClass | (Action & ActionCopier);
export type FilterInput = FilterFunc | FilterClass | (Filter & FilterCopier);

/** Validates a populated option struct. Throw (or return an Error) to reject it. */
export type ValidateFunc = (options: object) => Error | undefined | void;

export interface Author {
  readonly name: string;
  readonly email?: string;
}

/** Where usage and parse errors are written. process.stderr satisfies it. */
export interface OutputSink {
  write(chunk: string): unknown;
}
