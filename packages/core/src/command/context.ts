import { Status, StatusError } from "@flagroute/sdk";
import type { Context } from "@flagroute/sdk";

/** The Context handed to handlers for one App.exec call. */
export class ExecContext implements Context {
  constructor(
    private readonly argv: readonly string[],
    private readonly path: readonly string[],
    readonly signal: AbortSignal | undefined,
  ) {}

  args(): readonly string[] {
    return this.argv;
  }

  cmdPath(): readonly string[] {
    return this.path;
  }

  cmdPathString(): string {
    return this.path.join(" ");
  }

  throwStatus(code: number, msg: string, cause?: unknown): never {
    throw new StatusError(Status.withStack(code, msg, cause));
  }

  checkStatus(err: unknown, code: number, msg: string, whenError?: () => void): void {
    if (err === undefined || err === null) return;
    whenError?.();
    this.throwStatus(code, msg, err);
  }
}
