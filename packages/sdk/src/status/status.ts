/**
 * Status - the result of one App.exec call.
 *
 * Code 0 means success. Failures carry a classifying code, a message and the
 * underlying cause; a stack is captured only on request.
 */

import { ErrorCode } from "../errors/codes.js";
import { FlagrouteError } from "../errors/base.js";

export const StatusCode = {
  OK: 0,
  BadArgs: 1,
  NotFound: 2,
  ParseFailed: 3,
  ValidateFailed: 4,
  /** Fault thrown by a handler that was not a Status. */
  Unknown: -1,
} as const;

export type StatusCode = (typeof StatusCode)[keyof typeof StatusCode];

export class Status {
  readonly code: number;
  readonly msg: string;
  readonly cause: Error | undefined;
  readonly stack: string | undefined;

  constructor(code: number, msg = "", cause?: unknown, stack?: string) {
    this.code = code;
    this.cause = toError(cause);
    this.msg = msg === "" && this.cause ? this.cause.message : msg;
    this.stack = stack;
  }

  static ok(): Status {
    return new Status(StatusCode.OK);
  }

  static withStack(code: number, msg = "", cause?: unknown): Status {
    const captured = new Error(msg).stack?.split("\n").slice(2).join("\n");
    return new Status(code, msg, cause, captured);
  }

  /** Convert any thrown value into a Status. */
  static from(err: unknown): Status {
    if (err instanceof StatusError) return err.status;
    if (err instanceof Status) return err;
    return new Status(StatusCode.Unknown, "", err, err instanceof Error ? err.stack : undefined);
  }

  ok(): boolean {
    return this.code === StatusCode.OK;
  }

  toString(): string {
    if (this.ok() && this.msg === "") return "0: ok";
    return `${this.code}: ${this.msg}`;
  }

  toJSON(): Record<string, unknown> {
    return {
      code: this.code,
      msg: this.msg,
      ...(this.cause ? { cause: this.cause.message } : {}),
      ...(this.stack ? { stack: this.stack } : {}),
    };
  }
}

/** Carries a Status through a throw; caught at the top of App.exec. */
export class StatusError extends FlagrouteError {
  constructor(public readonly status: Status) {
    super(status.toString(), ErrorCode.STATUS_ERROR, { cause: status.cause });
    this.name = "StatusError";
  }
}

function toError(cause: unknown): Error | undefined {
  if (cause === undefined || cause === null) return undefined;
  if (cause instanceof Error) return cause;
  return new Error(String(cause));
}
