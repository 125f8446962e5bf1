import { describe, it, expect } from "vitest";
import { Status, StatusCode, StatusError } from "./status.js";
import { ErrorCode } from "../errors/codes.js";

describe("Status", () => {
  it("Status.ok() has code 0", () => {
    const stat = Status.ok();
    expect(stat.ok()).toBe(true);
    expect(stat.code).toBe(0);
    expect(stat.cause).toBeUndefined();
    expect(stat.toString()).toBe("0: ok");
  });

  it("takes the message from the cause when msg is empty", () => {
    const stat = new Status(StatusCode.ParseFailed, "", new Error("flag provided but not defined: -x"));
    expect(stat.msg).toBe("flag provided but not defined: -x");
    expect(stat.ok()).toBe(false);
    expect(stat.toString()).toBe("3: flag provided but not defined: -x");
  });

  it("wraps non-Error causes", () => {
    const stat = new Status(StatusCode.NotFound, "", 'not found command action: "app x"');
    expect(stat.cause).toBeInstanceOf(Error);
    expect(stat.msg).toBe('not found command action: "app x"');
  });

  it("withStack captures a stack", () => {
    const stat = Status.withStack(StatusCode.BadArgs, "bad");
    expect(stat.stack).toBeTypeOf("string");
    expect(stat.msg).toBe("bad");
  });

  it("toJSON omits absent fields", () => {
    expect(new Status(StatusCode.NotFound, "missing").toJSON()).toEqual({ code: 2, msg: "missing" });
    expect(new Status(StatusCode.NotFound, "missing", new Error("why")).toJSON()).toEqual({
      code: 2,
      msg: "missing",
      cause: "why",
    });
  });

  describe("Status.from", () => {
    it("unwraps a StatusError", () => {
      const inner = new Status(StatusCode.ValidateFailed, "invalid");
      expect(Status.from(new StatusError(inner))).toBe(inner);
    });

    it("converts other errors to Unknown", () => {
      const err = new TypeError("boom");
      const stat = Status.from(err);
      expect(stat.code).toBe(StatusCode.Unknown);
      expect(stat.cause).toBe(err);
      expect(stat.msg).toBe("boom");
    });
  });

  describe("StatusError", () => {
    it("exposes the status and STATUS_ERROR code", () => {
      const stat = new Status(StatusCode.NotFound, "nope");
      const err = new StatusError(stat);
      expect(err.status).toBe(stat);
      expect(err.code).toBe(ErrorCode.STATUS_ERROR);
      expect(err.message).toBe("2: nope");
    });
  });
});
