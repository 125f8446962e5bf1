import { describe, it, expect, vi, afterEach } from "vitest";
import { StatusCode } from "@flagroute/sdk";
import { classifyTokens } from "../../src/commands/tokens.js";
import { testRunner } from "../helpers.js";

describe("classifyTokens", () => {
  it("reads each token the way the flag grammar does", () => {
    expect(classifyTokens(["-a", "1", "-b=2", "x", "-", "--", "-c", "---d"])).toEqual([
      "flag a=1",
      "flag b=2",
      "positional x",
      "positional -",
      "terminator",
      "flag c",
      "bad ---d",
    ]);
  });

  it("returns nothing for no tokens", () => {
    expect(classifyTokens([])).toEqual([]);
  });
});

describe("tokens command", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("classifies the arguments after --", async () => {
    const consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    const { app } = testRunner();

    const status = await app.exec(["tokens", "--", "-v", "file", "--debug"]);

    expect(status.ok()).toBe(true);
    expect(consoleSpy.mock.calls).toEqual([["flag v=file"], ["flag debug"]]);
  });

  it("needs the terminator", async () => {
    const { app } = testRunner();

    const status = await app.exec(["tokens", "x"]);

    expect(status.code).toBe(StatusCode.BadArgs);
    expect(status.msg).toBe("usage: tokens -- <args...>");
  });
});
