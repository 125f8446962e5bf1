import { describe, it, expect } from "vitest";
import { readFlagToken, splitArgs } from "../token.js";

describe("readFlagToken", () => {
  it("reads a flag with the following token as its value", () => {
    expect(readFlagToken(["-a", "1", "x"])).toEqual({
      type: "flag",
      name: "a",
      value: "1",
      consumed: ["-a", "1"],
      rest: ["x"],
    });
  });

  it("reads inline values after the first =", () => {
    const token = readFlagToken(["--name=a=b"]);
    expect(token).toMatchObject({ type: "flag", name: "name", value: "a=b", consumed: ["--name=a=b"] });
  });

  it("does not take a following token that starts with -", () => {
    expect(readFlagToken(["-a", "-b"])).toMatchObject({ type: "flag", name: "a", value: undefined, rest: ["-b"] });
  });

  it("takes an empty following token", () => {
    expect(readFlagToken(["-a", ""])).toMatchObject({ type: "flag", value: "", rest: [] });
  });

  it("leaves the next token alone when takesValue says no", () => {
    const token = readFlagToken(["-v", "file"], (name) => name !== "v");
    expect(token).toMatchObject({ type: "flag", name: "v", value: undefined, rest: ["file"] });
  });

  it("recognizes the terminator", () => {
    expect(readFlagToken(["--", "-a"])).toEqual({ type: "terminator", rest: ["-a"] });
  });

  it("stops at bare tokens", () => {
    expect(readFlagToken(["file", "-a"]).type).toBe("end");
    expect(readFlagToken(["-"]).type).toBe("end");
    expect(readFlagToken([]).type).toBe("end");
  });

  it("rejects malformed names", () => {
    expect(readFlagToken(["---a"])).toEqual({ type: "bad", token: "---a", rest: ["---a"] });
    expect(readFlagToken(["-=a"]).type).toBe("bad");
    expect(readFlagToken(["--=a"]).type).toBe("bad");
  });
});

describe("splitArgs", () => {
  it("splits off a leading bare token", () => {
    expect(splitArgs(["run", "-x"])).toEqual(["run", ["-x"]]);
  });

  it("returns no head when the list starts with a flag", () => {
    expect(splitArgs(["-x", "run"])).toEqual([undefined, ["-x", "run"]]);
    expect(splitArgs([])).toEqual([undefined, []]);
  });
});
