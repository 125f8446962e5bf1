import { describe, it, expect } from "vitest";
import { ErrorCode, StructBindingError } from "@flagroute/sdk";
import { ErrorHandling } from "../named-flag-set.js";
import { FlagSet } from "../flag-set.js";
import { describeStruct } from "../struct-binder.js";
import type { FieldSpecs } from "../struct-binder.js";

class ServeOptions {
  port = 8080;
  host = "localhost";
  verbose = false;
  root = "";
  timeout = 0;
  secret = "";

  static flags: FieldSpecs<ServeOptions> = {
    port: { tag: "port;usage=listen `port`", kind: "int" },
    host: { tag: ";usage=bind address", kind: "string" },
    verbose: { tag: "v;usage=verbose logging", kind: "bool" },
    root: { tag: "?0;usage=directory to serve", kind: "string" },
    timeout: { tag: "timeout;def=1m30s;usage=idle timeout", kind: "duration" },
    secret: { tag: "-", kind: "string" },
  };
}

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof StructBindingError ? err.code : undefined;
  }
  return undefined;
}

describe("describeStruct", () => {
  it("lists the declared fields", () => {
    const bindings = describeStruct(new ServeOptions());

    expect(bindings.map((b) => [b.field, b.name, b.index, b.kind])).toEqual([
      ["port", "port", undefined, "int"],
      ["host", "host", undefined, "string"],
      ["verbose", "v", undefined, "bool"],
      ["root", "?0", 0, "string"],
      ["timeout", "timeout", undefined, "duration"],
    ]);
    expect(bindings[4].defaultText).toBe("1m30s");
    expect(bindings[0].usage).toBe("listen `port`");
  });

  it("rejects targets that are not plain objects", () => {
    expect(() => describeStruct(null)).toThrow("want a struct object, but got null");
    expect(() => describeStruct([])).toThrow("want a struct object, but got array");
    expect(codeOf(() => describeStruct("x"))).toBe(ErrorCode.NOT_A_STRUCT);
  });

  it("rejects nested objects", () => {
    const specs = { inner: { tag: "inner", kind: "string" } };
    expect(codeOf(() => describeStruct({ inner: { a: 1 } }, specs))).toBe(ErrorCode.NESTED_FIELD);
  });

  it("rejects a field whose type does not match its kind", () => {
    const specs = { port: { tag: "port", kind: "int" } };
    expect(() => describeStruct({ port: "80" }, specs)).toThrow(
      "field port: holds a string, but kind int wants a number",
    );
  });

  it("validates the field specs", () => {
    const specs = { port: { tag: "port", kind: "integer" } };
    expect(codeOf(() => describeStruct({ port: 1 }, specs))).toBe(ErrorCode.BAD_FIELD_SPEC);
  });

  it("rejects malformed tags", () => {
    expect(() => describeStruct({ port: 1 }, { port: { tag: "port;default=3", kind: "int" } })).toThrow(
      'field port: unknown tag key "default"',
    );
    expect(() => describeStruct({ port: 1 }, { port: { tag: "port;usage", kind: "int" } })).toThrow(
      'field port: tag segment "usage" has no "="',
    );
    expect(() => describeStruct({ root: "" }, { root: { tag: "?x", kind: "string" } })).toThrow(
      'field root: bad positional tag "?x"',
    );
  });
});

describe("FlagSet.structVars", () => {
  it("binds flags and positionals onto the fields", () => {
    const set = new FlagSet("serve", ErrorHandling.ContinueOnError, { output: { write: () => undefined } });
    const options = new ServeOptions();
    set.structVars(options);

    expect(options.timeout).toBe(90_000);
    expect(set.lookup("port")?.defValue).toBe("8080");
    expect(set.lookup("timeout")?.defValue).toBe("1m30s");
    expect(set.lookup("secret")).toBeUndefined();

    expect(set.parse(["-port", "9000", "-v", "/srv"])).toBeUndefined();
    expect(options.port).toBe(9000);
    expect(options.verbose).toBe(true);
    expect(options.root).toBe("/srv");
    expect(options.host).toBe("localhost");
  });

  it("starts missing fields at their zero value", () => {
    const set = new FlagSet("", ErrorHandling.ContinueOnError, { output: { write: () => undefined } });
    const options: Record<string, unknown> = {};
    set.structVars(options, { count: { tag: "count", kind: "int" } });

    expect(options.count).toBe(0);
    set.parse(["-count", "3"]);
    expect(options.count).toBe(3);
  });

  it("reports a default that does not parse", () => {
    const set = new FlagSet("", ErrorHandling.ContinueOnError, { output: { write: () => undefined } });
    expect(() => set.structVars({ port: 0 }, { port: { tag: "port;def=abc", kind: "int" } })).toThrow(
      'field port: bad default "abc"',
    );
  });

  it("uses the struct's usage text in the defaults listing", () => {
    const set = new FlagSet("", ErrorHandling.ContinueOnError, { output: { write: () => undefined } });
    set.structVars(new ServeOptions());

    expect(set.defaultsText()).toBe(
      "  -host string\n    \tbind address (default \"localhost\")\n" +
        "  -port port\n    \tlisten port (default 8080)\n" +
        "  -timeout duration\n    \tidle timeout (default 1m30s)\n" +
        "  -v\tverbose logging\n" +
        "  ?0 string\n    \tdirectory to serve\n",
    );
  });
});
