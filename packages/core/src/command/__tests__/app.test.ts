import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { ConfigError, StatusCode } from "@flagroute/sdk";
import type { Action, ActionFunc, Context, FilterFunc } from "@flagroute/sdk";
import { createApp } from "../app.js";
import type { AppOptions } from "../app.js";
import type { FieldSpecs } from "../../flags/struct-binder.js";

function memorySink() {
  const chunks: string[] = [];
  return {
    chunks,
    write: (chunk: string) => {
      chunks.push(chunk);
      return true;
    },
    text: () => chunks.join(""),
  };
}

let seen: string[] = [];

class Greet {
  name = "world";
  loud = false;

  static flags: FieldSpecs<Greet> = {
    name: { tag: "name;usage=who to greet", kind: "string" },
    loud: { tag: "loud;usage=shout", kind: "bool" },
  };

  handle(_ctx: Context): void {
    seen.push(`${this.loud ? "HELLO" : "hello"} ${this.name}`);
  }
}

class Tagged {
  tag = "none";

  static flags: FieldSpecs<Tagged> = {
    tag: { tag: "tag;usage=tag to `label` output", kind: "string" },
  };

  filter(ctx: Context, next: ActionFunc) {
    seen.push(`tag=${this.tag}`);
    return next(ctx);
  }
}

class Verbose {
  v = false;

  static flags: FieldSpecs<Verbose> = {
    v: { tag: "v;usage=verbose output", kind: "bool" },
  };

  filter(ctx: Context, next: ActionFunc) {
    seen.push(`v=${this.v}`);
    return next(ctx);
  }
}

class Level {
  x = 0;

  static flags: FieldSpecs<Level> = {
    x: { tag: "x;usage=level", kind: "int" },
  };

  filter(ctx: Context, next: ActionFunc) {
    seen.push(`x=${this.x}`);
    return next(ctx);
  }
}

class Repeat {
  name = "";
  n = 1;

  static flags: FieldSpecs<Repeat> = {
    name: { tag: "name", kind: "string" },
    n: { tag: "n", kind: "int" },
  };

  handle(_ctx: Context): void {
    seen.push(`${this.name} x${this.n}`);
  }
}

function testApp(extra: AppOptions = {}) {
  const output = memorySink();
  const app = createApp({
    cmdName: "tool",
    programPath: "/usr/local/bin/tool",
    compiled: new Date(0),
    output,
    ...extra,
  });
  return { app, output };
}

beforeEach(() => {
  seen = [];
});

describe("App.exec routing", () => {
  it("runs the deepest matching action with the original args", async () => {
    const { app } = testApp();
    let ctxSeen: Context | undefined;
    app.addSubcommand("remote", "manage remotes").addSubaction("add", "add a remote", (ctx) => {
      ctxSeen = ctx;
    });

    const status = await app.exec(["remote", "add", "origin"]);

    expect(status.ok()).toBe(true);
    expect(ctxSeen?.cmdPath()).toEqual(["tool", "remote", "add"]);
    expect(ctxSeen?.cmdPathString()).toBe("tool remote add");
    expect(ctxSeen?.args()).toEqual(["remote", "add", "origin"]);
  });

  it("wraps the action in filters, outermost first", async () => {
    const { app } = testApp();
    const log: string[] = [];
    const trace =
      (label: string): FilterFunc =>
      async (ctx, next) => {
        log.push(`${label}-entry`);
        await next(ctx);
        log.push(`${label}-exit`);
      };
    app.use(trace("F1"), trace("F2"));
    app.addSubaction("run", "", () => {
      log.push("Act");
    }, trace("F3"));

    await app.exec(["run"]);

    expect(log).toEqual(["F1-entry", "F2-entry", "F3-entry", "Act", "F3-exit", "F2-exit", "F1-exit"]);
  });

  it("returns NotFound for an unknown command", async () => {
    const { app } = testApp();
    app.addSubaction("run", "", () => {});

    const status = await app.exec(["nope"]);

    expect(status.code).toBe(StatusCode.NotFound);
    expect(status.msg).toBe('not found command action: "tool nope"');
  });

  it("returns NotFound when no command is given", async () => {
    const { app } = testApp();
    app.addSubaction("run", "", () => {});

    const status = await app.exec([]);

    expect(status.msg).toBe('not found command action: "tool"');
  });

  it("runs the not-found handler without filters", async () => {
    const log: string[] = [];
    const { app } = testApp({
      notFound: (ctx) => {
        log.push(`missing ${ctx.cmdPathString()}`);
      },
    });
    app.use((ctx, next) => {
      log.push("filter");
      return next(ctx);
    });
    app.addSubaction("run", "", () => {});

    const status = await app.exec(["nope", "x"]);

    expect(status.ok()).toBe(true);
    expect(log).toEqual(["missing tool nope"]);
  });

  it("writes the usage text for a help token", async () => {
    const { app, output } = testApp();
    app.addSubaction("run", "", () => {});

    const status = await app.exec(["-h"]);

    expect(status.ok()).toBe(true);
    expect(output.text()).toBe(app.usageText());
  });

  it("passes the signal through untouched", async () => {
    const { app } = testApp();
    const controller = new AbortController();
    let signal: AbortSignal | undefined;
    app.setAction((ctx) => {
      signal = ctx.signal;
    });

    await app.exec([], { signal: controller.signal });

    expect(signal).toBe(controller.signal);
  });
});

describe("App.exec option structs", () => {
  it("populates a fresh action object per call", async () => {
    const { app } = testApp();
    app.addSubaction("greet", "say hello", Greet);

    await app.exec(["greet", "-name", "ann", "-loud"]);
    await app.exec(["greet"]);

    expect(seen).toEqual(["HELLO ann", "hello world"]);
  });

  it("lets a root filter take its flags and pass the rest down", async () => {
    const { app } = testApp();
    app.use(Tagged);
    app.addSubaction("greet", "", Greet);

    const status = await app.exec(["-tag", "x", "greet", "-name", "bo"]);

    expect(status.ok()).toBe(true);
    expect(seen).toEqual(["tag=x", "hello bo"]);
  });

  it("runs filters of an intermediate command before those of its child", async () => {
    const { app } = testApp();
    app.addSubcommand("a", "", Level).addSubaction("b", "", () => {
      seen.push("act");
    }, (ctx, next) => {
      seen.push("b-entry");
      return next(ctx);
    });

    const status = await app.exec(["a", "b", "-x", "1"]);

    expect(status.ok()).toBe(true);
    expect(seen).toEqual(["x=1", "b-entry", "act"]);
  });

  it("hands the next level the shortest remainder among a level's filters", async () => {
    const { app } = testApp();
    app.use(Tagged, Verbose);
    app.addSubaction("greet", "", Greet);

    const status = await app.exec(["-v", "greet"]);

    expect(status.ok()).toBe(true);
    expect(seen).toEqual(["tag=none", "v=true", "hello world"]);
  });

  it("copies instances that implement deepCopy", async () => {
    const { app } = testApp();
    const template = {
      times: 1,
      handle(_ctx: Context) {
        seen.push(`times=${this.times}`);
        this.times = 99;
      },
      deepCopy(): Action {
        return { ...template };
      },
    };
    app.addSubaction("repeat", "", template);

    await app.exec(["repeat"]);
    await app.exec(["repeat"]);

    expect(seen).toEqual(["times=1", "times=1"]);
  });

  it("maps a bad value to ParseFailed", async () => {
    const { app } = testApp();
    app.addSubaction("greet", "", Greet);

    const status = await app.exec(["greet", "-loud=maybe"]);

    expect(status.code).toBe(StatusCode.ParseFailed);
    expect(status.msg.startsWith('invalid boolean value "maybe" for -loud')).toBe(true);
    expect(seen).toEqual([]);
  });

  it("refuses a flag that needs a value when another flag follows it", async () => {
    const { app } = testApp();
    app.addSubaction("go", "", Repeat);

    const status = await app.exec(["go", "-name", "-n", "5"]);

    expect(status.code).toBe(StatusCode.ParseFailed);
    expect(status.msg).toBe("flag needs an argument: -name");
    expect(seen).toEqual([]);
  });

  it("maps bad flag syntax to BadArgs", async () => {
    const { app } = testApp();
    app.addSubaction("greet", "", Greet);

    const status = await app.exec(["greet", "---x"]);

    expect(status.code).toBe(StatusCode.BadArgs);
    expect(status.msg).toBe("bad flag syntax: ---x");
  });

  it("maps validator failures to ValidateFailed", async () => {
    const { app } = testApp({
      validator: (options) => (options instanceof Greet && options.name === "bad" ? new Error("name is bad") : undefined),
    });
    app.addSubaction("greet", "", Greet);

    const status = await app.exec(["greet", "-name", "bad"]);

    expect(status.code).toBe(StatusCode.ValidateFailed);
    expect(status.msg).toBe("name is bad");
    expect(seen).toEqual([]);
  });
});

describe("App.exec faults", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns the status thrown by ctx.throwStatus", async () => {
    const { app } = testApp();
    app.setAction((ctx) => ctx.throwStatus(42, "boom"));

    const status = await app.exec([]);

    expect(status.code).toBe(42);
    expect(status.msg).toBe("boom");
    expect(status.stack).toBeDefined();
  });

  it("runs the cleanup hook of checkStatus", async () => {
    const { app } = testApp();
    let cleaned = false;
    app.setAction((ctx) => {
      ctx.checkStatus(undefined, 7, "");
      ctx.checkStatus(new Error("disk full"), 7, "", () => {
        cleaned = true;
      });
    });

    const status = await app.exec([]);

    expect(cleaned).toBe(true);
    expect(status.code).toBe(7);
    expect(status.msg).toBe("disk full");
  });

  it("converts other faults to Unknown", async () => {
    const { app } = testApp();
    app.setAction(async () => {
      throw new Error("kaput");
    });

    const status = await app.exec([]);

    expect(status.code).toBe(StatusCode.Unknown);
    expect(status.msg).toBe("kaput");
    expect(status.cause).toBeInstanceOf(Error);
  });
});

describe("App.run", () => {
  afterEach(() => {
    process.exitCode = undefined;
  });

  it("writes a failed status and sets the exit code", async () => {
    const { app, output } = testApp();
    app.addSubaction("run", "", () => {});

    const status = await app.run(["nope"]);

    expect(status.code).toBe(StatusCode.NotFound);
    expect(output.text()).toBe('tool: not found command action: "tool nope"\n');
    expect(process.exitCode).toBe(StatusCode.NotFound);
  });

  it("leaves the exit code alone on success", async () => {
    const { app, output } = testApp();
    app.addSubaction("run", "", () => {});

    await app.run(["run"]);

    expect(output.text()).toBe("");
    expect(process.exitCode).toBeUndefined();
  });
});

describe("App metadata", () => {
  it("normalizes names and versions", () => {
    const app = createApp({ programPath: "/opt/bin/--mytool", compiled: new Date(0), output: memorySink() });

    expect(app.cmdName).toBe("mytool");
    expect(app.name).toBe("mytool");
    expect(app.version).toBe("0.0.1");

    app.version = "V2.1.0";
    expect(app.version).toBe("2.1.0");
  });

  it("rejects invalid metadata", () => {
    expect(() => createApp({ authors: [{ name: "" }] })).toThrow(ConfigError);
    expect(() => createApp({ authors: [{ name: "" }] })).toThrow(
      "invalid app options: authors.0.name: Author name must not be empty",
    );
  });
});
