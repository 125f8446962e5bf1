/**
 * The flagroute CLI, assembled on the core App.
 *
 *   flagroute [-debug] version [-verbose]
 *   flagroute [-debug] tokens -- <args...>
 *   flagroute [-debug] duration <value>
 */

import { StatusCode } from "@flagroute/sdk";
import type { OutputSink } from "@flagroute/sdk";
import { createApp, createSchemaValidator } from "@flagroute/core";
import type { App } from "@flagroute/core";
import { DurationAction } from "./commands/duration.js";
import { GlobalOptions, timingFilter } from "./commands/global.js";
import { tokensAction } from "./commands/tokens.js";
import { VersionAction } from "./commands/version.js";
import { readPackageInfo } from "./utils/package-info.js";

export interface RunnerOptions {
  /** Usage and errors. Defaults to process.stderr. */
  output?: OutputSink;
  programPath?: string;
}

export function createRunnerApp(options: RunnerOptions = {}): App {
  const pkg = readPackageInfo();
  const app = createApp({
    cmdName: "flagroute",
    description: pkg.description,
    version: pkg.version,
    programPath: options.programPath,
    output: options.output,
    validator: createSchemaValidator(),
  });

  app.use(GlobalOptions, timingFilter);
  app.addSubaction("version", "show version information", VersionAction);
  app.addSubaction("tokens", "classify the arguments after --", tokensAction);
  app.addSubaction("duration", "normalize a duration", DurationAction);

  app.notFound = (ctx) => {
    app.output.write(app.usageText());
    const [, ...names] = ctx.cmdPath();
    if (names.length > 0) {
      ctx.throwStatus(StatusCode.NotFound, `unknown command ${JSON.stringify(names.join(" "))}`);
    }
  };

  return app;
}
