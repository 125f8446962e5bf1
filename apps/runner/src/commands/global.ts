/**
 * Root filters shared by every runner command.
 */

import type { ActionFunc, Context, FilterFunc } from "@flagroute/sdk";
import type { FieldSpecs } from "@flagroute/core";
import { createLogger, setLogLevel } from "@flagroute/shared";

const logger = createLogger("runner");

export class GlobalOptions {
  debug = false;

  static flags: FieldSpecs<GlobalOptions> = {
    debug: { tag: "debug;usage=log routing and timing details", kind: "bool" },
  };

  filter(ctx: Context, next: ActionFunc) {
    if (this.debug) setLogLevel("debug");
    return next(ctx);
  }
}

/** Logs how long the wrapped command took, at debug level. */
export const timingFilter: FilterFunc = async (ctx, next) => {
  const stop = logger.time(ctx.cmdPathString());
  try {
    await next(ctx);
  } finally {
    stop();
  }
};
