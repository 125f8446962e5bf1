/**
 * duration command - normalize a duration given as the first positional.
 */

import type { Context } from "@flagroute/sdk";
import { formatDuration } from "@flagroute/core";
import type { FieldSpecs } from "@flagroute/core";

export class DurationAction {
  /** Milliseconds. */
  value = 0;

  static flags: FieldSpecs<DurationAction> = {
    value: { tag: "?0;usage=duration such as `1h30m`", kind: "duration" },
  };

  handle(_ctx: Context): void {
    console.log(`${formatDuration(this.value)} (${this.value}ms)`);
  }
}
