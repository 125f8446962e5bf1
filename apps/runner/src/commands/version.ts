/**
 * version command - display version information.
 */

import type { Context } from "@flagroute/sdk";
import type { FieldSpecs } from "@flagroute/core";
import { readPackageInfo } from "../utils/package-info.js";

export class VersionAction {
  verbose = false;

  static flags: FieldSpecs<VersionAction> = {
    verbose: { tag: "verbose;usage=include runtime details", kind: "bool" },
  };

  handle(_ctx: Context): void {
    console.log(`flagroute v${readPackageInfo().version}`);

    if (this.verbose) {
      console.log(`Node.js ${process.version}`);
      console.log(`Platform: ${process.platform} ${process.arch}`);
    }
  }
}
