/**
 * Reads the runner's own package.json.
 */

import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ConfigError } from "@flagroute/sdk";
import { validateInput } from "@flagroute/shared";

const __dirname = dirname(fileURLToPath(import.meta.url));

const PackageInfoSchema = z.object({
  name: z.string(),
  version: z.string(),
  description: z.string().optional(),
});

export type PackageInfo = z.infer<typeof PackageInfoSchema>;

let cached: PackageInfo | undefined;

export function readPackageInfo(): PackageInfo {
  if (cached) return cached;
  const pkgPath = resolve(__dirname, "../../package.json");
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(pkgPath, "utf-8"));
  } catch (err) {
    throw new ConfigError(`cannot read ${pkgPath}`, { cause: err });
  }
  const result = validateInput(PackageInfoSchema, raw);
  if (!result.success || !result.data) {
    throw new ConfigError(`invalid ${pkgPath}: ${result.error ?? "no data"}`);
  }
  cached = result.data;
  return cached;
}
