import { readFileSync } from "fs";
import { z } from "zod";

const PackageSchema = z.object({ version: z.string() });

/**
 * Version from the package manifest, two levels above both src/lib and dist/lib.
 */
function readPackageVersion(): string {
  const manifest = readFileSync(new URL("../../package.json", import.meta.url), "utf-8");
  return PackageSchema.parse(JSON.parse(manifest)).version;
}

export const VERSION = readPackageVersion();
