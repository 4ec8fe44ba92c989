import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

interface PackageJson {
  version?: string;
}

const FALLBACK_VERSION = "0.0.0";

const isPackageJson = (value: unknown): value is PackageJson =>
  typeof value === "object" && value !== null;

/**
 * Reads the CLI version from apps/cli/package.json.
 * The file sits two levels above both src/utils and dist/utils.
 */
export const getVersion = (): string => {
  try {
    const __dirname = dirname(fileURLToPath(import.meta.url));
    const pkgPath = join(__dirname, "..", "..", "package.json");
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf-8"));
    if (isPackageJson(pkg) && typeof pkg.version === "string") {
      return pkg.version;
    }
    return FALLBACK_VERSION;
  } catch {
    return FALLBACK_VERSION;
  }
};
