import { createRequire } from "node:module";

function readVersionFromPackageJson(): string | null {
  const require = createRequire(import.meta.url);
  // Sources sit one level below the package root, compiled output two.
  for (const candidate of ["../package.json", "../../package.json"]) {
    try {
      const pkg: unknown = require(candidate);
      if (pkg !== null && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
        return pkg.version;
      }
    } catch {
      continue;
    }
  }
  return null;
}

// Single source of truth for the current stratum version.
export const VERSION = process.env.STRATUM_VERSION || readVersionFromPackageJson() || "0.0.0";
