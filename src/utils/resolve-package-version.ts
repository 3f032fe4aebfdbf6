import { existsSync, readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

/**
 * Return the first non-empty `.version` among `package.json` candidates,
 * each resolved relative to `importMetaUrl`. Falls back to "unknown".
 */
export function resolvePackageVersion(importMetaUrl: string, candidates: readonly string[]): string {
  for (const candidate of candidates) {
    const version = readVersion(fileURLToPath(new URL(candidate, importMetaUrl)));
    if (version) return version;
  }
  return "unknown";
}

function readVersion(path: string): string | undefined {
  if (!existsSync(path)) return undefined;
  let pkg: unknown;
  try {
    pkg = JSON.parse(readFileSync(path, "utf-8"));
  } catch {
    return undefined;
  }
  if (typeof pkg !== "object" || pkg === null || !("version" in pkg)) return undefined;
  return typeof pkg.version === "string" && pkg.version.length > 0 ? pkg.version : undefined;
}
