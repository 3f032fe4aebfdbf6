import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { pathToFileURL } from "node:url";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { resolvePackageVersion } from "./resolve-package-version.js";

describe("resolvePackageVersion", () => {
  let root: string;
  let moduleUrl: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "logship-version-"));
    mkdirSync(join(root, "src", "adapters"), { recursive: true });
    moduleUrl = pathToFileURL(join(root, "src", "adapters", "module.js")).href;
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("returns the version of the first candidate that exists", () => {
    writeFileSync(join(root, "package.json"), JSON.stringify({ version: "1.2.3" }));
    expect(resolvePackageVersion(moduleUrl, ["../package.json", "../../package.json"])).toBe("1.2.3");
  });

  it("prefers an earlier candidate", () => {
    writeFileSync(join(root, "package.json"), JSON.stringify({ version: "1.0.0" }));
    writeFileSync(join(root, "src", "package.json"), JSON.stringify({ version: "2.0.0" }));
    expect(resolvePackageVersion(moduleUrl, ["../package.json", "../../package.json"])).toBe("2.0.0");
  });

  it("skips candidates with invalid JSON or no version", () => {
    writeFileSync(join(root, "src", "package.json"), "{ not json");
    writeFileSync(join(root, "package.json"), JSON.stringify({ name: "x", version: "" }));
    expect(resolvePackageVersion(moduleUrl, ["../package.json", "../../package.json"])).toBe("unknown");
  });

  it("returns unknown when nothing resolves", () => {
    expect(resolvePackageVersion(moduleUrl, ["./missing.json"])).toBe("unknown");
  });
});
