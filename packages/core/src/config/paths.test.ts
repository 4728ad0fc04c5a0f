import { describe, expect, it } from "vitest";
import { homedir } from "node:os";
import { resolve } from "node:path";
import { DEFAULT_ROOT_PATH } from "./defaults.js";
import { expandHomePath, resolveFrom, resolveRootPath } from "./paths.js";

describe("expandHomePath", () => {
  it('expands "~" to the current home directory', () => {
    expect(expandHomePath("~")).toBe(homedir());
  });

  it('expands "~/" prefixes to the current home directory', () => {
    expect(expandHomePath("~/share-seeder/share")).toBe(
      resolve(homedir(), "share-seeder/share"),
    );
  });

  it("leaves non-home paths unchanged", () => {
    expect(expandHomePath("/tmp/sandbox")).toBe("/tmp/sandbox");
  });
});

describe("resolveRootPath", () => {
  it("returns default root path when no input is provided", () => {
    expect(resolveRootPath()).toBe(resolve(DEFAULT_ROOT_PATH));
  });

  it("resolves relative paths to absolute", () => {
    expect(resolveRootPath("relative/seeder")).toBe(resolve("relative/seeder"));
  });
});

describe("resolveFrom", () => {
  it("joins relative paths onto the base directory", () => {
    expect(resolveFrom("/srv/seed", "share/Finance")).toBe(
      "/srv/seed/share/Finance",
    );
  });

  it("keeps absolute paths", () => {
    expect(resolveFrom("/srv/seed", "/mnt/share")).toBe("/mnt/share");
  });

  it("expands home-relative paths instead of joining them", () => {
    expect(resolveFrom("/srv/seed", "~/share")).toBe(resolve(homedir(), "share"));
  });
});
