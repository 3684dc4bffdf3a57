import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, readFile, realpath, rm, symlink, writeFile } from "fs/promises";
import { join } from "path";
import { tmpdir } from "os";
import { InvalidTargetError } from "./errors.js";
import { ensureDir, ensureFile, resolveTargetDir } from "./filesystem.js";

describe("filesystem", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await realpath(await mkdtemp(join(tmpdir(), "agent-rules-fs-")));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe("resolveTargetDir", () => {
    it("returns the absolute path of an existing directory", async () => {
      await mkdir(join(testDir, "app"));

      expect(await resolveTargetDir(join(testDir, "app", "..", "app"))).toBe(join(testDir, "app"));
    });

    it("follows symlinks to the real directory", async () => {
      await mkdir(join(testDir, "real"));
      await symlink(join(testDir, "real"), join(testDir, "link"), "dir");

      expect(await resolveTargetDir(join(testDir, "link"))).toBe(join(testDir, "real"));
    });

    it("throws InvalidTargetError for a missing path", async () => {
      const missing = join(testDir, "missing");

      await expect(resolveTargetDir(missing)).rejects.toBeInstanceOf(InvalidTargetError);
      await expect(resolveTargetDir(missing)).rejects.toThrow(`Directory '${missing}' does not exist.`);
    });

    it("throws InvalidTargetError for a file", async () => {
      await writeFile(join(testDir, "file.txt"), "x");

      await expect(resolveTargetDir(join(testDir, "file.txt"))).rejects.toMatchObject({
        code: "INVALID_TARGET",
      });
    });
  });

  describe("ensureDir", () => {
    it("creates a missing directory", async () => {
      expect(await ensureDir(join(testDir, "a", "b"))).toBe("created");
      expect(await ensureDir(join(testDir, "a", "b"))).toBe("exists");
    });

    it("fails when a file occupies the path", async () => {
      await writeFile(join(testDir, "taken"), "x");

      await expect(ensureDir(join(testDir, "taken"))).rejects.toThrow();
    });
  });

  describe("ensureFile", () => {
    it("writes a missing file", async () => {
      const filePath = join(testDir, "docs", "TODO.md");

      expect(await ensureFile(filePath, "template")).toBe("created");
      expect(await readFile(filePath, "utf-8")).toBe("template");
    });

    it("never overwrites an existing file", async () => {
      const filePath = join(testDir, "TODO.md");
      await writeFile(filePath, "X");

      expect(await ensureFile(filePath, "template")).toBe("exists");
      expect(await readFile(filePath, "utf-8")).toBe("X");
    });
  });
});
