import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from "fs/promises";
import { basename, join } from "path";
import { tmpdir } from "os";
import { RuleSourceError } from "./errors.js";
import {
  describeStats,
  findRuleProjects,
  isRuleFileName,
  listRuleFiles,
  syncRuleFiles,
} from "./rules.js";

describe("isRuleFileName", () => {
  it("accepts markdown files", () => {
    expect(isRuleFileName("typescript.md")).toBe(true);
  });

  it("rejects template placeholders", () => {
    expect(isRuleFileName("TODO-template.md")).toBe(false);
    expect(isRuleFileName("PROJECT-template.md")).toBe(false);
  });

  it("rejects the tracking docs", () => {
    expect(isRuleFileName("TODO.md")).toBe(false);
    expect(isRuleFileName("PROJECT.md")).toBe(false);
  });

  it("rejects other extensions", () => {
    expect(isRuleFileName("setup.sh")).toBe(false);
    expect(isRuleFileName("notes.markdown")).toBe(false);
  });
});

describe("rule files", () => {
  let testDir: string;
  let sourceDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "agent-rules-rules-"));
    sourceDir = join(testDir, "rules");
    await mkdir(sourceDir);
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe("listRuleFiles", () => {
    it("lists top-level rule documents sorted by name", async () => {
      await writeFile(join(sourceDir, "python.md"), "py");
      await writeFile(join(sourceDir, "clean-architecture.md"), "ca");
      await writeFile(join(sourceDir, "TODO-template.md"), "tpl");
      await writeFile(join(sourceDir, "README.txt"), "readme");
      await mkdir(join(sourceDir, "nested.md"));
      await mkdir(join(sourceDir, "drafts"));
      await writeFile(join(sourceDir, "drafts", "draft.md"), "draft");

      const files = await listRuleFiles(sourceDir);

      expect(files).toEqual([join(sourceDir, "clean-architecture.md"), join(sourceDir, "python.md")]);
    });

    it("throws when the directory has no rule documents", async () => {
      await writeFile(join(sourceDir, "TODO-template.md"), "tpl");

      await expect(listRuleFiles(sourceDir)).rejects.toThrow(`No .md rule files found: ${sourceDir}`);
    });

    it("throws when the directory does not exist", async () => {
      await expect(listRuleFiles(join(testDir, "missing"))).rejects.toBeInstanceOf(RuleSourceError);
    });
  });

  describe("syncRuleFiles", () => {
    let configDir: string;
    let ruleFiles: string[];

    beforeEach(async () => {
      configDir = join(testDir, "project", ".claude");
      await writeFile(join(sourceDir, "a.md"), "alpha");
      await writeFile(join(sourceDir, "b.md"), "bravo");
      await writeFile(join(sourceDir, "c.md"), "charlie");
      ruleFiles = await listRuleFiles(sourceDir);
    });

    it("copies every file into a new configuration folder", async () => {
      const stats = await syncRuleFiles(ruleFiles, configDir);

      expect(stats.copied).toBe(3);
      expect(stats.files).toEqual([
        { name: "a.md", action: "copied" },
        { name: "b.md", action: "copied" },
        { name: "c.md", action: "copied" },
      ]);
      expect((await readdir(configDir)).sort()).toEqual(["a.md", "b.md", "c.md"]);
      expect(await readFile(join(configDir, "b.md"), "utf-8")).toBe("bravo");
    });

    it("classifies updated and unchanged files", async () => {
      await mkdir(configDir, { recursive: true });
      await writeFile(join(configDir, "a.md"), "alpha");
      await writeFile(join(configDir, "b.md"), "old bravo");

      const stats = await syncRuleFiles(ruleFiles, configDir);

      expect(stats).toEqual({
        files: [
          { name: "a.md", action: "unchanged" },
          { name: "b.md", action: "updated" },
          { name: "c.md", action: "copied" },
        ],
        copied: 1,
        updated: 1,
        unchanged: 1,
        errors: [],
      });
      expect(await readFile(join(configDir, "b.md"), "utf-8")).toBe("bravo");
    });

    it("leaves unrelated files in the configuration folder", async () => {
      await mkdir(configDir, { recursive: true });
      await writeFile(join(configDir, "TODO.md"), "my tasks");

      await syncRuleFiles(ruleFiles, configDir);

      expect(await readFile(join(configDir, "TODO.md"), "utf-8")).toBe("my tasks");
    });

    it("writes nothing in dry run mode", async () => {
      await mkdir(configDir, { recursive: true });
      await writeFile(join(configDir, "b.md"), "old bravo");

      const stats = await syncRuleFiles(ruleFiles, configDir, { dryRun: true });

      expect(stats.copied).toBe(2);
      expect(stats.updated).toBe(1);
      expect(await readdir(configDir)).toEqual(["b.md"]);
      expect(await readFile(join(configDir, "b.md"), "utf-8")).toBe("old bravo");
    });

    it("does not create the configuration folder in dry run mode", async () => {
      await syncRuleFiles(ruleFiles, configDir, { dryRun: true });

      await expect(readdir(configDir)).rejects.toThrow();
    });

    it("records a failing file and continues with the rest", async () => {
      const missing = join(sourceDir, "gone.md");

      const stats = await syncRuleFiles([ruleFiles[0] ?? "", missing, ruleFiles[1] ?? ""], configDir);

      expect(stats.copied).toBe(2);
      expect(stats.errors).toHaveLength(1);
      expect(stats.errors[0]?.file).toBe("gone.md");
      expect((await readdir(configDir)).sort()).toEqual(["a.md", "b.md"]);
    });
  });

  describe("findRuleProjects", () => {
    it("finds sibling directories that have a .claude folder", async () => {
      await mkdir(join(testDir, "web", ".claude"), { recursive: true });
      await mkdir(join(testDir, "api", ".claude"), { recursive: true });
      await mkdir(join(testDir, "plain"), { recursive: true });
      await mkdir(join(testDir, ".hidden", ".claude"), { recursive: true });
      await mkdir(join(testDir, "file-config"), { recursive: true });
      await writeFile(join(testDir, "file-config", ".claude"), "not a folder");
      await writeFile(join(testDir, "notes.md"), "notes");

      const projects = await findRuleProjects(testDir);

      expect(projects.map((p) => basename(p))).toEqual(["api", "web"]);
    });

    it("skips excluded directories", async () => {
      await mkdir(join(sourceDir, ".claude"), { recursive: true });
      await mkdir(join(testDir, "web", ".claude"), { recursive: true });

      const projects = await findRuleProjects(testDir, [sourceDir]);

      expect(projects).toEqual([join(testDir, "web")]);
    });

    it("returns an empty list for a missing parent directory", async () => {
      expect(await findRuleProjects(join(testDir, "missing"))).toEqual([]);
    });
  });
});

describe("describeStats", () => {
  it("joins non-zero counters", () => {
    const stats = { files: [], copied: 2, updated: 0, unchanged: 3, errors: [] };
    expect(describeStats(stats)).toBe("2 copied, 3 unchanged");
  });

  it("counts errors", () => {
    const stats = { files: [], copied: 0, updated: 1, unchanged: 0, errors: [{ file: "a.md", message: "EACCES" }] };
    expect(describeStats(stats)).toBe("1 updated, 1 errors");
  });

  it("reports no changes when every counter is zero", () => {
    const stats = { files: [], copied: 0, updated: 0, unchanged: 0, errors: [] };
    expect(describeStats(stats)).toBe("No changes");
  });
});
