import { appendFile, readFile, writeFile } from "fs/promises";
import { join } from "path";

export type IgnoreOutcome = "created" | "appended" | "present";

/**
 * Lines that already exclude `entry`. For a directory entry such as
 * ".claude/" the bare ".claude" form counts too.
 */
function matchingLines(entry: string): string[] {
  const bare = entry.endsWith("/") ? entry.slice(0, -1) : entry;
  return bare === entry ? [entry] : [entry, bare];
}

/**
 * Ensure the .gitignore in `dir` lists `entry` exactly once.
 * - no .gitignore: created with `entry` as its only line
 * - entry missing: one line appended, other lines untouched
 * - entry present: nothing written
 */
export async function ensureIgnoreEntry(dir: string, entry: string): Promise<IgnoreOutcome> {
  const gitignorePath = join(dir, ".gitignore");

  let content: string;
  try {
    content = await readFile(gitignorePath, "utf-8");
  } catch (err) {
    if (isNotFound(err)) {
      await writeFile(gitignorePath, `${entry}\n`);
      return "created";
    }
    throw err;
  }

  const accepted = matchingLines(entry);
  const lines = content.split(/\r?\n/);
  if (lines.some((line) => accepted.includes(line.trim()))) {
    return "present";
  }

  const newEntry = content === "" || content.endsWith("\n") ? `${entry}\n` : `\n${entry}\n`;
  await appendFile(gitignorePath, newEntry);
  return "appended";
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
