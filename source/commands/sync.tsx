import * as React from "react";
import { Text, Box } from "ink";
import { z } from "zod";
import { basename, join, resolve } from "path";
import { CONFIG_DIR_NAME, getRulesDir } from "../lib/config.js";
import { formatError } from "../lib/errors.js";
import { resolveTargetDir } from "../lib/filesystem.js";
import { describeStats, findRuleProjects, listRuleFiles, syncRuleFiles, type SyncStats } from "../lib/rules.js";

export const description = "Refresh rule files in projects that already have a .claude folder";

export const options = z.object({
  project: z
    .string()
    .optional()
    .describe("Specific project path to sync to"),
  all: z
    .boolean()
    .default(false)
    .describe("Sync to every project with a .claude folder under --parent"),
  parent: z
    .string()
    .optional()
    .describe("Directory scanned by --all (default: cwd)"),
  source: z
    .string()
    .optional()
    .describe("Directory to read rule files from (default: bundled rules)"),
  dryRun: z
    .boolean()
    .default(false)
    .describe("Show what would be synced without copying"),
  verbose: z
    .boolean()
    .default(false)
    .describe("Show the outcome for every file"),
});

export const args = z.tuple([]);

type Props = {
  options: z.infer<typeof options>;
  args: z.infer<typeof args>;
};

type ProjectSync = {
  path: string;
  stats: SyncStats;
};

type SyncState =
  | { status: "loading"; message: string }
  | { status: "success"; sourceDir: string; ruleFiles: string[]; results: ProjectSync[] }
  | { status: "error"; message: string };

export default function Sync({ options }: Props) {
  const [state, setState] = React.useState<SyncState>({ status: "loading", message: "Starting sync..." });

  React.useEffect(() => {
    async function sync() {
      if (!options.project && !options.all) {
        process.exitCode = 1;
        setState({ status: "error", message: "Must specify either --project or --all" });
        return;
      }

      try {
        const sourceDir = getRulesDir(options.source);
        const ruleFiles = await listRuleFiles(sourceDir);

        let projects: string[];
        if (options.project) {
          projects = [await resolveTargetDir(options.project)];
        } else {
          projects = await findRuleProjects(resolve(options.parent ?? process.cwd()), [sourceDir]);
        }

        const results: ProjectSync[] = [];
        for (const project of projects) {
          setState({ status: "loading", message: `Syncing ${basename(project)}...` });
          const stats = await syncRuleFiles(ruleFiles, join(project, CONFIG_DIR_NAME), {
            dryRun: options.dryRun,
          });
          results.push({ path: project, stats });
        }

        if (results.some((r) => r.stats.errors.length > 0)) {
          process.exitCode = 1;
        }
        setState({ status: "success", sourceDir, ruleFiles, results });
      } catch (err) {
        process.exitCode = 1;
        setState({ status: "error", message: formatError(err) });
      }
    }

    sync();
  }, [options]);

  if (state.status === "loading") {
    return <Text>{state.message}</Text>;
  }

  if (state.status === "error") {
    return <Text color="red">Error: {state.message}</Text>;
  }

  if (state.results.length === 0) {
    return <Text color="yellow">No projects found with {CONFIG_DIR_NAME}/ directories</Text>;
  }

  const totals = summarize(state.results.map((r) => r.stats));

  return (
    <Box flexDirection="column">
      <Text>Source: {state.sourceDir}</Text>
      <Text>Rule files: {state.ruleFiles.length}</Text>
      {state.ruleFiles.map((file) => (
        <Text key={file} dimColor>  - {basename(file)}</Text>
      ))}
      {options.dryRun && <Text color="yellow">DRY RUN - no files will be copied</Text>}

      {state.results.map((result) => (
        <Box key={result.path} flexDirection="column" marginTop={1}>
          <Text bold>{basename(result.path)}</Text>
          {options.verbose &&
            result.stats.files.map((file) => (
              <Text key={file.name} dimColor={file.action === "unchanged"}>
                {"  "}{file.name} ({file.action})
              </Text>
            ))}
          {!options.verbose && <Text>  {describeStats(result.stats)}</Text>}
          {result.stats.errors.map((error) => (
            <Text key={error.file} color="red">  {error.file} - ERROR: {error.message}</Text>
          ))}
        </Box>
      ))}

      <Box flexDirection="column" marginTop={1}>
        <Text bold>{options.dryRun ? "Dry run summary" : "Sync complete"}</Text>
        <Text>Projects synced: {state.results.length}</Text>
        <Text color="green">Files copied:    {totals.copied}</Text>
        <Text color="yellow">Files updated:   {totals.updated}</Text>
        <Text>Files unchanged: {totals.unchanged}</Text>
        {totals.errors > 0 && <Text color="red">Errors:          {totals.errors}</Text>}
      </Box>
    </Box>
  );
}

function summarize(all: SyncStats[]) {
  return all.reduce(
    (acc, s) => ({
      copied: acc.copied + s.copied,
      updated: acc.updated + s.updated,
      unchanged: acc.unchanged + s.unchanged,
      errors: acc.errors + s.errors.length,
    }),
    { copied: 0, updated: 0, unchanged: 0, errors: 0 }
  );
}
