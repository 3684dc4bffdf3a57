import * as React from "react";
import { Text, Box } from "ink";
import { z } from "zod";
import {
  bootstrap,
  type BootstrapContext,
  type BootstrapResult,
  type StepReport,
  type StepStatus,
} from "../lib/bootstrap.js";
import { CONFIG_DIR_NAME } from "../lib/config.js";
import { formatError } from "../lib/errors.js";

export const description = "Set up rules, tracking docs and repository for a project";

export const options = z.object({
  source: z
    .string()
    .optional()
    .describe("Directory to read rule files from (default: bundled rules)"),
  githubUser: z
    .string()
    .optional()
    .describe("GitHub owner used when the repository already exists (default: logged-in user)"),
  branch: z
    .string()
    .optional()
    .describe("Default branch to create and push (default: current branch)"),
  visibility: z
    .enum(["public", "private"])
    .default("public")
    .describe("Visibility of a newly created GitHub repository"),
  remote: z
    .boolean()
    .default(true)
    .describe("Create and push a GitHub repository (use --no-remote to skip)"),
});

export const args = z.tuple([
  z.string().optional().describe("Target project directory (default: cwd)"),
  z.string().optional().describe("Project name (default: target directory name)"),
]);

type Props = {
  options: z.infer<typeof options>;
  args: z.infer<typeof args>;
};

type SetupState =
  | { status: "running"; context: BootstrapContext | null; steps: StepReport[] }
  | { status: "success"; result: BootstrapResult }
  | { status: "error"; context: BootstrapContext | null; steps: StepReport[]; message: string };

const STATUS_COLORS: Record<StepStatus, string | undefined> = {
  created: "green",
  updated: "green",
  unchanged: undefined,
  skipped: "gray",
  warning: "yellow",
};

export default function Setup({ options, args }: Props) {
  const [state, setState] = React.useState<SetupState>({ status: "running", context: null, steps: [] });

  React.useEffect(() => {
    async function setup() {
      const [targetDir, projectName] = args;
      let context: BootstrapContext | null = null;
      const steps: StepReport[] = [];

      try {
        const result = await bootstrap({
          targetDir,
          projectName,
          sourceDir: options.source,
          githubUser: options.githubUser,
          branch: options.branch,
          visibility: options.visibility,
          remote: options.remote,
          onProgress: (event) => {
            if (event.type === "start") {
              context = event.context;
            } else {
              steps.push(event.step);
            }
            setState({ status: "running", context, steps: [...steps] });
          },
        });
        setState({ status: "success", result });
      } catch (err) {
        process.exitCode = 1;
        setState({ status: "error", context, steps: [...steps], message: formatError(err) });
      }
    }

    setup();
  }, [args, options]);

  const context = state.status === "success" ? state.result.context : state.context;
  const steps = state.status === "success" ? state.result.steps : state.steps;

  return (
    <Box flexDirection="column">
      <Text bold>Agent Rules Setup</Text>
      {context && <Header context={context} />}
      {steps.map((step) => (
        <Step key={step.index} step={step} />
      ))}
      {state.status === "running" && <Text dimColor>Working...</Text>}
      {state.status === "error" && <Text color="red">Error: {state.message}</Text>}
      {state.status === "success" && <Summary result={state.result} />}
    </Box>
  );
}

function Header({ context }: { context: BootstrapContext }) {
  return (
    <Box flexDirection="column" marginY={1}>
      <Text>Source:  {context.sourceDir}</Text>
      <Text>Target:  {context.targetDir}</Text>
      <Text>Project: {context.projectName}</Text>
    </Box>
  );
}

function Step({ step }: { step: StepReport }) {
  return (
    <Box flexDirection="column">
      <Text color={STATUS_COLORS[step.status]}>
        [{step.index}/{step.total}] {step.message}
      </Text>
      {step.details.map((detail, i) => (
        <Text key={i} dimColor={step.status !== "warning"}>
          {"       "}
          {detail}
        </Text>
      ))}
    </Box>
  );
}

function Summary({ result }: { result: BootstrapResult }) {
  const { remote } = result;
  const repoUrl = remote.status === "configured" ? remote.repoUrl : null;

  return (
    <Box flexDirection="column" marginTop={1}>
      <Text color="green" bold>Setup complete!</Text>
      {repoUrl && <Text>Repository: {repoUrl}</Text>}
      {remote.status === "not_authenticated" && (
        <Text color="yellow">Local setup finished; GitHub repository was not created.</Text>
      )}
      <Text dimColor>Files in place:</Text>
      <Text dimColor>  - {CONFIG_DIR_NAME}/ folder with {result.context.ruleFiles.length} rule files</Text>
      <Text dimColor>  - {CONFIG_DIR_NAME}/TODO.md and {CONFIG_DIR_NAME}/PROJECT.md</Text>
      <Text dimColor>  - .gitignore (with {CONFIG_DIR_NAME}/ excluded)</Text>
    </Box>
  );
}
