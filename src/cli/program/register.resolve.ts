import type { Command } from "commander";

import type { GraphCommandOptions } from "../../commands/context.js";
import { resolveCommand } from "../../commands/resolve.js";
import { simulateCommand } from "../../commands/simulate.js";
import type { RuntimeEnv } from "../../runtime.js";
import { collectOption, parsePositiveInt, runCommandWithRuntime } from "../cli-utils.js";

type GraphFlags = {
  param?: string[];
  paramsFile?: string;
  deploymentName?: string;
  subscriptionId?: string;
  config?: string;
  json?: boolean;
};

type SimulateFlags = GraphFlags & {
  dryRun?: boolean;
  maxConcurrency?: string;
  continueOnError?: boolean;
  fail?: string[];
};

function withGraphOptions(command: Command): Command {
  return command
    .argument("<template>", "Template id")
    .option("--param <key=value>", "Template parameter; JSON values keep their type (repeatable)", collectOption)
    .option("--params-file <file>", "JSON object of template parameters")
    .option("--deployment-name <name>", "Deployment name exposed to templates")
    .option("--subscription-id <id>", "Subscription id exposed to templates")
    .option("--config <file>", "Config file (default: ./stratum.config.json)")
    .option("--json", "Output as JSON");
}

function graphOptions(flags: GraphFlags): GraphCommandOptions {
  return {
    params: flags.param,
    paramsFile: flags.paramsFile,
    deploymentName: flags.deploymentName,
    subscriptionId: flags.subscriptionId,
    config: flags.config,
    json: Boolean(flags.json),
  };
}

export function registerResolveCommands(program: Command, runtime: RuntimeEnv) {
  withGraphOptions(program.command("resolve").description("Resolve a template into an ordered resource graph")).action(
    async (template: string, flags: GraphFlags) => {
      await runCommandWithRuntime(runtime, async () => {
        await resolveCommand(template, graphOptions(flags), runtime);
      });
    },
  );

  withGraphOptions(program.command("simulate").description("Resolve a template and apply it to an in-memory provider"))
    .option("--dry-run", "Plan requests without applying anything")
    .option("--max-concurrency <n>", "Nodes applied at once within a layer")
    .option("--continue-on-error", "Keep applying nodes that do not depend on a failure")
    .option("--fail <nodeId=message>", "Make the simulated provider fail a node (repeatable)", collectOption)
    .action(async (template: string, flags: SimulateFlags) => {
      await runCommandWithRuntime(runtime, async () => {
        await simulateCommand(
          template,
          {
            ...graphOptions(flags),
            dryRun: Boolean(flags.dryRun),
            maxConcurrency: parsePositiveInt(flags.maxConcurrency, "--max-concurrency"),
            continueOnError: Boolean(flags.continueOnError),
            fail: flags.fail,
          },
          runtime,
        );
      });
    });
}
