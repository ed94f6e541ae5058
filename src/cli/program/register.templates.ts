import type { Command } from "commander";

import { showCommand } from "../../commands/show.js";
import { templatesCommand } from "../../commands/templates.js";
import type { RuntimeEnv } from "../../runtime.js";
import { runCommandWithRuntime } from "../cli-utils.js";

export function registerTemplatesCommands(program: Command, runtime: RuntimeEnv) {
  program
    .command("templates")
    .description("List registered templates")
    .option("--json", "Output as JSON")
    .action(async (opts: { json?: boolean }) => {
      await runCommandWithRuntime(runtime, async () => {
        await templatesCommand({ json: Boolean(opts.json) }, runtime);
      });
    });

  program
    .command("show")
    .description("Describe a template's parameters")
    .argument("<template>", "Template id")
    .option("--json", "Output as JSON")
    .action(async (template: string, opts: { json?: boolean }) => {
      await runCommandWithRuntime(runtime, async () => {
        await showCommand(template, { json: Boolean(opts.json) }, runtime);
      });
    });
}
