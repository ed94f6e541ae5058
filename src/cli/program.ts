import { Command } from "commander";

import { defaultRuntime, type RuntimeEnv } from "../runtime.js";
import { VERSION } from "../version.js";
import { registerResolveCommands } from "./program/register.resolve.js";
import { registerTemplatesCommands } from "./program/register.templates.js";

export function buildProgram(runtime: RuntimeEnv = defaultRuntime): Command {
  const program = new Command();
  program
    .name("stratum")
    .description("Resolve declarative cloud resource templates into ordered resource graphs")
    .version(VERSION);

  registerTemplatesCommands(program, runtime);
  registerResolveCommands(program, runtime);
  return program;
}

export async function runCli(argv: string[] = process.argv, runtime: RuntimeEnv = defaultRuntime): Promise<void> {
  await buildProgram(runtime).parseAsync(argv);
}
