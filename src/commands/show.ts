import { describeParameters, type ParameterDescription } from "../graph/parameters.js";
import { requireTemplate } from "../graph/registry.js";
import { registerBuiltinTemplates } from "../templates/index.js";
import { defaultRuntime, type RuntimeEnv } from "../runtime.js";
import { formatValue } from "./context.js";

export type ShowOptions = {
  json?: boolean;
};

function describeLine(p: ParameterDescription): string {
  const flags = [p.type, p.required ? "required" : "optional"];
  if (p.secure) flags.push("secure");
  if (p.deferrable) flags.push("deferrable");
  const parts = [`  ${p.name} (${flags.join(", ")})`];
  if (p.default !== undefined) parts.push(`default ${formatValue(p.default)}`);
  if (p.allowed) parts.push(`one of ${p.allowed.join(" | ")}`);
  if (p.description) parts.push(p.description);
  return parts.join("  ");
}

export async function showCommand(templateId: string, opts: ShowOptions, runtime: RuntimeEnv = defaultRuntime): Promise<void> {
  registerBuiltinTemplates();
  const template = requireTemplate(templateId);
  // Secure defaults are never printed.
  const parameters = describeParameters(template).map((p) => (p.secure ? { ...p, default: undefined } : p));

  if (opts.json) {
    runtime.log(
      JSON.stringify({ id: template.id, name: template.name, description: template.description, parameters }, null, 2),
    );
    return;
  }

  runtime.log(`${template.id}: ${template.name}`);
  runtime.log(template.description);
  runtime.log("");
  runtime.log("Parameters:");
  for (const p of parameters) runtime.log(describeLine(p));
}
