import { listTemplates } from "../graph/registry.js";
import { registerBuiltinTemplates } from "../templates/index.js";
import { defaultRuntime, type RuntimeEnv } from "../runtime.js";

export type TemplatesOptions = {
  json?: boolean;
};

export async function templatesCommand(opts: TemplatesOptions, runtime: RuntimeEnv = defaultRuntime): Promise<void> {
  registerBuiltinTemplates();
  const templates = listTemplates().map((t) => ({ id: t.id, name: t.name, description: t.description }));

  if (opts.json) {
    runtime.log(JSON.stringify(templates, null, 2));
    return;
  }

  const width = Math.max(0, ...templates.map((t) => t.id.length));
  for (const t of templates) {
    runtime.log(`${t.id.padEnd(width)}  ${t.description}`);
  }
}
