import { toDisplayGraph, type DisplayGraph } from "../graph/resolver.js";
import { defaultRuntime, type RuntimeEnv } from "../runtime.js";
import { formatValue, prepareCommand, resolveForCommand, type GraphCommandOptions } from "./context.js";

function nodeLabel(node: Record<string, unknown>): string {
  if (node.kind === "module") return `module ${formatValue(node.template)}`;
  const existing = node.existing === true ? " (existing)" : "";
  return `${formatValue(node.type)} ${formatValue(node.name)}${existing}`;
}

export function renderGraph(view: DisplayGraph): string[] {
  const byId = new Map(view.nodes.map((n) => [String(n.id), n]));
  const lines = [
    `Resolved "${view.template}" (deployment ${view.deployment.deploymentName}): ${view.nodes.length} nodes in ${view.layers.length} layers`,
  ];

  view.layers.forEach((layer, index) => {
    lines.push(`Layer ${index + 1}:`);
    for (const id of layer) {
      const node = byId.get(id);
      if (node) lines.push(`  ${id}  ${nodeLabel(node)}`);
    }
  });

  if (view.excluded.length > 0) lines.push(`Excluded: ${view.excluded.join(", ")}`);

  const outputs = Object.entries(view.outputs);
  if (outputs.length > 0) {
    lines.push("Outputs:");
    for (const [name, value] of outputs) lines.push(`  ${name} = ${formatValue(value)}`);
  }
  return lines;
}

export async function resolveCommand(
  templateId: string,
  opts: GraphCommandOptions,
  runtime: RuntimeEnv = defaultRuntime,
): Promise<void> {
  const config = prepareCommand(opts.config);
  const graph = resolveForCommand(templateId, opts, config);
  const view = toDisplayGraph(graph);

  if (opts.json) {
    runtime.log(JSON.stringify(view, null, 2));
    return;
  }
  for (const line of renderGraph(view)) runtime.log(line);
}
