import { applyGraph, type ApplyEvent, type ApplyResult } from "../apply/engine.js";
import { SimulatedProvider } from "../apply/simulated.js";
import { parseAssignment } from "../cli/params.js";
import { REDACTED } from "../logging/redact.js";
import { defaultRuntime, type RuntimeEnv } from "../runtime.js";
import type { ResolvedGraph } from "../types.js";
import { formatValue, prepareCommand, resolveForCommand, type GraphCommandOptions } from "./context.js";

export type SimulateOptions = GraphCommandOptions & {
  dryRun?: boolean;
  maxConcurrency?: number;
  continueOnError?: boolean;
  /** `nodeId=message` pairs the simulated provider fails with. */
  fail?: string[];
};

function redactedOutputs(result: ApplyResult, graph: ResolvedGraph): Record<string, unknown> {
  const outputs: Record<string, unknown> = {};
  for (const [name, value] of Object.entries(result.outputs)) {
    outputs[name] = graph.secureOutputs.includes(name) ? REDACTED : graph.redactor.redactValue(value);
  }
  return outputs;
}

export async function simulateCommand(
  templateId: string,
  opts: SimulateOptions,
  runtime: RuntimeEnv = defaultRuntime,
): Promise<void> {
  const config = prepareCommand(opts.config);
  const graph = resolveForCommand(templateId, opts, config);
  const { redactor } = graph;

  const failures: Record<string, string> = {};
  for (const raw of opts.fail ?? []) {
    const { key, value } = parseAssignment(raw, "--fail");
    failures[key] = formatValue(value);
  }
  const provider = new SimulatedProvider({
    subscriptionId: graph.deployment.subscriptionId,
    failures,
  });

  const events: ApplyEvent[] = [];
  const onEvent = (event: ApplyEvent) => {
    if (opts.json) {
      events.push(event);
    } else {
      runtime.log(redactor.redactText(`[${event.type}] ${event.message}`));
    }
  };

  const result = await applyGraph(
    graph,
    provider,
    {
      dryRun: Boolean(opts.dryRun),
      maxConcurrency: opts.maxConcurrency ?? config.apply.maxConcurrency,
      failFast: opts.continueOnError ? false : config.apply.failFast,
    },
    onEvent,
  );
  const outputs = redactedOutputs(result, graph);
  const errors = result.errors.map((e) => redactor.redactText(e));

  if (opts.json) {
    runtime.log(
      JSON.stringify(
        {
          template: result.template,
          deployment: result.deployment,
          status: result.status,
          dryRun: result.dryRun,
          events: events.map((e) => redactor.redactValue(e)),
          nodes: result.nodes.map((n) => ({
            nodeId: n.nodeId,
            type: n.type,
            status: n.status,
            ...(n.error !== undefined ? { error: redactor.redactText(n.error) } : {}),
            ...(n.reason !== undefined ? { reason: n.reason } : {}),
          })),
          outputs,
          errors,
        },
        null,
        2,
      ),
    );
  } else {
    const count = (status: string) => result.nodes.filter((n) => n.status === status).length;
    runtime.log(
      `Status: ${result.status} (${count("succeeded")} succeeded, ${count("failed")} failed, ${count("skipped")} skipped)`,
    );
    const entries = Object.entries(outputs);
    if (entries.length > 0) {
      runtime.log("Outputs:");
      for (const [name, value] of entries) runtime.log(`  ${name} = ${formatValue(value)}`);
    }
  }

  if (result.status !== "succeeded") {
    for (const error of errors) runtime.error(error);
    runtime.exit(1);
  }
}
