/**
 * stratum — Apply Engine
 *
 * Drives a resolved graph against a ResourceProvider:
 * - Applies layer by layer with a concurrency limit per chunk
 * - Binds deferred attributes from the results of applied nodes
 * - Resolves module outputs and graph outputs
 * - Emits lifecycle events
 * - Honours cancellation (AbortSignal) by not starting new work
 *
 * There are no retries and no rollback: provider errors are reported as they
 * were thrown, and removing a resource means leaving it out of a later pass.
 */

import { getLogger, type Logger } from "../logging/logger.js";
import { readPath, substituteExpressions, type PropertyValue, type Reference } from "../graph/expressions.js";
import { transitiveDependents } from "../graph/planner.js";
import type { GraphNode, ModuleNode, ResolvedGraph, ResourceNode } from "../types.js";
import type { AppliedResource, ApplyRequest, ResourceProvider } from "./provider.js";

// =============================================================================
// Types
// =============================================================================

export type ApplyOptions = {
  /** Bind deferred values to `<pending:node.path>` and never call the provider. */
  dryRun: boolean;
  /** Nodes applied at once within a layer. */
  maxConcurrency: number;
  /** Stop scheduling anything after the first failure. */
  failFast: boolean;
  signal?: AbortSignal;
  logger?: Logger;
};

export type NodeStatus = "pending" | "running" | "succeeded" | "failed" | "skipped";

export type NodeApplyResult = {
  nodeId: string;
  /** Resource type, or "module". */
  type: string;
  status: NodeStatus;
  durationMs: number;
  /** The request sent to the provider (or that would have been, in a dry run). */
  request?: ApplyRequest;
  resource?: AppliedResource;
  /** Bound outputs of a module node. */
  outputs?: Record<string, PropertyValue>;
  error?: string;
  reason?: string;
};

export type ApplyEventType =
  | "apply:start"
  | "apply:complete"
  | "apply:failed"
  | "apply:cancelled"
  | "node:start"
  | "node:complete"
  | "node:failed"
  | "node:skipped";

export type ApplyEvent = {
  type: ApplyEventType;
  deployment: string;
  nodeId?: string;
  timestamp: string;
  message: string;
  error?: string;
  progress?: { completed: number; total: number; percentage: number };
};

export type ApplyEventListener = (event: ApplyEvent) => void;

export type ApplyResult = {
  template: string;
  deployment: string;
  provider: string;
  status: "succeeded" | "failed" | "cancelled";
  dryRun: boolean;
  startedAt: string;
  completedAt: string;
  totalDurationMs: number;
  nodes: NodeApplyResult[];
  outputs: Record<string, PropertyValue>;
  errors: string[];
};

const DEFAULT_OPTIONS: ApplyOptions = {
  dryRun: false,
  maxConcurrency: 4,
  failFast: true,
};

/** Placeholder for a value that a dry run cannot know. */
export function pendingValue(ref: Reference): string {
  return ref.$kind === "attr" ? `<pending:${ref.node}.${ref.path}>` : `<pending:${ref.module}.outputs.${ref.output}>`;
}

// =============================================================================
// Engine
// =============================================================================

type RunState = {
  graph: ResolvedGraph;
  options: ApplyOptions;
  byId: Map<string, GraphNode>;
  applied: Map<string, AppliedResource>;
  moduleOutputs: Map<string, Record<string, PropertyValue>>;
  results: Map<string, NodeApplyResult>;
  completed: number;
};

export class ApplyEngine {
  private readonly options: ApplyOptions;
  private listeners: ApplyEventListener[] = [];

  constructor(
    private readonly provider: ResourceProvider,
    options?: Partial<ApplyOptions>,
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /** Subscribe to lifecycle events. */
  on(listener: ApplyEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  private emit(event: Omit<ApplyEvent, "timestamp">): void {
    const full: ApplyEvent = { ...event, timestamp: new Date().toISOString() };
    for (const listener of this.listeners) {
      try {
        listener(full);
      } catch (err) {
        this.logger().warn("Event listener threw", { event: full.type, error: err instanceof Error ? err.message : String(err) });
      }
    }
  }

  private logger(graph?: ResolvedGraph): Logger {
    const base = this.options.logger ?? getLogger("apply");
    return graph ? base.withContext({ deployment: graph.deployment.deploymentName, template: graph.template }).withRedactor(graph.redactor) : base;
  }

  /**
   * Apply a resolved graph.
   */
  async apply(graph: ResolvedGraph): Promise<ApplyResult> {
    const started = Date.now();
    const opts = { ...this.options };
    const signal = opts.signal ?? new AbortController().signal;
    const log = this.logger(graph);
    const deployment = graph.deployment.deploymentName;
    const total = graph.nodes.length;

    const state: RunState = {
      graph,
      options: opts,
      byId: new Map(graph.nodes.map((n) => [n.id, n])),
      applied: new Map(),
      moduleOutputs: new Map(),
      results: new Map(),
      completed: 0,
    };

    this.emit({
      type: "apply:start",
      deployment,
      message: `Applying "${graph.template}" with ${total} nodes through ${this.provider.name}${opts.dryRun ? " (dry-run)" : ""}`,
      progress: { completed: 0, total, percentage: 0 },
    });
    log.info("Apply started", { nodes: total, provider: this.provider.name, dryRun: opts.dryRun });

    const failed = new Set<string>();
    let blocked = new Set<string>();

    for (const layer of graph.layers) {
      if (failed.size > 0 && opts.failFast) break;
      if (signal.aborted) break;

      const runnable: GraphNode[] = [];
      for (const id of layer) {
        const node = state.byId.get(id);
        if (!node) continue;
        if (blocked.has(id)) {
          this.markSkipped(state, node, "A dependency failed");
          continue;
        }
        runnable.push(node);
      }

      for (const chunk of chunkArray(runnable, Math.min(opts.maxConcurrency, runnable.length))) {
        if (failed.size > 0 && opts.failFast) break;
        if (signal.aborted) break;

        const settled = await Promise.allSettled(chunk.map((node) => this.applyNode(node, state, signal)));
        settled.forEach((outcome, i) => {
          const node = chunk[i];
          if (!node) return;
          const result: NodeApplyResult =
            outcome.status === "fulfilled"
              ? outcome.value
              : { nodeId: node.id, type: nodeType(node), status: "failed", durationMs: 0, error: errorMessage(outcome.reason) };
          state.results.set(node.id, result);
          if (result.status === "failed") failed.add(node.id);
        });
      }

      if (failed.size > 0 && !opts.failFast) {
        blocked = transitiveDependents(failed, graph.edges);
      }
    }

    // Everything not reached is skipped
    for (const node of graph.nodes) {
      if (state.results.has(node.id)) continue;
      const reason = signal.aborted ? "Cancelled" : failed.size > 0 ? "Skipped due to earlier failure" : "Not reached";
      this.markSkipped(state, node, reason);
    }

    const nodes = graph.nodes.flatMap((n) => {
      const result = state.results.get(n.id);
      return result ? [result] : [];
    });
    const errors = nodes.flatMap((r) => (r.status === "failed" && r.error !== undefined ? [`${r.nodeId}: ${r.error}`] : []));

    let outputs: Record<string, PropertyValue> = {};
    let status: ApplyResult["status"] = signal.aborted ? "cancelled" : failed.size > 0 ? "failed" : "succeeded";
    if (status === "succeeded") {
      try {
        outputs = bindRecord(graph.outputs, state);
      } catch (err) {
        status = "failed";
        errors.push(`outputs: ${errorMessage(err)}`);
      }
    }

    const durationMs = Date.now() - started;
    if (status === "cancelled") {
      this.emit({ type: "apply:cancelled", deployment, message: "Apply was cancelled" });
      errors.push("Apply was cancelled");
      log.warn("Apply cancelled", { completed: state.completed, total });
    } else if (status === "failed") {
      this.emit({ type: "apply:failed", deployment, message: `Apply of "${graph.template}" failed`, error: errors[0] });
      log.error("Apply failed", { errors: errors.length, durationMs });
    } else {
      this.emit({
        type: "apply:complete",
        deployment,
        message: `Apply of "${graph.template}" completed in ${durationMs}ms`,
        progress: { completed: total, total, percentage: 100 },
      });
      log.info("Apply completed", { nodes: total, durationMs });
    }

    return {
      template: graph.template,
      deployment,
      provider: this.provider.name,
      status,
      dryRun: opts.dryRun,
      startedAt: new Date(started).toISOString(),
      completedAt: new Date().toISOString(),
      totalDurationMs: durationMs,
      nodes,
      outputs,
      errors,
    };
  }

  // ---------------------------------------------------------------------------
  // Node Application
  // ---------------------------------------------------------------------------

  private async applyNode(node: GraphNode, state: RunState, signal: AbortSignal): Promise<NodeApplyResult> {
    const started = Date.now();
    const deployment = state.graph.deployment.deploymentName;
    this.emit({ type: "node:start", deployment, nodeId: node.id, message: `Applying ${describeNode(node)}` });

    try {
      const result = node.kind === "module" ? this.completeModule(node, state) : await this.applyResource(node, state, signal);
      result.durationMs = Date.now() - started;
      state.completed += 1;
      const total = state.graph.nodes.length;
      this.emit({
        type: "node:complete",
        deployment,
        nodeId: node.id,
        message: `${describeNode(node)} ${state.options.dryRun ? "planned" : "applied"} in ${result.durationMs}ms`,
        progress: { completed: state.completed, total, percentage: Math.round((state.completed / total) * 100) },
      });
      return result;
    } catch (err) {
      const error = errorMessage(err);
      this.emit({ type: "node:failed", deployment, nodeId: node.id, message: `${describeNode(node)} failed: ${error}`, error });
      return { nodeId: node.id, type: nodeType(node), status: "failed", durationMs: Date.now() - started, error };
    }
  }

  private completeModule(node: ModuleNode, state: RunState): NodeApplyResult {
    const outputs = bindRecord(node.outputs, state);
    state.moduleOutputs.set(node.id, outputs);
    return { nodeId: node.id, type: "module", status: "succeeded", durationMs: 0, outputs };
  }

  private async applyResource(node: ResourceNode, state: RunState, signal: AbortSignal): Promise<NodeApplyResult> {
    const request = buildRequest(node, state);
    if (state.options.dryRun) {
      return { nodeId: node.id, type: node.type, status: "succeeded", durationMs: 0, request };
    }
    const resource = node.existing
      ? await this.provider.read(request, signal)
      : await this.provider.apply(request, signal);
    state.applied.set(node.id, resource);
    return { nodeId: node.id, type: node.type, status: "succeeded", durationMs: 0, request, resource };
  }

  private markSkipped(state: RunState, node: GraphNode, reason: string): void {
    state.results.set(node.id, { nodeId: node.id, type: nodeType(node), status: "skipped", durationMs: 0, reason });
    this.emit({
      type: "node:skipped",
      deployment: state.graph.deployment.deploymentName,
      nodeId: node.id,
      message: `${describeNode(node)} skipped: ${reason}`,
    });
  }
}

// =============================================================================
// Binding
// =============================================================================

function bindValue(value: PropertyValue, state: RunState): PropertyValue {
  return substituteExpressions(value, (ref) => bindReference(ref, state));
}

function bindRecord(record: Readonly<Record<string, PropertyValue>>, state: RunState): Record<string, PropertyValue> {
  const result: Record<string, PropertyValue> = {};
  for (const [key, value] of Object.entries(record)) result[key] = bindValue(value, state);
  return result;
}

function bindReference(ref: Reference, state: RunState): PropertyValue {
  if (ref.$kind === "output") {
    const outputs = state.moduleOutputs.get(ref.module);
    const value = outputs?.[ref.output];
    if (value !== undefined) return value;
    if (state.options.dryRun) return pendingValue(ref);
    throw new Error(`Output "${ref.output}" of module "${ref.module}" is not available`);
  }

  const resource = state.applied.get(ref.node);
  if (resource) {
    const value = ref.path === "id" ? resource.id : readPath(resource.attributes, ref.path);
    if (value !== undefined) return value;
  }
  if (state.options.dryRun) return pendingValue(ref);
  if (!resource) throw new Error(`"${ref.node}" has not been applied`);
  throw new Error(`"${ref.node}" has no attribute "${ref.path}"`);
}

function bindString(value: PropertyValue, state: RunState, field: string): string {
  const bound = bindValue(value, state);
  if (typeof bound === "string") return bound;
  if (typeof bound === "number" || typeof bound === "boolean") return String(bound);
  throw new Error(`${field} did not bind to a string`);
}

/** Provider id of an applied (or, in a dry run, planned) node. */
function appliedId(id: string, state: RunState): string {
  const resource = state.applied.get(id);
  if (resource) return resource.id;
  if (state.options.dryRun) return `<pending:${id}.id>`;
  throw new Error(`"${id}" has not been applied`);
}

/**
 * Explicit scope, or the scope of the nearest enclosing module that has one.
 */
function effectiveScope(node: ResourceNode, state: RunState): string | undefined {
  if (node.scope) return node.scope;
  if (node.parent) return undefined;
  let moduleId = node.module;
  while (moduleId) {
    const enclosing = state.byId.get(moduleId);
    if (enclosing?.kind !== "module") return undefined;
    if (enclosing.scope) return enclosing.scope;
    moduleId = enclosing.module;
  }
  return undefined;
}

function buildRequest(node: ResourceNode, state: RunState): ApplyRequest {
  const tags: Record<string, string> = {};
  for (const [key, value] of Object.entries(node.tags)) {
    tags[key] = bindString(value, state, `Tag "${key}"`);
  }
  const request: ApplyRequest = {
    nodeId: node.id,
    type: node.type,
    name: bindString(node.name, state, "Name"),
    tags,
    properties: bindRecord(node.properties, state),
    existing: node.existing,
  };
  if (node.location !== undefined) request.location = bindString(node.location, state, "Location");
  if (node.parent) request.parentId = appliedId(node.parent, state);
  const scope = effectiveScope(node, state);
  if (scope) request.scopeId = appliedId(scope, state);
  return request;
}

// =============================================================================
// Helpers
// =============================================================================

function nodeType(node: GraphNode): string {
  return node.kind === "module" ? "module" : node.type;
}

function describeNode(node: GraphNode): string {
  return node.kind === "module" ? `module "${node.id}" (${node.template})` : `${node.type} "${node.id}"`;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function chunkArray<T>(array: T[], chunkSize: number): T[][] {
  if (chunkSize <= 0) return array.length > 0 ? [array] : [];
  const chunks: T[][] = [];
  for (let i = 0; i < array.length; i += chunkSize) {
    chunks.push(array.slice(i, i + chunkSize));
  }
  return chunks;
}

// =============================================================================
// Convenience
// =============================================================================

/**
 * Apply a resolved graph in one call.
 */
export async function applyGraph(
  graph: ResolvedGraph,
  provider: ResourceProvider,
  options?: Partial<ApplyOptions>,
  listener?: ApplyEventListener,
): Promise<ApplyResult> {
  const engine = new ApplyEngine(provider, options);
  if (listener) engine.on(listener);
  return engine.apply(graph);
}
