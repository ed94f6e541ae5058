/**
 * stratum — Template Resolver
 *
 * Turns a template and its parameters into a resolved resource graph:
 * parameters are bound, declarations expanded and pruned, references checked
 * and qualified, statically known attributes folded and module outputs
 * threaded into their consumers. Every issue found is collected and thrown as
 * one ResolutionError; nothing is ever handed to a provider from a graph that
 * failed to resolve.
 */

import { ParameterError, ResolutionError, type ResolutionIssue } from "../errors.js";
import { getLogger, type Logger } from "../logging/logger.js";
import { Redactor, REDACTED } from "../logging/redact.js";
import type {
  AnyTemplate,
  Declaration,
  DeploymentContext,
  EdgeReason,
  GraphEdge,
  GraphNode,
  ModuleDeclaration,
  ModuleNode,
  ResolvedGraph,
  ResourceDeclaration,
  ResourceNode,
  TemplateBody,
} from "../types.js";
import {
  collectReferences,
  concreteStrings,
  formatReference,
  isExpression,
  isQualified,
  readPath,
  substituteBag,
  substituteExpressions,
  type AttributeRef,
  type Deferred,
  type PropertyBag,
  type PropertyValue,
  type Reference,
} from "./expressions.js";
import { bindParameters, secureParameterValues } from "./parameters.js";
import { buildEdges, detectCycle, topologicalLayers } from "./planner.js";
import { getTemplate } from "./registry.js";

// =============================================================================
// Options
// =============================================================================

export type ResolveOptions = {
  deployment: DeploymentContext;
  logger?: Logger;
  /** Key names hidden in rendered output in addition to registered secrets. */
  sensitiveFields?: readonly string[];
  /** Regular expressions hidden in rendered text. */
  redactPatterns?: readonly string[];
};

// =============================================================================
// Internal State
// =============================================================================

type ResolveState = {
  deployment: DeploymentContext;
  logger: Logger;
  redactor: Redactor;
  nodes: GraphNode[];
  dependencies: GraphEdge[];
  excluded: string[];
  issues: ResolutionIssue[];
  /** Template ids being resolved, outermost first. */
  stack: string[];
};

type ScopeContext = {
  /** Qualified id of the enclosing module, or "" at the root. */
  prefix: string;
  /** Qualified ids every member of this scope must wait for. */
  externalDeps: readonly string[];
};

type LocalEntry =
  | { kind: "resource"; localId: string; decl: ResourceDeclaration; collection?: { symbol: string; index: number }; included: boolean }
  | { kind: "collection"; localId: string; members: string[]; included: boolean }
  | { kind: "module"; localId: string; decl: ModuleDeclaration; included: boolean };

/** What later declarations in the same scope may read from a processed one. */
type Folded =
  | { kind: "resource"; node: ResourceNode }
  | { kind: "module"; node: ModuleNode };

function qualify(prefix: string, localId: string): string {
  return prefix ? `${prefix}/${localId}` : localId;
}

// =============================================================================
// Entry Point
// =============================================================================

/**
 * Resolve a template (or a registered template id) into a graph.
 *
 * @throws ResolutionError carrying every issue found.
 */
export function resolveTemplate(
  template: AnyTemplate | string,
  input: Readonly<Record<string, unknown>>,
  options: ResolveOptions,
): ResolvedGraph {
  const root = typeof template === "string" ? getTemplate(template) : template;
  if (!root) {
    throw new ResolutionError([
      { code: "UNKNOWN_TEMPLATE", message: `Template "${String(template)}" is not registered` },
    ]);
  }

  const redactor = new Redactor({ sensitiveFields: options.sensitiveFields, patterns: options.redactPatterns });
  const state: ResolveState = {
    deployment: options.deployment,
    logger: (options.logger ?? getLogger("resolver"))
      .withContext({ deployment: options.deployment.deploymentName, template: root.id })
      .withRedactor(redactor),
    redactor,
    nodes: [],
    dependencies: [],
    excluded: [],
    issues: [],
    stack: [root.id],
  };

  const started = Date.now();
  const result = resolveScope(root, input, { prefix: "", externalDeps: [] }, state);
  if (state.issues.length > 0 || !result) {
    throw new ResolutionError(state.issues);
  }

  const ids = state.nodes.map((n) => n.id);
  const edges = buildEdges(ids, state.dependencies);
  const layers = topologicalLayers(ids, edges);
  const byId = new Map(state.nodes.map((n) => [n.id, n]));
  const nodes = layers.flat().flatMap((id) => {
    const node = byId.get(id);
    return node ? [node] : [];
  });

  state.logger.info("Template resolved", {
    nodes: nodes.length,
    edges: edges.length,
    layers: layers.length,
    excluded: state.excluded.length,
    durationMs: Date.now() - started,
  });

  return {
    template: root.id,
    deployment: options.deployment,
    nodes,
    edges,
    layers,
    outputs: result.outputs,
    secureOutputs: result.secureOutputs,
    excluded: state.excluded,
    redactor,
  };
}

// =============================================================================
// Scope Resolution
// =============================================================================

type ScopeResult = {
  outputs: Record<string, PropertyValue>;
  secureOutputs: string[];
};

function resolveScope(
  template: AnyTemplate,
  input: Readonly<Record<string, unknown>>,
  ctx: ScopeContext,
  state: ResolveState,
): ScopeResult | null {
  const log = state.logger.withContext({ template: template.id });

  // 1. Parameters
  const bound = bindParameters(template, input, ctx.prefix);
  if (!bound.ok) {
    state.issues.push(...bound.issues);
    return null;
  }
  for (const secret of secureParameterValues(template, bound.params)) {
    state.redactor.addSecret(secret);
  }

  // 2. Declarations
  let body: TemplateBody;
  try {
    body = template.declare(bound.params, state.deployment);
  } catch (err) {
    if (!(err instanceof ParameterError)) throw err;
    state.issues.push({
      code: "PARAMETER_CONSTRAINT",
      node: ctx.prefix || undefined,
      path: err.parameter,
      message: `Parameter "${err.parameter}" of template "${template.id}": ${err.message}`,
    });
    return null;
  }
  const entries = indexDeclarations(body.declarations, ctx.prefix, state);
  if (!entries) return null;

  for (const entry of entries.values()) {
    if (entry.included || (entry.kind === "resource" && entry.collection)) continue;
    state.excluded.push(qualify(ctx.prefix, entry.localId));
  }

  // 3. References
  const localDeps = checkReferences(entries, ctx.prefix, state);
  if (!localDeps) return null;

  // 4. Local order
  const localIds = [...entries.values()]
    .filter((e) => e.included && e.kind !== "collection")
    .map((e) => e.localId);
  const cycle = detectCycle(localIds, localDeps);
  if (cycle) {
    const path = cycle.map((id) => qualify(ctx.prefix, id));
    state.issues.push({
      code: "CIRCULAR_DEPENDENCY",
      node: path[0],
      message: `Circular dependency detected: ${path.join(" → ")}`,
    });
    return null;
  }
  const order = topologicalLayers(localIds, localDeps).flat();

  // 5. Qualify, fold and recurse in dependency order
  const folded = new Map<string, Folded>();
  for (const localId of order) {
    const entry = entries.get(localId);
    if (!entry || entry.kind === "collection") continue;
    if (entry.kind === "resource") {
      const node = resolveResource(entry.decl, entry.collection, entries, folded, ctx, state);
      folded.set(localId, { kind: "resource", node });
    } else {
      const node = resolveModule(entry.decl, entries, folded, ctx, state);
      if (!node) return null;
      folded.set(localId, { kind: "module", node });
    }
  }

  // 6. Outputs
  const outputs: Record<string, PropertyValue> = {};
  const secureOutputs: string[] = [];
  for (const [name, decl] of Object.entries(body.outputs ?? {})) {
    const scopeLabel = qualify(ctx.prefix, `outputs.${name}`);
    const value = substituteExpressions(
      decl.value,
      (ref) => replaceReference(ref, scopeLabel, null, folded, ctx.prefix, state),
      (ref) => reportInvalidPart(ref, scopeLabel, state),
    );
    outputs[name] = value;
    if (decl.secure) {
      secureOutputs.push(name);
      for (const secret of concreteStrings(value)) state.redactor.addSecret(secret);
    }
  }

  log.debug("Scope resolved", {
    scope: ctx.prefix || "(root)",
    declarations: entries.size,
    outputs: Object.keys(outputs).length,
  });
  return { outputs, secureOutputs };
}

// =============================================================================
// Indexing & Pruning
// =============================================================================

function indexDeclarations(
  declarations: readonly Declaration[],
  prefix: string,
  state: ResolveState,
): Map<string, LocalEntry> | null {
  const entries = new Map<string, LocalEntry>();
  const before = state.issues.length;

  const add = (entry: LocalEntry) => {
    if (entries.has(entry.localId)) {
      state.issues.push({
        code: "DUPLICATE_SYMBOL",
        node: qualify(prefix, entry.localId),
        message: `Symbol "${entry.localId}" is declared more than once`,
      });
      return;
    }
    entries.set(entry.localId, entry);
  };

  for (const decl of declarations) {
    const included = decl.condition !== false;
    if (decl.declaration === "resource") {
      add({ kind: "resource", localId: decl.symbol, decl, included });
    } else if (decl.declaration === "module") {
      add({ kind: "module", localId: decl.symbol, decl, included });
    } else {
      const populated = included && decl.elements.length > 0;
      const members = decl.elements.map((_, index) => `${decl.symbol}[${index}]`);
      add({ kind: "collection", localId: decl.symbol, members, included: populated });

      const names = new Map<string, number>();
      decl.elements.forEach((element, index) => {
        const localId = `${decl.symbol}[${index}]`;
        const first = names.get(element.name);
        if (first !== undefined && populated) {
          state.issues.push({
            code: "DUPLICATE_NAME",
            node: qualify(prefix, localId),
            message: `Name "${element.name}" is used by both ${decl.symbol}[${first}] and ${localId}`,
          });
        } else if (first === undefined) {
          names.set(element.name, index);
        }
        add({
          kind: "resource",
          localId,
          decl: {
            ...element,
            declaration: "resource",
            symbol: localId,
            parent: decl.parent,
            condition: decl.condition,
          },
          collection: { symbol: decl.symbol, index },
          included: populated,
        });
      });
    }
  }

  return state.issues.length > before ? null : entries;
}

// =============================================================================
// Reference Checks
// =============================================================================

function declarationReferences(entry: LocalEntry): Reference[] {
  if (entry.kind === "collection") return [];
  if (entry.kind === "module") return collectReferences(entry.decl.params).filter((r) => !isQualified(r));
  const { decl } = entry;
  return [
    ...collectReferences(decl.name),
    ...collectReferences(decl.location),
    ...collectReferences(decl.tags),
    ...collectReferences(decl.properties),
  ].filter((r) => !isQualified(r));
}

/**
 * Validate every symbol a declaration points at and return the local
 * dependency edges, or null when any reference is broken.
 */
function checkReferences(entries: Map<string, LocalEntry>, prefix: string, state: ResolveState): GraphEdge[] | null {
  const before = state.issues.length;
  const edges: GraphEdge[] = [];

  for (const entry of entries.values()) {
    if (!entry.included || entry.kind === "collection") continue;
    const from = entry.localId;
    const where = qualify(prefix, from);

    const target = (symbol: string, what: string): LocalEntry | undefined => {
      const found = entries.get(symbol);
      if (!found) {
        state.issues.push({
          code: "DANGLING_REFERENCE",
          node: where,
          message: `${what} "${symbol}" is not declared`,
        });
        return undefined;
      }
      if (!found.included) {
        state.issues.push({
          code: "DANGLING_REFERENCE",
          node: where,
          message: `${what} "${symbol}" is excluded by its condition`,
        });
        return undefined;
      }
      return found;
    };

    for (const ref of declarationReferences(entry)) {
      if (ref.$kind === "attr") {
        const found = target(ref.node, "Referenced declaration");
        if (!found) continue;
        if (found.kind !== "resource") {
          state.issues.push({
            code: "INVALID_REFERENCE",
            node: where,
            message: `Attribute reference ${formatReference(ref)} points at ${found.kind} "${ref.node}"; only resources have attributes`,
          });
          continue;
        }
        edges.push({ from, to: found.localId, reason: "reference" });
      } else {
        const found = target(ref.module, "Referenced module");
        if (!found) continue;
        if (found.kind !== "module") {
          state.issues.push({
            code: "INVALID_REFERENCE",
            node: where,
            message: `Output reference ${formatReference(ref)} points at ${found.kind} "${ref.module}"; only modules have outputs`,
          });
          continue;
        }
        edges.push({ from, to: found.localId, reason: "module-output" });
      }
    }

    const structural: Array<[string | undefined, "parent" | "scope"]> =
      entry.kind === "resource" ? [[entry.decl.parent, "parent"], [entry.decl.scope, "scope"]] : [[entry.decl.scope, "scope"]];
    for (const [symbol, reason] of structural) {
      if (symbol === undefined) continue;
      const found = target(symbol, reason === "parent" ? "Parent" : "Scope");
      if (!found) continue;
      if (found.kind !== "resource") {
        state.issues.push({
          code: "INVALID_REFERENCE",
          node: where,
          message: `${reason === "parent" ? "Parent" : "Scope"} "${symbol}" must be a resource`,
        });
        continue;
      }
      edges.push({ from, to: found.localId, reason });
    }

    for (const symbol of entry.decl.dependsOn ?? []) {
      const found = entries.get(symbol);
      if (!found) {
        state.issues.push({
          code: "DANGLING_REFERENCE",
          node: where,
          message: `Dependency "${symbol}" is not declared`,
        });
        continue;
      }
      // Ordering against an excluded declaration has nothing to wait for.
      if (!found.included) continue;
      const targets = found.kind === "collection" ? found.members : [found.localId];
      for (const to of targets) edges.push({ from, to, reason: "explicit" });
    }
  }

  return state.issues.length > before ? null : edges;
}

// =============================================================================
// Qualification & Folding
// =============================================================================

function recordDependency(state: ResolveState, from: string | null, to: string, reason: EdgeReason): void {
  if (from === null) return;
  state.dependencies.push({ from, to, reason });
}

/**
 * Replace one reference found while resolving `from` (null for template
 * outputs, which are not nodes).
 */
function replaceReference(
  ref: Reference,
  label: string,
  from: string | null,
  folded: Map<string, Folded>,
  prefix: string,
  state: ResolveState,
): PropertyValue {
  if (ref.$kind === "attr" && isQualified(ref)) {
    recordDependency(state, from, ref.node, "reference");
    return ref;
  }

  if (ref.$kind === "attr") {
    const target = folded.get(ref.node);
    if (target?.kind !== "resource") {
      // Unreachable once references are checked.
      state.issues.push({ code: "DANGLING_REFERENCE", node: label, message: `Unresolved reference ${formatReference(ref)}` });
      return null;
    }
    recordDependency(state, from, target.node.id, "reference");
    return foldAttribute(target.node, ref.path);
  }

  const target = folded.get(ref.module);
  if (target?.kind !== "module") {
    state.issues.push({ code: "DANGLING_REFERENCE", node: label, message: `Unresolved reference ${formatReference(ref)}` });
    return null;
  }
  recordDependency(state, from, target.node.id, "module-output");
  const value = target.node.outputs[ref.output];
  if (value === undefined) {
    state.issues.push({
      code: "UNKNOWN_OUTPUT",
      node: label,
      message: `Module "${qualify(prefix, ref.module)}" (template "${target.node.template}") has no output "${ref.output}"`,
    });
    return null;
  }
  return value;
}

/**
 * Statically known attributes fold to their values; anything the provider
 * computes stays a reference to the qualified node.
 */
function foldAttribute(node: ResourceNode, path: string): PropertyValue {
  if (path === "name") return node.name;
  if (path === "type") return node.type;
  if (!node.existing) {
    if (path === "location" && node.location !== undefined) return node.location;
    const declared = readPath(node.properties, path);
    if (declared !== undefined) return declared;
  }
  const deferred: AttributeRef = { $kind: "attr", node: node.id, path, qualified: true };
  return deferred;
}

function reportInvalidPart(ref: Reference, label: string, state: ResolveState): void {
  state.issues.push({
    code: "INVALID_EXPRESSION",
    node: label,
    message: `${formatReference(ref)} does not resolve to a scalar and cannot be interpolated`,
  });
}

function toDeferredString(value: PropertyValue, label: string, field: string, state: ResolveState): Deferred<string> {
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  if (isExpression(value)) return value;
  state.issues.push({
    code: "INVALID_EXPRESSION",
    node: label,
    message: `${field} must resolve to a string`,
  });
  return "";
}

/** Qualified ids of the resolved targets of `dependsOn`, expanding collections. */
function explicitTargets(
  dependsOn: readonly string[] | undefined,
  entries: Map<string, LocalEntry>,
  folded: Map<string, Folded>,
): string[] {
  const targets: string[] = [];
  for (const symbol of dependsOn ?? []) {
    const entry = entries.get(symbol);
    if (!entry?.included) continue;
    const locals = entry.kind === "collection" ? entry.members : [entry.localId];
    for (const local of locals) {
      const target = folded.get(local);
      if (target) targets.push(target.node.id);
    }
  }
  return targets;
}

function linkMember(state: ResolveState, id: string, ctx: ScopeContext): void {
  if (!ctx.prefix) return;
  recordDependency(state, ctx.prefix, id, "module-member");
  for (const dep of ctx.externalDeps) recordDependency(state, id, dep, "module-input");
}

function resolveResource(
  decl: ResourceDeclaration,
  collection: { symbol: string; index: number } | undefined,
  entries: Map<string, LocalEntry>,
  folded: Map<string, Folded>,
  ctx: ScopeContext,
  state: ResolveState,
): ResourceNode {
  const id = qualify(ctx.prefix, decl.symbol);
  const replace = (ref: Reference) => replaceReference(ref, id, id, folded, ctx.prefix, state);
  const invalid = (ref: Reference) => reportInvalidPart(ref, id, state);

  const node: ResourceNode = {
    kind: "resource",
    id,
    symbol: decl.symbol,
    module: ctx.prefix || null,
    type: decl.type,
    name: toDeferredString(substituteExpressions(decl.name, replace, invalid), id, "name", state),
    tags: {},
    properties: substituteBag(decl.properties ?? {}, replace, invalid),
    existing: decl.existing === true,
  };
  if (decl.location !== undefined) {
    node.location = toDeferredString(substituteExpressions(decl.location, replace, invalid), id, "location", state);
  }
  for (const [key, value] of Object.entries(decl.tags ?? {})) {
    node.tags[key] = toDeferredString(substituteExpressions(value, replace, invalid), id, `tag "${key}"`, state);
  }
  if (collection) node.collection = collection;

  for (const [symbol, reason] of [[decl.parent, "parent"], [decl.scope, "scope"]] as const) {
    if (symbol === undefined) continue;
    const target = folded.get(symbol);
    if (!target) continue;
    if (reason === "parent") node.parent = target.node.id;
    else node.scope = target.node.id;
    recordDependency(state, id, target.node.id, reason);
  }
  for (const target of explicitTargets(decl.dependsOn, entries, folded)) {
    recordDependency(state, id, target, "explicit");
  }

  linkMember(state, id, ctx);
  state.nodes.push(node);
  return node;
}

function resolveModule(
  decl: ModuleDeclaration,
  entries: Map<string, LocalEntry>,
  folded: Map<string, Folded>,
  ctx: ScopeContext,
  state: ResolveState,
): ModuleNode | null {
  const id = qualify(ctx.prefix, decl.symbol);
  const template = typeof decl.template === "string" ? getTemplate(decl.template) : decl.template;
  if (!template) {
    state.issues.push({
      code: "UNKNOWN_TEMPLATE",
      node: id,
      message: `Module "${id}" uses template "${String(decl.template)}", which is not registered`,
    });
    return null;
  }
  if (state.stack.includes(template.id)) {
    state.issues.push({
      code: "CIRCULAR_DEPENDENCY",
      node: id,
      message: `Template "${template.id}" includes itself: ${[...state.stack, template.id].join(" → ")}`,
    });
    return null;
  }

  // Everything this module's own inputs point at, so members can wait for it.
  const inputs: string[] = [];
  const track = (ref: Reference) => {
    const before = state.dependencies.length;
    const value = replaceReference(ref, id, id, folded, ctx.prefix, state);
    for (const dep of state.dependencies.slice(before)) inputs.push(dep.to);
    return value;
  };
  const params = substituteBag(decl.params, track, (ref) => reportInvalidPart(ref, id, state));

  const node: ModuleNode = {
    kind: "module",
    id,
    symbol: decl.symbol,
    module: ctx.prefix || null,
    template: template.id,
    outputs: {},
  };
  if (decl.scope !== undefined) {
    const target = folded.get(decl.scope);
    if (target) {
      node.scope = target.node.id;
      recordDependency(state, id, target.node.id, "scope");
      inputs.push(target.node.id);
    }
  }
  for (const target of explicitTargets(decl.dependsOn, entries, folded)) {
    recordDependency(state, id, target, "explicit");
    inputs.push(target);
  }

  linkMember(state, id, ctx);
  state.nodes.push(node);

  state.stack.push(template.id);
  const result = resolveScope(
    template,
    params,
    { prefix: id, externalDeps: [...new Set([...ctx.externalDeps, ...inputs])] },
    state,
  );
  state.stack.pop();
  if (!result) return null;

  node.outputs = result.outputs;
  return node;
}

// =============================================================================
// Graph Helpers
// =============================================================================

/** Resource nodes that will be created or updated (existing references excluded). */
export function provisionedNodes(graph: ResolvedGraph): ResourceNode[] {
  return graph.nodes.filter((n): n is ResourceNode => n.kind === "resource" && !n.existing);
}

export function nodesOfType(graph: ResolvedGraph, type: string): ResourceNode[] {
  return graph.nodes.filter((n): n is ResourceNode => n.kind === "resource" && n.type.toLowerCase() === type.toLowerCase());
}

export function findNode(graph: ResolvedGraph, id: string): GraphNode | undefined {
  return graph.nodes.find((n) => n.id === id);
}

/**
 * Render a deferred value for humans: references become `${node.path}`
 * placeholders.
 */
export function renderValue(value: PropertyValue): unknown {
  const placeholder = (ref: Reference) => `\${${formatReference(ref)}}`;
  return substituteExpressions(value, placeholder);
}

export type DisplayGraph = {
  template: string;
  deployment: DeploymentContext;
  nodes: Array<Record<string, unknown>>;
  edges: GraphEdge[];
  layers: string[][];
  outputs: Record<string, unknown>;
  excluded: string[];
};

/**
 * Plain JSON view of a graph with every secret and sensitive key redacted.
 */
export function toDisplayGraph(graph: ResolvedGraph): DisplayGraph {
  const { redactor } = graph;
  const nodes = graph.nodes.map((node): Record<string, unknown> => {
    if (node.kind === "module") {
      return {
        kind: node.kind,
        id: node.id,
        template: node.template,
        ...(node.scope ? { scope: node.scope } : {}),
        outputs: redactor.redactRecord(renderBag(node.outputs)),
      };
    }
    const view: Record<string, unknown> = {
      kind: node.kind,
      id: node.id,
      type: node.type,
      name: redactor.redactValue(renderValue(node.name)),
    };
    if (node.location !== undefined) view.location = redactor.redactValue(renderValue(node.location));
    if (node.parent) view.parent = node.parent;
    if (node.scope) view.scope = node.scope;
    if (node.existing) view.existing = true;
    if (Object.keys(node.tags).length > 0) view.tags = redactor.redactRecord(renderBag(node.tags));
    view.properties = redactor.redactRecord(renderBag(node.properties));
    return view;
  });

  const outputs: Record<string, unknown> = {};
  for (const [name, value] of Object.entries(graph.outputs)) {
    outputs[name] = graph.secureOutputs.includes(name) ? REDACTED : redactor.redactValue(renderValue(value));
  }

  return {
    template: graph.template,
    deployment: graph.deployment,
    nodes,
    edges: graph.edges,
    layers: graph.layers,
    outputs,
    excluded: graph.excluded,
  };
}

function renderBag(bag: PropertyBag): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(bag)) result[key] = renderValue(value);
  return result;
}
