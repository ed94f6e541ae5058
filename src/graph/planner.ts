/**
 * stratum — Dependency Planner
 *
 * Edge construction, cycle detection and layered topological sort over the
 * qualified node ids produced by resolution.
 */

import { ResolutionError } from "../errors.js";
import type { GraphEdge } from "../types.js";

// =============================================================================
// Edges
// =============================================================================

/**
 * Flatten recorded dependencies into edges. Duplicates (same `from` and `to`)
 * keep the first recorded reason; self edges and edges to unknown ids are
 * dropped.
 */
export function buildEdges(ids: readonly string[], dependencies: Iterable<GraphEdge>): GraphEdge[] {
  const known = new Set(ids);
  const seen = new Set<string>();
  const edges: GraphEdge[] = [];
  for (const dep of dependencies) {
    if (dep.from === dep.to || !known.has(dep.from) || !known.has(dep.to)) continue;
    const key = `${dep.from}\u0000${dep.to}`;
    if (seen.has(key)) continue;
    seen.add(key);
    edges.push(dep);
  }
  return edges;
}

/** Map from id to the ids it depends on, in edge order. */
function dependencyMap(ids: readonly string[], edges: readonly GraphEdge[]): Map<string, string[]> {
  const deps = new Map<string, string[]>();
  for (const id of ids) deps.set(id, []);
  for (const edge of edges) {
    deps.get(edge.from)?.push(edge.to);
  }
  return deps;
}

// =============================================================================
// Cycle Detection
// =============================================================================

const WHITE = 0;
const GRAY = 1;
const BLACK = 2;

/**
 * Detect cycles using DFS.
 * Returns the cycle path (first id repeated at the end), or null.
 */
export function detectCycle(ids: readonly string[], edges: readonly GraphEdge[]): string[] | null {
  const deps = dependencyMap(ids, edges);
  const color = new Map<string, number>();
  for (const id of ids) color.set(id, WHITE);
  const stack: string[] = [];

  const visit = (id: string): string[] | null => {
    color.set(id, GRAY);
    stack.push(id);
    for (const dep of deps.get(id) ?? []) {
      const state = color.get(dep);
      if (state === GRAY) {
        return [...stack.slice(stack.indexOf(dep)), dep];
      }
      if (state === WHITE) {
        const cycle = visit(dep);
        if (cycle) return cycle;
      }
    }
    stack.pop();
    color.set(id, BLACK);
    return null;
  };

  for (const id of ids) {
    if (color.get(id) !== WHITE) continue;
    const cycle = visit(id);
    if (cycle) return cycle;
  }
  return null;
}

// =============================================================================
// Topological Sort
// =============================================================================

/**
 * Layered topological sort (Kahn's algorithm). Ids in one layer have no path
 * between them; within a layer ids keep their order in `ids`.
 *
 * @throws ResolutionError with CIRCULAR_DEPENDENCY when a cycle remains.
 */
export function topologicalLayers(ids: readonly string[], edges: readonly GraphEdge[]): string[][] {
  const position = new Map(ids.map((id, i) => [id, i]));
  const inDegree = new Map<string, number>();
  const dependents = new Map<string, string[]>();
  for (const id of ids) {
    inDegree.set(id, 0);
    dependents.set(id, []);
  }
  for (const edge of edges) {
    if (!position.has(edge.from) || !position.has(edge.to)) continue;
    dependents.get(edge.to)?.push(edge.from);
    inDegree.set(edge.from, (inDegree.get(edge.from) ?? 0) + 1);
  }

  const byPosition = (a: string, b: string) => (position.get(a) ?? 0) - (position.get(b) ?? 0);
  const layers: string[][] = [];
  let queue = ids.filter((id) => inDegree.get(id) === 0);
  let processed = 0;

  while (queue.length > 0) {
    layers.push(queue);
    processed += queue.length;

    const next: string[] = [];
    for (const id of queue) {
      for (const dependent of dependents.get(id) ?? []) {
        const degree = (inDegree.get(dependent) ?? 1) - 1;
        inDegree.set(dependent, degree);
        if (degree === 0) next.push(dependent);
      }
    }
    queue = next.sort(byPosition);
  }

  if (processed < ids.length) {
    const remaining = ids.filter((id) => (inDegree.get(id) ?? 0) > 0);
    const cycle = detectCycle(remaining, edges) ?? remaining;
    throw new ResolutionError([
      {
        code: "CIRCULAR_DEPENDENCY",
        node: cycle[0],
        message: `Circular dependency detected: ${cycle.join(" → ")}`,
      },
    ]);
  }

  return layers;
}

// =============================================================================
// Reachability
// =============================================================================

/** Whether `from` depends on `to`, directly or through other nodes. */
export function isTransitiveDependency(from: string, to: string, edges: readonly GraphEdge[]): boolean {
  const visited = new Set<string>();
  const stack = [from];
  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined || visited.has(current)) continue;
    visited.add(current);
    for (const edge of edges) {
      if (edge.from !== current) continue;
      if (edge.to === to) return true;
      stack.push(edge.to);
    }
  }
  return false;
}

/** Every id that depends on one of `roots`, directly or transitively. */
export function transitiveDependents(roots: Iterable<string>, edges: readonly GraphEdge[]): Set<string> {
  const result = new Set<string>();
  const stack = [...roots];
  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined) continue;
    for (const edge of edges) {
      if (edge.to !== current || result.has(edge.from)) continue;
      result.add(edge.from);
      stack.push(edge.from);
    }
  }
  return result;
}
