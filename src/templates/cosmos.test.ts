import { describe, it, expect } from "vitest";
import { ResolutionError } from "../errors.js";
import { readPath } from "../graph/expressions.js";
import { findNode, resolveTemplate } from "../graph/resolver.js";
import { createLogger, MemoryTransport } from "../logging/logger.js";
import type { DeploymentContext, ResolvedGraph, ResourceNode } from "../types.js";
import { cosmosSqlRoleTemplate } from "./cosmos-sql-role.js";
import { cosmosTemplate } from "./cosmos.js";
import { guid } from "./naming.js";

const SUB = "00000000-0000-0000-0000-000000000000";
const deployment: DeploymentContext = { subscriptionId: SUB, deploymentName: "test" };
const quiet = () => createLogger("test", { level: "fatal" }, [new MemoryTransport()]);

function resourceNode(graph: ResolvedGraph, id: string): ResourceNode {
  const node = findNode(graph, id);
  if (node?.kind !== "resource") throw new Error(`expected resource node ${id}`);
  return node;
}

function issuePaths(fn: () => unknown): Array<string | undefined> {
  try {
    fn();
  } catch (err) {
    if (err instanceof ResolutionError) return err.issues.map((i) => i.path);
    throw err;
  }
  throw new Error("expected a ResolutionError");
}

describe("cosmos template", () => {
  const resolve = (input: Record<string, unknown> = {}) =>
    resolveTemplate(cosmosTemplate, { accountName: "cosmos-demo", location: "eastus", ...input }, { deployment, logger: quiet() });

  it("nests the database and containers under the account", () => {
    const graph = resolve();

    expect(graph.layers).toEqual([["cosmosAccount"], ["database"], ["containers[0]"]]);
    expect(resourceNode(graph, "containers[0]").parent).toBe("database");
    expect(readPath(resourceNode(graph, "containers[0]").properties, "properties.resource.partitionKey")).toEqual({
      paths: ["/category"],
      kind: "Hash",
    });
  });

  it("is serverless unless told otherwise", () => {
    const capabilities = (graph: ResolvedGraph) =>
      readPath(resourceNode(graph, "cosmosAccount").properties, "properties.capabilities");

    expect(capabilities(resolve())).toEqual([{ name: "EnableServerless" }]);
    expect(capabilities(resolve({ serverless: false }))).toEqual([]);
  });

  it("defaults a container's partition key to /id", () => {
    const graph = resolve({ containers: [{ name: "orders" }] });

    expect(readPath(resourceNode(graph, "containers[0]").properties, "properties.resource.partitionKey.paths")).toEqual(["/id"]);
    expect(graph.outputs.containerNames).toEqual(["orders"]);
  });

  it("rejects partition key paths without a leading slash", () => {
    expect(issuePaths(() => resolve({ containers: [{ name: "orders", partitionKeyPath: "category" }] }))).toEqual([
      "containers.0.partitionKeyPath",
    ]);
  });
});

describe("cosmos-sql-role template", () => {
  const resolve = (input: Record<string, unknown> = {}) =>
    resolveTemplate(
      cosmosSqlRoleTemplate,
      { accountName: "cosmos-demo", principalId: "principal-1", ...input },
      { deployment, logger: quiet() },
    );

  it("assigns the data contributor role under the existing account", () => {
    const graph = resolve();
    const assignment = resourceNode(graph, "sqlRoleAssignment");

    expect(resourceNode(graph, "cosmosAccount").existing).toBe(true);
    expect(assignment.parent).toBe("cosmosAccount");
    expect(assignment.name).toBe(guid(SUB, "cosmos-demo", "principal-1", "00000000-0000-0000-0000-000000000002"));
  });

  it("reports unknown data-plane roles", () => {
    expect(issuePaths(() => resolve({ roleName: "Owner" }))).toEqual(["roleName"]);
  });
});
