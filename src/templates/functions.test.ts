import { describe, it, expect } from "vitest";
import { applyGraph } from "../apply/engine.js";
import { SimulatedProvider } from "../apply/simulated.js";
import { ResolutionError } from "../errors.js";
import { readPath } from "../graph/expressions.js";
import { findNode, nodesOfType, resolveTemplate } from "../graph/resolver.js";
import { createLogger, MemoryTransport } from "../logging/logger.js";
import type { DeploymentContext, ResourceNode } from "../types.js";
import { RESOURCE_TYPES } from "./common.js";
import { functionsTemplate } from "./functions.js";
import { guid } from "./naming.js";

const SUB = "00000000-0000-0000-0000-000000000000";
const PLAN_ID = `/subscriptions/${SUB}/resourceGroups/rg-test/providers/Microsoft.Web/serverfarms/plan-demo`;
const STORAGE_ROLE = "ba92f5b4-2d11-453d-a403-e96b0029c9fe";
const deployment: DeploymentContext = { subscriptionId: SUB, deploymentName: "test" };
const quiet = () => createLogger("test", { level: "fatal" }, [new MemoryTransport()]);

function resolve(input: Record<string, unknown> = {}) {
  return resolveTemplate(
    functionsTemplate,
    { name: "func-demo", location: "eastus", appServicePlanId: PLAN_ID, storageAccountName: "stdemo001", ...input },
    { deployment, logger: quiet() },
  );
}

function resourceNode(graph: ReturnType<typeof resolve>, id: string): ResourceNode {
  const node = findNode(graph, id);
  if (node?.kind !== "resource") throw new Error(`expected resource node ${id}`);
  return node;
}

describe("functions template", () => {
  it("reads the storage account, builds the host and grants one role", () => {
    const graph = resolve();

    expect(graph.layers).toEqual([["storage"], ["host/appService"], ["host"], ["storageRoleAssignment"]]);
    expect(graph.excluded).toEqual(["host/diagnosticSettings"]);

    const storage = resourceNode(graph, "storage");
    expect(storage.existing).toBe(true);
    expect(storage.name).toBe("stdemo001");

    const assignments = nodesOfType(graph, RESOURCE_TYPES.roleAssignment);
    expect(assignments).toHaveLength(1);
    const [assignment] = assignments;
    expect(assignment?.scope).toBe("storage");
    expect(assignment?.name).toBe(guid(SUB, "stdemo001", "func-demo", STORAGE_ROLE));
    expect(assignment?.properties).toEqual({
      properties: {
        roleDefinitionId: `/subscriptions/${SUB}/providers/Microsoft.Authorization/roleDefinitions/${STORAGE_ROLE}`,
        principalId: { $kind: "attr", node: "host/appService", path: "identity.principalId", qualified: true },
        principalType: "ServicePrincipal",
      },
    });
  });

  it("omits the role assignment when skipped", () => {
    const graph = resolve({ skipRoleAssignment: true });

    expect(nodesOfType(graph, RESOURCE_TYPES.roleAssignment)).toEqual([]);
    expect(graph.excluded).toEqual(["storageRoleAssignment", "host/diagnosticSettings"]);
  });

  it("layers runtime, base and caller settings with the caller winning", () => {
    const graph = resolve({
      runtimeName: "node",
      baseAppSettings: { FEATURE_FLAGS: "on", FUNCTIONS_EXTENSION_VERSION: "~3" },
      appSettings: { FUNCTIONS_EXTENSION_VERSION: "~4", API_KEY: "test-secret" },
    });

    const siteConfig = readPath(resourceNode(graph, "host/appService").properties, "properties.siteConfig");
    expect(siteConfig).toEqual({
      linuxFxVersion: "Node|20",
      alwaysOn: false,
      ftpsState: "FtpsOnly",
      minTlsVersion: "1.2",
      appSettings: [
        { name: "FUNCTIONS_EXTENSION_VERSION", value: "~4" },
        { name: "FUNCTIONS_WORKER_RUNTIME", value: "node" },
        { name: "AzureWebJobsStorage__accountName", value: "stdemo001" },
        { name: "FEATURE_FLAGS", value: "on" },
        { name: "API_KEY", value: "test-secret" },
      ],
    });
  });

  it("registers caller settings as secrets", () => {
    const graph = resolve({ appSettings: { API_KEY: "test-secret" } });

    expect(graph.redactor.redactValue("key=test-secret")).toBe("key=[REDACTED]");
  });

  it("binds diagnostics when a workspace is given", () => {
    const graph = resolve({ logAnalyticsWorkspaceId: "workspace-1" });
    const diagnostics = resourceNode(graph, "host/diagnosticSettings");

    expect(graph.excluded).toEqual([]);
    expect(diagnostics.scope).toBe("host/appService");
    expect(diagnostics.name).toBe("func-demo-diagnostics");
  });

  it("reports an unknown storage role as a parameter issue", () => {
    let error: unknown;
    try {
      resolve({ storageRole: "Owner" });
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(ResolutionError);
    const issue = error instanceof ResolutionError ? error.issues[0] : undefined;
    expect(issue?.code).toBe("PARAMETER_CONSTRAINT");
    expect(issue?.path).toBe("storageRole");
  });

  it("grants the role to the site's identity once applied", async () => {
    const provider = new SimulatedProvider({ subscriptionId: SUB });
    const storage = provider.seed({ type: RESOURCE_TYPES.storageAccount, name: "stdemo001" });

    const result = await applyGraph(resolve(), provider, { logger: quiet() });

    expect(result.status).toBe("succeeded");
    const grant = result.nodes.find((n) => n.nodeId === "storageRoleAssignment");
    expect(grant?.request?.scopeId).toBe(storage.id);
    expect(grant?.request?.properties.properties).toEqual({
      roleDefinitionId: `/subscriptions/${SUB}/providers/Microsoft.Authorization/roleDefinitions/${STORAGE_ROLE}`,
      principalId: result.outputs.identityPrincipalId,
      principalType: "ServicePrincipal",
    });
    expect(result.outputs.uri).toBe("https://func-demo.azurewebsites.net");
  });

  it("fails when the storage account does not exist", async () => {
    const result = await applyGraph(resolve(), new SimulatedProvider({ subscriptionId: SUB }), { logger: quiet() });

    expect(result.status).toBe("failed");
    expect(result.errors).toEqual(['storage: Resource Microsoft.Storage/storageAccounts "stdemo001" was not found']);
  });
});
