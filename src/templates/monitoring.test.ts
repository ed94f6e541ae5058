import { describe, it, expect } from "vitest";
import { applyGraph } from "../apply/engine.js";
import { SimulatedProvider } from "../apply/simulated.js";
import { ResolutionError } from "../errors.js";
import { resolveTemplate, toDisplayGraph } from "../graph/resolver.js";
import { createLogger, MemoryTransport } from "../logging/logger.js";
import { REDACTED } from "../logging/redact.js";
import type { DeploymentContext } from "../types.js";
import { monitoringTemplate } from "./monitoring.js";

const deployment: DeploymentContext = { subscriptionId: "00000000-0000-0000-0000-000000000000", deploymentName: "test" };
const quiet = () => createLogger("test", { level: "fatal" }, [new MemoryTransport()]);

function resolve(input: Record<string, unknown> = {}) {
  return resolveTemplate(
    monitoringTemplate,
    { logAnalyticsName: "log-demo", applicationInsightsName: "appi-demo", location: "eastus", ...input },
    { deployment, logger: quiet() },
  );
}

describe("monitoring template", () => {
  it("creates the workspace before the component that reports to it", () => {
    const graph = resolve();

    expect(graph.layers).toEqual([["logAnalytics"], ["applicationInsights"]]);
    expect(graph.edges).toEqual([{ from: "applicationInsights", to: "logAnalytics", reason: "reference" }]);
  });

  it("marks the connection string output secure", () => {
    const graph = resolve();

    expect(graph.secureOutputs).toEqual(["applicationInsightsConnectionString"]);
    expect(toDisplayGraph(graph).outputs.applicationInsightsConnectionString).toBe(REDACTED);
    expect(toDisplayGraph(graph).outputs.logAnalyticsWorkspaceName).toBe("log-demo");
  });

  it("bounds the retention period", () => {
    let error: unknown;
    try {
      resolve({ retentionInDays: 7 });
    } catch (err) {
      error = err;
    }

    expect(error instanceof ResolutionError && error.issues.map((i) => i.path)).toEqual(["retentionInDays"]);
  });

  it("binds the connection string after apply", async () => {
    const result = await applyGraph(resolve(), new SimulatedProvider(), { logger: quiet() });
    const connection = result.outputs.applicationInsightsConnectionString;

    expect(result.status).toBe("succeeded");
    expect(typeof connection === "string" && connection.startsWith("InstrumentationKey=")).toBe(true);
  });
});
