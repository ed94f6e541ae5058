/**
 * Resolver unit tests: pruning, reference checks, module qualification and
 * graph ordering.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { Type, type Static, type TObject } from "@sinclair/typebox";
import { ParameterError, ResolutionError, type ResolutionIssue } from "../errors.js";
import { createLogger, MemoryTransport } from "../logging/logger.js";
import { REDACTED } from "../logging/redact.js";
import type { DeploymentContext, Template, TemplateBody } from "../types.js";
import { fanOut, hostedFanOut, module, resource } from "./declare.js";
import { attr, concat, Deferrable, output } from "./expressions.js";
import { Secure } from "./parameters.js";
import { clearTemplateRegistry, registerTemplate } from "./registry.js";
import { findNode, nodesOfType, provisionedNodes, renderValue, resolveTemplate, toDisplayGraph } from "./resolver.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const deployment: DeploymentContext = { subscriptionId: "00000000-0000-0000-0000-000000000000", deploymentName: "test" };

function tpl<S extends TObject>(
  id: string,
  parameters: S,
  declare: (params: Static<S>, context: DeploymentContext) => TemplateBody,
): Template<S> {
  return { id, name: id, description: "", parameters, declare };
}

const NoParameters = Type.Object({});

function resolve(template: Template<TObject> | string, input: Record<string, unknown> = {}) {
  const memory = new MemoryTransport();
  return resolveTemplate(template, input, { deployment, logger: createLogger("test", { level: "trace" }, [memory]) });
}

function issuesOf(fn: () => unknown): ResolutionIssue[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof ResolutionError) return [...err.issues];
    throw err;
  }
  throw new Error("expected a ResolutionError");
}

const InnerParameters = Type.Object({ name: Deferrable(Type.String()) });
const innerTemplate = tpl("inner", InnerParameters, (p) => ({
  declarations: [resource("acct", { type: "Test/accounts", name: p.name })],
  outputs: {
    id: { value: attr("acct", "id") },
    name: { value: attr("acct", "name") },
  },
}));

beforeEach(() => {
  clearTemplateRegistry();
});

// ---------------------------------------------------------------------------
// Ordering & folding
// ---------------------------------------------------------------------------

describe("resolveTemplate ordering", () => {
  const simple = tpl("simple", Type.Object({ prefix: Type.String({ default: "demo" }) }), (p) => ({
    declarations: [
      resource("site", {
        type: "Test/sites",
        name: `${p.prefix}-site`,
        properties: { serverFarmId: attr("plan", "id"), planName: attr("plan", "name") },
      }),
      resource("plan", { type: "Test/plans", name: `${p.prefix}-plan`, location: "eastus" }),
    ],
    outputs: {
      siteHost: { value: concat("https://", attr("site", "properties.host")) },
      planName: { value: attr("plan", "name") },
    },
  }));

  it("orders resources by their references and folds known attributes", () => {
    const graph = resolve(simple);
    expect(graph.layers).toEqual([["plan"], ["site"]]);
    expect(graph.nodes.map((n) => n.id)).toEqual(["plan", "site"]);
    expect(graph.edges).toEqual([{ from: "site", to: "plan", reason: "reference" }]);
    expect(findNode(graph, "site")).toEqual({
      kind: "resource",
      id: "site",
      symbol: "site",
      module: null,
      type: "Test/sites",
      name: "demo-site",
      tags: {},
      properties: {
        serverFarmId: { $kind: "attr", node: "plan", path: "id", qualified: true },
        planName: "demo-plan",
      },
      existing: false,
    });
  });

  it("resolves template outputs", () => {
    const graph = resolve(simple, { prefix: "x" });
    expect(graph.outputs.planName).toBe("x-plan");
    expect(renderValue(graph.outputs.siteHost ?? null)).toBe("https://${site.properties.host}");
    expect(graph.secureOutputs).toEqual([]);
    expect(graph.excluded).toEqual([]);
  });

  it("resolves registered templates by id", () => {
    registerTemplate(simple);
    expect(resolve("simple").template).toBe("simple");
  });

  it("reports an unknown root template", () => {
    expect(issuesOf(() => resolve("nope"))).toEqual([
      { code: "UNKNOWN_TEMPLATE", message: 'Template "nope" is not registered' },
    ]);
  });

  it("keeps attributes of existing resources deferred except name and type", () => {
    const graph = resolve(
      tpl("existing", NoParameters, () => ({
        declarations: [
          resource("st", { type: "Test/accounts", name: "acct", location: "eastus", existing: true }),
          resource("user", {
            type: "Test/users",
            name: "u",
            properties: { account: attr("st", "name"), where: attr("st", "location") },
          }),
        ],
      })),
    );
    expect(findNode(graph, "user")).toMatchObject({
      properties: { account: "acct", where: { $kind: "attr", node: "st", path: "location", qualified: true } },
    });
    expect(provisionedNodes(graph).map((n) => n.id)).toEqual(["user"]);
    expect(nodesOfType(graph, "test/ACCOUNTS").map((n) => n.id)).toEqual(["st"]);
  });
});

// ---------------------------------------------------------------------------
// Conditions & fan-out
// ---------------------------------------------------------------------------

describe("conditions and collections", () => {
  it("prunes false conditions and ignores ordering against them", () => {
    const graph = resolve(
      tpl("conditional", NoParameters, () => ({
        declarations: [
          resource("a", { type: "T/a", name: "a" }),
          resource("b", { type: "T/b", name: "b", condition: false }),
          resource("c", { type: "T/c", name: "c", dependsOn: ["b", "a"] }),
        ],
      })),
    );
    expect(graph.nodes.map((n) => n.id)).toEqual(["a", "c"]);
    expect(graph.excluded).toEqual(["b"]);
    expect(graph.edges).toEqual([{ from: "c", to: "a", reason: "explicit" }]);
  });

  it("rejects references to excluded declarations", () => {
    const issues = issuesOf(() =>
      resolve(
        tpl("conditional", NoParameters, () => ({
          declarations: [
            resource("b", { type: "T/b", name: "b", condition: false }),
            resource("c", { type: "T/c", name: "c", properties: { target: attr("b", "id") } }),
          ],
        })),
      ),
    );
    expect(issues).toEqual([
      { code: "DANGLING_REFERENCE", node: "c", message: 'Referenced declaration "b" is excluded by its condition' },
    ]);
  });

  const Buckets = Type.Object({ containers: Type.Array(Type.String(), { default: [] }) });
  const buckets = tpl("buckets", Buckets, (p) => ({
    declarations: [
      resource("account", { type: "T/accounts", name: "acct" }),
      ...hostedFanOut(
        resource("service", { type: "T/accounts/services", name: "default", parent: "account" }),
        "containers",
        p.containers,
        (name) => ({ type: "T/accounts/services/containers", name }),
      ),
    ],
  }));

  it("drops the host and every element for an empty collection", () => {
    const graph = resolve(buckets);
    expect(graph.nodes.map((n) => n.id)).toEqual(["account"]);
    expect(graph.excluded).toEqual(["service", "containers"]);
  });

  it("creates one host and one element per item, in order", () => {
    const graph = resolve(buckets, { containers: ["logs", "data"] });
    expect(graph.nodes.map((n) => n.id)).toEqual(["account", "service", "containers[0]", "containers[1]"]);
    expect(findNode(graph, "containers[1]")).toMatchObject({
      name: "data",
      parent: "service",
      collection: { symbol: "containers", index: 1 },
    });
    expect(graph.layers).toEqual([["account"], ["service"], ["containers[0]", "containers[1]"]]);
  });

  it("rejects duplicate element names", () => {
    expect(issuesOf(() => resolve(buckets, { containers: ["logs", "logs"] }))).toEqual([
      {
        code: "DUPLICATE_NAME",
        node: "containers[1]",
        message: 'Name "logs" is used by both containers[0] and containers[1]',
      },
    ]);
  });

  it("expands dependsOn on a collection to every element", () => {
    const graph = resolve(
      tpl("fan", NoParameters, () => ({
        declarations: [
          fanOut("items", ["x", "y"], (name) => ({ type: "T/items", name })),
          resource("last", { type: "T/last", name: "last", dependsOn: ["items"] }),
        ],
      })),
    );
    expect(graph.edges).toEqual([
      { from: "last", to: "items[0]", reason: "explicit" },
      { from: "last", to: "items[1]", reason: "explicit" },
    ]);
  });
});

// ---------------------------------------------------------------------------
// Reference errors
// ---------------------------------------------------------------------------

describe("reference checks", () => {
  it("reports undeclared references and dependencies", () => {
    const issues = issuesOf(() =>
      resolve(
        tpl("dangling", NoParameters, () => ({
          declarations: [
            resource("a", { type: "T/a", name: "a", properties: { x: attr("ghost", "id") }, dependsOn: ["phantom"] }),
          ],
        })),
      ),
    );
    expect(issues).toEqual([
      { code: "DANGLING_REFERENCE", node: "a", message: 'Referenced declaration "ghost" is not declared' },
      { code: "DANGLING_REFERENCE", node: "a", message: 'Dependency "phantom" is not declared' },
    ]);
  });

  it("reports duplicate symbols", () => {
    const issues = issuesOf(() =>
      resolve(
        tpl("dup", NoParameters, () => ({
          declarations: [resource("a", { type: "T/a", name: "a1" }), resource("a", { type: "T/a", name: "a2" })],
        })),
      ),
    );
    expect(issues).toEqual([{ code: "DUPLICATE_SYMBOL", node: "a", message: 'Symbol "a" is declared more than once' }]);
  });

  it("reports cycles between declarations", () => {
    const issues = issuesOf(() =>
      resolve(
        tpl("cycle", NoParameters, () => ({
          declarations: [
            resource("a", { type: "T/a", name: "a", properties: { peer: attr("b", "id") } }),
            resource("b", { type: "T/b", name: "b", properties: { peer: attr("a", "id") } }),
          ],
        })),
      ),
    );
    expect(issues).toEqual([{ code: "CIRCULAR_DEPENDENCY", node: "a", message: "Circular dependency detected: a → b → a" }]);
  });

  it("reports cycles between modules that consume each other's outputs", () => {
    const issues = issuesOf(() =>
      resolve(
        tpl("modules", NoParameters, () => ({
          declarations: [
            module("m1", innerTemplate, { name: output("m2", "name") }),
            module("m2", innerTemplate, { name: output("m1", "name") }),
          ],
        })),
      ),
    );
    expect(issues).toEqual([{ code: "CIRCULAR_DEPENDENCY", node: "m1", message: "Circular dependency detected: m1 → m2 → m1" }]);
  });

  it("rejects interpolating a non-scalar attribute", () => {
    const issues = issuesOf(() =>
      resolve(
        tpl("concat", NoParameters, () => ({
          declarations: [
            resource("plan", { type: "T/plans", name: "p", properties: { properties: { reserved: true } } }),
            resource("site", { type: "T/sites", name: concat("site-", attr("plan", "properties")) }),
          ],
        })),
      ),
    );
    expect(issues).toEqual([
      {
        code: "INVALID_EXPRESSION",
        node: "site",
        message: "plan.properties does not resolve to a scalar and cannot be interpolated",
      },
    ]);
  });
});

// ---------------------------------------------------------------------------
// Modules
// ---------------------------------------------------------------------------

describe("modules", () => {
  const outer = tpl("outer", NoParameters, () => ({
    declarations: [
      resource("rg", { type: "Microsoft.Resources/resourceGroups", name: "rg-test" }),
      module("store", innerTemplate, { name: "acct1" }, { scope: "rg" }),
      resource("consumer", {
        type: "T/consumers",
        name: "c",
        properties: { accountId: output("store", "id"), accountName: output("store", "name") },
      }),
    ],
  }));

  it("qualifies member ids and threads outputs", () => {
    const graph = resolve(outer);
    expect(graph.nodes.map((n) => n.id)).toEqual(["rg", "store/acct", "store", "consumer"]);
    expect(graph.layers).toEqual([["rg"], ["store/acct"], ["store"], ["consumer"]]);
    expect(findNode(graph, "consumer")).toMatchObject({
      properties: {
        accountId: { $kind: "attr", node: "store/acct", path: "id", qualified: true },
        accountName: "acct1",
      },
    });
    expect(findNode(graph, "store")).toEqual({
      kind: "module",
      id: "store",
      symbol: "store",
      module: null,
      template: "inner",
      scope: "rg",
      outputs: { id: { $kind: "attr", node: "store/acct", path: "id", qualified: true }, name: "acct1" },
    });
    expect(findNode(graph, "store/acct")).toMatchObject({ module: "store", symbol: "acct" });
  });

  it("records scope, member and inherited input edges", () => {
    expect(resolve(outer).edges).toEqual([
      { from: "store", to: "rg", reason: "scope" },
      { from: "store", to: "store/acct", reason: "module-member" },
      { from: "store/acct", to: "rg", reason: "module-input" },
      { from: "consumer", to: "store", reason: "module-output" },
    ]);
  });

  it("reports unknown module outputs", () => {
    const issues = issuesOf(() =>
      resolve(
        tpl("outputs", NoParameters, () => ({
          declarations: [
            module("store", innerTemplate, { name: "acct1" }),
            resource("consumer", { type: "T/c", name: "c", properties: { x: output("store", "missing") } }),
          ],
        })),
      ),
    );
    expect(issues).toEqual([
      { code: "UNKNOWN_OUTPUT", node: "consumer", message: 'Module "store" (template "inner") has no output "missing"' },
    ]);
  });

  it("rejects attribute references to modules", () => {
    const issues = issuesOf(() =>
      resolve(
        tpl("attrs", NoParameters, () => ({
          declarations: [
            module("store", innerTemplate, { name: "acct1" }),
            resource("consumer", { type: "T/c", name: "c", properties: { x: attr("store", "id") } }),
          ],
        })),
      ),
    );
    expect(issues).toEqual([
      {
        code: "INVALID_REFERENCE",
        node: "consumer",
        message: 'Attribute reference store.id points at module "store"; only resources have attributes',
      },
    ]);
  });

  it("prefixes parameter issues with the module path", () => {
    const issues = issuesOf(() =>
      resolve(tpl("missing", NoParameters, () => ({ declarations: [module("store", innerTemplate, {})] }))),
    );
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatchObject({ code: "PARAMETER_CONSTRAINT", node: "store", path: "name" });
  });

  it("reports modules naming unregistered templates", () => {
    const issues = issuesOf(() =>
      resolve(tpl("unknown", NoParameters, () => ({ declarations: [module("m", "does-not-exist", {})] }))),
    );
    expect(issues).toEqual([
      { code: "UNKNOWN_TEMPLATE", node: "m", message: 'Module "m" uses template "does-not-exist", which is not registered' },
    ]);
  });

  it("rejects a template that includes itself", () => {
    registerTemplate(tpl("loop", NoParameters, () => ({ declarations: [module("again", "loop", {})] })));
    expect(issuesOf(() => resolve("loop"))).toEqual([
      { code: "CIRCULAR_DEPENDENCY", node: "again", message: 'Template "loop" includes itself: loop → loop' },
    ]);
  });
});

// ---------------------------------------------------------------------------
// Parameters & redaction
// ---------------------------------------------------------------------------

describe("parameters and redaction", () => {
  it("turns ParameterError from declare into a parameter issue", () => {
    const issues = issuesOf(() =>
      resolve(
        tpl("params", NoParameters, () => {
          throw new ParameterError("size", "must be even");
        }),
      ),
    );
    expect(issues).toEqual([
      { code: "PARAMETER_CONSTRAINT", path: "size", message: 'Parameter "size" of template "params": must be even' },
    ]);
  });

  it("rethrows other errors from declare", () => {
    expect(() =>
      resolve(
        tpl("broken", NoParameters, () => {
          throw new Error("boom");
        }),
      ),
    ).toThrow("boom");
  });

  const Secretive = Type.Object({ password: Secure(Type.String()) });
  const secretive = tpl("secretive", Secretive, (p) => ({
    declarations: [resource("vault", { type: "T/vaults", name: "kv", properties: { config: { adminValue: p.password } } })],
    outputs: {
      echo: { value: p.password },
      token: { value: "visible-only-in-graph", secure: true },
    },
  }));

  it("keeps secure values in the graph but not in the display view", () => {
    const graph = resolve(secretive, { password: "test-secret" });
    expect(findNode(graph, "vault")).toMatchObject({ properties: { config: { adminValue: "test-secret" } } });
    expect(graph.secureOutputs).toEqual(["token"]);

    const view = toDisplayGraph(graph);
    expect(view.nodes[0]).toMatchObject({ properties: { config: { adminValue: REDACTED } } });
    expect(view.outputs).toEqual({ echo: REDACTED, token: REDACTED });
    expect(JSON.stringify(view)).not.toContain("test-secret");
  });

  const Located = Type.Object({ password: Secure(Type.String()), location: Type.String() });
  const located = tpl("located", Located, (p) => ({
    declarations: [
      resource("vault", {
        type: "T/vaults",
        name: "kv-dev",
        location: p.location,
        properties: { mode: p.password, label: "edge" },
      }),
    ],
    outputs: { location: { value: p.location } },
  }));

  it("hides short secure values only where they are the whole value", () => {
    const view = toDisplayGraph(resolve(located, { password: "e", location: "eastus" }));

    expect(view.nodes[0]).toMatchObject({
      name: "kv-dev",
      location: "eastus",
      properties: { mode: REDACTED, label: "edge" },
    });
    expect(view.outputs).toEqual({ location: "eastus" });
  });

  it("redacts a secure value used as a location", () => {
    const view = toDisplayGraph(resolve(located, { password: "test-secret-region", location: "test-secret-region" }));

    expect(view.nodes[0]).toMatchObject({ location: REDACTED });
    expect(view.outputs).toEqual({ location: REDACTED });
  });

  it("never logs secure values", () => {
    const memory = new MemoryTransport();
    resolveTemplate(secretive, { password: "test-secret" }, {
      deployment,
      logger: createLogger("test", { level: "trace" }, [memory]),
    });
    expect(memory.messages()).toContain("Template resolved");
    expect(JSON.stringify(memory.entries)).not.toContain("test-secret");
  });
});
