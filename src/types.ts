/**
 * stratum — Type Definitions
 *
 * Declarations are what templates produce; graph nodes are what resolution
 * produces from them.
 */

import type { Static, TObject } from "@sinclair/typebox";
import type { Deferred, PropertyBag, PropertyValue } from "./graph/expressions.js";
import type { Redactor } from "./logging/redact.js";

// =============================================================================
// Deployment Context
// =============================================================================

/** Facts about the deployment that every template may read. */
export type DeploymentContext = {
  subscriptionId: string;
  deploymentName: string;
};

// =============================================================================
// Declarations
// =============================================================================

/**
 * One desired cloud object.
 */
export type ResourceDeclaration = {
  declaration: "resource";
  /** Symbolic name, unique within the declaring template. */
  symbol: string;
  /** Provider resource type, e.g. "Microsoft.Storage/storageAccounts". */
  type: string;
  name: Deferred<string>;
  location?: Deferred<string>;
  tags?: Record<string, Deferred<string>>;
  /** Top-level resource body: kind, sku, identity, properties. */
  properties?: PropertyBag;
  /** Included in the graph iff true (default: true). */
  condition?: boolean;
  /** Symbol of the parent resource (child resource types). */
  parent?: string;
  /** Symbol of the resource this one is an extension of (role assignments, diagnostics). */
  scope?: string;
  /** Explicit ordering constraints; a collection symbol stands for all its elements. */
  dependsOn?: string[];
  /** Refers to a resource that already exists; it is read, never provisioned. */
  existing?: boolean;
};

/** One element of a fan-out; inherits the collection's parent and condition. */
export type CollectionElement = Omit<ResourceDeclaration, "declaration" | "symbol" | "name" | "parent" | "condition"> & {
  name: string;
};

/**
 * One resource declaration per element of an input sequence. Element nodes
 * are identified as `symbol[index]` and keep input order.
 */
export type CollectionDeclaration = {
  declaration: "collection";
  symbol: string;
  condition?: boolean;
  parent?: string;
  elements: CollectionElement[];
};

/**
 * A nested template. Its outputs are reachable only through `output(symbol, name)`.
 */
export type ModuleDeclaration = {
  declaration: "module";
  symbol: string;
  /** Registered template id, or the template itself. */
  template: string | AnyTemplate;
  params: PropertyBag;
  condition?: boolean;
  /** Symbol of the resource group (or other container) the module deploys into. */
  scope?: string;
  dependsOn?: string[];
};

export type Declaration = ResourceDeclaration | CollectionDeclaration | ModuleDeclaration;

export type OutputDeclaration = {
  value: PropertyValue;
  description?: string;
  /** Secure outputs are hidden from every rendered view. */
  secure?: boolean;
};

export type TemplateBody = {
  declarations: Declaration[];
  outputs?: Record<string, OutputDeclaration>;
};

// =============================================================================
// Templates
// =============================================================================

/**
 * A pure function from validated parameters to declarations.
 *
 * Parameters are a TypeBox object schema: defaults fill missing values,
 * literal unions restrict allowed values and `secure: true` marks values that
 * must never be rendered.
 */
export interface Template<S extends TObject = TObject> {
  id: string;
  name: string;
  description: string;
  parameters: S;
  declare(params: Static<S>, context: DeploymentContext): TemplateBody;
}

export type AnyTemplate = Template<TObject>;

// =============================================================================
// Resolved Graph
// =============================================================================

export type ResourceNode = {
  kind: "resource";
  /** Qualified id: module path + symbol, e.g. "storage/containers[0]". */
  id: string;
  symbol: string;
  /** Qualified id of the enclosing module node, null at the root. */
  module: string | null;
  type: string;
  name: Deferred<string>;
  location?: Deferred<string>;
  tags: Record<string, Deferred<string>>;
  properties: Record<string, PropertyValue>;
  parent?: string;
  scope?: string;
  existing: boolean;
  /** Set for fan-out elements. */
  collection?: { symbol: string; index: number };
};

export type ModuleNode = {
  kind: "module";
  id: string;
  symbol: string;
  module: string | null;
  template: string;
  scope?: string;
  /** Resolved (possibly deferred) output values. */
  outputs: Record<string, PropertyValue>;
};

export type GraphNode = ResourceNode | ModuleNode;

export type EdgeReason =
  | "parent"
  | "scope"
  | "explicit"
  | "reference"
  | "module-output"
  | "module-member"
  | "module-input";

/** `from` must not be applied before `to` has completed. */
export type GraphEdge = {
  from: string;
  to: string;
  reason: EdgeReason;
};

export type ResolvedGraph = {
  template: string;
  deployment: DeploymentContext;
  /** All nodes in a topological order. */
  nodes: GraphNode[];
  edges: GraphEdge[];
  /** Node ids grouped so that no two ids in a layer have a path between them. */
  layers: string[][];
  outputs: Record<string, PropertyValue>;
  /** Names of root outputs declared secure. */
  secureOutputs: string[];
  /** Qualified ids of declarations pruned by a false condition or an empty fan-out. */
  excluded: string[];
  /** Knows every secure value that flowed through resolution. */
  redactor: Redactor;
};
