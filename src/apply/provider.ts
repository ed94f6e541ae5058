/**
 * stratum — Resource Provider Contract
 *
 * The apply engine hands each resolved resource to a provider with every
 * deferred value bound. Providers talk to a control plane (or simulate one);
 * their errors surface verbatim and are never retried.
 */

import type { PropertyValue } from "../graph/expressions.js";

export type ApplyRequest = {
  /** Qualified graph node id. */
  nodeId: string;
  type: string;
  name: string;
  location?: string;
  tags: Record<string, string>;
  /** Top-level resource body (kind, sku, identity, properties) with nothing deferred. */
  properties: Record<string, PropertyValue>;
  /** Provider id of the parent resource, for child resource types. */
  parentId?: string;
  /** Provider id of the scope: the resource extended, or the resource group deployed into. */
  scopeId?: string;
  existing: boolean;
};

export type AppliedResource = {
  /** Provider id, e.g. "/subscriptions/.../resourceGroups/rg/providers/Microsoft.Web/sites/app". */
  id: string;
  /** Full resource body as the provider reports it; deferred attributes are read from here. */
  attributes: Record<string, PropertyValue>;
};

export interface ResourceProvider {
  readonly name: string;
  /** Create or update. Must be idempotent for an unchanged request. */
  apply(request: ApplyRequest, signal: AbortSignal): Promise<AppliedResource>;
  /** Look up a resource that already exists; fails when it does not. */
  read(request: ApplyRequest, signal: AbortSignal): Promise<AppliedResource>;
}
