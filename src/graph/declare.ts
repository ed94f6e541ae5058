/**
 * Declaration builders used by templates.
 */

import type { TObject } from "@sinclair/typebox";
import type { PropertyBag } from "./expressions.js";
import type {
  CollectionDeclaration,
  CollectionElement,
  ModuleDeclaration,
  ResourceDeclaration,
  Template,
} from "../types.js";

export function resource(symbol: string, spec: Omit<ResourceDeclaration, "declaration" | "symbol">): ResourceDeclaration {
  return { declaration: "resource", symbol, ...spec };
}

/**
 * One element per item, in item order.
 */
export function fanOut<T>(
  symbol: string,
  items: readonly T[],
  element: (item: T, index: number) => CollectionElement,
  options: { condition?: boolean; parent?: string } = {},
): CollectionDeclaration {
  return {
    declaration: "collection",
    symbol,
    condition: options.condition,
    parent: options.parent,
    elements: items.map((item, index) => element(item, index)),
  };
}

/**
 * A fan-out whose elements share a host parent. The host is provisioned only
 * when its own condition holds and there is at least one item, so an empty
 * collection yields neither elements nor host.
 */
export function hostedFanOut<T>(
  host: ResourceDeclaration,
  symbol: string,
  items: readonly T[],
  element: (item: T, index: number) => CollectionElement,
): [ResourceDeclaration, CollectionDeclaration] {
  const enabled = (host.condition ?? true) && items.length > 0;
  return [
    { ...host, condition: enabled },
    fanOut(symbol, items, element, { condition: enabled, parent: host.symbol }),
  ];
}

export function module<S extends TObject>(
  symbol: string,
  template: string | Template<S>,
  params: PropertyBag,
  options: Pick<ModuleDeclaration, "condition" | "scope" | "dependsOn"> = {},
): ModuleDeclaration {
  return { declaration: "module", symbol, template, params, ...options };
}
