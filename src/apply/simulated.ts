/**
 * In-memory provider for what-if runs and tests.
 *
 * Resources are stored by provider id. Applying the same request twice
 * updates the stored body in place; generated values (identities, endpoints,
 * keys) derive from the id, so repeated passes report the same attributes.
 */

import type { PropertyValue } from "../graph/expressions.js";
import { guid } from "../templates/naming.js";
import type { AppliedResource, ApplyRequest, ResourceProvider } from "./provider.js";

export type SimulatedProviderOptions = {
  subscriptionId?: string;
  /** Resource group for requests with no scope. */
  defaultResourceGroup?: string;
  /** Error messages to throw, keyed by graph node id. */
  failures?: Record<string, string>;
};

/** Identifies a resource that exists before any apply call. */
export type SeedResource = Pick<ApplyRequest, "type" | "name" | "parentId" | "scopeId"> & {
  location?: string;
  properties?: Record<string, PropertyValue>;
};

function lastSegment(type: string): string {
  const segments = type.split("/");
  return segments[segments.length - 1] ?? type;
}

function isRecord(value: PropertyValue | undefined): value is { readonly [key: string]: PropertyValue } {
  return value !== null && value !== undefined && typeof value === "object" && !Array.isArray(value);
}

export class SimulatedProvider implements ResourceProvider {
  readonly name = "simulated";
  private readonly store = new Map<string, AppliedResource>();
  private readonly subscriptionId: string;
  private readonly defaultResourceGroup: string;
  private readonly failures: Record<string, string>;
  private applyCount = 0;

  constructor(options: SimulatedProviderOptions = {}) {
    this.subscriptionId = options.subscriptionId ?? "00000000-0000-0000-0000-000000000000";
    this.defaultResourceGroup = options.defaultResourceGroup ?? "rg-simulated";
    this.failures = options.failures ?? {};
  }

  /** Number of `apply` calls served. */
  get applied(): number {
    return this.applyCount;
  }

  get size(): number {
    return this.store.size;
  }

  /** ARM-style id for a request. */
  resourceId(request: Pick<ApplyRequest, "type" | "name" | "parentId" | "scopeId">): string {
    if (request.type.toLowerCase() === "microsoft.resources/resourcegroups") {
      return `/subscriptions/${this.subscriptionId}/resourceGroups/${request.name}`;
    }
    if (request.parentId) {
      return `${request.parentId}/${lastSegment(request.type)}/${request.name}`;
    }
    const scope = request.scopeId ?? `/subscriptions/${this.subscriptionId}/resourceGroups/${this.defaultResourceGroup}`;
    return `${scope}/providers/${request.type}/${request.name}`;
  }

  get(id: string): AppliedResource | undefined {
    return this.store.get(id.toLowerCase());
  }

  list(): AppliedResource[] {
    return [...this.store.values()];
  }

  /** Store a resource as if it had been created outside of stratum. */
  seed(resource: SeedResource): AppliedResource {
    return this.put({
      nodeId: "",
      type: resource.type,
      name: resource.name,
      location: resource.location,
      tags: {},
      properties: resource.properties ?? {},
      parentId: resource.parentId,
      scopeId: resource.scopeId,
      existing: false,
    });
  }

  async apply(request: ApplyRequest, signal: AbortSignal): Promise<AppliedResource> {
    signal.throwIfAborted();
    const failure = this.failures[request.nodeId];
    if (failure !== undefined) throw new Error(failure);
    this.applyCount += 1;
    return this.put(request);
  }

  async read(request: ApplyRequest, signal: AbortSignal): Promise<AppliedResource> {
    signal.throwIfAborted();
    const stored = this.store.get(this.resourceId(request).toLowerCase());
    if (!stored) throw new Error(`Resource ${request.type} "${request.name}" was not found`);
    return stored;
  }

  private put(request: ApplyRequest): AppliedResource {
    const id = this.resourceId(request);
    const attributes: Record<string, PropertyValue> = {
      ...request.properties,
      id,
      name: request.name,
      type: request.type,
    };
    if (request.location !== undefined) attributes.location = request.location;
    if (Object.keys(request.tags).length > 0) attributes.tags = request.tags;

    const identity = request.properties.identity;
    if (isRecord(identity) && "type" in identity && identity.type === "SystemAssigned") {
      attributes.identity = {
        ...identity,
        principalId: guid("principal", id.toLowerCase()),
        tenantId: guid("tenant", this.subscriptionId),
      };
    }

    const declared = request.properties.properties;
    attributes.properties = {
      ...(isRecord(declared) ? declared : {}),
      provisioningState: "Succeeded",
      ...this.computedProperties(request, id),
    };

    const stored: AppliedResource = { id, attributes };
    this.store.set(id.toLowerCase(), stored);
    return stored;
  }

  /** Provider-computed properties for the resource types the templates use. */
  private computedProperties(request: ApplyRequest, id: string): Record<string, PropertyValue> {
    const name = request.name;
    switch (request.type.toLowerCase()) {
      case "microsoft.storage/storageaccounts":
        return {
          primaryEndpoints: {
            blob: `https://${name}.blob.core.windows.net/`,
            queue: `https://${name}.queue.core.windows.net/`,
            table: `https://${name}.table.core.windows.net/`,
            file: `https://${name}.file.core.windows.net/`,
          },
        };
      case "microsoft.insights/components": {
        const key = guid("instrumentation", id.toLowerCase());
        return {
          InstrumentationKey: key,
          ConnectionString: `InstrumentationKey=${key};IngestionEndpoint=https://${request.location ?? "eastus"}.in.applicationinsights.azure.com/`,
        };
      }
      case "microsoft.operationalinsights/workspaces":
        return { customerId: guid("workspace", id.toLowerCase()) };
      case "microsoft.web/sites":
        return { defaultHostName: `${name}.azurewebsites.net`, state: "Running" };
      case "microsoft.documentdb/databaseaccounts":
        return { documentEndpoint: `https://${name}.documents.azure.com:443/` };
      default:
        return {};
    }
  }
}
