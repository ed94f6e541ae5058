/**
 * Role definitions and runtime defaults, read from `data/` rather than
 * compiled in: the provider's role catalog and supported runtimes change
 * independently of the templates.
 */

import { Type, type Static } from "@sinclair/typebox";
import { ParameterError } from "../errors.js";
import { readDataFile } from "./data.js";

const RoleDefinitionsSchema = Type.Object({
  roles: Type.Record(Type.String(), Type.String()),
  cosmosSqlRoles: Type.Record(Type.String(), Type.String()),
});

const RuntimeSchema = Type.Object({
  workerRuntime: Type.String(),
  /** Stack name for `linuxFxVersion`; empty for custom handlers. */
  stack: Type.String(),
  version: Type.String(),
});

const RuntimeDefaultsSchema = Type.Object({
  functionsExtensionVersion: Type.String(),
  runtimes: Type.Record(Type.String(), RuntimeSchema),
});

export type RuntimeDefaults = Static<typeof RuntimeSchema>;

export const RUNTIME_NAMES = ["dotnet", "node", "python", "java", "powershell", "custom"] as const;
export type RuntimeName = (typeof RUNTIME_NAMES)[number];

// =============================================================================
// Roles
// =============================================================================

export function listRoles(): string[] {
  return Object.keys(readDataFile("role-definitions.json", RoleDefinitionsSchema).roles);
}

/** GUID of a built-in role, by display name. */
export function roleGuid(role: string, parameter = "role"): string {
  const { roles } = readDataFile("role-definitions.json", RoleDefinitionsSchema);
  const id = roles[role];
  if (id === undefined) {
    throw new ParameterError(parameter, `unknown role "${role}"; must be one of: ${Object.keys(roles).join(", ")}`);
  }
  return id;
}

/** Full role definition id at subscription scope. */
export function roleDefinitionId(role: string, subscriptionId: string, parameter?: string): string {
  return `/subscriptions/${subscriptionId}/providers/Microsoft.Authorization/roleDefinitions/${roleGuid(role, parameter)}`;
}

/** GUID of a Cosmos DB built-in data-plane role. */
export function cosmosSqlRoleGuid(role: string, parameter = "role"): string {
  const { cosmosSqlRoles } = readDataFile("role-definitions.json", RoleDefinitionsSchema);
  const id = cosmosSqlRoles[role];
  if (id === undefined) {
    throw new ParameterError(parameter, `unknown data-plane role "${role}"; must be one of: ${Object.keys(cosmosSqlRoles).join(", ")}`);
  }
  return id;
}

// =============================================================================
// Runtimes
// =============================================================================

export function functionsExtensionVersion(): string {
  return readDataFile("runtime-defaults.json", RuntimeDefaultsSchema).functionsExtensionVersion;
}

export function runtimeDefaults(runtime: string, parameter = "runtimeName"): RuntimeDefaults {
  const { runtimes } = readDataFile("runtime-defaults.json", RuntimeDefaultsSchema);
  const defaults = runtimes[runtime];
  if (!defaults) {
    throw new ParameterError(parameter, `unknown runtime "${runtime}"; must be one of: ${Object.keys(runtimes).join(", ")}`);
  }
  return defaults;
}

/**
 * `linuxFxVersion` for a runtime, e.g. "Python|3.11". Custom handlers have none.
 */
export function linuxFxVersion(runtime: string, version?: string, parameter?: string): string {
  const defaults = runtimeDefaults(runtime, parameter);
  if (!defaults.stack) return "";
  return `${defaults.stack}|${version || defaults.version}`;
}
