/**
 * Function host site with a system-assigned identity, and an optional
 * diagnostics binding to a Log Analytics workspace.
 */

import { Type } from "@sinclair/typebox";
import { attr, concat, Deferrable } from "../graph/expressions.js";
import { resource } from "../graph/declare.js";
import { Choice } from "../graph/parameters.js";
import type { Template } from "../types.js";
import { linuxFxVersion, RUNTIME_NAMES } from "./catalog.js";
import { Location, RESOURCE_TYPES, Tags } from "./common.js";

const AppServiceParameters = Type.Object(
  {
    name: Type.String({ minLength: 2, maxLength: 60 }),
    location: Location(),
    tags: Tags(),
    kind: Type.String({ default: "functionapp,linux" }),
    appServicePlanId: Deferrable(Type.String()),
    runtimeName: Choice(RUNTIME_NAMES, { default: "python" }),
    runtimeVersion: Type.String({ default: "", description: "Empty for the catalog default" }),
    appSettings: Type.Record(Type.String(), Deferrable(Type.String()), { default: {} }),
    managedIdentity: Type.Boolean({ default: true }),
    alwaysOn: Type.Boolean({ default: false }),
    logAnalyticsWorkspaceId: Deferrable(Type.String(), { default: "", description: "Diagnostics are bound when set" }),
    diagnosticLogCategories: Type.Array(Type.String(), { default: ["FunctionAppLogs"] }),
  },
  { additionalProperties: false },
);

export const appServiceTemplate: Template<typeof AppServiceParameters> = {
  id: "app-service",
  name: "Function host",
  description: "App Service site hosting a function app",
  parameters: AppServiceParameters,

  declare(p) {
    const site = resource("appService", {
      type: RESOURCE_TYPES.site,
      name: p.name,
      location: p.location,
      tags: p.tags,
      properties: {
        kind: p.kind,
        identity: { type: p.managedIdentity ? "SystemAssigned" : "None" },
        properties: {
          serverFarmId: p.appServicePlanId,
          httpsOnly: true,
          siteConfig: {
            linuxFxVersion: linuxFxVersion(p.runtimeName, p.runtimeVersion, "runtimeName"),
            alwaysOn: p.alwaysOn,
            ftpsState: "FtpsOnly",
            minTlsVersion: "1.2",
            appSettings: Object.entries(p.appSettings).map(([name, value]) => ({ name, value })),
          },
        },
      },
    });

    const diagnostics = resource("diagnosticSettings", {
      type: RESOURCE_TYPES.diagnosticSettings,
      name: `${p.name}-diagnostics`,
      scope: "appService",
      condition: p.logAnalyticsWorkspaceId !== "",
      properties: {
        properties: {
          workspaceId: p.logAnalyticsWorkspaceId,
          logs: p.diagnosticLogCategories.map((category) => ({ category, enabled: true })),
          metrics: [{ category: "AllMetrics", enabled: true }],
        },
      },
    });

    return {
      declarations: [site, diagnostics],
      outputs: {
        id: { value: attr("appService", "id") },
        name: { value: attr("appService", "name") },
        uri: { value: concat("https://", attr("appService", "properties.defaultHostName")) },
        identityPrincipalId: { value: attr("appService", "identity.principalId") },
      },
    };
  },
};
