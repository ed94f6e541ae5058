/**
 * Function app: delegates the site to the app-service template and grants
 * the site's identity a data role on an existing storage account.
 */

import { Type } from "@sinclair/typebox";
import { attr, Deferrable, output, type PropertyValue } from "../graph/expressions.js";
import { module, resource } from "../graph/declare.js";
import { mergeRecords } from "../graph/merge.js";
import { Choice, Secure } from "../graph/parameters.js";
import type { Template } from "../types.js";
import { appServiceTemplate } from "./app-service.js";
import { functionsExtensionVersion, roleDefinitionId, roleGuid, runtimeDefaults, RUNTIME_NAMES } from "./catalog.js";
import { Location, RESOURCE_TYPES, Tags } from "./common.js";
import { guid, seedOf } from "./naming.js";

const Settings = () => Type.Record(Type.String(), Deferrable(Type.String()), { default: {} });

const FunctionsParameters = Type.Object(
  {
    name: Type.String({ minLength: 2, maxLength: 60 }),
    location: Location(),
    tags: Tags(),
    appServicePlanId: Deferrable(Type.String()),
    storageAccountName: Deferrable(Type.String(), { description: "Existing account used by the host and granted to its identity" }),
    runtimeName: Choice(RUNTIME_NAMES, { default: "python" }),
    runtimeVersion: Type.String({ default: "" }),
    baseAppSettings: Settings(),
    appSettings: Secure(Settings()),
    skipRoleAssignment: Type.Boolean({ default: false }),
    storageRole: Type.String({ default: "Storage Blob Data Contributor" }),
    logAnalyticsWorkspaceId: Deferrable(Type.String(), { default: "" }),
    alwaysOn: Type.Boolean({ default: false }),
  },
  { additionalProperties: false },
);

export const functionsTemplate: Template<typeof FunctionsParameters> = {
  id: "functions",
  name: "Function app",
  description: "Function app on an existing storage account, with an optional storage role grant",
  parameters: FunctionsParameters,

  declare(p, context) {
    const runtime = runtimeDefaults(p.runtimeName, "runtimeName");
    const runtimeSettings = {
      FUNCTIONS_EXTENSION_VERSION: functionsExtensionVersion(),
      FUNCTIONS_WORKER_RUNTIME: runtime.workerRuntime,
      AzureWebJobsStorage__accountName: attr("storage", "name"),
    };

    const storage = resource("storage", {
      type: RESOURCE_TYPES.storageAccount,
      name: p.storageAccountName,
      existing: true,
    });

    const host = module("host", appServiceTemplate, {
      name: p.name,
      location: p.location,
      tags: p.tags,
      appServicePlanId: p.appServicePlanId,
      runtimeName: p.runtimeName,
      runtimeVersion: p.runtimeVersion,
      appSettings: mergeRecords<PropertyValue>(runtimeSettings, p.baseAppSettings, p.appSettings),
      alwaysOn: p.alwaysOn,
      logAnalyticsWorkspaceId: p.logAnalyticsWorkspaceId,
    });

    const roleId = roleGuid(p.storageRole, "storageRole");
    const roleAssignment = resource("storageRoleAssignment", {
      type: RESOURCE_TYPES.roleAssignment,
      name: guid(context.subscriptionId, seedOf(p.storageAccountName), p.name, roleId),
      scope: "storage",
      condition: !p.skipRoleAssignment,
      properties: {
        properties: {
          roleDefinitionId: roleDefinitionId(p.storageRole, context.subscriptionId, "storageRole"),
          principalId: output("host", "identityPrincipalId"),
          principalType: "ServicePrincipal",
        },
      },
    });

    return {
      declarations: [storage, host, roleAssignment],
      outputs: {
        id: { value: output("host", "id") },
        name: { value: output("host", "name") },
        uri: { value: output("host", "uri") },
        identityPrincipalId: { value: output("host", "identityPrincipalId") },
      },
    };
  },
};
