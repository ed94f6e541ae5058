/**
 * Orchestrating template: a resource group plus the monitoring, storage,
 * hosting plan and function app modules, threaded together through module
 * outputs. Cosmos DB and its data role are added when `provisionCosmos` is set.
 */

import { Type } from "@sinclair/typebox";
import { attr, output, type OutputRef, type PropertyValue } from "../graph/expressions.js";
import { module, resource } from "../graph/declare.js";
import { mergeRecords, mergeTags } from "../graph/merge.js";
import { Choice, Secure } from "../graph/parameters.js";
import type { Declaration, OutputDeclaration, Template } from "../types.js";
import { appServicePlanTemplate } from "./app-service-plan.js";
import { RUNTIME_NAMES } from "./catalog.js";
import { Location, RESOURCE_TYPES, Tags } from "./common.js";
import { cosmosSqlRoleTemplate } from "./cosmos-sql-role.js";
import { cosmosTemplate } from "./cosmos.js";
import { functionsTemplate } from "./functions.js";
import { monitoringTemplate } from "./monitoring.js";
import { resourceName, storageAccountName, uniqueString } from "./naming.js";
import { ContainerSchema, storageTemplate } from "./storage.js";

/** Settings every function app starts from; anything layered later wins. */
export const DEFAULT_APP_SETTINGS: Readonly<Record<string, string>> = {
  SCM_DO_BUILD_DURING_DEPLOYMENT: "true",
  ENABLE_ORYX_BUILD: "true",
};

const MainParameters = Type.Object(
  {
    environmentName: Type.String({ default: "", maxLength: 64, description: "Defaults to the deployment name" }),
    location: Location(),
    resourceGroupName: Type.String({ default: "", description: "Defaults to rg-<environment>" }),
    tags: Tags(),
    storageAccessTier: Choice(["Hot", "Cool", "Premium"], { default: "Hot" }),
    storageContainers: Type.Array(ContainerSchema, { default: [] }),
    planSkuName: Type.String({ default: "Y1" }),
    planSkuTier: Type.String({ default: "Dynamic" }),
    runtimeName: Choice(RUNTIME_NAMES, { default: "python" }),
    runtimeVersion: Type.String({ default: "" }),
    appSettings: Secure(Type.Record(Type.String(), Type.String(), { default: {}, description: "Caller settings; win over every default" })),
    skipRoleAssignment: Type.Boolean({ default: false }),
    logRetentionInDays: Type.Integer({ minimum: 30, maximum: 730, default: 30 }),
    provisionCosmos: Type.Boolean({ default: false }),
    cosmosDatabaseName: Type.String({ default: "inventory" }),
    cosmosContainerName: Type.String({ default: "items" }),
    cosmosPartitionKeyPath: Type.String({ pattern: "^/", default: "/category" }),
  },
  { additionalProperties: false },
);

export const mainTemplate: Template<typeof MainParameters> = {
  id: "main",
  name: "Function app environment",
  description: "Resource group, monitoring, storage, hosting plan and function app, with optional Cosmos DB",
  parameters: MainParameters,

  declare(p, context) {
    const environment = p.environmentName || context.deploymentName;
    const token = uniqueString(context.subscriptionId, environment, p.location);
    const tags = mergeTags({ environment, "managed-by": "stratum" }, p.tags);
    const common = { location: p.location, tags };
    const inResourceGroup = { scope: "resourceGroup" };

    const declarations: Declaration[] = [
      resource("resourceGroup", {
        type: RESOURCE_TYPES.resourceGroup,
        name: p.resourceGroupName || `rg-${environment}`,
        location: p.location,
        tags,
      }),

      module("monitoring", monitoringTemplate, {
        ...common,
        logAnalyticsName: resourceName(RESOURCE_TYPES.logAnalytics, token),
        applicationInsightsName: resourceName(RESOURCE_TYPES.applicationInsights, token),
        retentionInDays: p.logRetentionInDays,
      }, inResourceGroup),

      module("storage", storageTemplate, {
        ...common,
        name: storageAccountName(token),
        accessTier: p.storageAccessTier,
        containers: p.storageContainers.map((c): PropertyValue => (c.publicAccess ? { name: c.name, publicAccess: c.publicAccess } : { name: c.name })),
      }, inResourceGroup),

      module("appServicePlan", appServicePlanTemplate, {
        ...common,
        name: resourceName(RESOURCE_TYPES.serverFarm, token),
        skuName: p.planSkuName,
        skuTier: p.planSkuTier,
      }, inResourceGroup),

      module("cosmos", cosmosTemplate, {
        ...common,
        accountName: resourceName(RESOURCE_TYPES.cosmosAccount, token),
        databaseName: p.cosmosDatabaseName,
        containers: [{ name: p.cosmosContainerName, partitionKeyPath: p.cosmosPartitionKeyPath }],
      }, { ...inResourceGroup, condition: p.provisionCosmos }),
    ];

    const monitoringSettings: Record<string, OutputRef> = {
      APPLICATIONINSIGHTS_CONNECTION_STRING: output("monitoring", "applicationInsightsConnectionString"),
    };
    const cosmosSettings: Record<string, PropertyValue> = p.provisionCosmos
      ? {
          COSMOSDB_ENDPOINT: output("cosmos", "endpoint"),
          COSMOSDB_DATABASE: p.cosmosDatabaseName,
          COSMOSDB_CONTAINER: p.cosmosContainerName,
        }
      : {};

    declarations.push(
      module("functionApp", functionsTemplate, {
        ...common,
        name: resourceName(RESOURCE_TYPES.site, token),
        appServicePlanId: output("appServicePlan", "id"),
        storageAccountName: output("storage", "name"),
        runtimeName: p.runtimeName,
        runtimeVersion: p.runtimeVersion,
        baseAppSettings: mergeRecords<PropertyValue>(DEFAULT_APP_SETTINGS, monitoringSettings, cosmosSettings),
        appSettings: p.appSettings,
        skipRoleAssignment: p.skipRoleAssignment,
        logAnalyticsWorkspaceId: output("monitoring", "logAnalyticsWorkspaceId"),
      }, inResourceGroup),

      module("cosmosDataRole", cosmosSqlRoleTemplate, {
        accountName: output("cosmos", "accountName"),
        principalId: output("functionApp", "identityPrincipalId"),
      }, { ...inResourceGroup, condition: p.provisionCosmos }),
    );

    const outputs: Record<string, OutputDeclaration> = {
      location: { value: p.location },
      resourceGroupName: { value: attr("resourceGroup", "name") },
      storageAccountName: { value: output("storage", "name") },
      storageBlobEndpoint: { value: output("storage", "blobEndpoint") },
      functionAppName: { value: output("functionApp", "name") },
      functionAppUri: { value: output("functionApp", "uri") },
      functionAppPrincipalId: { value: output("functionApp", "identityPrincipalId") },
    };
    if (p.provisionCosmos) {
      outputs.cosmosEndpoint = { value: output("cosmos", "endpoint") };
    }

    return { declarations, outputs };
  },
};
