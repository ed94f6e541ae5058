/**
 * Parameter schemas shared by the built-in templates.
 */

import { Type } from "@sinclair/typebox";

export const Location = () => Type.String({ minLength: 1, description: "Region, e.g. eastus" });

export const Tags = () =>
  Type.Record(Type.String(), Type.String(), { default: {}, description: "Tags applied to every resource" });

export const RESOURCE_TYPES = {
  resourceGroup: "Microsoft.Resources/resourceGroups",
  storageAccount: "Microsoft.Storage/storageAccounts",
  blobServices: "Microsoft.Storage/storageAccounts/blobServices",
  blobContainer: "Microsoft.Storage/storageAccounts/blobServices/containers",
  serverFarm: "Microsoft.Web/serverfarms",
  site: "Microsoft.Web/sites",
  diagnosticSettings: "Microsoft.Insights/diagnosticSettings",
  applicationInsights: "Microsoft.Insights/components",
  logAnalytics: "Microsoft.OperationalInsights/workspaces",
  roleAssignment: "Microsoft.Authorization/roleAssignments",
  cosmosAccount: "Microsoft.DocumentDB/databaseAccounts",
  cosmosSqlDatabase: "Microsoft.DocumentDB/databaseAccounts/sqlDatabases",
  cosmosSqlContainer: "Microsoft.DocumentDB/databaseAccounts/sqlDatabases/containers",
  cosmosSqlRoleAssignment: "Microsoft.DocumentDB/databaseAccounts/sqlRoleAssignments",
} as const;
