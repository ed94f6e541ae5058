/**
 * Log Analytics workspace and a workspace-based Application Insights component.
 */

import { Type } from "@sinclair/typebox";
import { attr } from "../graph/expressions.js";
import { resource } from "../graph/declare.js";
import type { Template } from "../types.js";
import { Location, RESOURCE_TYPES, Tags } from "./common.js";

const MonitoringParameters = Type.Object(
  {
    logAnalyticsName: Type.String({ minLength: 4, maxLength: 63 }),
    applicationInsightsName: Type.String({ minLength: 1, maxLength: 255 }),
    location: Location(),
    tags: Tags(),
    retentionInDays: Type.Integer({ minimum: 30, maximum: 730, default: 30 }),
    skuName: Type.String({ default: "PerGB2018" }),
  },
  { additionalProperties: false },
);

export const monitoringTemplate: Template<typeof MonitoringParameters> = {
  id: "monitoring",
  name: "Monitoring",
  description: "Log Analytics workspace and Application Insights",
  parameters: MonitoringParameters,

  declare(p) {
    return {
      declarations: [
        resource("logAnalytics", {
          type: RESOURCE_TYPES.logAnalytics,
          name: p.logAnalyticsName,
          location: p.location,
          tags: p.tags,
          properties: {
            properties: {
              retentionInDays: p.retentionInDays,
              sku: { name: p.skuName },
            },
          },
        }),
        resource("applicationInsights", {
          type: RESOURCE_TYPES.applicationInsights,
          name: p.applicationInsightsName,
          location: p.location,
          tags: p.tags,
          properties: {
            kind: "web",
            properties: {
              Application_Type: "web",
              WorkspaceResourceId: attr("logAnalytics", "id"),
            },
          },
        }),
      ],
      outputs: {
        logAnalyticsWorkspaceId: { value: attr("logAnalytics", "id") },
        logAnalyticsWorkspaceName: { value: attr("logAnalytics", "name") },
        applicationInsightsName: { value: attr("applicationInsights", "name") },
        applicationInsightsConnectionString: {
          value: attr("applicationInsights", "properties.ConnectionString"),
          secure: true,
        },
      },
    };
  },
};
