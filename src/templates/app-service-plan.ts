/**
 * Hosting plan for the function app. Defaults to the Linux consumption plan.
 */

import { Type } from "@sinclair/typebox";
import { attr } from "../graph/expressions.js";
import { resource } from "../graph/declare.js";
import { Choice } from "../graph/parameters.js";
import type { Template } from "../types.js";
import { Location, RESOURCE_TYPES, Tags } from "./common.js";

const AppServicePlanParameters = Type.Object(
  {
    name: Type.String({ minLength: 1, maxLength: 60 }),
    location: Location(),
    tags: Tags(),
    kind: Choice(["linux", "functionapp", "elastic", "app"], { default: "linux" }),
    skuName: Type.String({ default: "Y1" }),
    skuTier: Type.String({ default: "Dynamic" }),
    reserved: Type.Boolean({ default: true, description: "Required for Linux plans" }),
  },
  { additionalProperties: false },
);

export const appServicePlanTemplate: Template<typeof AppServicePlanParameters> = {
  id: "app-service-plan",
  name: "App Service plan",
  description: "Hosting plan for a function app",
  parameters: AppServicePlanParameters,

  declare(p) {
    return {
      declarations: [
        resource("hostingPlan", {
          type: RESOURCE_TYPES.serverFarm,
          name: p.name,
          location: p.location,
          tags: p.tags,
          properties: {
            kind: p.kind,
            sku: { name: p.skuName, tier: p.skuTier },
            properties: { reserved: p.reserved },
          },
        }),
      ],
      outputs: {
        id: { value: attr("hostingPlan", "id") },
        name: { value: attr("hostingPlan", "name") },
      },
    };
  },
};
