/**
 * Built-in templates.
 */

import { hasTemplate, registerTemplate } from "../graph/registry.js";
import type { AnyTemplate } from "../types.js";
import { appServicePlanTemplate } from "./app-service-plan.js";
import { appServiceTemplate } from "./app-service.js";
import { cosmosSqlRoleTemplate } from "./cosmos-sql-role.js";
import { cosmosTemplate } from "./cosmos.js";
import { functionsTemplate } from "./functions.js";
import { mainTemplate } from "./main.js";
import { monitoringTemplate } from "./monitoring.js";
import { storageTemplate } from "./storage.js";

export const BUILTIN_TEMPLATES: readonly AnyTemplate[] = [
  mainTemplate,
  storageTemplate,
  functionsTemplate,
  appServiceTemplate,
  appServicePlanTemplate,
  monitoringTemplate,
  cosmosTemplate,
  cosmosSqlRoleTemplate,
];

/**
 * Register every built-in template that is not registered yet.
 */
export function registerBuiltinTemplates(): void {
  for (const template of BUILTIN_TEMPLATES) {
    if (!hasTemplate(template.id)) registerTemplate(template);
  }
}

export {
  appServicePlanTemplate,
  appServiceTemplate,
  cosmosSqlRoleTemplate,
  cosmosTemplate,
  functionsTemplate,
  mainTemplate,
  monitoringTemplate,
  storageTemplate,
};
export { DEFAULT_APP_SETTINGS } from "./main.js";
export * from "./catalog.js";
export * from "./naming.js";
