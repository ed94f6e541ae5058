/**
 * Setup shared by the commands that resolve a template.
 */

import { loadConfig, type StratumConfig } from "../config.js";
import { buildParameterInput } from "../cli/params.js";
import { requireTemplate } from "../graph/registry.js";
import { resolveTemplate } from "../graph/resolver.js";
import { createLogger, setLogger } from "../logging/logger.js";
import { DEFAULT_SENSITIVE_FIELDS } from "../logging/redact.js";
import { registerBuiltinTemplates } from "../templates/index.js";
import type { ResolvedGraph } from "../types.js";

export const DEFAULT_DEPLOYMENT_NAME = "stratum";

export type GraphCommandOptions = {
  params?: string[];
  paramsFile?: string;
  deploymentName?: string;
  subscriptionId?: string;
  /** Explicit config file instead of ./stratum.config.json. */
  config?: string;
  json?: boolean;
};

export function sensitiveFieldsOf(config: StratumConfig): string[] {
  return [...DEFAULT_SENSITIVE_FIELDS, ...config.redaction.sensitiveFields];
}

/**
 * Load configuration, install the process logger and register the built-in
 * templates.
 */
export function prepareCommand(configPath?: string, env?: NodeJS.ProcessEnv): StratumConfig {
  const config = loadConfig({ path: configPath, env });
  setLogger(
    createLogger("core", {
      level: config.logging.level,
      colors: config.logging.colors,
      sensitiveFields: sensitiveFieldsOf(config),
      redactPatterns: config.redaction.patterns,
    }),
  );
  registerBuiltinTemplates();
  return config;
}

export function resolveForCommand(templateId: string, opts: GraphCommandOptions, config: StratumConfig): ResolvedGraph {
  const template = requireTemplate(templateId);
  const input = buildParameterInput({ paramsFile: opts.paramsFile, params: opts.params });
  if ("location" in template.parameters.properties && input.location === undefined) {
    input.location = config.defaultLocation;
  }
  return resolveTemplate(template, input, {
    deployment: {
      subscriptionId: opts.subscriptionId ?? config.subscriptionId,
      deploymentName: opts.deploymentName ?? DEFAULT_DEPLOYMENT_NAME,
    },
    sensitiveFields: sensitiveFieldsOf(config),
    redactPatterns: config.redaction.patterns,
  });
}

/** One-line rendering of an already redacted value. */
export function formatValue(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}
