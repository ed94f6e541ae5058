/**
 * stratum configuration schema (TypeBox), defaults and loader.
 *
 * Precedence: defaults, then `stratum.config.json`, then STRATUM_* environment
 * variables.
 */

import { existsSync, readFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Check, Clone, Default } from "@sinclair/typebox/value";
import { Errors } from "@sinclair/typebox/errors";
import { ConfigError } from "./errors.js";
import { isLogLevel } from "./logging/logger.js";

export const CONFIG_FILE_NAME = "stratum.config.json";

export const configSchema = Type.Object(
  {
    subscriptionId: Type.String({
      default: "00000000-0000-0000-0000-000000000000",
      description: "Subscription id exposed to templates",
    }),
    defaultLocation: Type.String({ default: "eastus", description: "Region used when a template's location is not given" }),
    logging: Type.Object(
      {
        level: Type.Union(
          [
            Type.Literal("trace"),
            Type.Literal("debug"),
            Type.Literal("info"),
            Type.Literal("warn"),
            Type.Literal("error"),
            Type.Literal("fatal"),
          ],
          { default: "info" },
        ),
        colors: Type.Optional(Type.Boolean({ description: "ANSI colours on stderr; defaults to whether stderr is a terminal" })),
      },
      { default: {}, additionalProperties: false },
    ),
    redaction: Type.Object(
      {
        sensitiveFields: Type.Array(Type.String(), {
          default: [],
          description: "Extra key names hidden in output, on top of the built-in list",
        }),
        patterns: Type.Array(Type.String(), {
          default: [],
          description: "Regular expressions whose matches are hidden in rendered text",
        }),
      },
      { default: {}, additionalProperties: false },
    ),
    apply: Type.Object(
      {
        maxConcurrency: Type.Integer({ minimum: 1, default: 4 }),
        failFast: Type.Boolean({ default: true }),
      },
      { default: {}, additionalProperties: false },
    ),
  },
  { additionalProperties: false },
);

export type StratumConfig = Static<typeof configSchema>;

function validate(value: unknown, source: string): StratumConfig {
  const withDefaults = Default(configSchema, Clone(value));
  if (Check(configSchema, withDefaults)) return withDefaults;
  const errors = [...Errors(configSchema, withDefaults)].map((e) => `${e.path || "/"}: ${e.message}`);
  throw new ConfigError(`Invalid configuration in ${source}`, errors);
}

export function getDefaultConfig(): StratumConfig {
  return validate({}, "defaults");
}

export type LoadConfigOptions = {
  /** Explicit config file; it must exist. */
  path?: string;
  /** Directory searched for stratum.config.json when no path is given. */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
};

/**
 * Load configuration from defaults, an optional JSON file and the environment.
 */
export function loadConfig(options: LoadConfigOptions = {}): StratumConfig {
  const env = options.env ?? process.env;
  const path = options.path ? resolve(options.path) : join(options.cwd ?? process.cwd(), CONFIG_FILE_NAME);

  let fileValue: unknown = {};
  if (existsSync(path)) {
    try {
      fileValue = JSON.parse(readFileSync(path, "utf-8"));
    } catch (err) {
      throw new ConfigError(`Could not read ${path}`, [err instanceof Error ? err.message : String(err)]);
    }
  } else if (options.path) {
    throw new ConfigError(`Config file ${path} does not exist`);
  }

  const config = validate(fileValue, path);

  if (env.STRATUM_SUBSCRIPTION_ID) config.subscriptionId = env.STRATUM_SUBSCRIPTION_ID;
  if (env.STRATUM_LOCATION) config.defaultLocation = env.STRATUM_LOCATION;
  if (env.STRATUM_LOG_LEVEL) {
    const level = env.STRATUM_LOG_LEVEL.toLowerCase();
    if (!isLogLevel(level)) {
      throw new ConfigError("Invalid STRATUM_LOG_LEVEL", [`"${env.STRATUM_LOG_LEVEL}" is not a log level`]);
    }
    config.logging.level = level;
  }

  return config;
}
