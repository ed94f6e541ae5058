/**
 * Parameter input for CLI commands: a JSON parameters file overlaid with
 * repeated `--param key=value` assignments.
 */

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { ConfigError } from "../errors.js";

export type Assignment = { key: string; value: unknown };

/**
 * Split `key=value` at the first "=". Values that parse as JSON (numbers,
 * booleans, arrays, objects, quoted strings) keep their JSON type; anything
 * else is taken as a plain string.
 */
export function parseAssignment(raw: string, flag = "--param"): Assignment {
  const eq = raw.indexOf("=");
  const key = eq === -1 ? "" : raw.slice(0, eq).trim();
  if (!key) {
    throw new ConfigError(`Invalid ${flag} "${raw}"`, ["expected key=value"]);
  }
  return { key, value: parseValue(raw.slice(eq + 1)) };
}

function parseValue(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function readParamsFile(path: string): Record<string, unknown> {
  const fullPath = resolve(path);
  if (!existsSync(fullPath)) {
    throw new ConfigError(`Parameters file ${fullPath} does not exist`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(fullPath, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Could not read ${fullPath}`, [err instanceof Error ? err.message : String(err)]);
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Parameters file ${fullPath} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Merge file parameters and assignments; later assignments win.
 */
export function buildParameterInput(options: { paramsFile?: string; params?: readonly string[] }): Record<string, unknown> {
  const input: Record<string, unknown> = options.paramsFile ? readParamsFile(options.paramsFile) : {};
  for (const raw of options.params ?? []) {
    const { key, value } = parseAssignment(raw);
    input[key] = value;
  }
  return input;
}
