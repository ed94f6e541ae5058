/**
 * Loader for the catalog files under `data/` at the package root.
 */

import { existsSync, readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import type { Static, TSchema } from "@sinclair/typebox";
import { Check } from "@sinclair/typebox/value";
import { Errors } from "@sinclair/typebox/errors";
import { ConfigError } from "../errors.js";

const cache = new Map<string, unknown>();

/** Walk up from this module until a `data/<name>` file is found. */
export function findDataFile(name: string): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    const candidate = join(dir, "data", name);
    if (existsSync(candidate)) return candidate;
    const parent = dirname(dir);
    if (parent === dir) throw new ConfigError(`Data file "${name}" not found`);
    dir = parent;
  }
}

/**
 * Read and validate a JSON data file. Results are cached per file name.
 */
export function readDataFile<S extends TSchema>(name: string, schema: S): Static<S> {
  const cached = cache.get(name);
  if (cached !== undefined && Check(schema, cached)) return cached;

  const path = findDataFile(name);
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Data file "${path}" is not valid JSON`, [err instanceof Error ? err.message : String(err)]);
  }
  if (!Check(schema, parsed)) {
    const errors = [...Errors(schema, parsed)].map((e) => `${e.path || "/"}: ${e.message}`);
    throw new ConfigError(`Data file "${path}" is invalid`, errors);
  }
  cache.set(name, parsed);
  return parsed;
}
