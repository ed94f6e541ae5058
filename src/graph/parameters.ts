/**
 * Template parameter binding: defaults, type and allowed-value checks, and
 * discovery of secure values.
 */

import { Type, TypeGuard, type SchemaOptions, type Static, type TObject, type TSchema } from "@sinclair/typebox";
import { Check, Clone, Default } from "@sinclair/typebox/value";
import { Errors } from "@sinclair/typebox/errors";
import type { ResolutionIssue } from "../errors.js";
import type { Template } from "../types.js";
import { concreteStrings } from "./expressions.js";

// =============================================================================
// Schema Helpers
// =============================================================================

/** Allowed-value parameter: a union of string literals. */
export function Choice<const T extends readonly [string, ...string[]]>(values: T, options?: SchemaOptions) {
  return Type.Union(
    values.map((v) => Type.Literal(v)),
    options,
  );
}

/** Marks a parameter as secure: its values are redacted wherever they are rendered. */
export function Secure<T extends TSchema>(schema: T): T {
  return { ...schema, secure: true };
}

// =============================================================================
// Binding
// =============================================================================

export type BindResult<S extends TObject> =
  | { ok: true; params: Static<S> }
  | { ok: false; issues: ResolutionIssue[] };

/**
 * Fill defaults and validate `input` against the template's parameter schema.
 * The caller's object is never mutated.
 */
export function bindParameters<S extends TObject>(
  template: Template<S>,
  input: Readonly<Record<string, unknown>>,
  scope = "",
): BindResult<S> {
  const value = Default(template.parameters, Clone(input));
  if (Check(template.parameters, value)) {
    return { ok: true, params: value };
  }

  const issues: ResolutionIssue[] = [];
  const seen = new Set<string>();
  for (const error of Errors(template.parameters, value)) {
    const path = formatPath(error.path);
    if (seen.has(path)) continue;
    seen.add(path);
    issues.push({
      code: "PARAMETER_CONSTRAINT",
      node: scope || undefined,
      path,
      message: `Parameter "${path}" of template "${template.id}": ${describeViolation(error.schema, error.message)}`,
    });
  }
  if (issues.length === 0) {
    issues.push({
      code: "PARAMETER_CONSTRAINT",
      node: scope || undefined,
      message: `Parameters do not match the schema of template "${template.id}"`,
    });
  }
  return { ok: false, issues };
}

function formatPath(path: string): string {
  const trimmed = path.replace(/^\//, "");
  return trimmed === "" ? "(root)" : trimmed.split("/").join(".");
}

function describeViolation(schema: TSchema, fallback: string): string {
  const allowed = allowedValues(schema);
  if (allowed) return `must be one of: ${allowed.join(", ")}`;
  return fallback;
}

function allowedValues(schema: TSchema): string[] | undefined {
  if (!TypeGuard.IsUnion(schema)) return undefined;
  const values: string[] = [];
  for (const member of schema.anyOf) {
    if (!TypeGuard.IsLiteral(member)) return undefined;
    values.push(String(member.const));
  }
  return values;
}

// =============================================================================
// Description
// =============================================================================

export type ParameterDescription = {
  name: string;
  type: "string" | "integer" | "number" | "boolean" | "object" | "array";
  required: boolean;
  secure: boolean;
  /** True when the parameter also accepts another module's output. */
  deferrable: boolean;
  default?: unknown;
  allowed?: string[];
  description?: string;
};

export function describeParameters(template: Template<TObject>): ParameterDescription[] {
  const required = new Set(template.parameters.required ?? []);
  return Object.entries(template.parameters.properties).map(([name, schema]) => {
    const described = describeSchema(schema);
    const description: ParameterDescription = {
      name,
      type: described.type,
      required: required.has(name) && schema.default === undefined,
      secure: schema.secure === true,
      deferrable: described.deferrable,
    };
    if (schema.default !== undefined) description.default = schema.default;
    const allowed = allowedValues(schema);
    if (allowed) description.allowed = allowed;
    if (typeof schema.description === "string") description.description = schema.description;
    return description;
  });
}

function describeSchema(schema: TSchema): { type: ParameterDescription["type"]; deferrable: boolean } {
  if (TypeGuard.IsUnion(schema)) {
    if (allowedValues(schema)) return { type: "string", deferrable: false };
    const [first] = schema.anyOf;
    const deferrable = schema.anyOf.length > 1;
    return { type: first ? describeSchema(first).type : "string", deferrable };
  }
  if (TypeGuard.IsString(schema) || TypeGuard.IsLiteral(schema)) return { type: "string", deferrable: false };
  if (TypeGuard.IsBoolean(schema)) return { type: "boolean", deferrable: false };
  if (TypeGuard.IsInteger(schema)) return { type: "integer", deferrable: false };
  if (TypeGuard.IsNumber(schema)) return { type: "number", deferrable: false };
  if (TypeGuard.IsArray(schema)) return { type: "array", deferrable: false };
  return { type: "object", deferrable: false };
}

// =============================================================================
// Secure Values
// =============================================================================

/**
 * Every concrete string reachable from a parameter marked secure. Expressions
 * are skipped: they name other values rather than carrying one.
 */
export function secureParameterValues(template: Template<TObject>, params: Readonly<Record<string, unknown>>): string[] {
  const values: string[] = [];
  for (const [name, schema] of Object.entries(template.parameters.properties)) {
    if (schema.secure !== true) continue;
    values.push(...concreteStrings(params[name]));
  }
  return values;
}
