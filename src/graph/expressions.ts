/**
 * Symbolic placeholders for values that are only known after another
 * declaration has been resolved or applied.
 *
 * Templates build property bags out of plain JSON values and these
 * expressions. Resolution qualifies and folds them; whatever is still an
 * expression in the resolved graph is bound by the apply engine.
 */

import { Type, type Static, type TSchema, type SchemaOptions, type TUnion } from "@sinclair/typebox";

// =============================================================================
// Schemas
// =============================================================================

export const AttributeRefSchema = Type.Object({
  $kind: Type.Literal("attr"),
  node: Type.String(),
  path: Type.String(),
  /** Set once `node` is a graph-wide node id rather than a symbol of the declaring template. */
  qualified: Type.Optional(Type.Literal(true)),
});

export const OutputRefSchema = Type.Object({
  $kind: Type.Literal("output"),
  module: Type.String(),
  output: Type.String(),
});

export const ConcatExpressionSchema = Type.Object({
  $kind: Type.Literal("concat"),
  parts: Type.Array(Type.Union([Type.String(), Type.Number(), AttributeRefSchema, OutputRefSchema])),
});

export const ExpressionSchema = Type.Union([AttributeRefSchema, OutputRefSchema, ConcatExpressionSchema]);

export type AttributeRef = Static<typeof AttributeRefSchema>;
export type OutputRef = Static<typeof OutputRefSchema>;
export type ConcatExpression = Static<typeof ConcatExpressionSchema>;
export type Expression = Static<typeof ExpressionSchema>;
export type Reference = AttributeRef | OutputRef;
type ConcatPart = ConcatExpression["parts"][number];

/** A value that is either concrete now or bound later. */
export type Deferred<T> = T | Expression;

export type PropertyValue =
  | string
  | number
  | boolean
  | null
  | Expression
  | readonly PropertyValue[]
  | { readonly [key: string]: PropertyValue };

export type PropertyBag = { readonly [key: string]: PropertyValue };

/**
 * Parameter schema that also accepts an expression, for values a caller may
 * thread in from another module's outputs.
 */
export function Deferrable<T extends TSchema>(schema: T, options?: SchemaOptions): TUnion<[T, typeof ExpressionSchema]> {
  return Type.Union([schema, ExpressionSchema], options);
}

// =============================================================================
// Constructors
// =============================================================================

/** Reference an attribute of a resource declared in the same template. */
export function attr(node: string, path: string): AttributeRef {
  return { $kind: "attr", node, path };
}

/** Reference an output of a module declared in the same template. */
export function output(module: string, name: string): OutputRef {
  return { $kind: "output", module, output: name };
}

/**
 * Interpolate literals and references into one string. Nested concatenations
 * are flattened; when every part is concrete the plain string is returned.
 */
export function concat(...parts: ReadonlyArray<Deferred<string> | number>): Deferred<string> {
  const flat: ConcatPart[] = [];
  for (const part of parts) {
    if (typeof part === "string" || typeof part === "number") {
      flat.push(part);
    } else if (part.$kind === "concat") {
      flat.push(...part.parts);
    } else {
      flat.push(part);
    }
  }
  return simplifyConcat(flat);
}

function simplifyConcat(parts: ConcatPart[]): Deferred<string> {
  const merged: ConcatPart[] = [];
  for (const part of parts) {
    const last = merged[merged.length - 1];
    if (typeof part !== "object" && (typeof last === "string" || typeof last === "number")) {
      merged[merged.length - 1] = `${last}${part}`;
    } else if (part !== "") {
      merged.push(part);
    }
  }
  if (merged.length === 0) return "";
  if (merged.length === 1 && typeof merged[0] !== "object") return String(merged[0]);
  return { $kind: "concat", parts: merged };
}

// =============================================================================
// Inspection
// =============================================================================

const EXPRESSION_KINDS = new Set(["attr", "output", "concat"]);

export function isExpression(value: unknown): value is Expression {
  if (value === null || typeof value !== "object" || Array.isArray(value)) return false;
  const kind: unknown = Reflect.get(value, "$kind");
  return typeof kind === "string" && EXPRESSION_KINDS.has(kind);
}

export function isAttributeRef(value: unknown): value is AttributeRef {
  return isExpression(value) && value.$kind === "attr";
}

/** True for references already rewritten to graph-wide node ids. */
export function isQualified(ref: Reference): boolean {
  return ref.$kind === "attr" && ref.qualified === true;
}

export function isPropertyRecord(value: PropertyValue): value is { readonly [key: string]: PropertyValue } {
  return value !== null && typeof value === "object" && !Array.isArray(value) && !isExpression(value);
}

function isPropertyArray(value: PropertyValue): value is readonly PropertyValue[] {
  return Array.isArray(value);
}

/** Every attribute and output reference inside `value`, in document order. */
export function collectReferences(value: PropertyValue | undefined): Reference[] {
  const refs: Reference[] = [];
  const visit = (v: PropertyValue | undefined): void => {
    if (v === undefined || v === null || typeof v !== "object") return;
    if (isPropertyArray(v)) {
      for (const item of v) visit(item);
      return;
    }
    if (isExpression(v)) {
      if (v.$kind === "concat") {
        for (const part of v.parts) {
          if (typeof part === "object") refs.push(part);
        }
      } else {
        refs.push(v);
      }
      return;
    }
    for (const item of Object.values(v)) visit(item);
  };
  visit(value);
  return refs;
}

export function containsExpression(value: PropertyValue | undefined): boolean {
  return collectReferences(value).length > 0;
}

/** Every concrete string in `value`; expressions are skipped. */
export function concreteStrings(value: unknown): string[] {
  const strings: string[] = [];
  const visit = (v: unknown): void => {
    if (typeof v === "string") {
      strings.push(v);
    } else if (Array.isArray(v)) {
      for (const item of v) visit(item);
    } else if (v !== null && typeof v === "object" && !isExpression(v)) {
      for (const item of Object.values(v)) visit(item);
    }
  };
  visit(value);
  return strings;
}

// =============================================================================
// Substitution
// =============================================================================

/**
 * Replace every reference in `value` with what `replace` returns. Concat
 * parts must be replaced by scalars or references; anything else is
 * reported through `onInvalid` and left as an empty string.
 */
export function substituteExpressions(
  value: PropertyValue,
  replace: (ref: Reference) => PropertyValue,
  onInvalid: (ref: Reference, replacement: PropertyValue) => void = () => {},
): PropertyValue {
  if (value === null || typeof value !== "object") return value;
  if (isPropertyArray(value)) {
    return value.map((item) => substituteExpressions(item, replace, onInvalid));
  }
  if (isExpression(value)) {
    if (value.$kind !== "concat") return replace(value);
    const parts: ConcatPart[] = [];
    for (const part of value.parts) {
      if (typeof part !== "object") {
        parts.push(part);
        continue;
      }
      const replacement = replace(part);
      if (typeof replacement === "string" || typeof replacement === "number") {
        parts.push(replacement);
      } else if (typeof replacement === "boolean") {
        parts.push(String(replacement));
      } else if (isExpression(replacement)) {
        if (replacement.$kind === "concat") parts.push(...replacement.parts);
        else parts.push(replacement);
      } else {
        onInvalid(part, replacement);
        parts.push("");
      }
    }
    return simplifyConcat(parts);
  }
  const result: Record<string, PropertyValue> = {};
  for (const [key, item] of Object.entries(value)) {
    result[key] = substituteExpressions(item, replace, onInvalid);
  }
  return result;
}

/** Same as {@link substituteExpressions} over a record of values. */
export function substituteBag(
  bag: PropertyBag,
  replace: (ref: Reference) => PropertyValue,
  onInvalid?: (ref: Reference, replacement: PropertyValue) => void,
): Record<string, PropertyValue> {
  const result: Record<string, PropertyValue> = {};
  for (const [key, item] of Object.entries(bag)) {
    result[key] = substituteExpressions(item, replace, onInvalid);
  }
  return result;
}

/** Walk a dotted path (`properties.primaryEndpoints.blob`) through a property value. */
export function readPath(value: PropertyValue | undefined, path: string): PropertyValue | undefined {
  let current: PropertyValue | undefined = value;
  for (const segment of path.split(".")) {
    if (current === undefined || current === null || typeof current !== "object") return undefined;
    if (isPropertyArray(current)) {
      const index = Number(segment);
      if (!Number.isInteger(index)) return undefined;
      current = current[index];
    } else if (isExpression(current)) {
      return undefined;
    } else {
      current = current[segment];
    }
  }
  return current;
}

export function formatReference(ref: Reference): string {
  return ref.$kind === "attr" ? `${ref.node}.${ref.path}` : `${ref.module}.outputs.${ref.output}`;
}
