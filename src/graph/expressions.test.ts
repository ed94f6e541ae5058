import { describe, it, expect } from "vitest";
import {
  attr,
  collectReferences,
  concat,
  concreteStrings,
  containsExpression,
  formatReference,
  isExpression,
  output,
  readPath,
  substituteExpressions,
  type PropertyValue,
  type Reference,
} from "./expressions.js";

describe("concat", () => {
  it("returns a plain string when every part is concrete", () => {
    expect(concat("rg-", "dev", "-", 1)).toBe("rg-dev-1");
  });

  it("merges adjacent literals around references", () => {
    expect(concat("https://", "x", attr("site", "properties.defaultHostName"), "/", "api")).toEqual({
      $kind: "concat",
      parts: ["https://x", { $kind: "attr", node: "site", path: "properties.defaultHostName" }, "/api"],
    });
  });

  it("flattens nested concatenations", () => {
    const inner = concat("a", output("m", "name"));
    expect(concat(inner, "-b")).toEqual({
      $kind: "concat",
      parts: ["a", { $kind: "output", module: "m", output: "name" }, "-b"],
    });
  });
});

describe("inspection", () => {
  it("recognises expressions only by $kind", () => {
    expect(isExpression(attr("a", "id"))).toBe(true);
    expect(isExpression({ $kind: "other" })).toBe(false);
    expect(isExpression(["attr"])).toBe(false);
    expect(isExpression("attr")).toBe(false);
  });

  it("collects references in document order, including concat parts", () => {
    const value: PropertyValue = {
      first: attr("a", "id"),
      list: [concat("x", output("m", "o"))],
      plain: "text",
    };
    expect(collectReferences(value)).toEqual([attr("a", "id"), output("m", "o")]);
    expect(containsExpression(value)).toBe(true);
    expect(containsExpression({ plain: ["text", 1, null] })).toBe(false);
  });

  it("lists concrete strings and skips expressions", () => {
    expect(concreteStrings({ a: "one", b: [attr("x", "id"), "two"], c: 3 })).toEqual(["one", "two"]);
  });

  it("formats references for messages", () => {
    expect(formatReference(attr("storage/account", "properties.primaryEndpoints.blob"))).toBe(
      "storage/account.properties.primaryEndpoints.blob",
    );
    expect(formatReference(output("monitoring", "workspaceId"))).toBe("monitoring.outputs.workspaceId");
  });
});

describe("substituteExpressions", () => {
  const values: Record<string, PropertyValue> = {
    "a.name": "acct",
    "a.port": 443,
    "a.object": { nested: true },
  };
  const replace = (ref: Reference): PropertyValue => values[formatReference(ref)] ?? null;

  it("replaces references deep inside records and arrays", () => {
    expect(substituteExpressions({ list: [attr("a", "name")], n: 1 }, replace)).toEqual({ list: ["acct"], n: 1 });
  });

  it("folds fully concrete concatenations to strings", () => {
    expect(substituteExpressions(concat("https://", attr("a", "name"), ":", attr("a", "port")), replace)).toBe(
      "https://acct:443",
    );
  });

  it("reports non-scalar concat parts", () => {
    const invalid: string[] = [];
    const result = substituteExpressions(concat("x-", attr("a", "object")), replace, (ref) => {
      invalid.push(formatReference(ref));
    });
    expect(result).toBe("x-");
    expect(invalid).toEqual(["a.object"]);
  });
});

describe("readPath", () => {
  const value: PropertyValue = {
    properties: { primaryEndpoints: { blob: "https://acct.blob.core.windows.net/" }, list: ["a", "b"] },
    ref: attr("x", "id"),
  };

  it("walks dotted paths through records and arrays", () => {
    expect(readPath(value, "properties.primaryEndpoints.blob")).toBe("https://acct.blob.core.windows.net/");
    expect(readPath(value, "properties.list.1")).toBe("b");
  });

  it("returns undefined for missing segments and for paths into expressions", () => {
    expect(readPath(value, "properties.missing.blob")).toBeUndefined();
    expect(readPath(value, "properties.list.x")).toBeUndefined();
    expect(readPath(value, "ref.node")).toBeUndefined();
  });
});
