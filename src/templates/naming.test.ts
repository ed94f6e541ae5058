import { describe, it, expect } from "vitest";
import { attr } from "../graph/expressions.js";
import { abbreviation, guid, resourceName, seedOf, storageAccountName, uniqueString } from "./naming.js";

describe("uniqueString", () => {
  it("is a deterministic 13-character lowercase token", () => {
    const token = uniqueString("sub", "dev", "eastus");
    expect(token).toMatch(/^[a-z2-7]{13}$/);
    expect(uniqueString("sub", "dev", "eastus")).toBe(token);
  });

  it("changes with any part", () => {
    expect(uniqueString("sub", "dev", "eastus")).not.toBe(uniqueString("sub", "prod", "eastus"));
  });

  it("keeps part boundaries", () => {
    expect(uniqueString("ab", "c")).not.toBe(uniqueString("a", "bc"));
  });
});

describe("guid", () => {
  it("produces a stable version-5 style UUID", () => {
    const id = guid("sub", "acct", "role");
    expect(id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-5[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(guid("sub", "acct", "role")).toBe(id);
    expect(guid("sub", "acct", "other")).not.toBe(id);
  });
});

describe("seedOf", () => {
  it("uses strings as they are and serializes expressions", () => {
    expect(seedOf("acct")).toBe("acct");
    expect(seedOf(attr("storage", "name"))).toBe('{"$kind":"attr","node":"storage","path":"name"}');
  });
});

describe("abbreviations", () => {
  it("looks resource types up case-insensitively", () => {
    expect(abbreviation("Microsoft.Web/sites")).toBe("func");
    expect(abbreviation("microsoft.web/SITES")).toBe("func");
  });

  it("falls back to res for unknown types", () => {
    expect(abbreviation("Contoso.Widgets/widgets")).toBe("res");
  });

  it("prefixes tokens with the abbreviation", () => {
    expect(resourceName("Microsoft.Web/serverfarms", "abc123")).toBe("plan-abc123");
    expect(resourceName("Microsoft.Insights/components", "abc123")).toBe("appi-abc123");
  });

  it("builds storage account names within the allowed alphabet and length", () => {
    expect(storageAccountName("abc123")).toBe("stabc123");
    expect(storageAccountName("ABC-def_123456789012345678")).toBe("stabcdef1234567890123456");
  });
});
