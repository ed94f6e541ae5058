import { describe, it, expect, beforeEach } from "vitest";
import { Type } from "@sinclair/typebox";
import { TemplateNotFoundError } from "../errors.js";
import type { AnyTemplate } from "../types.js";
import {
  clearTemplateRegistry,
  getTemplate,
  hasTemplate,
  listTemplates,
  registerTemplate,
  requireTemplate,
  unregisterTemplate,
} from "./registry.js";

function template(id: string): AnyTemplate {
  return { id, name: id, description: "", parameters: Type.Object({}), declare: () => ({ declarations: [] }) };
}

describe("template registry", () => {
  beforeEach(() => {
    clearTemplateRegistry();
  });

  it("registers and looks up templates by id", () => {
    const t = template("storage");
    registerTemplate(t);
    expect(getTemplate("storage")).toBe(t);
    expect(requireTemplate("storage")).toBe(t);
    expect(hasTemplate("storage")).toBe(true);
  });

  it("rejects a second registration of the same id", () => {
    registerTemplate(template("storage"));
    expect(() => registerTemplate(template("storage"))).toThrow('Template "storage" is already registered');
  });

  it("lists templates in registration order", () => {
    registerTemplate(template("b"));
    registerTemplate(template("a"));
    expect(listTemplates().map((t) => t.id)).toEqual(["b", "a"]);
  });

  it("throws TemplateNotFoundError for unknown ids", () => {
    expect(getTemplate("missing")).toBeUndefined();
    expect(() => requireTemplate("missing")).toThrow(TemplateNotFoundError);
    expect(() => requireTemplate("missing")).toThrow('Template "missing" is not registered');
  });

  it("unregisters templates", () => {
    registerTemplate(template("storage"));
    expect(unregisterTemplate("storage")).toBe(true);
    expect(unregisterTemplate("storage")).toBe(false);
    expect(hasTemplate("storage")).toBe(false);
  });
});
