/**
 * stratum — Template Registry
 *
 * Templates are looked up by id when a module declaration names one.
 */

import { TemplateNotFoundError } from "../errors.js";
import type { AnyTemplate } from "../types.js";

const templates = new Map<string, AnyTemplate>();

/**
 * Register a template under its id.
 */
export function registerTemplate(template: AnyTemplate): void {
  if (templates.has(template.id)) {
    throw new Error(`Template "${template.id}" is already registered`);
  }
  templates.set(template.id, template);
}

export function getTemplate(id: string): AnyTemplate | undefined {
  return templates.get(id);
}

/**
 * Get a template or throw {@link TemplateNotFoundError}.
 */
export function requireTemplate(id: string): AnyTemplate {
  const template = templates.get(id);
  if (!template) throw new TemplateNotFoundError(id);
  return template;
}

/**
 * List all registered templates, in registration order.
 */
export function listTemplates(): AnyTemplate[] {
  return [...templates.values()];
}

export function hasTemplate(id: string): boolean {
  return templates.has(id);
}

/**
 * Remove a template (useful for testing).
 */
export function unregisterTemplate(id: string): boolean {
  return templates.delete(id);
}

/**
 * Clear all registrations (useful for testing).
 */
export function clearTemplateRegistry(): void {
  templates.clear();
}
