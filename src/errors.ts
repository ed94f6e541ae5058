/**
 * stratum — Error Types
 *
 * Resolution-time errors are fatal and abort before anything is applied.
 * Apply-time errors come from the provider and are reported verbatim in the
 * apply result instead of being thrown from here.
 */

export type ResolutionIssueCode =
  | "PARAMETER_CONSTRAINT"
  | "DANGLING_REFERENCE"
  | "INVALID_REFERENCE"
  | "UNKNOWN_OUTPUT"
  | "UNKNOWN_TEMPLATE"
  | "DUPLICATE_SYMBOL"
  | "DUPLICATE_NAME"
  | "CIRCULAR_DEPENDENCY"
  | "INVALID_EXPRESSION";

export type ResolutionIssue = {
  code: ResolutionIssueCode;
  message: string;
  /** Qualified id of the declaration the issue belongs to. */
  node?: string;
  /** Parameter path for PARAMETER_CONSTRAINT issues. */
  path?: string;
};

export class StratumError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StratumError";
  }
}

export class ResolutionError extends StratumError {
  readonly issues: readonly ResolutionIssue[];

  constructor(issues: readonly ResolutionIssue[]) {
    const head = issues[0];
    const summary = head ? `${head.code}: ${head.message}` : "Resolution failed";
    super(issues.length > 1 ? `${summary} (and ${issues.length - 1} more)` : summary);
    this.name = "ResolutionError";
    this.issues = issues;
  }

  /** Whether any collected issue carries the given code. */
  has(code: ResolutionIssueCode): boolean {
    return this.issues.some((i) => i.code === code);
  }
}

/**
 * Thrown from a template's `declare` when a parameter value passes its schema
 * but names something the catalog does not know (a role, a runtime).
 */
export class ParameterError extends StratumError {
  constructor(public readonly parameter: string, message: string) {
    super(message);
    this.name = "ParameterError";
  }
}

export class TemplateNotFoundError extends StratumError {
  constructor(public readonly templateId: string) {
    super(`Template "${templateId}" is not registered`);
    this.name = "TemplateNotFoundError";
  }
}

export class ConfigError extends StratumError {
  constructor(message: string, public readonly errors: string[] = []) {
    super(errors.length > 0 ? `${message}: ${errors.join("; ")}` : message);
    this.name = "ConfigError";
  }
}

/**
 * Format an unknown thrown value for CLI output.
 */
export function formatErrorMessage(error: unknown): string {
  if (error instanceof ResolutionError) {
    const lines = error.issues.map((i) => {
      const where = i.node ? ` [${i.node}]` : "";
      return `  ${i.code}${where}: ${i.message}`;
    });
    return [`Resolution failed with ${error.issues.length} issue(s):`, ...lines].join("\n");
  }
  if (error instanceof Error) return error.message;
  return String(error);
}
