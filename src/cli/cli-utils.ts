import { formatErrorMessage } from "../errors.js";
import type { RuntimeEnv } from "../runtime.js";

/**
 * Run a command body, reporting any thrown error through the runtime and
 * exiting with status 1.
 */
export async function runCommandWithRuntime(runtime: RuntimeEnv, action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (err) {
    runtime.error(formatErrorMessage(err));
    runtime.exit(1);
  }
}

/** Commander collector for repeatable options. */
export function collectOption(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function parsePositiveInt(raw: string | undefined, flag: string): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number.parseInt(raw, 10);
  if (!Number.isInteger(value) || value < 1 || String(value) !== raw.trim()) {
    throw new Error(`${flag} must be a positive integer, got "${raw}"`);
  }
  return value;
}
