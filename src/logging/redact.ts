/**
 * Sensitive value redaction for logs and diagnostic output.
 *
 * Secrets registered here are replaced in anything rendered for humans; the
 * underlying values in the resolved graph are never touched.
 */

export const REDACTED = "[REDACTED]";

export const DEFAULT_SENSITIVE_FIELDS: readonly string[] = [
  "password",
  "secret",
  "token",
  "apiKey",
  "api_key",
  "accessKey",
  "access_key",
  "secretKey",
  "secret_key",
  "privateKey",
  "private_key",
  "credential",
  "authorization",
  "connectionString",
];

/**
 * Secrets shorter than this are hidden only where they make up a whole
 * string, never inside longer text.
 */
export const MIN_EMBEDDED_SECRET_LENGTH = 8;

export type RedactorOptions = {
  /** Key names (case-insensitive substrings) whose values are always hidden. */
  sensitiveFields?: readonly string[];
  /** Extra regular expressions applied to rendered text. */
  patterns?: readonly string[];
};

export class Redactor {
  private readonly secrets = new Set<string>();
  private readonly fields: string[];
  private readonly patterns: RegExp[];

  constructor(options?: RedactorOptions) {
    this.fields = (options?.sensitiveFields ?? DEFAULT_SENSITIVE_FIELDS).map((f) => f.toLowerCase());
    this.patterns = (options?.patterns ?? []).map((p) => new RegExp(p, "gi"));
  }

  /** Number of registered secret values. */
  get size(): number {
    return this.secrets.size;
  }

  addSecret(value: string): void {
    if (value.length === 0) return;
    this.secrets.add(value);
  }

  /** Register every string leaf reachable from `value`. */
  addSecretsFrom(value: unknown): void {
    if (typeof value === "string") {
      this.addSecret(value);
    } else if (Array.isArray(value)) {
      for (const item of value) this.addSecretsFrom(item);
    } else if (value !== null && typeof value === "object") {
      for (const item of Object.values(value)) this.addSecretsFrom(item);
    }
  }

  isSensitiveKey(key: string): boolean {
    const lower = key.toLowerCase();
    return this.fields.some((f) => lower.includes(f));
  }

  redactText(text: string): string {
    if (this.secrets.has(text)) return REDACTED;
    let result = text;
    // Longest first so a secret containing another secret is hidden whole.
    const ordered = [...this.secrets]
      .filter((secret) => secret.length >= MIN_EMBEDDED_SECRET_LENGTH)
      .sort((a, b) => b.length - a.length);
    for (const secret of ordered) {
      result = result.split(secret).join(REDACTED);
    }
    for (const pattern of this.patterns) {
      result = result.replace(pattern, REDACTED);
    }
    return result;
  }

  /** Deep copy of `value` with secrets and sensitive keys hidden. */
  redactValue(value: unknown): unknown {
    if (typeof value === "string") return this.redactText(value);
    if (Array.isArray(value)) return value.map((v) => this.redactValue(v));
    if (value !== null && typeof value === "object") {
      const result: Record<string, unknown> = {};
      for (const [key, item] of Object.entries(value)) {
        result[key] = this.isSensitiveKey(key) ? REDACTED : this.redactValue(item);
      }
      return result;
    }
    return value;
  }

  /** Same as {@link redactValue} for record-shaped metadata. */
  redactRecord(record: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(record)) {
      result[key] = this.isSensitiveKey(key) ? REDACTED : this.redactValue(item);
    }
    return result;
  }

  toJSON(): { secrets: number } {
    return { secrets: this.secrets.size };
  }
}
