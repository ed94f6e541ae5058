/**
 * Deterministic naming helpers.
 */

import { createHash } from "node:crypto";
import { Type } from "@sinclair/typebox";
import type { PropertyValue } from "../graph/expressions.js";
import { readDataFile } from "./data.js";

const BASE32 = "abcdefghijklmnopqrstuvwxyz234567";

/**
 * 13-character lowercase token derived from `parts`. The same parts always
 * give the same token, which keeps generated names stable across passes.
 */
export function uniqueString(...parts: string[]): string {
  const digest = createHash("sha256").update(parts.join("\u0000")).digest();
  const value = digest.readBigUInt64BE(0);
  let token = "";
  for (let shift = 60; shift >= 0; shift -= 5) {
    token += BASE32[Number((value >> BigInt(shift)) & 31n)];
  }
  return token;
}

/**
 * Deterministic UUID (version 5 layout) derived from `parts`.
 */
export function guid(...parts: string[]): string {
  const bytes = createHash("sha256").update(parts.join("\u0000")).digest().subarray(0, 16);
  bytes[6] = ((bytes[6] ?? 0) & 0x0f) | 0x50;
  bytes[8] = ((bytes[8] ?? 0) & 0x3f) | 0x80;
  const hex = bytes.toString("hex");
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
}

/** Stable text for a possibly deferred value, for seeding {@link guid}. */
export function seedOf(value: PropertyValue): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

const AbbreviationsSchema = Type.Record(Type.String(), Type.String());

/** Resource-type abbreviation, e.g. "st" for storage accounts. */
export function abbreviation(resourceType: string): string {
  const abbreviations = readDataFile("abbreviations.json", AbbreviationsSchema);
  const key = Object.keys(abbreviations).find((k) => k.toLowerCase() === resourceType.toLowerCase());
  return key ? (abbreviations[key] ?? "res") : "res";
}

/** `<abbreviation>-<token>`, e.g. "func-4fxyzqmz3vz2o". */
export function resourceName(resourceType: string, token: string): string {
  return `${abbreviation(resourceType)}-${token}`;
}

/**
 * Storage account names allow 3-24 lowercase letters and digits only.
 */
export function storageAccountName(token: string): string {
  return `${abbreviation("Microsoft.Storage/storageAccounts")}${token}`
    .toLowerCase()
    .replace(/[^a-z0-9]/g, "")
    .slice(0, 24);
}
