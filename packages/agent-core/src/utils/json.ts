import type { ParamValue } from "@cadence/types";

/** Converts contract return values (bigint, ethers Result, nested tuples) into plain JSON. */
export function toJsonSafe(value: unknown): unknown {
  if (typeof value === "bigint") return value.toString();
  if (Array.isArray(value)) return Array.from(value, (entry: unknown) => toJsonSafe(entry));
  if (value && typeof value === "object") {
    return Object.fromEntries(Object.entries(value).map(([key, entry]) => [key, toJsonSafe(entry)]));
  }
  return value;
}

export function toParamValue(value: unknown): ParamValue {
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") return value;
  if (typeof value === "bigint") return value.toString();
  return JSON.stringify(toJsonSafe(value)) ?? "";
}
