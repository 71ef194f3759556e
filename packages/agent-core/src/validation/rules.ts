import type { AgentFunction, ParamRule, ParamValue } from "@cadence/types";

export type RuleConstraint = Exclude<keyof ParamRule, "default"> | "missing" | "type";

export interface RuleViolation {
  param: string;
  constraint: RuleConstraint;
  message: string;
}

const INTEGER = /^-?\d+$/;
const DECIMAL = /^-?\d+(\.\d+)?$/;

function toNumericString(value: ParamValue): string | undefined {
  if (typeof value === "number") return Number.isFinite(value) ? String(value) : undefined;
  if (typeof value === "string" && DECIMAL.test(value.trim())) return value.trim();
  return undefined;
}

/** Compares two decimal strings, using bigint when both are integers so uint256 values stay exact. */
export function compareNumeric(left: string, right: string): number {
  if (INTEGER.test(left) && INTEGER.test(right)) {
    const a = BigInt(left);
    const b = BigInt(right);
    return a === b ? 0 : a < b ? -1 : 1;
  }
  const a = Number(left);
  const b = Number(right);
  return a === b ? 0 : a < b ? -1 : 1;
}

export function checkValue(param: string, rule: ParamRule, value: ParamValue | undefined): RuleViolation | null {
  if (value === undefined || value === "") {
    if (rule.required) {
      return { param, constraint: "required", message: `${param} is required` };
    }
    if (value === undefined) {
      return { param, constraint: "missing", message: `${param} has no value and no default` };
    }
  }

  if (value === undefined) return null;

  if (rule.min !== undefined || rule.max !== undefined) {
    const numeric = toNumericString(value);
    if (numeric === undefined) {
      return { param, constraint: "type", message: `${param} must be numeric, got ${JSON.stringify(value)}` };
    }
    if (rule.min !== undefined && compareNumeric(numeric, String(rule.min)) < 0) {
      return { param, constraint: "min", message: `${param} must be >= ${rule.min}, got ${numeric}` };
    }
    if (rule.max !== undefined && compareNumeric(numeric, String(rule.max)) > 0) {
      return { param, constraint: "max", message: `${param} must be <= ${rule.max}, got ${numeric}` };
    }
  }

  const text = String(value);
  if (rule.minLength !== undefined && text.length < rule.minLength) {
    return { param, constraint: "minLength", message: `${param} must be at least ${rule.minLength} characters` };
  }
  if (rule.maxLength !== undefined && text.length > rule.maxLength) {
    return { param, constraint: "maxLength", message: `${param} must be at most ${rule.maxLength} characters` };
  }
  if (rule.pattern !== undefined && !new RegExp(rule.pattern).test(text)) {
    return { param, constraint: "pattern", message: `${param} does not match /${rule.pattern}/` };
  }
  if (rule.oneOf !== undefined && !rule.oneOf.some((allowed) => String(allowed) === text)) {
    return {
      param,
      constraint: "oneOf",
      message: `${param} must be one of ${rule.oneOf.map((allowed) => String(allowed)).join(", ")}`
    };
  }

  return null;
}

export function resolveParams(
  fn: Pick<AgentFunction, "params" | "validationRules">,
  supplied: Record<string, ParamValue>
): Record<string, ParamValue> {
  const resolved: Record<string, ParamValue> = {};
  for (const param of fn.params) {
    const value = supplied[param.name] ?? fn.validationRules[param.name]?.default;
    if (value !== undefined) {
      resolved[param.name] = value;
    }
  }
  return resolved;
}

/** Returns the first violated constraint, walking parameters in declaration order. */
export function validateParams(
  fn: Pick<AgentFunction, "params" | "validationRules">,
  params: Record<string, ParamValue>
): RuleViolation | null {
  for (const param of fn.params) {
    const violation = checkValue(param.name, fn.validationRules[param.name] ?? {}, params[param.name]);
    if (violation) return violation;
  }
  return null;
}

export function toCallArgs(fn: Pick<AgentFunction, "params">, params: Record<string, ParamValue>): ParamValue[] {
  return fn.params.map((param) => {
    const value = params[param.name];
    if (value === undefined) {
      throw new Error(`missing value for ${param.name}`);
    }
    return value;
  });
}
