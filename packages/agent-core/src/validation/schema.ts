import { z } from "zod";

const paramValueSchema = z.union([z.string(), z.number(), z.boolean()]);

const numericBoundSchema = z.union([
  z.number().finite(),
  z.string().regex(/^-?\d+(\.\d+)?$/, "bound must be a decimal number")
]);

function isValidPattern(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

export const paramRuleSchema = z
  .object({
    required: z.boolean().optional(),
    min: numericBoundSchema.optional(),
    max: numericBoundSchema.optional(),
    minLength: z.number().int().nonnegative().optional(),
    maxLength: z.number().int().nonnegative().optional(),
    pattern: z.string().refine(isValidPattern, "pattern is not a valid regular expression").optional(),
    oneOf: z.array(paramValueSchema).min(1).optional(),
    default: paramValueSchema.optional()
  })
  .strict();

export const validationRulesSchema = z.record(z.string().min(1), paramRuleSchema);

export function hasConstraintOrDefault(rule: z.infer<typeof paramRuleSchema>): boolean {
  return Object.values(rule).some((value) => value !== undefined);
}
