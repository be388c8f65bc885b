import { z } from "zod";
import { MAX_TIMEOUT_MS } from "../entities/validation-rule.js";
import { SeveritySchema } from "./validation-rule.schema.js";

function isValidPattern(source: string): boolean {
    try {
        new RegExp(source);
        return true;
    } catch {
        return false;
    }
}

const RuleBaseSchema = z.object({
    column: z.string().min(1, "column is required"),
    name: z.string().min(1).optional(),
    message: z.string().min(1).optional(),
    severity: SeveritySchema.default("error"),
    priority: z.number().int().optional(),
    timeout_ms: z
        .number()
        .finite()
        .positive()
        .max(MAX_TIMEOUT_MS, `timeout_ms must be at most ${MAX_TIMEOUT_MS}`)
        .optional(),
});

const BoundsSchema = {
    min: z.number().finite().optional(),
    max: z.number().finite().optional(),
};

export const CompareOperatorSchema = z.enum([
    "lt",
    "lte",
    "gt",
    "gte",
    "eq",
    "neq",
]);

export const RuleDefinitionSchema = z.discriminatedUnion("type", [
    RuleBaseSchema.extend({ type: z.literal("required") }),
    RuleBaseSchema.extend({
        type: z.literal("pattern"),
        pattern: z.string().refine(isValidPattern, {
            message: "pattern must be a valid regular expression",
        }),
    }),
    RuleBaseSchema.extend({ type: z.literal("range"), ...BoundsSchema }),
    RuleBaseSchema.extend({
        type: z.literal("length"),
        min: z.number().int().nonnegative().optional(),
        max: z.number().int().nonnegative().optional(),
    }),
    RuleBaseSchema.extend({
        type: z.literal("one_of"),
        values: z
            .array(z.union([z.string(), z.number(), z.boolean()]))
            .min(1, "one_of needs at least one value"),
    }),
    RuleBaseSchema.extend({
        type: z.literal("compare"),
        operator: CompareOperatorSchema,
        other_column: z.string().min(1, "other_column is required"),
    }),
]);

export const RuleSetSchema = z.object({
    rules: z.array(RuleDefinitionSchema),
});

export type RuleDefinition = z.infer<typeof RuleDefinitionSchema>;
export type CompareOperator = z.infer<typeof CompareOperatorSchema>;
export type RuleSetInput = z.infer<typeof RuleSetSchema>;
