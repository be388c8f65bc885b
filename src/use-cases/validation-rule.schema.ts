import { z } from "zod";
import { MAX_TIMEOUT_MS } from "../entities/validation-rule.js";

export const SeveritySchema = z.enum(["info", "warning", "error", "critical"]);

export const ValidationRuleSchema = z.object({
    name: z.string().min(1, "name must not be empty when present").optional(),
    message: z.string().min(1, "message is required"),
    severity: SeveritySchema,
    priority: z.number().int("priority must be an integer").optional(),
    timeoutMs: z
        .number()
        .finite("timeoutMs must be finite")
        .positive("timeoutMs must be greater than zero")
        .max(MAX_TIMEOUT_MS, `timeoutMs must be at most ${MAX_TIMEOUT_MS}`)
        .optional(),
    columns: z.array(z.string().min(1)).optional(),
    check: z.custom<(...args: never[]) => unknown>(
        (value) => typeof value === "function",
        "check must be a function",
    ),
});

export const CheckResultSchema = z.union([
    z.boolean(),
    z.object({
        valid: z.boolean(),
        message: z.string().optional(),
        severity: SeveritySchema.optional(),
    }),
]);

export const ValidationRuleSetSchema = z.array(ValidationRuleSchema, {
    required_error: "rules must be an array",
    invalid_type_error: "rules must be an array",
});
