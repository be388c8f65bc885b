import { z } from "zod";
import {
    DEFAULT_TIMEOUT_MS,
    MAX_TIMEOUT_MS,
} from "../entities/validation-rule.js";
import { SeveritySchema } from "./validation-rule.schema.js";

export const DEFAULT_BATCH_SIZE = 1000;
export const DEFAULT_DEBOUNCE_MS = 500;

export const EngineConfigSchema = z.object({
    defaultTimeoutMs: z
        .number()
        .finite()
        .positive("default_timeout_ms must be greater than zero")
        .max(
            MAX_TIMEOUT_MS,
            `default_timeout_ms must be at most ${MAX_TIMEOUT_MS}`,
        )
        .default(DEFAULT_TIMEOUT_MS),
    failOn: SeveritySchema.default("error"),
    mode: z.enum(["run_all", "stop_on_first_error"]).default("run_all"),
    strategy: z.enum(["parallel", "sequential"]).default("parallel"),
    batchSize: z
        .number()
        .int()
        .positive("batch_size must be a positive integer")
        .default(DEFAULT_BATCH_SIZE),
    debounceMs: z
        .number()
        .int()
        .nonnegative("debounce_ms must not be negative")
        .default(DEFAULT_DEBOUNCE_MS),
});

export type EngineConfigInput = z.input<typeof EngineConfigSchema>;
