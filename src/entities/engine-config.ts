import type { Severity } from "./severity.js";

export type ValidationMode = "run_all" | "stop_on_first_error";

export type ExecutionStrategy = "parallel" | "sequential";

export interface EngineConfig {
    readonly defaultTimeoutMs: number;
    readonly failOn: Severity;
    readonly mode: ValidationMode;
    readonly strategy: ExecutionStrategy;
    readonly batchSize: number;
    readonly debounceMs: number;
}
