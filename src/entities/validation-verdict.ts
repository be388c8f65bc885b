import type { Severity } from "./severity.js";

export type FailureKind = "failed" | "timed_out" | "faulted";

export type VerdictStatus = "completed" | "cancelled";

export interface ValidationFailure {
    readonly rule_name: string | null;
    readonly rule_index: number;
    readonly kind: FailureKind;
    readonly severity: Severity;
    readonly declared_severity: Severity;
    readonly priority: number | null;
    readonly message: string;
}

export interface VerdictStats {
    readonly total_rules: number;
    readonly executed: number;
    readonly passed: number;
    readonly failed: number;
    readonly timed_out: number;
    readonly faulted: number;
    readonly skipped: number;
}

export interface ValidationVerdict {
    readonly status: VerdictStatus;
    readonly valid: boolean;
    readonly overall_severity: Severity | null;
    readonly fail_on: Severity;
    readonly failures: readonly ValidationFailure[];
    readonly stats: VerdictStats;
}
