import type {
    ValidationVerdict,
    VerdictStatus,
} from "./validation-verdict.js";

export interface RowVerdict {
    readonly row_index: number;
    readonly verdict: ValidationVerdict;
}

export interface ValidationProgress {
    readonly processed_rows: number;
    readonly total_rows: number;
    readonly percent: number;
    readonly error_count: number;
    readonly warning_count: number;
}

export interface BatchValidationResult {
    readonly status: VerdictStatus;
    readonly valid: boolean;
    readonly total_rows: number;
    readonly validated_rows: number;
    readonly skipped_rows: number;
    readonly invalid_rows: number;
    readonly error_count: number;
    readonly warning_count: number;
    readonly row_results: readonly RowVerdict[];
}
