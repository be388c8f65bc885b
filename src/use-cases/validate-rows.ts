import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import type {
    BatchValidationResult,
    RowVerdict,
    ValidationProgress,
} from "../entities/batch-result.js";
import { ConfigurationError } from "../entities/errors.js";
import { type GridRow, isEmptyRow } from "../entities/grid-data.js";
import { isAtLeast } from "../entities/severity.js";
import type { ValidationVerdict } from "../entities/validation-verdict.js";
import type { GridRule } from "./build-grid-rules.js";
import type { EngineLogger } from "./engine-logger.port.js";
import type {
    ValidateOptions,
    ValidationOrchestrator,
} from "./validate-target.js";

export interface RowBatchValidatorDeps {
    readonly orchestrator: ValidationOrchestrator;
    readonly logger: EngineLogger;
    readonly batchSize: number;
}

export interface ValidateRowsOptions
    extends Omit<ValidateOptions, "throwOnCancel"> {
    readonly batchSize?: number | undefined;
    readonly skipEmptyRows?: boolean | undefined;
    readonly onProgress?: ((progress: ValidationProgress) => void) | undefined;
}

export interface RowBatchValidator {
    validateRows(
        rows: readonly GridRow[],
        rules: readonly GridRule[],
        options?: ValidateRowsOptions,
    ): Promise<BatchValidationResult>;
}

function countFailures(verdict: ValidationVerdict) {
    let errors = 0;
    let warnings = 0;
    for (const failure of verdict.failures) {
        if (isAtLeast(failure.severity, "error")) {
            errors++;
        } else if (failure.severity === "warning") {
            warnings++;
        }
    }
    return { errors, warnings };
}

function assertBatchSize(batchSize: number): void {
    if (!Number.isSafeInteger(batchSize) || batchSize <= 0) {
        throw new ConfigurationError([
            `batchSize must be a positive integer, received ${batchSize}`,
        ]);
    }
}

export function createRowBatchValidator(
    deps: RowBatchValidatorDeps,
): RowBatchValidator {
    assertBatchSize(deps.batchSize);

    return {
        async validateRows(
            rows: readonly GridRow[],
            rules: readonly GridRule[],
            options?: ValidateRowsOptions,
        ): Promise<BatchValidationResult> {
            const batchSize = options?.batchSize ?? deps.batchSize;
            assertBatchSize(batchSize);
            const signal = options?.signal;
            const indexed = rows
                .map((row, rowIndex) => ({ row, rowIndex }))
                .filter(
                    ({ row }) => !(options?.skipEmptyRows && isEmptyRow(row)),
                );

            const rowResults: RowVerdict[] = [];
            let validatedRows = 0;
            let errorCount = 0;
            let warningCount = 0;
            let invalidRows = 0;
            let cancelled = false;

            for (let start = 0; start < indexed.length; start += batchSize) {
                if (signal?.aborted) {
                    cancelled = true;
                    break;
                }

                const batch = indexed.slice(start, start + batchSize);
                const verdicts = await Promise.all(
                    batch.map(({ row }) =>
                        deps.orchestrator.validate(row, rules, {
                            mode: options?.mode,
                            strategy: options?.strategy,
                            failOn: options?.failOn,
                            signal,
                        }),
                    ),
                );

                verdicts.forEach((verdict, i) => {
                    const rowIndex = batch[i]?.rowIndex ?? start + i;
                    if (verdict.status === "cancelled") {
                        cancelled = true;
                    } else {
                        validatedRows++;
                    }
                    const { errors, warnings } = countFailures(verdict);
                    errorCount += errors;
                    warningCount += warnings;
                    if (!verdict.valid && verdict.status === "completed") {
                        invalidRows++;
                    }
                    if (verdict.failures.length > 0) {
                        rowResults.push({ row_index: rowIndex, verdict });
                    }
                });

                const processed = Math.min(start + batchSize, indexed.length);
                options?.onProgress?.({
                    processed_rows: processed,
                    total_rows: indexed.length,
                    percent: (processed / indexed.length) * 100,
                    error_count: errorCount,
                    warning_count: warningCount,
                });
                deps.logger.debug(
                    `Validated rows ${start}-${processed - 1} of ${indexed.length}: ${errorCount} error(s), ${warningCount} warning(s) so far`,
                );

                if (cancelled) {
                    break;
                }
                if (processed < indexed.length) {
                    await yieldToEventLoop();
                }
            }

            return {
                status: cancelled ? "cancelled" : "completed",
                valid: !cancelled && invalidRows === 0,
                total_rows: rows.length,
                validated_rows: validatedRows,
                skipped_rows: rows.length - indexed.length,
                invalid_rows: invalidRows,
                error_count: errorCount,
                warning_count: warningCount,
                row_results: rowResults,
            };
        },
    };
}
