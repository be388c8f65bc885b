import type { EngineConfig } from "./entities/engine-config.js";
import { createNoopPerformanceSink } from "./gateways/performance-sink.js";
import { createResultAggregator } from "./use-cases/aggregate-outcomes.js";
import {
    createGridRuleBuilder,
    type GridRuleBuilder,
} from "./use-cases/build-grid-rules.js";
import {
    createDebouncedValidation,
    type DebouncedValidation,
} from "./use-cases/debounce-validation.js";
import type { EngineLogger } from "./use-cases/engine-logger.port.js";
import {
    type EngineConfigInput,
    EngineConfigSchema,
} from "./use-cases/engine-config.schema.js";
import { createRuleExecutor } from "./use-cases/execute-rule.js";
import type { PerformanceSink } from "./use-cases/performance-sink.port.js";
import { createRuleScheduler } from "./use-cases/plan-rules.js";
import { createTimingReporter } from "./use-cases/report-timing.js";
import {
    createRowBatchValidator,
    type RowBatchValidator,
} from "./use-cases/validate-rows.js";
import {
    createValidationOrchestrator,
    type ValidationOrchestrator,
} from "./use-cases/validate-target.js";

export interface ValidationEngineDeps {
    readonly sink?: PerformanceSink | undefined;
    readonly logger: EngineLogger;
}

export interface ValidationEngine {
    readonly config: EngineConfig;
    readonly orchestrator: ValidationOrchestrator;
    readonly rules: GridRuleBuilder;
    readonly rows: RowBatchValidator;
    debounce<R>(
        run: (signal: AbortSignal) => Promise<R>,
        onResult: (result: R, reason: string) => void,
    ): DebouncedValidation<R>;
}

export function createValidationEngine(
    config: EngineConfigInput,
    deps: ValidationEngineDeps,
): ValidationEngine {
    const resolved = EngineConfigSchema.parse(config);
    const timing = createTimingReporter({
        sink: deps.sink ?? createNoopPerformanceSink(),
        logger: deps.logger,
    });
    const executor = createRuleExecutor({
        defaultTimeoutMs: resolved.defaultTimeoutMs,
        timing,
        logger: deps.logger,
    });
    const orchestrator = createValidationOrchestrator({
        executor,
        scheduler: createRuleScheduler(),
        aggregator: createResultAggregator(),
        timing,
        logger: deps.logger,
        defaults: {
            mode: resolved.mode,
            strategy: resolved.strategy,
            failOn: resolved.failOn,
        },
    });

    return {
        config: resolved,
        orchestrator,
        rules: createGridRuleBuilder({ executor }),
        rows: createRowBatchValidator({
            orchestrator,
            logger: deps.logger,
            batchSize: resolved.batchSize,
        }),
        debounce<R>(
            run: (signal: AbortSignal) => Promise<R>,
            onResult: (result: R, reason: string) => void,
        ): DebouncedValidation<R> {
            return createDebouncedValidation({
                run,
                onResult,
                logger: deps.logger,
                debounceMs: resolved.debounceMs,
            });
        },
    };
}

export type { BatchValidationResult } from "./entities/batch-result.js";
export type { EngineConfig } from "./entities/engine-config.js";
export {
    ConfigurationError,
    ValidationCancelledError,
} from "./entities/errors.js";
export type { GridRow } from "./entities/grid-data.js";
export type { RuleOutcome } from "./entities/rule-outcome.js";
export type { Severity } from "./entities/severity.js";
export type { TimingSample } from "./entities/timing-sample.js";
export type {
    CheckResult,
    RuleDescriptor,
    ValidationRule,
} from "./entities/validation-rule.js";
export type {
    ValidationFailure,
    ValidationVerdict,
} from "./entities/validation-verdict.js";
export {
    createInMemoryPerformanceSink,
    createLoggingPerformanceSink,
} from "./gateways/performance-sink.js";
