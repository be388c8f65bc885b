import Chance from "chance";
import { vi } from "vitest";
import type { ValidationRule } from "../entities/validation-rule.js";
import { createResultAggregator } from "../use-cases/aggregate-outcomes.js";
import type { EngineLogger } from "../use-cases/engine-logger.port.js";
import { createRuleExecutor } from "../use-cases/execute-rule.js";
import type { PerformanceSink } from "../use-cases/performance-sink.port.js";
import { createRuleScheduler } from "../use-cases/plan-rules.js";
import { createTimingReporter } from "../use-cases/report-timing.js";
import {
    createValidationOrchestrator,
    type ValidationDefaults,
} from "../use-cases/validate-target.js";

const chance = new Chance();

export function buildRule<T = unknown>(
    overrides?: Partial<ValidationRule<T>>,
): ValidationRule<T> {
    return {
        name: chance.word({ length: 8 }),
        message: chance.sentence(),
        severity: "error",
        check: () => true,
        ...overrides,
    };
}

export function buildLogger() {
    return {
        debug: vi.fn<(message: string) => void>(),
        info: vi.fn<(message: string) => void>(),
        warn: vi.fn<(message: string) => void>(),
    } satisfies EngineLogger;
}

export function buildSink() {
    return {
        report: vi.fn<PerformanceSink["report"]>(),
    } satisfies PerformanceSink;
}

/** Resolves after `ms`; rejects with the abort reason when `signal` fires first. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        const timer = setTimeout(resolve, ms);
        signal?.addEventListener(
            "abort",
            () => {
                clearTimeout(timer);
                reject(signal.reason);
            },
            { once: true },
        );
    });
}

export function buildEngineParts(options?: {
    readonly defaultTimeoutMs?: number;
    readonly defaults?: Partial<ValidationDefaults>;
    readonly sink?: PerformanceSink;
    readonly logger?: EngineLogger;
    readonly now?: () => number;
}) {
    const logger = options?.logger ?? buildLogger();
    const timing = createTimingReporter({
        sink: options?.sink ?? buildSink(),
        logger,
    });
    const executor = createRuleExecutor({
        defaultTimeoutMs: options?.defaultTimeoutMs ?? 1000,
        timing,
        logger,
        now: options?.now,
    });
    const orchestrator = createValidationOrchestrator({
        executor,
        scheduler: createRuleScheduler(),
        aggregator: createResultAggregator(),
        timing,
        logger,
        defaults: {
            mode: "run_all",
            strategy: "parallel",
            failOn: "error",
            ...options?.defaults,
        },
        now: options?.now,
    });
    return { executor, orchestrator, logger };
}
