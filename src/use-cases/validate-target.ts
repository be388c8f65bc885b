import type {
    ExecutionStrategy,
    ValidationMode,
} from "../entities/engine-config.js";
import {
    ConfigurationError,
    ValidationCancelledError,
} from "../entities/errors.js";
import type { RuleOutcome } from "../entities/rule-outcome.js";
import type { Severity } from "../entities/severity.js";
import { PASS_SAMPLE_NAME } from "../entities/timing-sample.js";
import type { ValidationRule } from "../entities/validation-rule.js";
import type { ValidationVerdict } from "../entities/validation-verdict.js";
import type { OutcomeEntry, ResultAggregator } from "./aggregate-outcomes.js";
import type { EngineLogger } from "./engine-logger.port.js";
import type { RuleExecutor } from "./execute-rule.js";
import type { ExecutionPlan, RuleLane, RuleScheduler } from "./plan-rules.js";
import type { TimingReporter } from "./report-timing.js";
import { ValidationRuleSetSchema } from "./validation-rule.schema.js";

export interface ValidateOptions {
    readonly mode?: ValidationMode | undefined;
    readonly strategy?: ExecutionStrategy | undefined;
    readonly failOn?: Severity | undefined;
    readonly signal?: AbortSignal | undefined;
    readonly throwOnCancel?: boolean | undefined;
}

export interface ValidationDefaults {
    readonly mode: ValidationMode;
    readonly strategy: ExecutionStrategy;
    readonly failOn: Severity;
}

export interface ValidationOrchestratorDeps {
    readonly executor: RuleExecutor;
    readonly scheduler: RuleScheduler;
    readonly aggregator: ResultAggregator;
    readonly timing: TimingReporter;
    readonly logger: EngineLogger;
    readonly defaults: ValidationDefaults;
    readonly now?: (() => number) | undefined;
}

export interface ValidationOrchestrator {
    validate<T>(
        target: T,
        rules: readonly ValidationRule<T>[],
        options?: ValidateOptions,
    ): Promise<ValidationVerdict>;
    validateSync<T>(
        target: T,
        rules: readonly ValidationRule<T>[],
        options?: ValidateOptions,
    ): ValidationVerdict;
}

function assertRuleSet(rules: unknown): void {
    const result = ValidationRuleSetSchema.safeParse(rules);
    if (result.success) {
        return;
    }
    throw new ConfigurationError(
        result.error.issues.map((issue) => {
            const [index, ...field] = issue.path;
            const location =
                index === undefined
                    ? "rules"
                    : `rules[${index}]${field.map((f) => `.${f}`).join("")}`;
            return `${location}: ${issue.message}`;
        }),
    );
}

/** Outcomes indexed by plan position, filled in as lanes complete. */
class OutcomeBuffer<T> {
    private readonly outcomes: (RuleOutcome | undefined)[];
    stopped = false;
    cancelled = false;

    constructor(private readonly plan: ExecutionPlan<T>) {
        this.outcomes = new Array<RuleOutcome | undefined>(plan.order.length);
    }

    record(position: number, outcome: RuleOutcome): void {
        this.outcomes[position] = outcome;
        if (outcome.kind === "cancelled") {
            this.cancelled = true;
        }
    }

    entries(): readonly OutcomeEntry[] {
        const entries: OutcomeEntry[] = [];
        for (const planned of this.plan.order) {
            const outcome = this.outcomes[planned.position];
            if (outcome) {
                entries.push({
                    rule: planned.rule,
                    ruleIndex: planned.ruleIndex,
                    outcome,
                });
            }
        }
        return entries;
    }
}

export function createValidationOrchestrator(
    deps: ValidationOrchestratorDeps,
): ValidationOrchestrator {
    const now = deps.now ?? (() => performance.now());

    const resolve = (options?: ValidateOptions) => ({
        mode: options?.mode ?? deps.defaults.mode,
        strategy: options?.strategy ?? deps.defaults.strategy,
        failOn: options?.failOn ?? deps.defaults.failOn,
        signal: options?.signal,
        throwOnCancel: options?.throwOnCancel ?? false,
    });

    const canContinue = <T>(
        buffer: OutcomeBuffer<T>,
        signal: AbortSignal | undefined,
    ) => {
        if (signal?.aborted) {
            buffer.cancelled = true;
        }
        return !buffer.stopped && !buffer.cancelled;
    };

    const finish = <T>(
        buffer: OutcomeBuffer<T>,
        totalRules: number,
        settings: ReturnType<typeof resolve>,
        startedAt: number,
    ): ValidationVerdict => {
        const verdict = deps.aggregator.aggregate(buffer.entries(), {
            failOn: settings.failOn,
            totalRules,
            cancelled: buffer.cancelled,
        });
        const elapsed = now() - startedAt;

        deps.timing.report({
            rule_name: PASS_SAMPLE_NAME,
            elapsed_ms: elapsed,
            outcome: verdict.status,
        });
        deps.logger.debug(
            `Validated ${verdict.stats.executed}/${totalRules} rule(s) in ${elapsed.toFixed(1)}ms: ${verdict.status}, ${verdict.failures.length} failure(s)`,
        );

        if (verdict.status === "cancelled" && settings.throwOnCancel) {
            throw new ValidationCancelledError();
        }
        return verdict;
    };

    return {
        async validate<T>(
            target: T,
            rules: readonly ValidationRule<T>[],
            options?: ValidateOptions,
        ): Promise<ValidationVerdict> {
            assertRuleSet(rules);
            const settings = resolve(options);
            const startedAt = now();
            const plan = deps.scheduler.plan(rules, settings.mode);
            const buffer = new OutcomeBuffer(plan);

            const runLane = async (lane: RuleLane<T>) => {
                for (const planned of lane) {
                    if (!canContinue(buffer, settings.signal)) {
                        return;
                    }
                    const outcome = await deps.executor.execute(
                        planned.rule,
                        target,
                        settings.signal,
                    );
                    buffer.record(planned.position, outcome);
                    if (
                        deps.scheduler.shouldStop(
                            outcome,
                            planned.rule,
                            settings.mode,
                        )
                    ) {
                        buffer.stopped = true;
                    }
                }
            };

            if (settings.strategy === "parallel") {
                await Promise.all(plan.lanes.map(runLane));
            } else {
                await runLane(plan.order);
            }

            return finish(buffer, rules.length, settings, startedAt);
        },

        validateSync<T>(
            target: T,
            rules: readonly ValidationRule<T>[],
            options?: ValidateOptions,
        ): ValidationVerdict {
            assertRuleSet(rules);
            const settings = resolve(options);
            const startedAt = now();
            const plan = deps.scheduler.plan(rules, settings.mode);
            const buffer = new OutcomeBuffer(plan);

            for (const planned of plan.order) {
                if (!canContinue(buffer, settings.signal)) {
                    break;
                }
                const outcome = deps.executor.executeSync(planned.rule, target);
                buffer.record(planned.position, outcome);
                buffer.stopped = deps.scheduler.shouldStop(
                    outcome,
                    planned.rule,
                    settings.mode,
                );
            }

            return finish(buffer, rules.length, settings, startedAt);
        },
    };
}
