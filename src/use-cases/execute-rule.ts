import { ConfigurationError } from "../entities/errors.js";
import { describeCause, type RuleOutcome } from "../entities/rule-outcome.js";
import {
    effectiveTimeout,
    MAX_TIMEOUT_MS,
    type ValidationRule,
} from "../entities/validation-rule.js";
import type { EngineLogger } from "./engine-logger.port.js";
import type { TimingReporter } from "./report-timing.js";
import { CheckResultSchema } from "./validation-rule.schema.js";

const ANONYMOUS_RULE_NAME = "(anonymous)";

const CANCELLED: RuleOutcome = { kind: "cancelled" };

export interface RuleExecutorDeps {
    readonly defaultTimeoutMs: number;
    readonly timing: TimingReporter;
    readonly logger: EngineLogger;
    readonly now?: (() => number) | undefined;
}

export interface RuleExecutor {
    execute<T>(
        rule: ValidationRule<T>,
        target: T,
        signal?: AbortSignal,
    ): Promise<RuleOutcome>;
    executeSync<T>(rule: ValidationRule<T>, target: T): RuleOutcome;
}

export class RuleTimeoutError extends Error {
    constructor(timeoutMs: number) {
        super(`Rule exceeded its ${timeoutMs}ms budget`);
        this.name = "RuleTimeoutError";
    }
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
    return (
        (typeof value === "object" || typeof value === "function") &&
        value !== null &&
        "then" in value &&
        typeof value.then === "function"
    );
}

function readResult<T>(rule: ValidationRule<T>, value: unknown): RuleOutcome {
    const parsed = CheckResultSchema.safeParse(value);
    if (!parsed.success) {
        return {
            kind: "faulted",
            cause: new Error(
                `Check returned an invalid result: ${describeCause(value)}`,
            ),
        };
    }
    const result = parsed.data;
    if (typeof result === "boolean") {
        return result
            ? { kind: "passed" }
            : { kind: "failed", severity: rule.severity, message: rule.message };
    }
    if (result.valid) {
        return { kind: "passed" };
    }
    return {
        kind: "failed",
        severity: result.severity ?? rule.severity,
        message: result.message ?? rule.message,
    };
}

/** Turns whatever a check produced into an outcome without throwing. */
function toOutcome<T>(rule: ValidationRule<T>, value: unknown): RuleOutcome {
    try {
        return readResult(rule, value);
    } catch (error) {
        return { kind: "faulted", cause: error };
    }
}

export function createRuleExecutor(deps: RuleExecutorDeps): RuleExecutor {
    if (
        !Number.isFinite(deps.defaultTimeoutMs) ||
        deps.defaultTimeoutMs <= 0 ||
        deps.defaultTimeoutMs > MAX_TIMEOUT_MS
    ) {
        throw new ConfigurationError([
            `defaultTimeoutMs must be a positive number no greater than ${MAX_TIMEOUT_MS}, received ${deps.defaultTimeoutMs}`,
        ]);
    }
    const now = deps.now ?? (() => performance.now());

    const record = <T>(
        rule: ValidationRule<T>,
        startedAt: number,
        outcome: RuleOutcome,
    ) => {
        deps.timing.report({
            rule_name: rule.name ?? ANONYMOUS_RULE_NAME,
            elapsed_ms: now() - startedAt,
            outcome: outcome.kind,
        });
    };

    return {
        async execute<T>(
            rule: ValidationRule<T>,
            target: T,
            signal?: AbortSignal,
        ): Promise<RuleOutcome> {
            if (signal?.aborted) {
                return CANCELLED;
            }

            const timeoutMs = effectiveTimeout(rule, deps.defaultTimeoutMs);
            const controller = new AbortController();
            const startedAt = now();

            const outcome = await new Promise<RuleOutcome>((resolve) => {
                let settled = false;
                let timer: ReturnType<typeof setTimeout> | undefined;

                const onAbort = () => {
                    controller.abort(signal?.reason);
                    settle(CANCELLED);
                };

                const settle = (result: RuleOutcome) => {
                    if (settled) {
                        return;
                    }
                    settled = true;
                    clearTimeout(timer);
                    signal?.removeEventListener("abort", onAbort);
                    resolve(result);
                };

                timer = setTimeout(() => {
                    controller.abort(new RuleTimeoutError(timeoutMs));
                    settle({ kind: "timed_out", timeoutMs });
                }, timeoutMs);
                signal?.addEventListener("abort", onAbort, { once: true });

                let pending: unknown;
                try {
                    pending = rule.check(target, controller.signal);
                } catch (error) {
                    settle({ kind: "faulted", cause: error });
                    return;
                }

                if (!isPromiseLike(pending)) {
                    // a synchronous check cannot be interrupted, so its budget is judged after the fact
                    settle(
                        now() - startedAt > timeoutMs
                            ? { kind: "timed_out", timeoutMs }
                            : toOutcome(rule, pending),
                    );
                    return;
                }

                void Promise.resolve(pending).then(
                    (result) => settle(toOutcome(rule, result)),
                    (error: unknown) => {
                        if (controller.signal.aborted) {
                            deps.logger.debug(
                                `Rule "${rule.name ?? ANONYMOUS_RULE_NAME}" unwound after abort`,
                            );
                            return;
                        }
                        settle({ kind: "faulted", cause: error });
                    },
                );
            });

            record(rule, startedAt, outcome);
            return outcome;
        },

        executeSync<T>(rule: ValidationRule<T>, target: T): RuleOutcome {
            const timeoutMs = effectiveTimeout(rule, deps.defaultTimeoutMs);
            const controller = new AbortController();
            const startedAt = now();

            let outcome: RuleOutcome;
            try {
                const result: unknown = rule.check(target, controller.signal);
                if (isPromiseLike(result)) {
                    controller.abort();
                    void Promise.resolve(result).catch((error: unknown) => {
                        deps.logger.debug(
                            `Discarded asynchronous check of "${rule.name ?? ANONYMOUS_RULE_NAME}" rejected: ${describeCause(error)}`,
                        );
                    });
                    outcome = {
                        kind: "faulted",
                        cause: new Error(
                            "Check returned a promise during synchronous validation",
                        ),
                    };
                } else if (now() - startedAt > timeoutMs) {
                    outcome = { kind: "timed_out", timeoutMs };
                } else {
                    outcome = toOutcome(rule, result);
                }
            } catch (error) {
                outcome = { kind: "faulted", cause: error };
            }

            record(rule, startedAt, outcome);
            return outcome;
        },
    };
}
