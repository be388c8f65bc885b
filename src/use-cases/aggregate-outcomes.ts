import {
    describeOutcome,
    outcomeSeverity,
    type RuleOutcome,
} from "../entities/rule-outcome.js";
import {
    compareSeverity,
    isAtLeast,
    maxSeverity,
    type Severity,
} from "../entities/severity.js";
import type { RuleDescriptor } from "../entities/validation-rule.js";
import type {
    FailureKind,
    ValidationFailure,
    ValidationVerdict,
    VerdictStats,
} from "../entities/validation-verdict.js";

export const DEFAULT_FAIL_ON: Severity = "error";

export interface OutcomeEntry {
    readonly rule: RuleDescriptor;
    readonly ruleIndex: number;
    readonly outcome: RuleOutcome;
}

export interface AggregateOptions {
    readonly failOn?: Severity | undefined;
    readonly totalRules?: number | undefined;
    readonly cancelled?: boolean | undefined;
}

export interface ResultAggregator {
    aggregate(
        entries: readonly OutcomeEntry[],
        options?: AggregateOptions,
    ): ValidationVerdict;
}

function toFailure(entry: OutcomeEntry): ValidationFailure | undefined {
    const { outcome, rule } = entry;
    if (outcome.kind === "passed" || outcome.kind === "cancelled") {
        return undefined;
    }
    const severity = outcomeSeverity(outcome, rule.severity) ?? rule.severity;
    const kind: FailureKind = outcome.kind;

    return {
        rule_name: rule.name ?? null,
        rule_index: entry.ruleIndex,
        kind,
        severity,
        declared_severity: rule.severity,
        priority: rule.priority ?? null,
        message: describeOutcome(outcome),
    };
}

function compareFailures(a: ValidationFailure, b: ValidationFailure): number {
    const bySeverity = compareSeverity(b.severity, a.severity);
    if (bySeverity !== 0) {
        return bySeverity;
    }
    if (a.priority !== b.priority) {
        if (a.priority === null) {
            return 1;
        }
        if (b.priority === null) {
            return -1;
        }
        return a.priority - b.priority;
    }
    return a.rule_index - b.rule_index;
}

function countOutcomes(
    entries: readonly OutcomeEntry[],
    totalRules: number,
): VerdictStats {
    const count = (kind: RuleOutcome["kind"]) =>
        entries.filter((e) => e.outcome.kind === kind).length;
    const executed = entries.length - count("cancelled");

    return {
        total_rules: totalRules,
        executed,
        passed: count("passed"),
        failed: count("failed"),
        timed_out: count("timed_out"),
        faulted: count("faulted"),
        skipped: totalRules - executed,
    };
}

export function createResultAggregator(): ResultAggregator {
    return {
        aggregate(
            entries: readonly OutcomeEntry[],
            options?: AggregateOptions,
        ): ValidationVerdict {
            const failOn = options?.failOn ?? DEFAULT_FAIL_ON;
            const cancelled = options?.cancelled ?? false;
            const failures = entries
                .map(toFailure)
                .filter((f): f is ValidationFailure => f !== undefined)
                .sort(compareFailures);

            return {
                status: cancelled ? "cancelled" : "completed",
                valid:
                    !cancelled &&
                    failures.every((f) => !isAtLeast(f.severity, failOn)),
                overall_severity: maxSeverity(failures.map((f) => f.severity)),
                fail_on: failOn,
                failures,
                stats: countOutcomes(
                    entries,
                    options?.totalRules ?? entries.length,
                ),
            };
        },
    };
}
