import type { ValidationMode } from "../entities/engine-config.js";
import { outcomeSeverity, type RuleOutcome } from "../entities/rule-outcome.js";
import { isAtLeast } from "../entities/severity.js";
import type {
    RuleDescriptor,
    ValidationRule,
} from "../entities/validation-rule.js";

export interface PlannedRule<T> {
    readonly rule: ValidationRule<T>;
    readonly ruleIndex: number;
    readonly position: number;
}

export type RuleLane<T> = readonly PlannedRule<T>[];

export interface ExecutionPlan<T> {
    readonly mode: ValidationMode;
    readonly order: readonly PlannedRule<T>[];
    readonly lanes: readonly RuleLane<T>[];
}

export interface RuleScheduler {
    plan<T>(
        rules: readonly ValidationRule<T>[],
        mode: ValidationMode,
    ): ExecutionPlan<T>;
    shouldStop(
        outcome: RuleOutcome,
        rule: RuleDescriptor,
        mode: ValidationMode,
    ): boolean;
}

function comparePriority(a: number | undefined, b: number | undefined) {
    if (a === undefined && b === undefined) {
        return 0;
    }
    if (a === undefined) {
        return 1;
    }
    if (b === undefined) {
        return -1;
    }
    return a - b;
}

function orderRules<T>(
    rules: readonly ValidationRule<T>[],
): readonly PlannedRule<T>[] {
    return rules
        .map((rule, ruleIndex) => ({ rule, ruleIndex }))
        .sort(
            (a, b) =>
                comparePriority(a.rule.priority, b.rule.priority) ||
                a.ruleIndex - b.ruleIndex,
        )
        .map((entry, position) => ({ ...entry, position }));
}

/**
 * Rules whose declared columns overlap, directly or through another rule,
 * share a lane and run one after another. Rules without declared columns
 * read nothing the grid tracks and each get a lane of their own.
 */
function buildLanes<T>(
    order: readonly PlannedRule<T>[],
): readonly RuleLane<T>[] {
    const lanes: PlannedRule<T>[][] = [];
    const laneOfColumn = new Map<string, PlannedRule<T>[]>();

    for (const planned of order) {
        const columns = planned.rule.columns ?? [];
        if (columns.length === 0) {
            lanes.push([planned]);
            continue;
        }

        const touched = new Set<PlannedRule<T>[]>();
        for (const column of columns) {
            const lane = laneOfColumn.get(column);
            if (lane) {
                touched.add(lane);
            }
        }

        let target: PlannedRule<T>[];
        if (touched.size === 0) {
            target = [];
            lanes.push(target);
        } else {
            const [first, ...rest] = [...touched].sort(
                (a, b) => lanes.indexOf(a) - lanes.indexOf(b),
            );
            target = first ?? [];
            for (const other of rest) {
                target.push(...other);
                lanes.splice(lanes.indexOf(other), 1);
                for (const [column, lane] of laneOfColumn) {
                    if (lane === other) {
                        laneOfColumn.set(column, target);
                    }
                }
            }
            target.sort((a, b) => a.position - b.position);
        }

        target.push(planned);
        for (const column of columns) {
            laneOfColumn.set(column, target);
        }
    }

    return lanes;
}

export function createRuleScheduler(): RuleScheduler {
    return {
        plan<T>(
            rules: readonly ValidationRule<T>[],
            mode: ValidationMode,
        ): ExecutionPlan<T> {
            const order = orderRules(rules);
            if (mode === "stop_on_first_error") {
                return { mode, order, lanes: order.length > 0 ? [order] : [] };
            }
            return { mode, order, lanes: buildLanes(order) };
        },

        shouldStop(
            outcome: RuleOutcome,
            rule: RuleDescriptor,
            mode: ValidationMode,
        ): boolean {
            if (mode !== "stop_on_first_error") {
                return false;
            }
            const severity = outcomeSeverity(outcome, rule.severity);
            return severity !== null && isAtLeast(severity, "error");
        },
    };
}
