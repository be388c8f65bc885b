import {
    type CellValue,
    cellValue,
    type GridRow,
} from "../entities/grid-data.js";
import {
    describeOutcome,
    outcomeSeverity,
} from "../entities/rule-outcome.js";
import { maxSeverity, type Severity } from "../entities/severity.js";
import type {
    CheckResult,
    RuleDescriptor,
    ValidationRule,
} from "../entities/validation-rule.js";
import type { RuleExecutor } from "./execute-rule.js";

export type GridRule = ValidationRule<GridRow>;

type RuleOptions = Omit<RuleDescriptor, "columns" | "severity"> & {
    readonly severity?: Severity | undefined;
};

export interface CellRuleOptions extends RuleOptions {
    readonly column: string;
    readonly predicate: (
        value: CellValue,
        row: GridRow,
        signal: AbortSignal,
    ) => CheckResult | Promise<CheckResult>;
}

export interface RowRuleOptions extends RuleOptions {
    readonly columns: readonly string[];
    readonly check: (
        row: GridRow,
        signal: AbortSignal,
    ) => CheckResult | Promise<CheckResult>;
}

export interface ConditionalRuleOptions {
    readonly when: (row: GridRow) => boolean;
    readonly rule: GridRule;
    readonly dependsOn?: readonly string[] | undefined;
}

export type GroupOperator = "and" | "or";

export interface RuleGroupOptions extends RuleOptions {
    readonly operator: GroupOperator;
    readonly rules: readonly GridRule[];
}

export interface GridRuleBuilderDeps {
    readonly executor: RuleExecutor;
}

export interface GridRuleBuilder {
    cellRule(options: CellRuleOptions): GridRule;
    rowRule(options: RowRuleOptions): GridRule;
    conditionalRule(options: ConditionalRuleOptions): GridRule;
    ruleGroup(options: RuleGroupOptions): GridRule;
}

const GROUP_MESSAGE_SEPARATOR = "; ";

function unionColumns(
    ...sources: (readonly string[] | undefined)[]
): readonly string[] {
    return [...new Set(sources.flatMap((columns) => columns ?? []))];
}

function descriptorOf(options: RuleOptions): Omit<RuleDescriptor, "columns"> {
    return {
        name: options.name,
        message: options.message,
        severity: options.severity ?? "error",
        priority: options.priority,
        timeoutMs: options.timeoutMs,
    };
}

export function createGridRuleBuilder(
    deps: GridRuleBuilderDeps,
): GridRuleBuilder {
    return {
        cellRule(options: CellRuleOptions): GridRule {
            const { column, predicate } = options;
            return {
                ...descriptorOf(options),
                columns: [column],
                check: (row, signal) =>
                    predicate(cellValue(row, column), row, signal),
            };
        },

        rowRule(options: RowRuleOptions): GridRule {
            return {
                ...descriptorOf(options),
                columns: [...options.columns],
                check: options.check,
            };
        },

        conditionalRule(options: ConditionalRuleOptions): GridRule {
            const { rule, when } = options;
            return {
                ...rule,
                columns: unionColumns(rule.columns, options.dependsOn),
                check: (row, signal) =>
                    when(row) ? rule.check(row, signal) : true,
            };
        },

        ruleGroup(options: RuleGroupOptions): GridRule {
            const { operator, rules } = options;
            const descriptor = descriptorOf(options);

            return {
                ...descriptor,
                columns: unionColumns(...rules.map((r) => r.columns)),
                async check(row, signal): Promise<CheckResult> {
                    const failures: { severity: Severity; message: string }[] =
                        [];

                    for (const child of rules) {
                        const outcome = await deps.executor.execute(
                            child,
                            row,
                            signal,
                        );
                        if (outcome.kind === "cancelled") {
                            throw signal.reason;
                        }
                        const severity = outcomeSeverity(
                            outcome,
                            child.severity,
                        );
                        if (severity === null) {
                            if (operator === "or") {
                                return true;
                            }
                            continue;
                        }
                        failures.push({
                            severity,
                            message: describeOutcome(outcome),
                        });
                        if (operator === "and") {
                            break;
                        }
                    }

                    if (failures.length === 0) {
                        return true;
                    }
                    return {
                        valid: false,
                        severity:
                            maxSeverity(failures.map((f) => f.severity)) ??
                            descriptor.severity,
                        message: failures
                            .map((f) => f.message)
                            .join(GROUP_MESSAGE_SEPARATOR),
                    };
                },
            };
        },
    };
}
