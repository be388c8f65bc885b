import {
    type CellValue,
    cellValue,
    isEmptyValue,
} from "../entities/grid-data.js";
import type { GridRule, GridRuleBuilder } from "./build-grid-rules.js";
import type {
    CompareOperator,
    RuleDefinition,
    RuleSetInput,
} from "./rule-set.schema.js";

export interface RuleSetCompiler {
    compile(ruleSet: RuleSetInput): readonly GridRule[];
}

const OPERATOR_WORDS: Readonly<Record<CompareOperator, string>> = {
    lt: "less than",
    lte: "less than or equal to",
    gt: "greater than",
    gte: "greater than or equal to",
    eq: "equal to",
    neq: "different from",
};

function toNumber(value: CellValue): number | undefined {
    if (typeof value === "number") {
        return Number.isFinite(value) ? value : undefined;
    }
    if (typeof value === "string" && value.trim() !== "") {
        const parsed = Number(value);
        return Number.isFinite(parsed) ? parsed : undefined;
    }
    return undefined;
}

function withinBounds(
    value: number,
    min: number | undefined,
    max: number | undefined,
): boolean {
    return (
        (min === undefined || value >= min) &&
        (max === undefined || value <= max)
    );
}

function describeBounds(
    min: number | undefined,
    max: number | undefined,
    unit = "",
): string {
    if (min !== undefined && max !== undefined) {
        return `between ${min} and ${max}${unit}`;
    }
    if (min !== undefined) {
        return `at least ${min}${unit}`;
    }
    if (max !== undefined) {
        return `at most ${max}${unit}`;
    }
    return "present";
}

function applyOperator<V extends number | string>(
    a: V,
    b: V,
    operator: CompareOperator,
): boolean {
    switch (operator) {
        case "lt":
            return a < b;
        case "lte":
            return a <= b;
        case "gt":
            return a > b;
        case "gte":
            return a >= b;
        case "eq":
            return a === b;
        case "neq":
            return a !== b;
    }
}

function compareValues(
    left: CellValue,
    right: CellValue,
    operator: CompareOperator,
): boolean {
    const leftNumber = toNumber(left);
    const rightNumber = toNumber(right);
    if (leftNumber !== undefined && rightNumber !== undefined) {
        return applyOperator(leftNumber, rightNumber, operator);
    }
    return applyOperator(String(left), String(right), operator);
}

function defaultMessage(definition: RuleDefinition): string {
    const { column } = definition;
    switch (definition.type) {
        case "required":
            return `${column} is required`;
        case "pattern":
            return `${column} must match ${definition.pattern}`;
        case "range":
            return `${column} must be ${describeBounds(definition.min, definition.max)}`;
        case "length":
            return `${column} must be ${describeBounds(definition.min, definition.max, " characters")}`;
        case "one_of":
            return `${column} must be one of: ${definition.values.join(", ")}`;
        case "compare":
            return `${column} must be ${OPERATOR_WORDS[definition.operator]} ${definition.other_column}`;
    }
}

function defaultName(definition: RuleDefinition): string {
    if (definition.type === "compare") {
        return `${definition.column}.compare.${definition.other_column}`;
    }
    return `${definition.column}.${definition.type}`;
}

function valuePredicate(
    definition: Exclude<RuleDefinition, { type: "compare" }>,
): (value: CellValue) => boolean {
    switch (definition.type) {
        case "required":
            return (value) => !isEmptyValue(value);
        case "pattern": {
            const pattern = new RegExp(definition.pattern);
            return (value) => pattern.test(String(value));
        }
        case "range":
            return (value) => {
                const parsed = toNumber(value);
                return (
                    parsed !== undefined &&
                    withinBounds(parsed, definition.min, definition.max)
                );
            };
        case "length":
            return (value) =>
                withinBounds(
                    String(value).length,
                    definition.min,
                    definition.max,
                );
        case "one_of":
            return (value) =>
                definition.values.some(
                    (allowed) =>
                        allowed === value || String(allowed) === String(value),
                );
    }
}

export function createRuleSetCompiler(
    builder: GridRuleBuilder,
): RuleSetCompiler {
    const compileOne = (definition: RuleDefinition): GridRule => {
        const options = {
            name: definition.name ?? defaultName(definition),
            message: definition.message ?? defaultMessage(definition),
            severity: definition.severity,
            priority: definition.priority,
            timeoutMs: definition.timeout_ms,
        };

        if (definition.type === "compare") {
            const { column, other_column: otherColumn, operator } = definition;
            return builder.rowRule({
                ...options,
                columns: [column, otherColumn],
                check: (row) => {
                    const left = cellValue(row, column);
                    const right = cellValue(row, otherColumn);
                    return (
                        isEmptyValue(left) ||
                        isEmptyValue(right) ||
                        compareValues(left, right, operator)
                    );
                },
            });
        }

        const predicate = valuePredicate(definition);
        const skipsEmpty = definition.type !== "required";
        return builder.cellRule({
            ...options,
            column: definition.column,
            predicate: (value) =>
                (skipsEmpty && isEmptyValue(value)) || predicate(value),
        });
    };

    return {
        compile(ruleSet: RuleSetInput): readonly GridRule[] {
            return ruleSet.rules.map(compileOne);
        },
    };
}
