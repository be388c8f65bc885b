import { isAtLeast, type Severity } from "./severity.js";

export type RuleOutcome =
    | { readonly kind: "passed" }
    | {
          readonly kind: "failed";
          readonly severity: Severity;
          readonly message: string;
      }
    | { readonly kind: "timed_out"; readonly timeoutMs: number }
    | { readonly kind: "faulted"; readonly cause: unknown }
    | { readonly kind: "cancelled" };

export type OutcomeKind = RuleOutcome["kind"];

export function describeCause(cause: unknown): string {
    if (cause instanceof Error) {
        return cause.message;
    }
    return String(cause);
}

export function outcomeSeverity(
    outcome: RuleOutcome,
    declared: Severity,
): Severity | null {
    switch (outcome.kind) {
        case "passed":
        case "cancelled":
            return null;
        case "failed":
            return outcome.severity;
        case "timed_out":
        case "faulted":
            return isAtLeast(declared, "error") ? declared : "error";
    }
}

export function describeOutcome(outcome: RuleOutcome): string {
    switch (outcome.kind) {
        case "passed":
            return "Passed";
        case "cancelled":
            return "Cancelled";
        case "failed":
            return outcome.message;
        case "timed_out":
            return `Rule timed out after ${outcome.timeoutMs}ms`;
        case "faulted":
            return `Rule check faulted: ${describeCause(outcome.cause)}`;
    }
}
