import type { Severity } from "./severity.js";

export const DEFAULT_TIMEOUT_MS = 2000;

/** Largest delay a Node.js timer honours; longer delays fire after 1ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export interface RuleDescriptor {
    readonly name?: string | undefined;
    readonly message: string;
    readonly severity: Severity;
    readonly priority?: number | undefined;
    readonly timeoutMs?: number | undefined;
    readonly columns?: readonly string[] | undefined;
}

export type CheckResult =
    | boolean
    | {
          readonly valid: boolean;
          readonly message?: string | undefined;
          readonly severity?: Severity | undefined;
      };

export type RuleCheck<T> = (
    target: T,
    signal: AbortSignal,
) => CheckResult | Promise<CheckResult>;

export interface ValidationRule<T = unknown> extends RuleDescriptor {
    readonly check: RuleCheck<T>;
}

export function effectiveTimeout(
    rule: RuleDescriptor,
    defaultTimeoutMs: number,
): number {
    return rule.timeoutMs ?? defaultTimeoutMs;
}

export function describeRule(rule: RuleDescriptor, index: number): string {
    return rule.name ?? `rule #${index}`;
}
