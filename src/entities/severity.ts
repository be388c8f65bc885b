export type Severity = "info" | "warning" | "error" | "critical";

export const SEVERITIES: readonly Severity[] = [
    "info",
    "warning",
    "error",
    "critical",
];

const SEVERITY_RANK: Readonly<Record<Severity, number>> = {
    info: 0,
    warning: 1,
    error: 2,
    critical: 3,
};

export function compareSeverity(a: Severity, b: Severity): number {
    return SEVERITY_RANK[a] - SEVERITY_RANK[b];
}

export function isAtLeast(severity: Severity, threshold: Severity): boolean {
    return compareSeverity(severity, threshold) >= 0;
}

export function maxSeverity(
    severities: readonly Severity[],
): Severity | null {
    let highest: Severity | null = null;
    for (const severity of severities) {
        if (highest === null || compareSeverity(severity, highest) > 0) {
            highest = severity;
        }
    }
    return highest;
}
