import type { TimingSample } from "../entities/timing-sample.js";
import type { EngineLogger } from "../use-cases/engine-logger.port.js";
import type { PerformanceSink } from "../use-cases/performance-sink.port.js";

const DEFAULT_CAPACITY = 10_000;
const DEFAULT_SLOW_THRESHOLD_MS = 100;

export interface RuleTimingSummary {
    readonly count: number;
    readonly total_ms: number;
    readonly max_ms: number;
    readonly by_outcome: Readonly<Record<string, number>>;
}

export interface InMemoryPerformanceSink extends PerformanceSink {
    samples(): readonly TimingSample[];
    summarize(): Readonly<Record<string, RuleTimingSummary>>;
    clear(): void;
}

export function createNoopPerformanceSink(): PerformanceSink {
    return {
        report(): void {},
    };
}

/**
 * Keeps the most recent samples in a fixed-size ring; the oldest sample is
 * overwritten once `capacity` is reached.
 */
export function createInMemoryPerformanceSink(options?: {
    readonly capacity?: number;
}): InMemoryPerformanceSink {
    const capacity = Math.max(1, options?.capacity ?? DEFAULT_CAPACITY);
    let buffer: TimingSample[] = [];
    let next = 0;

    const samples = (): readonly TimingSample[] =>
        buffer.length < capacity
            ? [...buffer]
            : [...buffer.slice(next), ...buffer.slice(0, next)];

    return {
        report(sample: TimingSample): void {
            if (buffer.length < capacity) {
                buffer.push(sample);
                return;
            }
            buffer[next] = sample;
            next = (next + 1) % capacity;
        },

        samples,

        summarize(): Readonly<Record<string, RuleTimingSummary>> {
            const summary = new Map<string, RuleTimingSummary>();
            for (const sample of samples()) {
                const current = summary.get(sample.rule_name) ?? {
                    count: 0,
                    total_ms: 0,
                    max_ms: 0,
                    by_outcome: {},
                };
                summary.set(sample.rule_name, {
                    count: current.count + 1,
                    total_ms: current.total_ms + sample.elapsed_ms,
                    max_ms: Math.max(current.max_ms, sample.elapsed_ms),
                    by_outcome: {
                        ...current.by_outcome,
                        [sample.outcome]:
                            (current.by_outcome[sample.outcome] ?? 0) + 1,
                    },
                });
            }
            return Object.fromEntries(summary);
        },

        clear(): void {
            buffer = [];
            next = 0;
        },
    };
}

export function createLoggingPerformanceSink(
    logger: EngineLogger,
    options?: { readonly slowThresholdMs?: number },
): PerformanceSink {
    const threshold = options?.slowThresholdMs ?? DEFAULT_SLOW_THRESHOLD_MS;

    return {
        report(sample: TimingSample): void {
            const line = `${sample.rule_name} took ${sample.elapsed_ms.toFixed(1)}ms (${sample.outcome})`;
            if (sample.elapsed_ms >= threshold) {
                logger.warn(`Slow validation: ${line}`);
            } else {
                logger.debug(line);
            }
        },
    };
}
