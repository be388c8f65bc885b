import { describe, expect, it } from "vitest";
import type { TimingSample } from "../entities/timing-sample.js";
import { buildLogger } from "../lib/test-rule-builder.js";
import {
    createInMemoryPerformanceSink,
    createLoggingPerformanceSink,
} from "./performance-sink.js";

function sample(
    rule_name: string,
    elapsed_ms: number,
    outcome: TimingSample["outcome"] = "passed",
): TimingSample {
    return { rule_name, elapsed_ms, outcome };
}

describe("PerformanceSink", () => {
    describe("createInMemoryPerformanceSink", () => {
        it("should keep samples in arrival order", () => {
            const sink = createInMemoryPerformanceSink();

            sink.report(sample("a", 1));
            sink.report(sample("b", 2));

            expect(sink.samples().map((s) => s.rule_name)).toEqual(["a", "b"]);
        });

        it("should drop the oldest samples past capacity", () => {
            // Arrange
            const sink = createInMemoryPerformanceSink({ capacity: 2 });

            // Act
            sink.report(sample("a", 1));
            sink.report(sample("b", 2));
            sink.report(sample("c", 3));
            sink.report(sample("d", 4));
            sink.report(sample("e", 5));

            // Assert
            expect(sink.samples().map((s) => s.rule_name)).toEqual(["d", "e"]);
        });

        it("should summarize samples per rule", () => {
            // Arrange
            const sink = createInMemoryPerformanceSink();
            sink.report(sample("lookup", 4));
            sink.report(sample("lookup", 10, "timed_out"));
            sink.report(sample("format", 1, "failed"));

            // Act
            const summary = sink.summarize();

            // Assert
            expect(summary).toEqual({
                lookup: {
                    count: 2,
                    total_ms: 14,
                    max_ms: 10,
                    by_outcome: { passed: 1, timed_out: 1 },
                },
                format: {
                    count: 1,
                    total_ms: 1,
                    max_ms: 1,
                    by_outcome: { failed: 1 },
                },
            });
        });

        it("should summarize rules named after built-in object members", () => {
            // Arrange
            const sink = createInMemoryPerformanceSink();
            sink.report(sample("constructor", 2));
            sink.report(sample("toString", 3, "failed"));
            sink.report(sample("__proto__", 4));
            sink.report(sample("constructor", 6));

            // Act
            const summary = sink.summarize();

            // Assert
            expect(Object.keys(summary)).toEqual([
                "constructor",
                "toString",
                "__proto__",
            ]);
            expect(Object.getOwnPropertyDescriptor(summary, "constructor")?.value).toEqual({
                count: 2,
                total_ms: 8,
                max_ms: 6,
                by_outcome: { passed: 2 },
            });
            expect(Object.getOwnPropertyDescriptor(summary, "__proto__")?.value).toEqual({
                count: 1,
                total_ms: 4,
                max_ms: 4,
                by_outcome: { passed: 1 },
            });
        });

        it("should forget everything on clear", () => {
            const sink = createInMemoryPerformanceSink({ capacity: 1 });
            sink.report(sample("a", 1));
            sink.report(sample("b", 1));

            sink.clear();
            sink.report(sample("c", 1));

            expect(sink.samples().map((s) => s.rule_name)).toEqual(["c"]);
        });
    });

    describe("createLoggingPerformanceSink", () => {
        it("should warn about samples at or over the threshold", () => {
            const logger = buildLogger();
            const sink = createLoggingPerformanceSink(logger, {
                slowThresholdMs: 50,
            });

            sink.report(sample("lookup", 50, "timed_out"));

            expect(logger.warn).toHaveBeenCalledWith(
                "Slow validation: lookup took 50.0ms (timed_out)",
            );
            expect(logger.debug).not.toHaveBeenCalled();
        });

        it("should log faster samples at debug level", () => {
            const logger = buildLogger();
            const sink = createLoggingPerformanceSink(logger);

            sink.report(sample("format", 2.345));

            expect(logger.debug).toHaveBeenCalledWith(
                "format took 2.3ms (passed)",
            );
            expect(logger.warn).not.toHaveBeenCalled();
        });
    });
});
