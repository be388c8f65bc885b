import Chance from "chance";
import { describe, expect, it, vi } from "vitest";
import {
    ConfigurationError,
    ValidationCancelledError,
} from "../entities/errors.js";
import type {
    CheckResult,
    ValidationRule,
} from "../entities/validation-rule.js";
import {
    buildEngineParts,
    buildRule,
    buildSink,
    sleep,
} from "../lib/test-rule-builder.js";

const chance = new Chance();

describe("ValidateTarget", () => {
    describe("given an empty rule set", () => {
        it("should return a trivially valid verdict", async () => {
            // Arrange
            const { orchestrator } = buildEngineParts();

            // Act
            const verdict = await orchestrator.validate(chance.word(), []);

            // Assert
            expect(verdict).toEqual({
                status: "completed",
                valid: true,
                overall_severity: null,
                fail_on: "error",
                failures: [],
                stats: {
                    total_rules: 0,
                    executed: 0,
                    passed: 0,
                    failed: 0,
                    timed_out: 0,
                    faulted: 0,
                    skipped: 0,
                },
            });
        });
    });

    describe("given an invalid configuration", () => {
        it("should raise a configuration error for a missing rule set", async () => {
            // Arrange
            const { orchestrator } = buildEngineParts();
            const rules: ValidationRule[] = JSON.parse("null");

            // Act
            const attempt = orchestrator.validate(null, rules);

            // Assert
            await expect(attempt).rejects.toBeInstanceOf(ConfigurationError);
            await expect(attempt).rejects.toMatchObject({
                issues: ["rules: rules must be an array"],
            });
        });

        it("should list every rule that breaks the rule contract", async () => {
            // Arrange
            const { orchestrator } = buildEngineParts();
            const rules = [
                buildRule({ timeoutMs: -5 }),
                buildRule({ message: "" }),
            ];

            // Act
            const attempt = orchestrator.validate(null, rules);

            // Assert
            await expect(attempt).rejects.toMatchObject({
                issues: [
                    "rules[0].timeoutMs: timeoutMs must be greater than zero",
                    "rules[1].message: message is required",
                ],
            });
        });

        it("should reject a timeout longer than a timer can wait", async () => {
            // Arrange
            const { orchestrator } = buildEngineParts();
            const rules = [buildRule({ timeoutMs: 3_000_000_000 })];

            // Act
            const attempt = orchestrator.validate(null, rules);

            // Assert
            await expect(attempt).rejects.toMatchObject({
                issues: [
                    "rules[0].timeoutMs: timeoutMs must be at most 2147483647",
                ],
            });
        });

        it("should raise the same error from the synchronous variant", () => {
            // Arrange
            const { orchestrator } = buildEngineParts();
            const rules = [buildRule({ timeoutMs: 0 })];

            // Act & Assert
            expect(() => orchestrator.validateSync(null, rules)).toThrow(
                ConfigurationError,
            );
        });
    });

    describe("given a check that returns no result", () => {
        it("should report a fault instead of throwing", async () => {
            // Arrange
            const { orchestrator } = buildEngineParts();
            const missing: unknown = undefined;
            const rules = [
                buildRule({ name: "broken", check: () => missing as CheckResult }),
                buildRule({ name: "healthy" }),
            ];

            // Act
            const verdict = await orchestrator.validate(null, rules);

            // Assert
            expect(verdict.valid).toBe(false);
            expect(verdict.failures).toEqual([
                expect.objectContaining({
                    rule_name: "broken",
                    kind: "faulted",
                    severity: "error",
                    message:
                        "Rule check faulted: Check returned an invalid result: undefined",
                }),
            ]);
            expect(verdict.stats.passed).toBe(1);
        });
    });

    describe("given rules that fail", () => {
        it("should aggregate failures into an invalid verdict", async () => {
            // Arrange
            const { orchestrator } = buildEngineParts();
            const rules = [
                buildRule({ name: "positive", check: (n: number) => n > 0 }),
                buildRule({
                    name: "even",
                    severity: "warning",
                    check: (n: number) => n % 2 === 0,
                }),
            ];

            // Act
            const verdict = await orchestrator.validate(-3, rules);

            // Assert
            expect(verdict.valid).toBe(false);
            expect(verdict.overall_severity).toBe("error");
            expect(verdict.failures.map((f) => f.rule_name)).toEqual([
                "positive",
                "even",
            ]);
        });
    });

    describe("given a rule that outlives its timeout in parallel mode", () => {
        it("should report a timeout without waiting for the check", async () => {
            // Arrange
            const { orchestrator } = buildEngineParts();
            const rules = [
                buildRule({
                    name: "slow-lookup",
                    timeoutMs: 10,
                    check: () => sleep(100).then(() => true),
                }),
                buildRule({ name: "fast" }),
            ];
            const startedAt = performance.now();

            // Act
            const verdict = await orchestrator.validate(null, rules, {
                strategy: "parallel",
            });

            // Assert
            expect(performance.now() - startedAt).toBeLessThan(80);
            expect(verdict.failures).toHaveLength(1);
            expect(verdict.failures[0]).toMatchObject({
                rule_name: "slow-lookup",
                kind: "timed_out",
                severity: "error",
            });
        });
    });

    describe("given duplicate rule names", () => {
        it("should report only the failing instance", async () => {
            // Arrange
            const { orchestrator } = buildEngineParts();
            const rules = [
                buildRule({ name: "Required", check: () => true }),
                buildRule({ name: "Required", check: () => false }),
            ];

            // Act
            const verdict = await orchestrator.validate("", rules);

            // Assert
            expect(verdict.failures).toHaveLength(1);
            expect(verdict.failures[0]?.rule_index).toBe(1);
        });
    });

    describe("stop-on-first-error mode", () => {
        it("should skip rules after an error", async () => {
            // Arrange
            const { orchestrator } = buildEngineParts();
            const warningCheck = vi.fn(() => false);
            const rules = [
                buildRule({ severity: "error", check: () => false }),
                buildRule({ severity: "warning", check: warningCheck }),
            ];

            // Act
            const verdict = await orchestrator.validate(null, rules, {
                mode: "stop_on_first_error",
            });

            // Assert
            expect(warningCheck).not.toHaveBeenCalled();
            expect(verdict.stats.executed).toBe(1);
            expect(verdict.stats.skipped).toBe(1);
            expect(verdict.status).toBe("completed");
        });

        it("should keep going after a warning", async () => {
            // Arrange
            const { orchestrator } = buildEngineParts();
            const errorCheck = vi.fn(() => false);
            const rules = [
                buildRule({ severity: "warning", check: () => false }),
                buildRule({ severity: "error", check: errorCheck }),
            ];

            // Act
            const verdict = await orchestrator.validate(null, rules, {
                mode: "stop_on_first_error",
            });

            // Assert
            expect(errorCheck).toHaveBeenCalledTimes(1);
            expect(verdict.overall_severity).toBe("error");
            expect(verdict.failures).toHaveLength(2);
        });

        it("should follow priority order rather than declaration order", async () => {
            // Arrange
            const { orchestrator } = buildEngineParts();
            const laterCheck = vi.fn(() => true);
            const rules = [
                buildRule({ priority: 2, check: laterCheck }),
                buildRule({ priority: 1, check: () => false }),
            ];

            // Act
            await orchestrator.validate(null, rules, {
                mode: "stop_on_first_error",
            });

            // Assert
            expect(laterCheck).not.toHaveBeenCalled();
        });
    });

    describe("given a caller cancellation", () => {
        it("should return a cancelled verdict and start no further checks", async () => {
            // Arrange
            const { orchestrator } = buildEngineParts();
            const controller = new AbortController();
            const secondCheck = vi.fn(() => true);
            const rules = [
                buildRule({
                    check: () => {
                        controller.abort();
                        return true;
                    },
                }),
                buildRule({ check: secondCheck }),
            ];

            // Act
            const verdict = await orchestrator.validate(null, rules, {
                strategy: "sequential",
                signal: controller.signal,
            });

            // Assert
            expect(verdict.status).toBe("cancelled");
            expect(verdict.valid).toBe(false);
            expect(secondCheck).not.toHaveBeenCalled();
            expect(verdict.stats.skipped).toBe(2);
        });

        it("should abort an in-flight check", async () => {
            // Arrange
            const { orchestrator } = buildEngineParts();
            const controller = new AbortController();
            let seen: AbortSignal | undefined;
            const rules = [
                buildRule({
                    check: async (_target, signal) => {
                        seen = signal;
                        await sleep(200, signal);
                        return true;
                    },
                }),
            ];
            setTimeout(() => controller.abort(), 5);

            // Act
            const verdict = await orchestrator.validate(null, rules, {
                signal: controller.signal,
            });

            // Assert
            expect(verdict.status).toBe("cancelled");
            expect(seen?.aborted).toBe(true);
        });

        it("should throw when the caller asks for fail-fast cancellation", async () => {
            // Arrange
            const { orchestrator } = buildEngineParts();
            const controller = new AbortController();
            controller.abort();

            // Act
            const attempt = orchestrator.validate(null, [buildRule()], {
                signal: controller.signal,
                throwOnCancel: true,
            });

            // Assert
            await expect(attempt).rejects.toBeInstanceOf(
                ValidationCancelledError,
            );
        });
    });

    describe("lanes", () => {
        it("should run rules sharing a column in plan order", async () => {
            // Arrange
            const { orchestrator } = buildEngineParts();
            const finished: string[] = [];
            const rules = [
                buildRule({
                    name: "slow",
                    columns: ["amount"],
                    check: async () => {
                        await sleep(20);
                        finished.push("slow");
                        return true;
                    },
                }),
                buildRule({
                    name: "fast",
                    columns: ["amount"],
                    check: () => {
                        finished.push("fast");
                        return true;
                    },
                }),
            ];

            // Act
            await orchestrator.validate(null, rules);

            // Assert
            expect(finished).toEqual(["slow", "fast"]);
        });

        it("should run independent rules concurrently", async () => {
            // Arrange
            const { orchestrator } = buildEngineParts();
            const finished: string[] = [];
            const rules = [
                buildRule({
                    name: "slow",
                    columns: ["amount"],
                    check: async () => {
                        await sleep(20);
                        finished.push("slow");
                        return true;
                    },
                }),
                buildRule({
                    name: "fast",
                    columns: ["email"],
                    check: () => {
                        finished.push("fast");
                        return true;
                    },
                }),
            ];

            // Act
            await orchestrator.validate(null, rules);

            // Assert
            expect(finished).toEqual(["fast", "slow"]);
        });
    });

    describe("repeatability", () => {
        it("should produce identical verdicts for identical input", async () => {
            // Arrange
            const { orchestrator } = buildEngineParts();
            const target = Object.freeze({ qty: 0, sku: "" });
            const rules = Object.freeze([
                buildRule({
                    name: "qty",
                    check: (row: typeof target) => row.qty > 0,
                }),
                buildRule({
                    name: "sku",
                    severity: "warning",
                    check: (row: typeof target) => row.sku !== "",
                }),
            ]);

            // Act
            const first = await orchestrator.validate(target, rules);
            const second = await orchestrator.validate(target, rules);

            // Assert
            expect(second).toEqual(first);
        });
    });

    describe("timing", () => {
        it("should report a pass-level sample", async () => {
            // Arrange
            const sink = buildSink();
            const { orchestrator } = buildEngineParts({ sink });

            // Act
            await orchestrator.validate(null, [buildRule()]);

            // Assert
            expect(sink.report).toHaveBeenLastCalledWith(
                expect.objectContaining({ rule_name: "*", outcome: "completed" }),
            );
        });
    });

    describe("validateSync", () => {
        it("should validate synchronous rules without a promise", () => {
            // Arrange
            const { orchestrator } = buildEngineParts();
            const rules = [
                buildRule({ name: "a", severity: "warning", check: () => false }),
                buildRule({ name: "b", check: () => true }),
            ];

            // Act
            const verdict = orchestrator.validateSync(null, rules, {
                failOn: "warning",
            });

            // Assert
            expect(verdict.valid).toBe(false);
            expect(verdict.failures.map((f) => f.rule_name)).toEqual(["a"]);
            expect(verdict.stats.executed).toBe(2);
        });

        it("should honour stop-on-first-error", () => {
            // Arrange
            const { orchestrator } = buildEngineParts();
            const second = vi.fn(() => true);
            const rules = [
                buildRule({ check: () => false }),
                buildRule({ check: second }),
            ];

            // Act
            orchestrator.validateSync(null, rules, {
                mode: "stop_on_first_error",
            });

            // Assert
            expect(second).not.toHaveBeenCalled();
        });

        it("should skip every rule for a pre-aborted signal", () => {
            // Arrange
            const { orchestrator } = buildEngineParts();
            const controller = new AbortController();
            controller.abort();
            const check = vi.fn(() => true);

            // Act
            const verdict = orchestrator.validateSync(
                null,
                [buildRule({ check })],
                { signal: controller.signal },
            );

            // Assert
            expect(verdict.status).toBe("cancelled");
            expect(check).not.toHaveBeenCalled();
        });
    });
});
