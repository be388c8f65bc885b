import { describeCause } from "../entities/rule-outcome.js";
import type { TimingSample } from "../entities/timing-sample.js";
import type { EngineLogger } from "./engine-logger.port.js";
import type { PerformanceSink } from "./performance-sink.port.js";

export interface TimingReporterDeps {
    readonly sink: PerformanceSink;
    readonly logger: EngineLogger;
}

export interface TimingReporter {
    report(sample: TimingSample): void;
}

export function createTimingReporter(deps: TimingReporterDeps): TimingReporter {
    const warn = (sample: TimingSample, error: unknown) => {
        deps.logger.warn(
            `Performance sink rejected sample for "${sample.rule_name}": ${describeCause(error)}`,
        );
    };

    return {
        report(sample: TimingSample): void {
            try {
                const pending = deps.sink.report(sample);
                if (pending instanceof Promise) {
                    void pending.catch((error: unknown) => warn(sample, error));
                }
            } catch (error) {
                warn(sample, error);
            }
        },
    };
}
