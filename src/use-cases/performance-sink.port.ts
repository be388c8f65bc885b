import type { TimingSample } from "../entities/timing-sample.js";

export interface PerformanceSink {
    report(sample: TimingSample): void | Promise<void>;
}
