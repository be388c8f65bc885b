import type { OutcomeKind } from "./rule-outcome.js";
import type { VerdictStatus } from "./validation-verdict.js";

export const PASS_SAMPLE_NAME = "*";

export interface TimingSample {
    readonly rule_name: string;
    readonly elapsed_ms: number;
    readonly outcome: OutcomeKind | VerdictStatus;
}
