import { type RuleSetInput, RuleSetSchema } from "./rule-set.schema.js";
import { parseJsonInput } from "./parse-json-input.js";

export interface RuleSetParser {
    parse(content: string): RuleSetInput;
}

export function createRuleSetParser(): RuleSetParser {
    return {
        parse(content: string): RuleSetInput {
            return RuleSetSchema.parse(parseJsonInput(content, "rule set"));
        },
    };
}
