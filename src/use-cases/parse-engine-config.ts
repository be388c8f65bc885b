import type { EngineConfig } from "../entities/engine-config.js";
import { EngineConfigSchema } from "./engine-config.schema.js";
import { parseJsonInput } from "./parse-json-input.js";

export interface EngineConfigParser {
    parse(jsonString: string): EngineConfig;
}

const KEY_MAP: Readonly<Record<string, string>> = {
    default_timeout_ms: "defaultTimeoutMs",
    fail_on: "failOn",
    mode: "mode",
    strategy: "strategy",
    batch_size: "batchSize",
    debounce_ms: "debounceMs",
};

function transformSnakeToCamel(data: unknown): unknown {
    if (typeof data !== "object" || data === null || Array.isArray(data)) {
        return data;
    }

    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
        result[KEY_MAP[key] ?? key] = value;
    }
    return result;
}

export function createEngineConfigParser(): EngineConfigParser {
    return {
        parse(jsonString: string): EngineConfig {
            const sanitized = parseJsonInput(
                jsonString,
                "engine configuration",
            );
            return EngineConfigSchema.parse(transformSnakeToCamel(sanitized));
        },
    };
}
