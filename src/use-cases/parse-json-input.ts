const UNSAFE_KEYS = new Set(["__proto__", "constructor", "prototype"]);
const MAX_DEPTH = 64;

function stripUnsafeKeys(value: unknown, depth: number): unknown {
    if (value === null || typeof value !== "object") {
        return value;
    }
    if (depth > MAX_DEPTH) {
        throw new Error("JSON nesting too deep");
    }
    if (Array.isArray(value)) {
        return value.map((item) => stripUnsafeKeys(item, depth + 1));
    }
    const result: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
        if (!UNSAFE_KEYS.has(key)) {
            result[key] = stripUnsafeKeys(val, depth + 1);
        }
    }
    return result;
}

/**
 * Parses untrusted JSON and drops prototype-polluting keys before the
 * result reaches a schema.
 */
export function parseJsonInput(content: string, label: string): unknown {
    let raw: unknown;
    try {
        raw = JSON.parse(content);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new Error(`Invalid JSON: ${label} is not valid JSON (${message})`);
    }

    try {
        return stripUnsafeKeys(raw, 0);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new Error(
            `Invalid JSON: ${label} could not be sanitized (${message})`,
        );
    }
}
