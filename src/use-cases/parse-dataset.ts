import type { GridRow } from "../entities/grid-data.js";
import { DatasetSchema } from "./dataset.schema.js";
import { parseJsonInput } from "./parse-json-input.js";

export interface DatasetParser {
    parse(content: string): readonly GridRow[];
}

export function createDatasetParser(): DatasetParser {
    return {
        parse(content: string): readonly GridRow[] {
            return DatasetSchema.parse(parseJsonInput(content, "dataset"));
        },
    };
}
