import { z } from "zod";

const GridRowSchema = z.record(z.unknown());

export const DatasetSchema = z.union([
    z.array(GridRowSchema),
    z.object({ rows: z.array(GridRowSchema) }).transform((data) => data.rows),
]);

export type DatasetInput = z.infer<typeof DatasetSchema>;
