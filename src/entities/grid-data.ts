export type CellValue = unknown;

export type GridRow = Readonly<Record<string, CellValue>>;

/** Reads a column the row itself carries; inherited members read as absent. */
export function cellValue(row: GridRow, column: string): CellValue {
    return Object.hasOwn(row, column) ? row[column] : undefined;
}

export function isEmptyValue(value: CellValue): boolean {
    if (value === null || value === undefined) {
        return true;
    }
    return typeof value === "string" && value.trim() === "";
}

export function isEmptyRow(row: GridRow): boolean {
    return Object.values(row).every(isEmptyValue);
}
