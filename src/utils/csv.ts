/**
 * Minimal delimited-file writer with explicit column order.
 */

export type CsvCell = string | number | null | undefined;

export interface CsvColumn<T> {
    name: string;
    value: (row: T) => CsvCell;
}

const NUMBER_DECIMALS = 6;

export function formatCell(cell: CsvCell, delimiter: string): string {
    if (cell === null || cell === undefined) {
        return '';
    }
    if (typeof cell === 'number') {
        if (!Number.isFinite(cell)) return '';
        // toFixed then Number() trims trailing zeros
        return String(Number(cell.toFixed(NUMBER_DECIMALS)));
    }
    return escapeValue(cell, delimiter);
}

export function toCsv<T>(rows: readonly T[], columns: readonly CsvColumn<T>[], delimiter = ','): string {
    const header = columns.map((column) => escapeValue(column.name, delimiter)).join(delimiter);
    const lines = rows.map((row) =>
        columns.map((column) => formatCell(column.value(row), delimiter)).join(delimiter)
    );
    return [header, ...lines].join('\n') + '\n';
}

function escapeValue(value: string, delimiter: string): string {
    const needsEscape = value.includes('"') ||
        value.includes(delimiter) ||
        value.includes('\n') ||
        value.includes('\r');

    if (!needsEscape) {
        return value;
    }

    // Escape double quotes by doubling them
    const escaped = value.replace(/"/g, '""');
    return `"${escaped}"`;
}
