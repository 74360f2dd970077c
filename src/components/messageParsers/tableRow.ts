import { TABLE_CELL_SEPARATOR } from '../../config/parserConstants';

/**
 * Splits a pipe table row into trimmed cells. Empty cells, including the ones
 * produced by leading and trailing pipes, are dropped rather than padded.
 */
export function parseTableRow(line: string): string[] {
    return line
        .split(TABLE_CELL_SEPARATOR)
        .map(cell => cell.trim())
        .filter(cell => cell.length > 0);
}

/** True for `| --- | :---: |` style separator rows (and for rows with no cells at all). */
export function isTableDelimiterRow(cells: string[]): boolean {
    return cells.every(cell => /^[-:]*$/.test(cell));
}
