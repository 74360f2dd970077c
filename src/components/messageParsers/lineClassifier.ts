import {
    THINK_OPEN_TAG,
    CODE_FENCE,
    TABLE_CELL_SEPARATOR,
    MATH_BLOCK_OPEN,
    MATH_BLOCK_CLOSE,
    IMAGE_OPEN_TAG,
} from '../../config/parserConstants';

export type LineCategory =
    | 'thinking'
    | 'code-fence'
    | 'table-row'
    | 'math-block-open'
    | 'math-line'
    | 'image-reference'
    | 'plain-text';

/**
 * Classifies a single line without looking at any surrounding context.
 * Matching runs against the trimmed line; the first rule that matches wins.
 */
export function classifyLine(line: string): LineCategory {
    const trimmedLine = line.trim();

    if (trimmedLine.startsWith(THINK_OPEN_TAG)) {
        return 'thinking';
    }
    if (trimmedLine.startsWith(CODE_FENCE)) {
        return 'code-fence';
    }
    if (trimmedLine.startsWith(TABLE_CELL_SEPARATOR)) {
        return 'table-row';
    }
    if (trimmedLine.startsWith(MATH_BLOCK_OPEN)) {
        // A bare opener starts a multi-line block; anything after it makes a one-line formula.
        return trimmedLine.replace(/ /g, '') === MATH_BLOCK_OPEN ? 'math-block-open' : 'math-line';
    }
    if (trimmedLine.startsWith(MATH_BLOCK_CLOSE)) {
        return 'math-line';
    }
    if (trimmedLine.startsWith(IMAGE_OPEN_TAG)) {
        return 'image-reference';
    }
    return 'plain-text';
}

export function isMathBlockCloser(line: string): boolean {
    return line.trim().startsWith(MATH_BLOCK_CLOSE);
}

/** Number of leading whitespace characters in the line. */
export function leadingWhitespaceWidth(line: string): number {
    return line.length - line.trimStart().length;
}
