/**
 * Splits a plain-text line into text and inline formula fragments.
 *
 * Two delimiter pairs are recognised, `$...$` and `\(...\)`. The scan walks the
 * line left to right and, at each position, takes the shortest span that opens
 * there; the first position that yields a span wins. A delimiter whose first
 * character is directly preceded by a backslash is escaped and never opens or
 * closes a span. Only that single preceding character is inspected, so `\\$`
 * counts as escaped too.
 */
import { FormulaBlock, TextBlock } from '../../types';

export type InlineMathDelimiter = 'dollar' | 'paren';

export interface InlineMathSpan {
    /** Index of the opening delimiter. */
    start: number;
    /** Index just past the closing delimiter. */
    end: number;
    /** Raw text between the delimiters, still escaped. */
    content: string;
    delimiter: InlineMathDelimiter;
}

export type InlineFragment = TextBlock | FormulaBlock;

const DOLLAR = '$';
const PAREN_OPEN = '\\(';
const PAREN_CLOSE = '\\)';

function isPrecededByBackslash(line: string, index: number): boolean {
    return index > 0 && line[index - 1] === '\\';
}

function matchDollarSpan(line: string, start: number): InlineMathSpan | null {
    if (line[start] !== DOLLAR || isPrecededByBackslash(line, start)) {
        return null;
    }
    for (let i = start + 1; i < line.length; i++) {
        if (line[i] === DOLLAR && !isPrecededByBackslash(line, i)) {
            return { start, end: i + 1, content: line.slice(start + 1, i), delimiter: 'dollar' };
        }
    }
    return null;
}

function matchParenSpan(line: string, start: number): InlineMathSpan | null {
    if (!line.startsWith(PAREN_OPEN, start) || isPrecededByBackslash(line, start)) {
        return null;
    }
    const contentStart = start + PAREN_OPEN.length;
    for (let i = contentStart; i < line.length - 1; i++) {
        if (line.startsWith(PAREN_CLOSE, i) && !isPrecededByBackslash(line, i)) {
            return { start, end: i + PAREN_CLOSE.length, content: line.slice(contentStart, i), delimiter: 'paren' };
        }
    }
    return null;
}

export function findInlineMathSpans(line: string): InlineMathSpan[] {
    const spans: InlineMathSpan[] = [];
    let position = 0;

    while (position < line.length) {
        const span = matchDollarSpan(line, position) ?? matchParenSpan(line, position);
        if (span) {
            spans.push(span);
            position = span.end;
        } else {
            position++;
        }
    }
    return spans;
}

export function unescapeMathDelimiters(content: string): string {
    return content
        .replace(/\\\$/g, '$')
        .replace(/\\\(/g, '(')
        .replace(/\\\)/g, ')');
}

export function scanInlineMath(line: string): InlineFragment[] {
    const spans = findInlineMathSpans(line);
    if (spans.length === 0) {
        return [{ type: 'text', text: line }];
    }

    const fragments: InlineFragment[] = [];
    let lastIndexProcessed = 0;

    for (const span of spans) {
        if (span.start > lastIndexProcessed) {
            fragments.push({ type: 'text', text: line.slice(lastIndexProcessed, span.start) });
        }
        // Empty and whitespace-only formulas are kept.
        fragments.push({ type: 'formula', content: unescapeMathDelimiters(span.content) });
        lastIndexProcessed = span.end;
    }

    if (lastIndexProcessed < line.length) {
        fragments.push({ type: 'text', text: line.slice(lastIndexProcessed) });
    }
    return fragments;
}
