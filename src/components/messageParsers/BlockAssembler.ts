/**
 * BlockAssembler walks a message one line at a time and groups lines into content blocks.
 *
 * It keeps one pending buffer per block kind (text, code, math, table, thinking) plus the
 * open/closed flags for code fences, math blocks and thinking sections. Buffers are turned into
 * blocks only by the `flush*` methods, each of which does nothing when its buffer is empty.
 *
 * Line categories come from `classifyLine`, which ignores the assembler's state. Only the
 * plain-text branch checks which block is open, so by default a `|` line inside a code fence is
 * still handled as a table row. Setting `containBlockContent` routes every line inside an open
 * block to that block instead, leaving only the block's own closing delimiter special.
 */
import { Logger } from '../logger';
import { ContentBlock, ImageResolver } from '../../types';
import { CODE_FENCE, THINK_OPEN_TAG, THINK_CLOSE_TAG } from '../../config/parserConstants';
import { classifyLine, isMathBlockCloser, leadingWhitespaceWidth, LineCategory } from './lineClassifier';
import { parseTableRow, isTableDelimiterRow } from './tableRow';
import { scanInlineMath } from './inlineMathScanner';
import { extractImageIdentifier } from '../../utils/imageResolvers';

function stripMathDelimiters(line: string): string {
    return line.replace(/\\\[|\\\]/g, '');
}

function stripThinkingTags(text: string): string {
    return text.split(THINK_OPEN_TAG).join('').split(THINK_CLOSE_TAG).join('');
}

export class BlockAssembler<TImage = unknown> {
    private readonly blocks: ContentBlock<TImage>[] = [];

    private textLines: string[] = [];
    private codeLines: string[] = [];
    private mathLines: string[] = [];
    private thinkingLines: string[] = [];
    private tableHeader: string[] = [];
    private tableRows: string[][] = [];
    private isHeaderCaptured = false;

    private isCodeOpen = false;
    private isMathOpen = false;
    private isThinkingOpen = false;
    private codeLanguage = '';
    private codeIndent = 0;

    constructor(
        private readonly logger: Logger,
        private readonly resolveImage?: ImageResolver<TImage>,
        private readonly containBlockContent: boolean = false
    ) {}

    public processLine(line: string): void {
        switch (this.routeLine(line)) {
            case 'code-fence':
                this.handleCodeFence(line);
                break;
            case 'table-row':
                this.handleTableRow(line);
                break;
            case 'math-block-open':
                this.handleMathBlockOpen();
                break;
            case 'math-line':
                this.handleMathLine(line);
                break;
            case 'thinking':
                this.handleThinking(line);
                break;
            case 'image-reference':
                this.handleImageReference(line);
                break;
            case 'plain-text':
                this.handlePlainText(line);
                break;
        }
    }

    /**
     * Flushes whatever is still buffered and returns the assembled blocks.
     * Unclosed code fences, math blocks and thinking sections are emitted with the lines they hold.
     */
    public finish(): ContentBlock<TImage>[] {
        if (this.isCodeOpen) {
            this.logger.debug(`BlockAssembler: Code fence left open at end of input; flushing ${this.codeLines.length} buffered line(s).`);
        }
        if (this.isMathOpen) {
            this.logger.debug(`BlockAssembler: Math block left open at end of input; flushing ${this.mathLines.length} buffered line(s).`);
        }
        if (this.isThinkingOpen) {
            this.logger.debug(`BlockAssembler: Thinking section left open at end of input; flushing ${this.thinkingLines.length} buffered line(s).`);
        }

        this.flushText();
        this.flushCode();
        this.flushMath();
        this.flushTable();
        this.flushThinking();
        return this.blocks;
    }

    private routeLine(line: string): LineCategory {
        const category = classifyLine(line);
        if (!this.containBlockContent) {
            return category;
        }
        if (this.isThinkingOpen) {
            return 'plain-text';
        }
        if (this.isCodeOpen) {
            return category === 'code-fence' ? category : 'plain-text';
        }
        if (this.isMathOpen) {
            return category === 'math-line' && isMathBlockCloser(line) ? category : 'plain-text';
        }
        return category;
    }

    private handleCodeFence(line: string): void {
        this.flushText();
        this.flushTable();

        if (this.isCodeOpen) {
            this.flushCode();
            this.isCodeOpen = false;
            this.codeLanguage = '';
            this.codeIndent = 0;
        } else {
            this.codeLanguage = line.trim().slice(CODE_FENCE.length).trim();
            this.codeIndent = leadingWhitespaceWidth(line);
            this.isCodeOpen = true;
        }
    }

    private handleTableRow(line: string): void {
        this.flushText();

        const cells = parseTableRow(line);
        if (isTableDelimiterRow(cells)) {
            return;
        }

        if (!this.isHeaderCaptured) {
            this.tableHeader = cells;
            this.isHeaderCaptured = true;
        } else {
            this.tableRows.push(cells);
        }
    }

    private handleMathBlockOpen(): void {
        this.flushText();
        this.flushTable();
        this.isMathOpen = true;
    }

    private handleMathLine(line: string): void {
        this.flushText();
        this.flushTable();

        if (isMathBlockCloser(line)) {
            this.isMathOpen = false;
            this.flushMath();
            return;
        }

        this.mathLines.push(stripMathDelimiters(line));
        if (!this.isMathOpen) {
            // Opener and closer on the same line.
            this.flushMath();
        }
    }

    private handleThinking(line: string): void {
        this.flushText();
        this.flushTable();

        const closeIndex = line.indexOf(THINK_CLOSE_TAG);
        if (closeIndex !== -1) {
            const content = stripThinkingTags(line.slice(0, closeIndex)).trim();
            this.blocks.push({ type: 'thinking', content, expanded: false });
            this.handleTrailingText(line.slice(closeIndex + THINK_CLOSE_TAG.length));
            return;
        }

        this.isThinkingOpen = true;
        const firstLine = stripThinkingTags(line);
        if (firstLine.length > 0) {
            this.thinkingLines.push(firstLine);
        }
    }

    private handleImageReference(line: string): void {
        const identifier = extractImageIdentifier(line);
        const image = identifier === null ? undefined : this.lookupImage(identifier);

        if (identifier !== null && image !== undefined && image !== null) {
            this.flushText();
            this.flushTable();
            this.blocks.push({ type: 'image', id: identifier, image });
        } else {
            this.textLines.push(line);
        }
    }

    private lookupImage(identifier: string): TImage | null | undefined {
        if (!this.resolveImage) {
            this.logger.debug(`BlockAssembler: No image resolver configured; '${identifier}' stays as text.`);
            return undefined;
        }
        try {
            const image = this.resolveImage(identifier);
            if (image === undefined || image === null) {
                this.logger.debug(`BlockAssembler: Image '${identifier}' not found; line stays as text.`);
            }
            return image;
        } catch (error: unknown) {
            this.logger.warn(`BlockAssembler: Image resolver failed for '${identifier}'; line stays as text.`, error);
            return undefined;
        }
    }

    private handlePlainText(line: string): void {
        if (this.isThinkingOpen) {
            this.appendThinkingLine(line);
        } else if (this.isCodeOpen) {
            this.codeLines.push(this.codeIndent > 0 ? line.slice(this.codeIndent) : line);
        } else if (this.isMathOpen) {
            this.mathLines.push(stripMathDelimiters(line));
        } else {
            this.flushTable();
            this.flushText();
            this.blocks.push(...scanInlineMath(line));
        }
    }

    private appendThinkingLine(line: string): void {
        const closeIndex = line.indexOf(THINK_CLOSE_TAG);
        if (closeIndex === -1) {
            this.thinkingLines.push(line);
            return;
        }

        const lastLine = line.slice(0, closeIndex);
        if (lastLine.length > 0) {
            this.thinkingLines.push(lastLine);
        }
        this.isThinkingOpen = false;
        this.flushThinking();
        this.handleTrailingText(line.slice(closeIndex + THINK_CLOSE_TAG.length));
    }

    /** Text after a closing `</think>` on the same line is handled as a line of its own. */
    private handleTrailingText(rest: string): void {
        if (rest.trim().length > 0) {
            this.handlePlainText(rest);
        }
    }

    private flushText(): void {
        if (this.textLines.length === 0) {
            return;
        }
        this.blocks.push({ type: 'text', text: this.textLines.join('\n') });
        this.textLines = [];
    }

    private flushCode(): void {
        if (this.codeLines.length === 0) {
            return;
        }
        const code = this.codeLines.join('\n');
        this.blocks.push(this.codeLanguage
            ? { type: 'code', code, language: this.codeLanguage, indent: this.codeIndent }
            : { type: 'code', code, indent: this.codeIndent });
        this.codeLines = [];
    }

    private flushMath(): void {
        if (this.mathLines.length === 0) {
            return;
        }
        this.blocks.push({ type: 'formula', content: this.mathLines.join('\n') });
        this.mathLines = [];
    }

    /** Emits the table when it has data rows; a header with no rows is dropped. */
    private flushTable(): void {
        if (!this.isHeaderCaptured) {
            return;
        }
        if (this.tableRows.length > 0) {
            this.blocks.push({ type: 'table', header: this.tableHeader, rows: this.tableRows });
        } else {
            this.logger.debug('BlockAssembler: Dropping table header without data rows:', this.tableHeader);
        }
        this.tableHeader = [];
        this.tableRows = [];
        this.isHeaderCaptured = false;
    }

    private flushThinking(): void {
        if (this.thinkingLines.length === 0) {
            return;
        }
        const content = stripThinkingTags(this.thinkingLines.join('\n')).trim();
        this.blocks.push({ type: 'thinking', content, expanded: false });
        this.thinkingLines = [];
    }
}
