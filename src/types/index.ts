import { LogLevel } from '../components/logger';

export interface TextBlock {
    type: 'text';
    text: string;
}

export interface CodeBlock {
    type: 'code';
    code: string;
    language?: string;
    /** Leading whitespace width stripped from every body line, taken from the opening fence. */
    indent: number;
}

export interface TableBlock {
    type: 'table';
    header: string[];
    rows: string[][];
}

export interface FormulaBlock {
    type: 'formula';
    content: string;
}

export interface ThinkingBlock {
    type: 'thinking';
    content: string;
    expanded: boolean;
}

export interface ImageBlock<TImage = unknown> {
    type: 'image';
    id: string;
    image: TImage;
}

export type ContentBlock<TImage = unknown> =
    | TextBlock
    | CodeBlock
    | TableBlock
    | FormulaBlock
    | ThinkingBlock
    | ImageBlock<TImage>;

export type ContentBlockType = ContentBlock['type'];

/**
 * Looks up an image by its identifier. Returning null or undefined (or throwing)
 * makes the parser fall back to treating the reference line as text.
 */
export type ImageResolver<TImage> = (id: string) => TImage | null | undefined;

export type AsyncImageResolver<TImage> = (id: string) => Promise<TImage | null | undefined>;

export type MessageFormat = 'blocks' | 'plaintext';

export interface ParserSettings {
    format: MessageFormat;
    containBlockContent: boolean;
}

export interface ParserProfile {
    profileId: string;
    parser: ParserSettings;
}

export interface BaseConfig {
    logLevel: LogLevel;
    parserDefaults: ParserSettings;
}

export interface MessageParserServiceConfig {
    instanceConfigPath: string;
    apiBasePath: string;
}

export interface ParseRequestBody {
    message: string;
    images?: Record<string, string>;
}

/** Resource handed out by the HTTP service's image resolver. */
export interface ImageLink {
    url: string;
}
