export * from './types';
export { Logger, LogLevel, isLogLevel } from './components/logger';
export { IMessageParser } from './components/messageParsers/IMessageParser';
export { BlockMessageParser, BlockMessageParserOptions } from './components/messageParsers/BlockMessageParser';
export { PlaintextMessageParser } from './components/messageParsers/PlaintextMessageParser';
export { createMessageParser } from './components/messageParsers/createMessageParser';
export { classifyLine, LineCategory } from './components/messageParsers/lineClassifier';
export { parseTableRow, isTableDelimiterRow } from './components/messageParsers/tableRow';
export {
    scanInlineMath,
    findInlineMathSpans,
    unescapeMathDelimiters,
    InlineMathSpan,
    InlineFragment,
} from './components/messageParsers/inlineMathScanner';
export {
    extractImageIdentifier,
    isCanonicalUuid,
    createMapImageResolver,
    preloadImages,
    resolveImages,
} from './utils/imageResolvers';
export { MessageParserService, AdapterRequest } from './message-parser-service';
export { loadBaseConfig, loadInstanceConfig } from './lib/startup/config-loader';
