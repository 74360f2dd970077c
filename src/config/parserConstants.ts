import { MessageFormat } from '../types';

// Block markers
export const THINK_OPEN_TAG = '<think>';
export const THINK_CLOSE_TAG = '</think>';
export const CODE_FENCE = '```';
export const TABLE_CELL_SEPARATOR = '|';
export const MATH_BLOCK_OPEN = '\\[';
export const MATH_BLOCK_CLOSE = '\\]';
export const IMAGE_OPEN_TAG = '<image-uuid>';
export const IMAGE_CLOSE_TAG = '</image-uuid>';

// Canonical 8-4-4-4-12 identifier accepted inside image tags
export const UUID_PATTERN = /^[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}$/;

// Default parser behaviour
export const DEFAULT_MESSAGE_FORMAT: MessageFormat = 'blocks';
export const DEFAULT_CONTAIN_BLOCK_CONTENT = false;

export const LOGGER_PREFIX = 'ChatMessageBlocks';
export const LOG_LEVEL_ENV_VARIABLE = 'MESSAGE_PARSER_LOG_LEVEL';
