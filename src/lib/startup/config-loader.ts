/**
 * @file config-loader.ts
 * @description Loads the base configuration (from environment variables) and the
 * parser profiles (from a YAML file) during application startup. Both are read once
 * and treated as static afterwards.
 */
import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { BaseConfig, MessageFormat, ParserSettings } from '../../types';
import { isLogLevel, LogLevel } from '../../components/logger';
import {
    DEFAULT_MESSAGE_FORMAT,
    DEFAULT_CONTAIN_BLOCK_CONTENT,
    LOG_LEVEL_ENV_VARIABLE,
} from '../../config/parserConstants';

export interface RawParserProfile {
    profileId: string;
    parser: Partial<ParserSettings>;
}

const MESSAGE_FORMATS: MessageFormat[] = ['blocks', 'plaintext'];

function getEnvVariable(variableName: string): string | undefined {
    return process.env[variableName];
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMessageFormat(value: unknown): value is MessageFormat {
    return typeof value === 'string' && MESSAGE_FORMATS.some(format => format === value);
}

export function loadBaseConfig(): BaseConfig {
    console.log("ConfigLoader: Loading base configuration from environment variables and parser constants.");

    let logLevel: LogLevel = 'warn';
    const envLogLevel = getEnvVariable(LOG_LEVEL_ENV_VARIABLE);
    if (envLogLevel !== undefined && envLogLevel.trim() !== '') {
        const candidate = envLogLevel.trim().toLowerCase();
        if (!isLogLevel(candidate)) {
            throw new Error(`ConfigLoader: Invalid log level '${envLogLevel}' in environment variable ${LOG_LEVEL_ENV_VARIABLE}.`);
        }
        console.log(`ConfigLoader: Using ${LOG_LEVEL_ENV_VARIABLE} from environment: ${candidate}`);
        logLevel = candidate;
    }

    return {
        logLevel,
        parserDefaults: {
            format: DEFAULT_MESSAGE_FORMAT,
            containBlockContent: DEFAULT_CONTAIN_BLOCK_CONTENT,
        },
    };
}

function parseProfile(entry: unknown, index: number, absolutePath: string): RawParserProfile {
    if (!isRecord(entry) || typeof entry.profileId !== 'string' || entry.profileId.trim() === '') {
        throw new Error(`ConfigLoader: Profile at index ${index} is missing required 'profileId'. Path: ${absolutePath}`);
    }
    const profileId = entry.profileId;
    const parserSection = entry.parser === undefined ? {} : entry.parser;
    if (!isRecord(parserSection)) {
        throw new Error(`ConfigLoader: Profile '${profileId}' has a 'parser' section that is not a mapping. Path: ${absolutePath}`);
    }

    const parser: Partial<ParserSettings> = {};
    if (parserSection.format !== undefined) {
        if (!isMessageFormat(parserSection.format)) {
            throw new Error(`ConfigLoader: Profile '${profileId}' has unknown parser format '${String(parserSection.format)}'. Expected one of: ${MESSAGE_FORMATS.join(', ')}.`);
        }
        parser.format = parserSection.format;
    }
    if (parserSection.containBlockContent !== undefined) {
        if (typeof parserSection.containBlockContent !== 'boolean') {
            throw new Error(`ConfigLoader: Profile '${profileId}' has a non-boolean 'containBlockContent'. Path: ${absolutePath}`);
        }
        parser.containBlockContent = parserSection.containBlockContent;
    }
    return { profileId, parser };
}

export function loadInstanceConfig(instanceConfigPath: string): RawParserProfile[] {
    const absolutePath = path.resolve(instanceConfigPath);
    console.log(`ConfigLoader: Loading parser profiles from: ${absolutePath}`);
    if (!fs.existsSync(absolutePath)) {
        throw new Error(`Instance configuration file (YAML) not found at ${absolutePath}.`);
    }
    const fileContents = fs.readFileSync(absolutePath, 'utf-8');
    const parsedConfig: unknown = yaml.load(fileContents);

    if (!isRecord(parsedConfig) || !Array.isArray(parsedConfig.profiles)) {
        throw new Error(`Instance YAML config missing required 'profiles' array. Path: ${absolutePath}`);
    }

    return parsedConfig.profiles.map((entry: unknown, index: number) => parseProfile(entry, index, absolutePath));
}
