import { loadBaseConfig, loadInstanceConfig } from '../../../src/lib/startup/config-loader';

import fs from 'fs';
import path from 'path';
import { DEFAULT_CONTAIN_BLOCK_CONTENT, DEFAULT_MESSAGE_FORMAT } from '../../../src/config/parserConstants';

jest.mock('fs');
const mockedFs = fs as jest.Mocked<typeof fs>;

describe('loadBaseConfig', () => {
    let originalEnv: NodeJS.ProcessEnv;
    let mockLog: jest.SpyInstance;

    beforeEach(() => {
        originalEnv = { ...process.env };
        delete process.env.MESSAGE_PARSER_LOG_LEVEL;
        mockLog = jest.spyOn(console, 'log').mockImplementation(() => {});
    });

    afterEach(() => {
        process.env = originalEnv;
        mockLog.mockRestore();
    });

    test('should fall back to the warn level and the parser defaults', () => {
        expect(loadBaseConfig()).toEqual({
            logLevel: 'warn',
            parserDefaults: {
                format: DEFAULT_MESSAGE_FORMAT,
                containBlockContent: DEFAULT_CONTAIN_BLOCK_CONTENT,
            },
        });
    });

    test('should read the log level from the environment, ignoring case and whitespace', () => {
        process.env.MESSAGE_PARSER_LOG_LEVEL = ' DEBUG ';
        expect(loadBaseConfig().logLevel).toBe('debug');
        expect(mockLog).toHaveBeenCalledWith('ConfigLoader: Using MESSAGE_PARSER_LOG_LEVEL from environment: debug');
    });

    test('should treat a blank log level as unset', () => {
        process.env.MESSAGE_PARSER_LOG_LEVEL = '   ';
        expect(loadBaseConfig().logLevel).toBe('warn');
    });

    test('should throw on an unknown log level', () => {
        process.env.MESSAGE_PARSER_LOG_LEVEL = 'verbose';
        expect(() => loadBaseConfig()).toThrow(
            "ConfigLoader: Invalid log level 'verbose' in environment variable MESSAGE_PARSER_LOG_LEVEL."
        );
    });
});

describe('loadInstanceConfig', () => {
    const configPath = 'config/parsers.yaml';
    const absolutePath = path.resolve(configPath);
    let mockLog: jest.SpyInstance;

    beforeEach(() => {
        mockedFs.existsSync.mockReset();
        mockedFs.readFileSync.mockReset();
        mockLog = jest.spyOn(console, 'log').mockImplementation(() => {});
    });

    afterEach(() => {
        mockLog.mockRestore();
    });

    function givenYaml(contents: string) {
        mockedFs.existsSync.mockReturnValue(true);
        mockedFs.readFileSync.mockReturnValue(contents);
    }

    test('should throw when the file does not exist', () => {
        mockedFs.existsSync.mockReturnValue(false);
        expect(() => loadInstanceConfig(configPath)).toThrow(
            `Instance configuration file (YAML) not found at ${absolutePath}.`
        );
        expect(mockedFs.readFileSync).not.toHaveBeenCalled();
    });

    test('should load profiles and keep only the parser settings they give', () => {
        givenYaml([
            'profiles:',
            '  - profileId: chat',
            '    parser:',
            '      format: blocks',
            '      containBlockContent: true',
            '  - profileId: raw',
            '    parser:',
            '      format: plaintext',
            '  - profileId: bare',
        ].join('\n'));

        expect(loadInstanceConfig(configPath)).toEqual([
            { profileId: 'chat', parser: { format: 'blocks', containBlockContent: true } },
            { profileId: 'raw', parser: { format: 'plaintext' } },
            { profileId: 'bare', parser: {} },
        ]);
        expect(mockedFs.readFileSync).toHaveBeenCalledWith(absolutePath, 'utf-8');
    });

    test('should throw when the profiles array is missing', () => {
        givenYaml('parsers: []');
        expect(() => loadInstanceConfig(configPath)).toThrow(
            `Instance YAML config missing required 'profiles' array. Path: ${absolutePath}`
        );
    });

    test('should throw when a profile has no profileId', () => {
        givenYaml('profiles:\n  - parser:\n      format: blocks');
        expect(() => loadInstanceConfig(configPath)).toThrow(
            `ConfigLoader: Profile at index 0 is missing required 'profileId'. Path: ${absolutePath}`
        );
    });

    test('should throw on an unknown parser format', () => {
        givenYaml('profiles:\n  - profileId: chat\n    parser:\n      format: html');
        expect(() => loadInstanceConfig(configPath)).toThrow(
            "ConfigLoader: Profile 'chat' has unknown parser format 'html'. Expected one of: blocks, plaintext."
        );
    });

    test('should throw when containBlockContent is not a boolean', () => {
        givenYaml('profiles:\n  - profileId: chat\n    parser:\n      containBlockContent: "true"');
        expect(() => loadInstanceConfig(configPath)).toThrow(
            `ConfigLoader: Profile 'chat' has a non-boolean 'containBlockContent'. Path: ${absolutePath}`
        );
    });

    test('should throw when the parser section is not a mapping', () => {
        givenYaml('profiles:\n  - profileId: chat\n    parser: blocks');
        expect(() => loadInstanceConfig(configPath)).toThrow(
            `ConfigLoader: Profile 'chat' has a 'parser' section that is not a mapping. Path: ${absolutePath}`
        );
    });
});
