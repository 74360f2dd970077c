import http from 'http';
import { loadBaseConfig, loadInstanceConfig, RawParserProfile } from './lib/startup/config-loader';
import { handleRequest as handleRequestFromModule } from './lib/request-handler';
import { sendJsonError } from './lib/request-utils';
import { Logger } from './components/logger';
import { MessageParserServiceConfig, ParserProfile, ParserSettings } from './types';

/** Framework adapters such as Express attach these to the incoming request. */
export type AdapterRequest = http.IncomingMessage & {
    originalUrl?: string;
    body?: unknown;
};

export class MessageParserService {
    private parserProfiles: Map<string, ParserProfile> = new Map();
    private apiBasePath: string;
    private logger: Logger;

    constructor(config: MessageParserServiceConfig, logger?: Logger) {
        if (!config.apiBasePath || typeof config.apiBasePath !== 'string' || config.apiBasePath.trim() === '') {
            throw new TypeError('MessageParserService: apiBasePath is required in config and must be a non-empty string.');
        }

        const { logLevel, parserDefaults } = loadBaseConfig();
        this.logger = logger ?? new Logger(logLevel);
        this.apiBasePath = config.apiBasePath;
        this.logger.info(`MessageParserService: API Base Path configured to: ${this.apiBasePath}`);

        const rawProfiles = loadInstanceConfig(config.instanceConfigPath);
        rawProfiles.forEach(rawProfile => {
            if (this.parserProfiles.has(rawProfile.profileId)) {
                throw new Error(`MessageParserService: Duplicate profileId '${rawProfile.profileId}' in ${config.instanceConfigPath}.`);
            }
            const profile = this.completeProfile(rawProfile, parserDefaults);
            this.parserProfiles.set(profile.profileId, profile);
            this.logger.info(`MessageParserService: Loaded profile '${profile.profileId}' (format: ${profile.parser.format}).`);
        });

        if (this.parserProfiles.size === 0) {
            this.logger.warn("MessageParserService: No parser profiles were loaded. Every parse request will be rejected.");
        }
    }

    private completeProfile(rawProfile: RawParserProfile, defaults: ParserSettings): ParserProfile {
        return {
            profileId: rawProfile.profileId,
            parser: {
                format: rawProfile.parser.format ?? defaults.format,
                containBlockContent: rawProfile.parser.containBlockContent ?? defaults.containBlockContent,
            },
        };
    }

    public getParserProfile(profileId: string): ParserProfile | undefined {
        return this.parserProfiles.get(profileId);
    }

    /** A copy of the loaded profiles; changing it does not affect the service. */
    public getAllParserProfiles(): Map<string, ParserProfile> {
        return new Map(this.parserProfiles);
    }

    public async handleRequest(req: AdapterRequest, res: http.ServerResponse): Promise<void> {
        const entryReqUrl = req.url || '';
        const effectiveFullPath = req.originalUrl || entryReqUrl;

        if (!effectiveFullPath.startsWith(this.apiBasePath)) {
            sendJsonError(res, 404, "Endpoint not found. Path mismatch with API base path.");
            return;
        }

        let internalRoutePath = effectiveFullPath.substring(this.apiBasePath.length);
        if (!internalRoutePath.startsWith('/')) {
            internalRoutePath = '/' + internalRoutePath;
        }
        req.url = internalRoutePath;

        const preParsedBody = req.body;
        const isBodyPreParsed = preParsedBody !== undefined;

        try {
            await handleRequestFromModule(req, res, this.parserProfiles, this.logger, preParsedBody, isBodyPreParsed);
        } catch (error: unknown) {
            this.logger.error(`MessageParserService: Unhandled error for ${req.method} ${effectiveFullPath}:`, error);
            if (!res.headersSent) {
                sendJsonError(res, 500, "Failed to process request.", error instanceof Error ? error.message : String(error));
            }
        } finally {
            req.url = entryReqUrl;
        }
    }
}
