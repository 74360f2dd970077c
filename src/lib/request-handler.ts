import http from 'http';
import { URL } from 'url';
import { ParserProfile } from '../types';
import { Logger } from '../components/logger';
import {
    PROFILE_CONFIG_ENDPOINT_PREFIX,
    PROFILE_PARSE_ENDPOINT_PREFIX,
    PROFILES_SUFFIX,
} from '../config/apiPaths';
import { sendJsonError } from './request-utils';
import { handleGetParserConfigRequest, handleListParserProfilesRequest } from './configHandlers';
import { handleParseMessageRequest } from './parseHandlers';

// Called by MessageParserService once the API base path has been stripped from req.url
export async function handleRequest(
    req: http.IncomingMessage,
    res: http.ServerResponse,
    parserProfiles: ReadonlyMap<string, ParserProfile>,
    logger: Logger,
    preParsedBody?: unknown,
    isBodyPreParsed: boolean = false
): Promise<void> {
    const { method, url: rawUrl } = req;
    if (!rawUrl) {
        sendJsonError(res, 400, "URL is required.");
        return;
    }

    const base = `http://${req.headers.host || 'localhost'}`;
    const pathname = new URL(rawUrl, base).pathname;

    const configRequestPathPrefix = PROFILE_CONFIG_ENDPOINT_PREFIX + '/';
    const parseRequestPathPrefix = PROFILE_PARSE_ENDPOINT_PREFIX + '/';

    if (method === 'GET' && pathname.startsWith(configRequestPathPrefix)) {
        const profileId = pathname.substring(configRequestPathPrefix.length);
        await handleGetParserConfigRequest(profileId, res, parserProfiles, logger);
    } else if (pathname.startsWith(parseRequestPathPrefix)) {
        const parts = pathname.substring(parseRequestPathPrefix.length).split('/').filter(p => p.length > 0);
        const profileId = parts[0];

        if (!profileId) {
            sendJsonError(res, 400, "profileId missing in parse URL.");
            return;
        }

        const profile = parserProfiles.get(profileId);
        if (!profile) {
            sendJsonError(res, 404, `Parser profile with profileId '${profileId}' not found.`);
            return;
        }

        if (method === 'POST' && parts.length === 1) {
            await handleParseMessageRequest(req, res, profile, logger, preParsedBody, isBodyPreParsed);
        } else {
            sendJsonError(res, 404, "Parse endpoint not found or method not supported for the path.");
        }
    } else if (method === 'GET' && pathname === PROFILES_SUFFIX) {
        await handleListParserProfilesRequest(res, parserProfiles, logger);
    } else {
        sendJsonError(res, 404, "Endpoint not found or method not supported.");
    }
}
