import http from 'http';
import { ParserProfile } from '../types';
import { Logger } from '../components/logger';
import { sendJson, sendJsonError } from './request-utils';

export async function handleGetParserConfigRequest(profileId: string, res: http.ServerResponse, parserProfiles: ReadonlyMap<string, ParserProfile>, logger: Logger): Promise<void> {
    logger.info(`RequestHandler: Received GET request for parser configuration: '${profileId}'`);
    const profile = parserProfiles.get(profileId);

    if (profile) {
        sendJson(res, 200, profile);
    } else {
        sendJsonError(res, 404, `Parser profile with profileId '${profileId}' not found.`);
    }
}

export async function handleListParserProfilesRequest(res: http.ServerResponse, parserProfiles: ReadonlyMap<string, ParserProfile>, logger: Logger): Promise<void> {
    logger.info('RequestHandler: Received GET request to list parser profiles.');
    const profilesList = Array.from(parserProfiles.values()).map(profile => ({
        profileId: profile.profileId,
        format: profile.parser.format,
    }));
    sendJson(res, 200, profilesList);
}
