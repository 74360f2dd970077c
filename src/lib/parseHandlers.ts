import http from 'http';
import { ImageLink, ParseRequestBody, ParserProfile } from '../types';
import { Logger } from '../components/logger';
import { createMessageParser } from '../components/messageParsers/createMessageParser';
import { createMapImageResolver } from '../utils/imageResolvers';
import { sendJson, sendJsonError, parseJsonBody } from './request-utils';

function isStringRecord(value: unknown): value is Record<string, string> {
    return typeof value === 'object'
        && value !== null
        && !Array.isArray(value)
        && Object.values(value).every(entry => typeof entry === 'string');
}

/**
 * Validates the request body. Returns an error message for the client, or the typed body.
 */
export function validateParseRequestBody(body: unknown): ParseRequestBody | string {
    if (typeof body !== 'object' || body === null || Array.isArray(body)) {
        return "Request body must be a JSON object.";
    }
    const message: unknown = 'message' in body ? body.message : undefined;
    const images: unknown = 'images' in body ? body.images : undefined;

    if (typeof message !== 'string') {
        return "Message is required and must be a string.";
    }
    if (images === undefined) {
        return { message };
    }
    if (!isStringRecord(images)) {
        return "Images must be an object mapping image identifiers to URLs.";
    }
    return { message, images };
}

export async function handleParseMessageRequest(
    req: http.IncomingMessage,
    res: http.ServerResponse,
    profile: ParserProfile,
    logger: Logger,
    preParsedBody?: unknown,
    isBodyPreParsed: boolean = false
): Promise<void> {
    let actualBody: unknown;
    try {
        if (isBodyPreParsed && preParsedBody !== undefined) {
            logger.debug("ParseHandler: Using pre-parsed body provided by adapter.");
            actualBody = preParsedBody;
        } else {
            actualBody = await parseJsonBody(req);
        }
    } catch (error: unknown) {
        const detail = error instanceof Error ? error.message : String(error);
        logger.warn(`ParseHandler: Invalid JSON body for profile '${profile.profileId}'. Error: ${detail}`);
        sendJsonError(res, 400, "Invalid JSON body provided.", detail);
        return;
    }

    const validated = validateParseRequestBody(actualBody);
    if (typeof validated === 'string') {
        sendJsonError(res, 400, validated);
        return;
    }

    const links = new Map<string, ImageLink>(
        Object.entries(validated.images ?? {}).map(([id, url]): [string, ImageLink] => [id, { url }])
    );
    const parser = createMessageParser<ImageLink>(profile.parser, logger, createMapImageResolver(links));

    logger.info(`ParseHandler: Parsing ${validated.message.length} characters with profile '${profile.profileId}' (${profile.parser.format}).`);
    const blocks = parser.parseComplete(validated.message);
    sendJson(res, 200, { blocks });
}
