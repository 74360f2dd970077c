import { IMAGE_OPEN_TAG, IMAGE_CLOSE_TAG, UUID_PATTERN } from '../config/parserConstants';
import { classifyLine } from '../components/messageParsers/lineClassifier';
import { Logger } from '../components/logger';
import { AsyncImageResolver, ImageResolver } from '../types';

const IMAGE_REFERENCE_PATTERN = new RegExp(`${IMAGE_OPEN_TAG}(.*?)${IMAGE_CLOSE_TAG}`);

export function isCanonicalUuid(value: string): boolean {
    return UUID_PATTERN.test(value);
}

/**
 * Returns the identifier wrapped in the first `<image-uuid>...</image-uuid>` pair of the line,
 * or null when the tags are missing or the identifier is not a canonical UUID.
 */
export function extractImageIdentifier(line: string): string | null {
    const match = IMAGE_REFERENCE_PATTERN.exec(line);
    if (!match) {
        return null;
    }
    const identifier = match[1];
    return isCanonicalUuid(identifier) ? identifier : null;
}

export function createMapImageResolver<TImage>(images: Map<string, TImage> | Record<string, TImage>): ImageResolver<TImage> {
    const lookup = images instanceof Map ? images : new Map(Object.entries(images));
    return (id: string) => lookup.get(id);
}

/**
 * Looks up each identifier with an async resolver, one at a time.
 * Failed lookups are logged and left out of the returned map.
 */
export async function resolveImages<TImage>(
    identifiers: Iterable<string>,
    resolver: AsyncImageResolver<TImage>,
    logger: Logger
): Promise<Map<string, TImage>> {
    const images = new Map<string, TImage>();
    for (const identifier of new Set(identifiers)) {
        try {
            const image = await resolver(identifier);
            if (image !== null && image !== undefined) {
                images.set(identifier, image);
            } else {
                logger.debug(`resolveImages: No image found for '${identifier}'.`);
            }
        } catch (error: unknown) {
            logger.warn(`resolveImages: Image resolver failed for '${identifier}':`, error);
        }
    }
    return images;
}

/**
 * Resolves every image referenced on an image-reference line of the message.
 * Lines are classified one by one without any block context, so with `containBlockContent`
 * the set can include references that sit inside a code, math or thinking block.
 * `BlockMessageParser.parseCompleteAsync` collects its identifiers from the assembler instead.
 */
export async function preloadImages<TImage>(
    fullContent: string,
    resolver: AsyncImageResolver<TImage>,
    logger: Logger
): Promise<Map<string, TImage>> {
    const identifiers: string[] = [];
    for (const line of fullContent.split('\n')) {
        if (classifyLine(line) !== 'image-reference') {
            continue;
        }
        const identifier = extractImageIdentifier(line);
        if (identifier !== null) {
            identifiers.push(identifier);
        }
    }
    return resolveImages(identifiers, resolver, logger);
}
