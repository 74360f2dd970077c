import {
    extractImageIdentifier,
    isCanonicalUuid,
    createMapImageResolver,
    preloadImages,
    resolveImages,
} from '../../src/utils/imageResolvers';
import { Logger } from '../../src/components/logger';

const IMAGE_ID = '123e4567-e89b-12d3-a456-426614174000';
const OTHER_IMAGE_ID = '9b2f4c1e-0d3a-4e5f-8a7b-6c5d4e3f2a1b';

describe('imageResolvers', () => {
    describe('extractImageIdentifier', () => {
        test('should return the identifier between the tags', () => {
            expect(extractImageIdentifier(`<image-uuid>${IMAGE_ID}</image-uuid>`)).toBe(IMAGE_ID);
            expect(extractImageIdentifier(`  <image-uuid>${IMAGE_ID}</image-uuid> trailing`)).toBe(IMAGE_ID);
        });

        test('should accept upper-case identifiers', () => {
            const upper = IMAGE_ID.toUpperCase();
            expect(extractImageIdentifier(`<image-uuid>${upper}</image-uuid>`)).toBe(upper);
        });

        test('should return null for malformed identifiers or missing tags', () => {
            expect(extractImageIdentifier('<image-uuid>cat-picture</image-uuid>')).toBeNull();
            expect(extractImageIdentifier(`<image-uuid>${IMAGE_ID}`)).toBeNull();
            expect(extractImageIdentifier('no tags here')).toBeNull();
        });

        test('isCanonicalUuid should reject identifiers with the wrong grouping', () => {
            expect(isCanonicalUuid(IMAGE_ID)).toBe(true);
            expect(isCanonicalUuid('123e4567e89b12d3a456426614174000')).toBe(false);
        });
    });

    describe('createMapImageResolver', () => {
        test('should look up identifiers in a record', () => {
            const resolve = createMapImageResolver({ [IMAGE_ID]: 'a.png' });
            expect(resolve(IMAGE_ID)).toBe('a.png');
            expect(resolve(OTHER_IMAGE_ID)).toBeUndefined();
        });

        test('should look up identifiers in a Map', () => {
            const resolve = createMapImageResolver(new Map([[IMAGE_ID, { url: 'b.png' }]]));
            expect(resolve(IMAGE_ID)).toEqual({ url: 'b.png' });
        });
    });

    describe('preloadImages', () => {
        let logger: Logger;
        let mockWarn: jest.SpyInstance;

        beforeEach(() => {
            logger = new Logger('warn', 'TestPrefix');
            mockWarn = jest.spyOn(console, 'warn').mockImplementation(() => {});
        });

        afterEach(() => {
            mockWarn.mockRestore();
        });

        test('should only resolve identifiers on image reference lines', async () => {
            const resolver = jest.fn(async (id: string) => `${id}.png`);
            const content = [
                `<image-uuid>${IMAGE_ID}</image-uuid>`,
                `inline <image-uuid>${OTHER_IMAGE_ID}</image-uuid> is ignored`,
            ].join('\n');

            const images = await preloadImages(content, resolver, logger);

            expect(resolver).toHaveBeenCalledTimes(1);
            expect(resolver).toHaveBeenCalledWith(IMAGE_ID);
            expect(images).toEqual(new Map([[IMAGE_ID, `${IMAGE_ID}.png`]]));
        });

        test('should scan lines without looking at block context', async () => {
            const resolver = jest.fn(async (id: string) => `${id}.png`);
            const content = ['```', `<image-uuid>${IMAGE_ID}</image-uuid>`, '```'].join('\n');

            await preloadImages(content, resolver, logger);

            expect(resolver).toHaveBeenCalledWith(IMAGE_ID);
        });

        test('should leave out misses and log resolver failures', async () => {
            const failure = new Error('lookup failed');
            const resolver = jest.fn(async (id: string) => {
                if (id === IMAGE_ID) {
                    throw failure;
                }
                return undefined;
            });
            const content = `<image-uuid>${IMAGE_ID}</image-uuid>\n<image-uuid>${OTHER_IMAGE_ID}</image-uuid>`;

            const images = await preloadImages(content, resolver, logger);

            expect(images.size).toBe(0);
            expect(mockWarn).toHaveBeenCalledWith(
                '[TestPrefix] [WARN]',
                `resolveImages: Image resolver failed for '${IMAGE_ID}':`,
                failure
            );
        });
    });

    describe('resolveImages', () => {
        test('should ask once per identifier and keep the order they were given in', async () => {
            const resolver = jest.fn(async (id: string) => `${id}.png`);

            const images = await resolveImages([OTHER_IMAGE_ID, IMAGE_ID, OTHER_IMAGE_ID], resolver, new Logger('error'));

            expect(resolver).toHaveBeenCalledTimes(2);
            expect(Array.from(images.keys())).toEqual([OTHER_IMAGE_ID, IMAGE_ID]);
        });
    });
});
