import { IMessageParser } from './IMessageParser';
import { BlockAssembler } from './BlockAssembler';
import { Logger } from '../logger';
import { AsyncImageResolver, ContentBlock, ImageResolver } from '../../types';
import { createMapImageResolver, resolveImages } from '../../utils/imageResolvers';
import { DEFAULT_CONTAIN_BLOCK_CONTENT } from '../../config/parserConstants';

export interface BlockMessageParserOptions<TImage> {
    /** Looks up `<image-uuid>` references. Without one, every reference line stays text. */
    imageResolver?: ImageResolver<TImage>;
    logger?: Logger;
    /** Treat every line inside an open code, math or thinking block as that block's content. */
    containBlockContent?: boolean;
}

/**
 * Parses chat messages into text, code, table, formula, thinking and image blocks.
 * Holds no per-message state: each call builds a fresh assembler.
 */
export class BlockMessageParser<TImage = unknown> implements IMessageParser<TImage> {
    private readonly logger: Logger;
    private readonly imageResolver?: ImageResolver<TImage>;
    private readonly containBlockContent: boolean;

    constructor(options: BlockMessageParserOptions<TImage> = {}) {
        this.logger = options.logger ?? new Logger();
        this.imageResolver = options.imageResolver;
        this.containBlockContent = options.containBlockContent ?? DEFAULT_CONTAIN_BLOCK_CONTENT;
    }

    parseChunk(chunk: string, rawAccumulatedContentBeforeThisChunk: string): ContentBlock<TImage>[] {
        return this.parseComplete(rawAccumulatedContentBeforeThisChunk + chunk);
    }

    parseComplete(fullContent: string): ContentBlock<TImage>[] {
        return this.assemble(fullContent, this.imageResolver);
    }

    /**
     * Same as `parseComplete`, for image stores that can only be queried asynchronously.
     * Every image the assembler will ask for is looked up first; the configured synchronous
     * resolver is not used.
     */
    async parseCompleteAsync(fullContent: string, resolver: AsyncImageResolver<TImage>): Promise<ContentBlock<TImage>[]> {
        const images = await resolveImages(this.collectImageIdentifiers(fullContent), resolver, this.logger);
        return this.assemble(fullContent, createMapImageResolver(images));
    }

    // A miss never changes which block is open, so a run that finds no images asks for the same identifiers.
    private collectImageIdentifiers(fullContent: string): Set<string> {
        const identifiers = new Set<string>();
        const recordIdentifier: ImageResolver<TImage> = id => {
            identifiers.add(id);
            return undefined;
        };
        this.runAssembler(fullContent, recordIdentifier, new Logger('error'));
        return identifiers;
    }

    private assemble(fullContent: string, imageResolver: ImageResolver<TImage> | undefined): ContentBlock<TImage>[] {
        const blocks = this.runAssembler(fullContent, imageResolver, this.logger);
        this.logger.debug(`BlockMessageParser: Parsed ${fullContent.length} characters into ${blocks.length} block(s).`);
        return blocks;
    }

    private runAssembler(fullContent: string, imageResolver: ImageResolver<TImage> | undefined, logger: Logger): ContentBlock<TImage>[] {
        const assembler = new BlockAssembler<TImage>(logger, imageResolver, this.containBlockContent);
        for (const line of fullContent.split('\n')) {
            assembler.processLine(line);
        }
        return assembler.finish();
    }
}
