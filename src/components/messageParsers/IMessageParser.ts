import { ContentBlock } from '../../types';

export interface IMessageParser<TImage = unknown> {
    /**
     * Parses a message that is still streaming in.
     * @param chunk The current chunk of text from the stream.
     * @param rawAccumulatedContentBeforeThisChunk The raw content received so far, *before* this chunk.
     * @returns The blocks for everything received up to and including this chunk. Blocks that are
     *          still open (an unclosed code fence, for instance) are returned with what they hold so far.
     */
    parseChunk(chunk: string, rawAccumulatedContentBeforeThisChunk: string): ContentBlock<TImage>[];

    /**
     * Parses a complete message into blocks in input order.
     * @param fullContent The complete raw string content.
     */
    parseComplete(fullContent: string): ContentBlock<TImage>[];
}
