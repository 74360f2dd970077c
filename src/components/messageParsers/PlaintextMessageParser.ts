import { IMessageParser } from './IMessageParser';
import { ContentBlock } from '../../types';

export class PlaintextMessageParser<TImage = unknown> implements IMessageParser<TImage> {
    /**
     * For plaintext, a chunk is simply appended to what came before it.
     * @returns A single text block holding the whole message so far.
     */
    parseChunk(chunk: string, rawAccumulatedContentBeforeThisChunk: string): ContentBlock<TImage>[] {
        return this.parseComplete(rawAccumulatedContentBeforeThisChunk + chunk);
    }

    /**
     * For plaintext, the whole message becomes one text block, untouched.
     */
    parseComplete(fullContent: string): ContentBlock<TImage>[] {
        return [{ type: 'text', text: fullContent }];
    }
}
