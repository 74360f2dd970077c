import { IMessageParser } from './IMessageParser';
import { BlockMessageParser } from './BlockMessageParser';
import { PlaintextMessageParser } from './PlaintextMessageParser';
import { Logger } from '../logger';
import { ImageResolver, ParserSettings } from '../../types';

export function createMessageParser<TImage = unknown>(
    settings: ParserSettings,
    logger: Logger,
    imageResolver?: ImageResolver<TImage>
): IMessageParser<TImage> {
    switch (settings.format) {
        case 'plaintext':
            return new PlaintextMessageParser<TImage>();
        case 'blocks':
            return new BlockMessageParser<TImage>({
                logger,
                imageResolver,
                containBlockContent: settings.containBlockContent,
            });
    }
}
