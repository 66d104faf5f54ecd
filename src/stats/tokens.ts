import { getEncoding } from 'js-tiktoken';

/** Only the number of tokens is ever used. */
export interface TokenEncoder {
    encode(text: string): ArrayLike<number>;
}

export function createTiktokenEncoder(): TokenEncoder {
    const encoding = getEncoding('cl100k_base');
    return {
        // Special-token text such as <|endoftext|> is counted as ordinary text
        encode: (text: string) => encoding.encode(text, [], []),
    };
}

export function countTokens(encoder: TokenEncoder, text: string): number {
    return encoder.encode(text).length;
}
