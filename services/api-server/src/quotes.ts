import { z } from 'zod';
import { logger } from '../../../libs/logging/logger.js';

export interface Quote {
    quote: string;
    author: string;
    tags: string[];
}

/**
 * Source of the random-quote endpoint. Any rejection is answered with a fallback quote.
 */
export interface QuoteSource {
    random(): Promise<Quote>;
}

const QuotableResponseSchema = z.object({
    content: z.string(),
    author: z.string(),
    tags: z.array(z.string()),
});

export const UNAVAILABLE_FALLBACK: Quote = Object.freeze({
    quote: 'The only way to do great work is to love what you do.',
    author: 'Steve Jobs',
    tags: ['motivational'],
});

export const ERROR_FALLBACK: Quote = Object.freeze({
    quote: 'Success is not final, failure is not fatal: it is the courage to continue that counts.',
    author: 'Winston Churchill',
    tags: ['inspirational'],
});

export class UpstreamUnavailableError extends Error {
    constructor(readonly status: number) {
        super(`Quote service responded with ${status}`);
        this.name = 'UpstreamUnavailableError';
    }
}

export class QuotableSource implements QuoteSource {
    constructor(
        private readonly url = 'https://api.quotable.io/random',
        private readonly timeoutMs = 5000
    ) { }

    public async random(): Promise<Quote> {
        const response = await fetch(this.url, { signal: AbortSignal.timeout(this.timeoutMs) });
        if (!response.ok) {
            throw new UpstreamUnavailableError(response.status);
        }

        const body = QuotableResponseSchema.parse(await response.json());
        return { quote: body.content, author: body.author, tags: body.tags };
    }
}

/**
 * A non-2xx upstream gets one fallback, every other failure the other.
 */
export async function fetchQuote(source: QuoteSource): Promise<Quote> {
    try {
        return await source.random();
    } catch (error) {
        logger.warn({ err: error }, 'Quote source failed, serving fallback');
        return error instanceof UpstreamUnavailableError ? UNAVAILABLE_FALLBACK : ERROR_FALLBACK;
    }
}
