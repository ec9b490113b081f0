import { Router } from 'express';
import { setTimeout as sleep } from 'node:timers/promises';
import { HttpError } from '../../../../libs/errors/httpErrors.js';
import { asyncHandler } from '../../../../libs/middleware/asyncHandler.js';
import type { Clock } from '../../../../libs/time/clock.js';
import { validate } from '../../../../libs/validation/zod-middleware.js';
import {
    EchoBodySchema,
    EchoQuerySchema,
    ErrorQuerySchema,
    SlowQuerySchema,
    WeatherQuerySchema
} from '../../../../libs/validation/schema.js';
import { fetchQuote, type QuoteSource } from '../quotes.js';

export interface MiscRouteDeps {
    readonly clock: Clock;
    readonly appVersion: string;
    readonly quoteSource: QuoteSource;
    /** Replaced in tests so /slow returns at once */
    readonly sleep?: (ms: number) => Promise<void>;
    readonly random?: () => number;
}

const WEATHER_CONDITIONS = ['sunny', 'cloudy', 'rainy', 'partly cloudy', 'clear'] as const;

const ERROR_MESSAGES: Readonly<Record<number, string>> = {
    400: 'Bad Request',
    401: 'Unauthorized',
    403: 'Forbidden',
    404: 'Not Found',
    500: 'Internal Server Error',
    502: 'Bad Gateway',
    503: 'Service Unavailable',
};

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * `YYYY-MM-DD HH:MM:SS UTC`
 */
export function formatUtc(date: Date): string {
    const day = `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
    const time = `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
    return `${day} ${time} UTC`;
}

const roundTo = (value: number, digits: number): number => {
    const factor = 10 ** digits;
    return Math.round(value * factor) / factor;
};

export function createMiscRouter(deps: MiscRouteDeps): Router {
    const router = Router();
    const wait = deps.sleep ?? (async (ms: number): Promise<void> => { await sleep(ms); });
    const random = deps.random ?? Math.random;

    router.get('/health', (_req, res) => {
        res.json({ status: 'healthy', timestamp: deps.clock().toISOString(), version: deps.appVersion });
    });

    router.get('/ping', (_req, res) => {
        res.json({ message: 'pong' });
    });

    router.get('/time', (_req, res) => {
        const now = deps.clock();
        res.json({
            utc: now.toISOString(),
            unix_timestamp: Math.floor(now.getTime() / 1000),
            formatted: formatUtc(now),
            timezone: 'UTC',
        });
    });

    router.get('/echo', (req, res) => {
        const { message } = validate(EchoQuerySchema, req.query, 'Misc:Echo');
        res.json({
            original_message: message,
            echoed_at: deps.clock().toISOString(),
            length: [...message].length,
        });
    });

    router.post('/echo', (req, res) => {
        const data = validate(EchoBodySchema, req.body, 'Misc:EchoPost');
        res.json({ message: `Received data: ${JSON.stringify(data)}`, success: true });
    });

    router.get('/random-quote', asyncHandler(async (_req, res) => {
        res.json(await fetchQuote(deps.quoteSource));
    }));

    router.get('/weather', (req, res) => {
        const { city } = validate(WeatherQuerySchema, req.query, 'Misc:Weather');
        res.json({
            city,
            temperature: roundTo(-10 + random() * 45, 1),
            condition: WEATHER_CONDITIONS[Math.floor(random() * WEATHER_CONDITIONS.length)],
            humidity: 30 + Math.floor(random() * 61),
            wind_speed: roundTo(random() * 25, 1),
            timestamp: deps.clock().toISOString(),
            note: 'This is mock data for demo purposes',
        });
    });

    router.get('/slow', asyncHandler(async (req, res) => {
        const { delay } = validate(SlowQuerySchema, req.query, 'Misc:Slow');
        await wait(delay * 1000);
        res.json({ message: `Waited for ${delay} seconds`, completed_at: deps.clock().toISOString() });
    }));

    router.get('/error', (req, res) => {
        const { status_code: statusCode } = validate(ErrorQuerySchema, req.query, 'Misc:Error');
        throw new HttpError(statusCode, ERROR_MESSAGES[statusCode] ?? 'HTTP Error');
    });

    return router;
}
