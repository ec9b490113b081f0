import cors from 'cors';
import express, { type Express } from 'express';
import type { CredentialStore } from '../../../libs/accounts/index.js';
import type { Settings } from '../../../libs/bootstrap/settings.js';
import type { TokenCodec } from '../../../libs/crypto/tokenCodec.js';
import type { AccessGuard } from '../../../libs/guards/index.js';
import { createErrorHandler } from '../../../libs/middleware/errorHandler.js';
import { requestLogger } from '../../../libs/middleware/requestLogger.js';
import type { ProductCatalog } from '../../../libs/products/index.js';
import { type Clock, systemClock } from '../../../libs/time/clock.js';
import type { FileStore } from '../../../libs/uploads/index.js';
import { QuotableSource, type QuoteSource } from './quotes.js';
import { createAuthRouter } from './routes/auth.js';
import { createMiscRouter } from './routes/misc.js';
import { createProductRouter } from './routes/products.js';
import { createRootRouter } from './routes/root.js';
import { createUploadRouter } from './routes/uploads.js';
import { createUserRouter } from './routes/users.js';

export type AppSettings = Pick<
    Settings,
    | 'appName'
    | 'appVersion'
    | 'apiPrefix'
    | 'accessTokenTtlMinutes'
    | 'uploadDir'
    | 'uploadMaxBytes'
    | 'allowedOrigins'
>;

export interface AppDependencies {
    readonly settings: AppSettings;
    readonly store: CredentialStore;
    readonly codec: TokenCodec;
    readonly guard: AccessGuard;
    readonly catalog: ProductCatalog;
    readonly fileStore: FileStore;
    readonly clock?: Clock;
    readonly quoteSource?: QuoteSource;
    readonly sleep?: (ms: number) => Promise<void>;
}

/**
 * Build the HTTP surface over already constructed components.
 * Nothing here listens; index.ts owns the socket.
 */
export function createApp(deps: AppDependencies): Express {
    const { settings } = deps;
    const clock = deps.clock ?? systemClock;
    const prefix = settings.apiPrefix;

    const app = express();
    app.disable('x-powered-by');

    app.use(requestLogger());
    // Any method and request header from the listed origins, cookies included
    app.use(cors({ origin: [...settings.allowedOrigins], credentials: true }));

    app.use(express.json());
    app.use(express.urlencoded({ extended: false }));

    app.use(createRootRouter(settings));
    app.use(`${prefix}/auth`, createAuthRouter({
        store: deps.store,
        codec: deps.codec,
        guard: deps.guard,
        clock,
        accessTokenTtlMinutes: settings.accessTokenTtlMinutes,
    }));
    app.use(`${prefix}/users`, createUserRouter({ store: deps.store, guard: deps.guard }));
    app.use(`${prefix}/products`, createProductRouter({ catalog: deps.catalog, guard: deps.guard }));
    app.use(`${prefix}/upload`, createUploadRouter({
        guard: deps.guard,
        fileStore: deps.fileStore,
        clock,
        maxBytes: settings.uploadMaxBytes,
    }));
    app.use(`${prefix}/misc`, createMiscRouter({
        clock,
        appVersion: settings.appVersion,
        quoteSource: deps.quoteSource ?? new QuotableSource(),
        sleep: deps.sleep,
    }));

    app.use('/files', express.static(settings.uploadDir, { index: false }));

    app.use((_req, res) => {
        res.status(404).json({ detail: 'Not Found' });
    });

    app.use(createErrorHandler());

    return app;
}
