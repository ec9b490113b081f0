import { CredentialStore } from '../../../libs/accounts/index.js';
import { ConfigGuard } from '../../../libs/bootstrap/config-guard.js';
import { AUTH_CONFIG_REQUIREMENTS } from '../../../libs/bootstrap/config/auth-config.js';
import { seedDemoData } from '../../../libs/bootstrap/seed.js';
import { loadSettings } from '../../../libs/bootstrap/settings.js';
import { ScryptPasswordHasher } from '../../../libs/crypto/passwordHasher.js';
import { TokenCodec } from '../../../libs/crypto/tokenCodec.js';
import { AccessGuard } from '../../../libs/guards/index.js';
import { logger } from '../../../libs/logging/logger.js';
import { ProductCatalog } from '../../../libs/products/index.js';
import { DiskFileStore } from '../../../libs/uploads/index.js';
import { createApp } from './app.js';

async function main(): Promise<void> {
    // Fail-closed: no signing secret, no server
    ConfigGuard.enforce(AUTH_CONFIG_REQUIREMENTS);
    const settings = loadSettings();

    const store = new CredentialStore(new ScryptPasswordHasher(settings.passwordHashCost));
    const codec = new TokenCodec({ secret: settings.jwtSecret, algorithm: settings.jwtAlgorithm });
    const guard = new AccessGuard({ codec, store });
    const catalog = new ProductCatalog();
    const fileStore = new DiskFileStore(settings.uploadDir);

    if (settings.seedDemoData) {
        await seedDemoData(store, catalog);
    }

    const app = createApp({ settings, store, codec, guard, catalog, fileStore });

    const server = app.listen(settings.port, () => {
        logger.info({ port: settings.port, apiPrefix: settings.apiPrefix, version: settings.appVersion }, 'Server listening');
    });

    const shutdown = (signal: NodeJS.Signals): void => {
        logger.info({ signal }, 'Shutting down');
        server.close(err => {
            if (err) {
                logger.error({ err }, 'Error while closing server');
                process.exit(1);
            }
            process.exit(0);
        });
    };

    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
}

main().catch(err => {
    logger.fatal(err);
    process.exit(1);
});
