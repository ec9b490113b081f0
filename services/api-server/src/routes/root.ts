import { Router } from 'express';

export interface RootRouteDeps {
    readonly appName: string;
    readonly appVersion: string;
    readonly apiPrefix: string;
}

export function createRootRouter(deps: RootRouteDeps): Router {
    const router = Router();

    router.get('/', (_req, res) => {
        res.json({
            message: `Welcome to ${deps.appName}!`,
            version: deps.appVersion,
            api_prefix: deps.apiPrefix,
        });
    });

    router.get(deps.apiPrefix, (_req, res) => {
        res.json({
            message: `${deps.appName} API`,
            endpoints: {
                authentication: `${deps.apiPrefix}/auth`,
                users: `${deps.apiPrefix}/users`,
                products: `${deps.apiPrefix}/products`,
                file_upload: `${deps.apiPrefix}/upload`,
                miscellaneous: `${deps.apiPrefix}/misc`,
            },
        });
    });

    return router;
}
