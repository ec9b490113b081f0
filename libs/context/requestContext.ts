import { AsyncLocalStorage } from 'node:async_hooks';
import type { Principal } from "../accounts/account.js";

/**
 * Request Context Container
 * AsyncLocalStorage-backed for concurrent request isolation.
 *
 * Only the authentication middleware calls run(); handlers call get().
 */

const storage = new AsyncLocalStorage<Principal>();

export class RequestContext {
    /**
     * Establish the principal scope for one request.
     * Supports both sync and async functions.
     */
    public static run<T>(
        principal: Principal,
        fn: () => Promise<T> | T
    ): Promise<T> | T {
        return storage.run(Object.freeze(principal), fn);
    }

    /**
     * Get the current principal.
     * FAIL-CLOSED: Throws if called outside run() scope.
     */
    public static get(): Principal {
        const principal = storage.getStore();
        if (!principal) {
            throw new Error("MISSING_REQUEST_CONTEXT: No principal scope established - access denied");
        }
        return principal;
    }
}
