import { describe, it } from 'node:test';
import assert from 'node:assert';
import type { Principal } from '../../libs/accounts/account.js';
import { RequestContext } from '../../libs/context/requestContext.js';

const principalA: Principal = {
    id: 1,
    username: 'alice',
    email: 'alice@example.com',
    fullName: null,
    role: 'admin',
    isActive: true,
    createdAt: new Date('2024-01-01T00:00:00Z'),
    updatedAt: null
};

const principalB: Principal = {
    ...principalA,
    id: 2,
    username: 'bob',
    email: 'bob@example.com',
    role: 'user'
};

describe('RequestContext', () => {
    it('should throw when accessing context outside run()', () => {
        assert.throws(() => RequestContext.get(), /MISSING_REQUEST_CONTEXT/);
    });

    it('should return context inside run()', () => {
        const result = RequestContext.run(principalA, () => {
            assert.deepStrictEqual(RequestContext.get(), principalA);
            return 'success';
        });
        assert.strictEqual(result, 'success');
    });

    it('should maintain isolation between concurrent async requests', async () => {
        const flowA = RequestContext.run(principalA, async () => {
            assert.strictEqual(RequestContext.get().username, 'alice');
            await new Promise(resolve => setTimeout(resolve, 50));
            assert.strictEqual(RequestContext.get().username, 'alice');
            return 'A';
        });

        const flowB = RequestContext.run(principalB, async () => {
            assert.strictEqual(RequestContext.get().username, 'bob');
            await new Promise(resolve => setTimeout(resolve, 20));
            assert.strictEqual(RequestContext.get().username, 'bob');
            return 'B';
        });

        const [resA, resB] = await Promise.all([flowA, flowB]);
        assert.strictEqual(resA, 'A');
        assert.strictEqual(resB, 'B');
    });

    it('should freeze the principal for the scope', () => {
        RequestContext.run({ ...principalA }, () => {
            assert.ok(Object.isFrozen(RequestContext.get()));
        });
    });
});
