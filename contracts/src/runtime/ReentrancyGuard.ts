// Sale runtime: exclusive execution scope
// One operation runs at a time per instance. Callers from outside queue behind
// the running operation; a call made from inside it (an untrusted token
// calling back during a transfer) is rejected instead of deadlocking.

import { AsyncLocalStorage } from 'node:async_hooks';

import { StateError } from './Revert';

export abstract class ReentrancyGuard {
    private readonly scope: AsyncLocalStorage<ReentrancyGuard> = new AsyncLocalStorage<ReentrancyGuard>();
    private tail: Promise<void> = Promise.resolve();

    protected get entered(): boolean {
        return this.scope.getStore() === this;
    }

    /**
     * Runs `fn` outside the exclusive scope. Calls it makes into this
     * instance queue behind the running operation instead of failing with
     * ReentrantCall.
     */
    protected detached<T>(fn: () => T): T {
        return this.scope.exit(fn);
    }

    protected async nonReentrant<T>(operation: () => Promise<T>): Promise<T> {
        if (this.entered) {
            throw new StateError('ReentrantCall', 'ReentrancyGuard: reentrant call');
        }

        let release: () => void = () => undefined;
        const held: Promise<void> = new Promise<void>((resolve) => {
            release = resolve;
        });
        const previous: Promise<void> = this.tail;
        this.tail = previous.then(() => held);

        await previous;
        try {
            return await this.scope.run(this, operation);
        } finally {
            release();
        }
    }
}
