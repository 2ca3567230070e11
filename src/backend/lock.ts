/**
 * @module backend/lock
 * @description Single-slot async lock around "apply excitation + fetch pattern"
 */

/**
 * Runs tasks one at a time in call order. A failed task releases the slot
 * and does not affect the tasks queued behind it.
 */
export class SingleSlotLock {
    private tail: Promise<void> = Promise.resolve();
    private queued = 0;

    run<T>(task: () => Promise<T>): Promise<T> {
        this.queued++;
        const start = (): Promise<T> => {
            this.queued--;
            return task();
        };
        const result = this.tail.then(start, start);
        this.tail = result.then(() => undefined, () => undefined);
        return result;
    }

    /** Tasks waiting for the slot */
    get waiting(): number {
        return this.queued;
    }
}
