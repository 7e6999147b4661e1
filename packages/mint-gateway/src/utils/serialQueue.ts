/**
 * Runs tasks one at a time in submission order.
 *
 * A task starts only after the previous one has settled, so tasks that
 * await external calls never interleave their state changes.
 */
export class SerialQueue {
    private tail: Promise<void> = Promise.resolve();

    run<T>(task: () => T | Promise<T>): Promise<T> {
        const result = this.tail.then(task);

        // The tail only orders tasks; callers observe failures through `result`
        this.tail = result.then(
            () => undefined,
            () => undefined
        );

        return result;
    }
}
