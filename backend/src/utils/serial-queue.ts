/**
 * Single-consumer queue: tasks run one at a time in arrival order.
 * A failing task does not stop the ones queued behind it.
 */
export class SerialQueue {
    private tail: Promise<void> = Promise.resolve();
    private pending = 0;

    get size(): number {
        return this.pending;
    }

    run<T>(task: () => Promise<T>): Promise<T> {
        this.pending++;
        const result = this.tail.then(task);
        this.tail = result.then(
            () => {
                this.pending--;
            },
            () => {
                this.pending--;
            }
        );
        return result;
    }

    /**
     * Resolves once everything queued so far has settled
     */
    drain(): Promise<void> {
        return this.tail;
    }
}
