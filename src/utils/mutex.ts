/**
 * Promise-chain lock: tasks passed to runExclusive run one at a time, in call order.
 */
export class Mutex {
    private tail: Promise<void> = Promise.resolve();

    runExclusive<T>(task: () => Promise<T>): Promise<T> {
        const run = this.tail.then(task);
        // The next task waits for this one whether it resolved or rejected
        this.tail = run.then(() => undefined, () => undefined);
        return run;
    }
}
