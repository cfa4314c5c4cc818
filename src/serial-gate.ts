/**
 * Runs async tasks one at a time, in the order they were submitted.
 * A rejected task does not stop the tasks queued behind it.
 *
 * @example
 * const gate = new SerialGate();
 * const [a, b] = await Promise.all([
 *   gate.run(() => login()),
 *   gate.run(() => listTables()),   // starts once login settles
 * ]);
 */
export class SerialGate {
    private tail: Promise<void> = Promise.resolve();
    private pending = 0;

    run<T>(task: () => Promise<T>): Promise<T> {
        this.pending++;
        const result = this.tail.then(task);
        this.tail = result.then(
            () => this.settle(),
            () => this.settle(),
        );
        return result;
    }

    /**
     * Number of tasks queued or running.
     */
    get size(): number {
        return this.pending;
    }

    private settle(): void {
        this.pending--;
    }
}
