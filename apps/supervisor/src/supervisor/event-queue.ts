/**
 * Single-consumer async queue. Events pushed before anyone iterates are
 * buffered, so a stream that is attached late still sees every event.
 */
export class AsyncEventQueue<T> {
    private readonly buffer: T[] = [];
    private wake: (() => void) | null = null;
    private closed = false;

    push(item: T): void {
        if (this.closed) return;
        this.buffer.push(item);
        this.notify();
    }

    close(): void {
        this.closed = true;
        this.notify();
    }

    get length(): number {
        return this.buffer.length;
    }

    async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
        while (true) {
            if (this.buffer.length > 0) {
                const [item] = this.buffer.splice(0, 1);
                yield item;
                continue;
            }
            if (this.closed) return;
            await new Promise<void>(resolve => { this.wake = resolve; });
        }
    }

    private notify(): void {
        const wake = this.wake;
        this.wake = null;
        if (wake) wake();
    }
}
