/**
 * Ordered, unbounded hand-off between a producer (the device listener) and
 * the engine. Consumers iterate with `for await` and wait while it is empty.
 * After close(), queued items still drain, then iteration ends.
 */
export class EventQueue<T> implements AsyncIterable<T> {
	private readonly items: T[] = [];
	private readonly waiting: ((result: IteratorResult<T>) => void)[] = [];
	private closed = false;

	push(item: T): void {
		if (this.closed) return;
		const waiter = this.waiting.shift();
		if (waiter !== undefined) {
			waiter({ value: item, done: false });
		} else {
			this.items.push(item);
		}
	}

	close(): void {
		if (this.closed) return;
		this.closed = true;
		for (const waiter of this.waiting.splice(0)) {
			waiter({ value: undefined, done: true });
		}
	}

	get isClosed(): boolean {
		return this.closed;
	}

	get size(): number {
		return this.items.length;
	}

	next(): Promise<IteratorResult<T>> {
		if (this.items.length > 0) {
			const [item] = this.items.splice(0, 1);
			if (item !== undefined) return Promise.resolve({ value: item, done: false });
		}
		if (this.closed) return Promise.resolve({ value: undefined, done: true });
		return new Promise((resolve) => this.waiting.push(resolve));
	}

	[Symbol.asyncIterator](): AsyncIterator<T> {
		return { next: () => this.next() };
	}
}
