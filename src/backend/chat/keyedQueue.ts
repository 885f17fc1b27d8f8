/**
 * Runs tasks that share a key one after another while tasks under different
 * keys proceed concurrently. Keys are dropped once their queue drains.
 */
export class KeyedQueue {
	private tails = new Map<string, Promise<void>>();

	run<T>(key: string, task: () => Promise<T>): Promise<T> {
		const previous = this.tails.get(key) ?? Promise.resolve();
		const result = previous.then(task);
		const tail = result.then(
			() => undefined,
			() => undefined
		);
		this.tails.set(key, tail);
		void tail.then(() => {
			if (this.tails.get(key) === tail) this.tails.delete(key);
		});
		return result;
	}

	get pendingKeys(): number {
		return this.tails.size;
	}
}
