/**
 * Concurrency helpers for the poller: a per-key promise chain and a bounded
 * parallel map.
 */

/**
 * Runs tasks one at a time per key; different keys run independently.
 * A rejected task does not block the next one for the same key.
 */
export class KeyedSerialQueue<K> {
	private readonly tails = new Map<K, Promise<unknown>>();

	run<T>(key: K, task: () => Promise<T>): Promise<T> {
		const previous = this.tails.get(key) ?? Promise.resolve();
		const next = previous.catch(() => undefined).then(task);
		this.tails.set(key, next);
		const cleanup = () => {
			if (this.tails.get(key) === next) this.tails.delete(key);
		};
		void next.then(cleanup, cleanup);
		return next;
	}

	/** Keys with a queued or running task. */
	get activeKeys(): number {
		return this.tails.size;
	}
}

/**
 * Map `items` through `fn` with at most `limit` calls in flight. Results keep
 * the input order. `fn` is expected not to reject.
 */
export async function mapWithConcurrency<T, R>(
	items: readonly T[],
	limit: number,
	fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
	const results = new Array<R>(items.length);
	// Workers pull from one shared iterator.
	const pending = items.entries();
	const worker = async (): Promise<void> => {
		for (const [index, item] of pending) {
			results[index] = await fn(item, index);
		}
	};
	const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, worker);
	await Promise.all(workers);
	return results;
}
