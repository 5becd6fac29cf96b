/**
 * Bounded async channel with backpressure.
 *
 * Implements producer-consumer pattern where:
 * - Producer blocks when buffer is full (backpressure)
 * - Consumer blocks when buffer is empty
 *
 * Sits between the parse workers and the embed/write workers of the
 * indexing pipeline, so a slow embedding call holds back parsing by at most
 * `capacity` files.
 */

/**
 * Items are boxed so `undefined` is a valid payload.
 */
type Slot<T> = {item: T};

type PendingPush<T> = {
	slot: Slot<T>;
	resolve: () => void;
	reject: (error: Error) => void;
};

/**
 * Bounded async channel for producer-consumer communication.
 *
 * @template T - Type of items in the channel
 */
export class BoundedChannel<T> {
	private buffer: Array<Slot<T>> = [];
	private closed = false;
	private waitingPush: Array<PendingPush<T>> = [];
	private waitingPull: Array<(value: Slot<T> | null) => void> = [];

	/**
	 * Create a bounded channel.
	 * @param capacity - Maximum number of items in buffer (must be >= 1)
	 */
	constructor(private readonly capacity: number) {
		if (capacity < 1) {
			throw new Error('BoundedChannel capacity must be >= 1');
		}
	}

	/**
	 * Push an item to the channel.
	 * Blocks if buffer is full (backpressure).
	 *
	 * @throws Error if channel is closed, or closes while waiting
	 */
	async push(item: T): Promise<void> {
		if (this.closed) {
			throw new Error('Cannot push to closed channel');
		}

		// If there's a waiting consumer, deliver directly
		const consumer = this.waitingPull.shift();
		if (consumer) {
			consumer({item});
			return;
		}

		if (this.buffer.length < this.capacity) {
			this.buffer.push({item});
			return;
		}

		// Buffer full - the item enters the buffer when a consumer frees a slot
		await new Promise<void>((resolve, reject) => {
			this.waitingPush.push({slot: {item}, resolve, reject});
		});
	}

	/**
	 * Pull the next item, waiting while the buffer is empty.
	 * Resolves null once the channel is closed and drained.
	 */
	async pull(): Promise<Slot<T> | null> {
		const slot = this.buffer.shift();
		if (slot) {
			// Move a blocked producer's item into the freed slot
			const producer = this.waitingPush.shift();
			if (producer) {
				this.buffer.push(producer.slot);
				producer.resolve();
			}
			return slot;
		}

		if (this.closed) {
			return null;
		}

		return new Promise(resolve => {
			this.waitingPull.push(resolve);
		});
	}

	/**
	 * Iterate until the channel is closed and drained.
	 */
	async *[Symbol.asyncIterator](): AsyncGenerator<T> {
		for (;;) {
			const next = await this.pull();
			if (!next) return;
			yield next.item;
		}
	}

	/**
	 * Close the channel.
	 * Remaining items can still be pulled, but no new items can be pushed.
	 */
	close(): void {
		this.closed = true;

		// Reject all waiting producers
		for (const producer of this.waitingPush) {
			producer.reject(new Error('Channel closed'));
		}
		this.waitingPush = [];

		// Resolve all waiting consumers with null
		for (const consumer of this.waitingPull) {
			consumer(null);
		}
		this.waitingPull = [];
	}

	/** Current number of items in buffer */
	get size(): number {
		return this.buffer.length;
	}

	/** Whether channel is closed */
	get isClosed(): boolean {
		return this.closed;
	}

	/** Maximum buffer capacity */
	get maxCapacity(): number {
		return this.capacity;
	}
}
