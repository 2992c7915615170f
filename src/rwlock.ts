/**
 * Async reader/writer lock for the library store
 *
 * Any number of readers or a single writer hold the lock at a time.
 * Waiters are granted in arrival order: a queued writer blocks readers that
 * arrive after it, and consecutive queued readers are released together.
 *
 * Usage:
 * ```ts
 * const lock = new ReadWriteLock()
 *
 * const games = await lock.withRead(() => [...state.games])
 * await lock.withWrite(async () => {
 *   state.games = await rebuild()
 * })
 * ```
 */

export type LockMode = "read" | "write"

export interface LockState {
	activeReaders: number
	writerActive: boolean
	queuedReaders: number
	queuedWriters: number
}

interface QueuedWaiter {
	mode: LockMode
	resolve: () => void
}

/** Call once to give the lock back. Extra calls are ignored. */
export type Release = () => void

export class ReadWriteLock {
	private activeReaders = 0
	private writerActive = false
	private readonly queue: QueuedWaiter[] = []

	getState(): LockState {
		let queuedReaders = 0
		for (const waiter of this.queue) {
			if (waiter.mode === "read") queuedReaders++
		}
		return {
			activeReaders: this.activeReaders,
			writerActive: this.writerActive,
			queuedReaders,
			queuedWriters: this.queue.length - queuedReaders,
		}
	}

	private canGrant(mode: LockMode): boolean {
		if (this.writerActive) return false
		return mode === "read" ? true : this.activeReaders === 0
	}

	private grant(mode: LockMode): void {
		if (mode === "read") {
			this.activeReaders++
		} else {
			this.writerActive = true
		}
	}

	/**
	 * Acquire the lock in the given mode. Resolves with a release function
	 * once the lock is held.
	 */
	acquire(mode: LockMode): Promise<Release> {
		// Only jump straight in when nobody is waiting; otherwise queue to keep FIFO order
		if (this.queue.length === 0 && this.canGrant(mode)) {
			this.grant(mode)
			return Promise.resolve(this.releaser(mode))
		}

		return new Promise<Release>(resolve => {
			this.queue.push({ mode, resolve: () => resolve(this.releaser(mode)) })
		})
	}

	acquireRead(): Promise<Release> {
		return this.acquire("read")
	}

	acquireWrite(): Promise<Release> {
		return this.acquire("write")
	}

	/** Run fn while holding a shared lock. */
	async withRead<T>(fn: () => T | Promise<T>): Promise<T> {
		const release = await this.acquire("read")
		try {
			return await fn()
		} finally {
			release()
		}
	}

	/** Run fn while holding the exclusive lock. */
	async withWrite<T>(fn: () => T | Promise<T>): Promise<T> {
		const release = await this.acquire("write")
		try {
			return await fn()
		} finally {
			release()
		}
	}

	private releaser(mode: LockMode): Release {
		let released = false
		return () => {
			if (released) return
			released = true
			if (mode === "read") {
				this.activeReaders--
			} else {
				this.writerActive = false
			}
			this.processQueue()
		}
	}

	/**
	 * Grant waiters from the head of the queue while they are compatible
	 * with the current holders.
	 */
	private processQueue(): void {
		while (this.queue.length > 0) {
			const next = this.queue[0]
			if (!next || !this.canGrant(next.mode)) break

			this.queue.shift()
			this.grant(next.mode)
			next.resolve()

			if (next.mode === "write") break
		}
	}
}
