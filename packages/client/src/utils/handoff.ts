/**
 * Single-consumer handoff between a push source and pull-based receivers
 *
 * `put()` resolves only once a receiver has taken the value, so a push
 * source that awaits it (kafkajs' eachMessage) never runs ahead of callers.
 * Errors pushed with `fail()` are delivered to the next receiver in order.
 */

type Entry<T> =
	| { kind: 'value'; value: T; delivered: () => void; dropped: (error: unknown) => void }
	| { kind: 'error'; error: unknown }

interface Waiter<T> {
	resolve: (value: T) => void
	reject: (error: unknown) => void
}

export class Handoff<T> {
	private readonly entries: Entry<T>[] = []
	private readonly waiters: Waiter<T>[] = []
	private closed: { error: unknown } | null = null

	put(value: T): Promise<void> {
		if (this.closed) {
			return Promise.reject(this.closed.error)
		}
		const waiter = this.waiters.shift()
		if (waiter) {
			waiter.resolve(value)
			return Promise.resolve()
		}
		return new Promise<void>((resolve, reject) => {
			this.entries.push({ kind: 'value', value, delivered: resolve, dropped: reject })
		})
	}

	fail(error: unknown): void {
		if (this.closed) {
			return
		}
		const waiter = this.waiters.shift()
		if (waiter) {
			waiter.reject(error)
			return
		}
		this.entries.push({ kind: 'error', error })
	}

	take(signal?: AbortSignal): Promise<T> {
		if (signal?.aborted) {
			return Promise.reject(signal.reason)
		}

		const entry = this.entries.shift()
		if (entry?.kind === 'error') {
			return Promise.reject(entry.error)
		}
		if (entry) {
			entry.delivered()
			return Promise.resolve(entry.value)
		}
		if (this.closed) {
			return Promise.reject(this.closed.error)
		}

		return new Promise<T>((resolve, reject) => {
			const onAbort = () => {
				const index = this.waiters.indexOf(waiter)
				if (index !== -1) {
					this.waiters.splice(index, 1)
				}
				reject(signal?.reason)
			}
			const waiter: Waiter<T> = {
				resolve: value => {
					signal?.removeEventListener('abort', onAbort)
					resolve(value)
				},
				reject: error => {
					signal?.removeEventListener('abort', onAbort)
					reject(error)
				},
			}
			this.waiters.push(waiter)
			signal?.addEventListener('abort', onAbort, { once: true })
		})
	}

	/**
	 * Reject every waiting receiver and pending put, and all later calls
	 */
	close(error: unknown): void {
		if (this.closed) {
			return
		}
		this.closed = { error }

		for (const waiter of this.waiters.splice(0)) {
			waiter.reject(error)
		}
		for (const entry of this.entries.splice(0)) {
			if (entry.kind === 'value') {
				entry.dropped(error)
			}
		}
	}
}
