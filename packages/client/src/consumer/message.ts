/**
 * Received message bound to its topic's payload type
 */

import { SerializationError } from '@/client/errors.js'
import type { RawMessage } from '@/client/types.js'
import type { PayloadOf, Topic } from '@/topic.js'

type Decoded<T> = { value: T | null } | null

/**
 * A message received from a topic
 *
 * Owns its key, value and header buffers, so it stays valid after later
 * receives. The payload is decoded on the first `payload()` call and cached.
 */
export class TypedMessage<TTopic extends Topic<T>, T = PayloadOf<TTopic>> {
	private decoded: Decoded<T> = null

	constructor(
		private readonly source: TTopic,
		private readonly raw: RawMessage
	) {}

	/** Message key, or null when the message was sent without one */
	key(): Buffer | null {
		return this.raw.key
	}

	/**
	 * Decoded payload, or null when the message carries no value
	 *
	 * @throws SerializationError when the bytes do not decode
	 */
	payload(): T | null {
		if (this.decoded) {
			return this.decoded.value
		}

		const bytes = this.raw.value
		let value: T | null = null
		if (bytes !== null) {
			try {
				value = this.source.codec.decode(bytes)
			} catch (error) {
				throw new SerializationError(this.raw.topic, 'decode', error)
			}
		}
		this.decoded = { value }
		return value
	}

	/** The topic the consumer is bound to */
	topic(): TTopic {
		return this.source
	}

	/** Name of the topic the message was read from */
	topicName(): string {
		return this.raw.topic
	}

	partition(): number {
		return this.raw.partition
	}

	offset(): bigint {
		return this.raw.offset
	}

	/** Milliseconds since the epoch */
	timestamp(): bigint {
		return this.raw.timestamp
	}

	headers(): Readonly<Record<string, Buffer>> {
		return this.raw.headers
	}
}
