/**
 * Topic binding
 *
 * A topic ties an externally visible name to one payload type and the codec
 * that moves it across the wire. Topics are immutable values: sharing a
 * reference is the same as copying one.
 */

import { json, type Codec } from '@/codec.js'

/**
 * A named channel carrying payloads of type T
 *
 * The name is resolved by a method rather than stored, so it can be composed
 * from instance state (e.g. a session id). Implementations must keep their
 * state readonly.
 *
 * @example
 * ```typescript
 * class SessionTopic implements Topic<Update> {
 *   readonly codec = codec.json<Update>()
 *   constructor(readonly id: string) {}
 *   topicName() {
 *     return `session:${this.id}`
 *   }
 * }
 * ```
 */
export interface Topic<T> {
	readonly codec: Codec<T>
	topicName(): string
}

/**
 * Payload type carried by a topic
 */
export type PayloadOf<TTopic> = TTopic extends Topic<infer T> ? T : never

export interface TopicOptions<T> {
	/** Payload codec (default: JSON) */
	codec?: Codec<T>
}

/**
 * Define a topic with a fixed name
 *
 * @example
 * ```typescript
 * const orders = topic<Order>('orders')
 * const audit = topic('audit', { codec: zodCodec(auditSchema) })
 * ```
 */
export function topic<T>(name: string, options: TopicOptions<T> = {}): Topic<T> {
	const codec = options.codec ?? json<T>()
	return Object.freeze({
		codec,
		topicName: () => name,
	})
}

/**
 * Define a family of topics whose names are computed from arguments
 *
 * Every topic in the family shares one codec.
 *
 * @example
 * ```typescript
 * const sessionTopic = topicFamily<Update, [id: string]>(id => `session:${id}`)
 * sessionTopic('abc').topicName() // 'session:abc'
 * ```
 */
export function topicFamily<T, A extends readonly unknown[]>(
	resolveName: (...args: A) => string,
	options: TopicOptions<T> = {}
): (...args: A) => Topic<T> {
	const codec = options.codec ?? json<T>()
	return (...args: A) => {
		const name = resolveName(...args)
		return Object.freeze({
			codec,
			topicName: () => name,
		})
	}
}
