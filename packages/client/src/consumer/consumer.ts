/**
 * Typed consumer - receives a single topic's payloads
 */

import { BrokerError, ConsumerStateError, toBrokerError } from '@/client/errors.js'
import { resolveClientFactory } from '@/client/options.js'
import type { RawConsumer } from '@/client/types.js'
import type { ConnectionConfig } from '@/config/option-set.js'
import { resolveLogger, type Logger } from '@/logger.js'
import type { PayloadOf, Topic } from '@/topic.js'
import { TypedMessage } from './message.js'
import type { ReceiveOptions, ReceiveResult, TypedConsumerOptions } from './types.js'

const DEFAULT_HEARTBEAT_INTERVAL_MS = 3000
const DEFAULT_SESSION_TIMEOUT_MS = 45_000

function readMillis(config: ConnectionConfig<'consumer'>, key: string, fallback: number): number {
	const raw = config.get(key)
	const value = raw === undefined ? fallback : Number(raw)
	return Number.isFinite(value) ? value : fallback
}

/**
 * Consumer bound to one topic for its whole lifetime
 *
 * The subscription is issued when the consumer is created. `receive()` and
 * `stream()` are meant for one caller at a time; messages are delivered in
 * partition order.
 *
 * @example
 * ```typescript
 * const consumer = new TypedConsumer(
 *   new ConsumerConfigBuilder()
 *     .bootstrapServers(['localhost:9092'])
 *     .groupId('session-workers')
 *     .autoOffsetReset('earliest')
 *     .build(),
 *   sessionTopic('abc')
 * )
 *
 * for await (const result of consumer.stream()) {
 *   if (result.ok) {
 *     handle(result.message.payload())
 *   } else {
 *     log(result.error)
 *   }
 * }
 * ```
 */
export class TypedConsumer<TTopic extends Topic<T>, T = PayloadOf<TTopic>> {
	private readonly raw: RawConsumer
	private readonly logger: Logger
	private readonly topicName: string
	/** Settles with the subscription's failure, or null once subscribed */
	private subscription: Promise<BrokerError | null> | null = null
	private disconnected = false
	private activeStream: symbol | null = null

	/**
	 * @throws ConstructionError when the configuration cannot create a client
	 */
	constructor(
		config: ConnectionConfig<'consumer'>,
		private readonly source: TTopic,
		options: TypedConsumerOptions = {}
	) {
		this.topicName = source.topicName()
		this.logger = resolveLogger(options, {
			component: 'consumer',
			groupId: config.get('group.id'),
			topic: this.topicName,
		})

		const heartbeat = readMillis(config, 'heartbeat.interval.ms', DEFAULT_HEARTBEAT_INTERVAL_MS)
		const session = readMillis(config, 'session.timeout.ms', DEFAULT_SESSION_TIMEOUT_MS)
		if (heartbeat >= session) {
			this.logger.warn('heartbeat.interval.ms should be lower than session.timeout.ms', {
				heartbeatIntervalMs: heartbeat,
				sessionTimeoutMs: session,
			})
		}

		this.raw = resolveClientFactory(options).createConsumer(config, this.logger)
		void this.subscribe()
	}

	/** The bound topic */
	topic(): TTopic {
		return this.source
	}

	/**
	 * Wait for the next message
	 *
	 * A failed subscription rejects this call with its BrokerError; the next
	 * call subscribes again.
	 *
	 * @throws ConsumerStateError after disconnect()
	 */
	async receive(options: ReceiveOptions = {}): Promise<TypedMessage<TTopic, T>> {
		this.assertConnected()
		const failure = await this.subscribe()
		if (failure) {
			this.subscription = null
			throw failure
		}

		try {
			const raw = await this.raw.receive(options.signal)
			return new TypedMessage<TTopic, T>(this.source, raw)
		} catch (error) {
			if (options.signal?.aborted || error instanceof ConsumerStateError) {
				throw error
			}
			throw toBrokerError(error, 'receive')
		}
	}

	/**
	 * Receive messages as an async iterator
	 *
	 * Broker errors are yielded and iteration goes on. The iterator ends when
	 * the consumer is disconnected. Leaving a `for await` loop releases the
	 * stream for another call.
	 *
	 * @throws ConsumerStateError when another stream is active
	 */
	stream(): AsyncGenerator<ReceiveResult<TTopic, T>, void, undefined> {
		if (this.activeStream) {
			throw new ConsumerStateError('consumer already has an active stream')
		}
		const token = Symbol('stream')
		this.activeStream = token

		const iterator = this.iterate(token)
		// a generator closed before its first next() never runs its finally
		const close = iterator.return.bind(iterator)
		iterator.return = async value => {
			try {
				return await close(value)
			} finally {
				this.releaseStream(token)
			}
		}
		return iterator
	}

	private async *iterate(token: symbol): AsyncGenerator<ReceiveResult<TTopic, T>, void, undefined> {
		try {
			while (!this.disconnected) {
				let message: TypedMessage<TTopic, T>
				try {
					message = await this.receive()
				} catch (error) {
					if (error instanceof ConsumerStateError) {
						return
					}
					if (error instanceof BrokerError) {
						this.logger.warn('receive failed', { code: error.code, error: error.message })
						yield { ok: false, error }
						continue
					}
					throw error
				}
				yield { ok: true, message }
			}
		} finally {
			this.releaseStream(token)
		}
	}

	async disconnect(): Promise<void> {
		if (this.disconnected) {
			return
		}
		this.disconnected = true
		this.logger.info('disconnecting consumer')
		await this.raw.disconnect()
		this.logger.info('consumer disconnected')
	}

	private subscribe(): Promise<BrokerError | null> {
		this.subscription ??= this.raw.subscribe(this.topicName).then(
			() => {
				this.logger.debug('subscribed')
				return null
			},
			(error: unknown) => {
				const brokerError = toBrokerError(error, 'subscribe')
				this.logger.error('subscription failed', { code: brokerError.code, error: brokerError.message })
				return brokerError
			}
		)
		return this.subscription
	}

	private releaseStream(token: symbol): void {
		if (this.activeStream === token) {
			this.activeStream = null
		}
	}

	private assertConnected(): void {
		if (this.disconnected) {
			throw new ConsumerStateError('consumer is disconnected')
		}
	}
}
