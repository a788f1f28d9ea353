/**
 * Typed producer - publishes payloads under a topic's resolved name
 */

import { resolveClientFactory } from '@/client/options.js'
import { SerializationError, toBrokerError } from '@/client/errors.js'
import type { RawProducer } from '@/client/types.js'
import type { ConnectionConfig } from '@/config/option-set.js'
import { resolveLogger, type Logger } from '@/logger.js'
import type { PayloadOf, Topic } from '@/topic.js'
import type { DeliveryReport, SendOptions, TypedProducerOptions } from './types.js'

const DEFAULT_SEND_TIMEOUT_MS = 30_000

function toBuffer(value: string | Buffer): Buffer {
	return typeof value === 'string' ? Buffer.from(value, 'utf-8') : value
}

/**
 * Producer that is not bound to a topic: the topic is given per send
 *
 * The producer holds no per-call state, so one instance can be shared by
 * concurrent callers. Sends are handed to the raw client in call order with
 * no extra batching.
 *
 * @example
 * ```typescript
 * const producer = new TypedProducer(
 *   new ProducerConfigBuilder().bootstrapServers(['localhost:9092']).clientId('api').build()
 * )
 *
 * await producer.send(sessionTopic('s2d54f'), 'Thing1', { timeoutMs: 5000 })
 * ```
 */
export class TypedProducer {
	private readonly raw: RawProducer
	private readonly logger: Logger

	/**
	 * @throws ConstructionError when the configuration cannot create a client
	 */
	constructor(config: ConnectionConfig<'producer'>, options: TypedProducerOptions = {}) {
		this.logger = resolveLogger(options, { component: 'producer', clientId: config.get('client.id') })
		this.raw = resolveClientFactory(options).createProducer(config, this.logger)
	}

	/**
	 * Encode `payload` with the topic's codec and publish it
	 *
	 * Resolves once the broker acknowledged the message. Rejects with
	 * SerializationError when the payload does not encode (nothing is sent)
	 * and with BrokerError when the broker or transport fails, including
	 * REQUEST_TIMED_OUT when no acknowledgement arrives in time.
	 */
	async send<TTopic extends Topic<unknown>>(
		topic: TTopic,
		payload: PayloadOf<TTopic>,
		options: SendOptions = {}
	): Promise<DeliveryReport> {
		const topicName = topic.topicName()

		let value: Buffer
		try {
			value = topic.codec.encode(payload)
		} catch (error) {
			throw new SerializationError(topicName, 'encode', error)
		}

		const headers: Record<string, Buffer> = {}
		for (const [name, header] of Object.entries(options.headers ?? {})) {
			headers[name] = toBuffer(header)
		}

		try {
			const report = await this.raw.send({
				topic: topicName,
				key: options.key === undefined || options.key === null ? null : toBuffer(options.key),
				value,
				headers,
				timeoutMs: options.timeoutMs ?? DEFAULT_SEND_TIMEOUT_MS,
			})
			this.logger.debug('message delivered', {
				topic: report.topic,
				partition: report.partition,
				offset: report.offset.toString(),
			})
			return report
		} catch (error) {
			const brokerError = toBrokerError(error, 'send')
			this.logger.warn('send failed', { topic: topicName, code: brokerError.code, error: brokerError.message })
			throw brokerError
		}
	}

	async disconnect(): Promise<void> {
		this.logger.info('disconnecting producer')
		await this.raw.disconnect()
		this.logger.info('producer disconnected')
	}
}
