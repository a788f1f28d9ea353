/**
 * kafkajs implementation of the raw broker client boundary
 */

import {
	Kafka,
	Partitioners,
	type Admin,
	type CompressionTypes,
	type Consumer,
	type IHeaders,
	type ITopicConfig,
	type KafkaConfig,
	type KafkaMessage,
	type Producer,
	type RecordMetadata,
} from 'kafkajs'

import { BrokerError, BrokerErrorCode, ConstructionError, ConsumerStateError, toBrokerError } from '@/client/errors.js'
import { createKafkaJsLogCreator, toKafkaJsLogLevel } from '@/client/kafkajs-logger.js'
import {
	toAdminSettings,
	toConsumerSettings,
	toProducerSettings,
	type KafkaJsConsumerSettings,
} from '@/client/kafkajs-config.js'
import type {
	BrokerClientFactory,
	RawAdmin,
	RawConsumer,
	RawDeliveryReport,
	RawMessage,
	RawProducer,
	RawSendRequest,
	RawTopicResult,
	RawTopicSpec,
} from '@/client/types.js'
import type { ConnectionConfig } from '@/config/option-set.js'
import type { ClientRole } from '@/config/types.js'
import type { Logger, LogLevel } from '@/logger.js'
import { Handoff } from '@/utils/handoff.js'

export interface KafkaJsClientFactoryOptions {
	/** Most verbose kafkajs output forwarded to the client logger (default: 'warn') */
	kafkaLogLevel?: LogLevel
}

/**
 * Creates kafkajs producers, consumers and admin clients
 */
export class KafkaJsClientFactory implements BrokerClientFactory {
	private readonly kafkaLogLevel: LogLevel

	constructor(options: KafkaJsClientFactoryOptions = {}) {
		this.kafkaLogLevel = options.kafkaLogLevel ?? 'warn'
	}

	createProducer(config: ConnectionConfig<'producer'>, logger: Logger): RawProducer {
		const settings = toProducerSettings(config)
		logIgnored(logger, settings.ignored)
		const kafka = this.createKafka('producer', settings.client, logger)
		return new KafkaJsProducer(
			kafka.producer({ ...settings.producer, createPartitioner: Partitioners.DefaultPartitioner }),
			settings.acks,
			settings.compression
		)
	}

	createConsumer(config: ConnectionConfig<'consumer'>, logger: Logger): RawConsumer {
		const settings = toConsumerSettings(config)
		logIgnored(logger, settings.ignored)
		if (settings.autoOffsetReset === 'none') {
			logger.warn('auto.offset.reset=none is not supported by kafkajs, starting from latest')
		}
		const kafka = this.createKafka('consumer', settings.client, logger)
		return new KafkaJsConsumer(kafka.consumer(settings.consumer), settings, logger)
	}

	createAdmin(config: ConnectionConfig<'admin'>, logger: Logger): RawAdmin {
		const settings = toAdminSettings(config)
		logIgnored(logger, settings.ignored)
		const kafka = this.createKafka('admin', settings.client, logger)
		return new KafkaJsAdmin(kafka.admin(settings.admin), settings.apiTimeoutMs)
	}

	private createKafka(role: ClientRole, client: KafkaConfig, logger: Logger): Kafka {
		try {
			return new Kafka({
				...client,
				logLevel: toKafkaJsLogLevel(this.kafkaLogLevel),
				logCreator: createKafkaJsLogCreator(logger.child({ component: 'kafkajs' })),
			})
		} catch (error) {
			const detail = error instanceof Error ? error.message : String(error)
			throw new ConstructionError(role, detail, undefined, error)
		}
	}
}

function logIgnored(logger: Logger, keys: string[]): void {
	if (keys.length > 0) {
		logger.debug('options not applied by kafkajs', { keys })
	}
}

/**
 * Memoized connect that can be retried after a failure
 */
class Connection {
	private pending: Promise<void> | null = null

	constructor(private readonly connect: () => Promise<void>) {}

	open(): Promise<void> {
		this.pending ??= this.connect().catch((error: unknown) => {
			this.pending = null
			throw toBrokerError(error, 'connect')
		})
		return this.pending
	}
}

function toHeaderBuffers(headers: IHeaders | undefined): Record<string, Buffer> {
	const result: Record<string, Buffer> = {}
	for (const [name, value] of Object.entries(headers ?? {})) {
		const first = Array.isArray(value) ? value[0] : value
		if (typeof first === 'string') {
			result[name] = Buffer.from(first, 'utf-8')
		} else if (first !== undefined) {
			result[name] = Buffer.from(first)
		}
	}
	return result
}

function toRawMessage(topic: string, partition: number, message: KafkaMessage): RawMessage {
	return {
		topic,
		partition,
		offset: BigInt(message.offset),
		timestamp: BigInt(message.timestamp),
		key: message.key ? Buffer.from(message.key) : null,
		value: message.value ? Buffer.from(message.value) : null,
		headers: toHeaderBuffers(message.headers),
	}
}

class KafkaJsProducer implements RawProducer {
	private readonly connection: Connection

	constructor(
		private readonly producer: Producer,
		private readonly acks: number,
		private readonly compression: CompressionTypes
	) {
		this.connection = new Connection(() => this.producer.connect())
	}

	async send(request: RawSendRequest): Promise<RawDeliveryReport> {
		await this.connection.open()

		let metadata: RecordMetadata[]
		try {
			metadata = await this.producer.send({
				topic: request.topic,
				messages: [{ key: request.key, value: request.value, headers: request.headers }],
				acks: this.acks,
				timeout: request.timeoutMs,
				compression: this.compression,
			})
		} catch (error) {
			throw toBrokerError(error, 'send')
		}

		const report = metadata.find(entry => entry.topicName === request.topic)
		if (!report) {
			throw new BrokerError('send', BrokerErrorCode.Unknown, `no acknowledgement for topic ${request.topic}`)
		}
		return {
			topic: report.topicName,
			partition: report.partition,
			offset: BigInt(report.baseOffset ?? report.offset ?? '-1'),
		}
	}

	async disconnect(): Promise<void> {
		try {
			await this.producer.disconnect()
		} catch (error) {
			throw toBrokerError(error, 'disconnect')
		}
	}
}

class KafkaJsConsumer implements RawConsumer {
	private readonly connection: Connection
	private readonly handoff = new Handoff<RawMessage>()

	constructor(
		private readonly consumer: Consumer,
		private readonly settings: KafkaJsConsumerSettings,
		private readonly logger: Logger
	) {
		this.connection = new Connection(() => this.consumer.connect())
		this.consumer.on(this.consumer.events.CRASH, event => {
			const { error, restart } = event.payload
			if (restart) {
				this.logger.warn('consumer crashed, kafkajs is restarting it', { error: error.message })
				return
			}
			this.handoff.fail(toBrokerError(error, 'receive'))
		})
	}

	async subscribe(topic: string): Promise<void> {
		await this.connection.open()
		try {
			await this.consumer.subscribe({
				topics: [topic],
				fromBeginning: this.settings.autoOffsetReset === 'earliest',
			})
			await this.consumer.run({
				autoCommit: this.settings.autoCommit,
				autoCommitInterval: this.settings.autoCommitInterval,
				eachMessage: async ({ topic: source, partition, message }) => {
					await this.handoff.put(toRawMessage(source, partition, message))
				},
			})
		} catch (error) {
			throw toBrokerError(error, 'subscribe')
		}
	}

	receive(signal?: AbortSignal): Promise<RawMessage> {
		return this.handoff.take(signal)
	}

	async disconnect(): Promise<void> {
		this.handoff.close(new ConsumerStateError('consumer is disconnected'))
		try {
			await this.consumer.disconnect()
		} catch (error) {
			throw toBrokerError(error, 'disconnect')
		}
	}
}

function readTopicErrors(error: unknown): Map<string, { code: string; message: string }> {
	const failures = new Map<string, { code: string; message: string }>()
	const errors: unknown = error instanceof Error ? Reflect.get(error, 'errors') : undefined
	if (!Array.isArray(errors)) {
		return failures
	}
	for (const item of errors) {
		if (!(item instanceof Error)) {
			continue
		}
		const topic: unknown = Reflect.get(item, 'topic')
		const code: unknown = Reflect.get(item, 'type')
		if (typeof topic === 'string') {
			failures.set(topic, { code: typeof code === 'string' ? code : BrokerErrorCode.Unknown, message: item.message })
		}
	}
	return failures
}

function toTopicConfig(spec: RawTopicSpec): ITopicConfig {
	const configEntries = Object.entries(spec.configEntries).map(([name, value]) => ({ name, value }))
	if (spec.replication.type === 'variable') {
		return {
			topic: spec.topic,
			replicaAssignment: spec.replication.assignment.map((replicas, partition) => ({
				partition,
				replicas: [...replicas],
			})),
			configEntries,
		}
	}
	return {
		topic: spec.topic,
		numPartitions: spec.numPartitions,
		replicationFactor: spec.replication.factor,
		configEntries,
	}
}

class KafkaJsAdmin implements RawAdmin {
	private readonly connection: Connection

	constructor(
		private readonly admin: Admin,
		private readonly apiTimeoutMs: number | undefined
	) {
		this.connection = new Connection(() => this.admin.connect())
	}

	async createTopics(specs: readonly RawTopicSpec[], timeoutMs?: number): Promise<RawTopicResult[]> {
		await this.connection.open()

		// existing topics are found up front, saving a request per topic
		let existing: Set<string>
		try {
			existing = new Set(await this.admin.listTopics())
		} catch (error) {
			throw toBrokerError(error, 'createTopics')
		}

		const timeout = timeoutMs ?? this.apiTimeoutMs
		return Promise.all(
			specs.map(spec =>
				existing.has(spec.topic)
					? { topic: spec.topic, errorCode: BrokerErrorCode.TopicAlreadyExists }
					: this.createTopic(spec, timeout)
			)
		)
	}

	/**
	 * One topic per request: kafkajs folds per-topic TOPIC_ALREADY_EXISTS
	 * failures into a single `false` for the whole request.
	 */
	private async createTopic(spec: RawTopicSpec, timeout: number | undefined): Promise<RawTopicResult> {
		try {
			const created = await this.admin.createTopics({
				topics: [toTopicConfig(spec)],
				timeout,
				waitForLeaders: true,
			})
			// `false` means a concurrent creation won the race
			return { topic: spec.topic, errorCode: created ? null : BrokerErrorCode.TopicAlreadyExists }
		} catch (error) {
			const failure = readTopicErrors(error).get(spec.topic)
			if (!failure) {
				throw toBrokerError(error, 'createTopics')
			}
			return { topic: spec.topic, errorCode: failure.code, errorMessage: failure.message }
		}
	}

	async disconnect(): Promise<void> {
		try {
			await this.admin.disconnect()
		} catch (error) {
			throw toBrokerError(error, 'disconnect')
		}
	}
}
