/**
 * Admin client for topic creation
 */

import { BrokerError, BrokerErrorCode, TopicCreationError, toBrokerError } from '@/client/errors.js'
import { resolveClientFactory } from '@/client/options.js'
import type { RawAdmin, RawTopicResult, RawTopicSpec, TopicReplication } from '@/client/types.js'
import type { ConnectionConfig } from '@/config/option-set.js'
import { resolveLogger, type Logger } from '@/logger.js'
import type { Topic } from '@/topic.js'
import type { CreateTopicOptions, TopicCreationRequest, TopicCreationResult, TypedAdminOptions } from './types.js'

function toTopicSpec(request: TopicCreationRequest): RawTopicSpec {
	return {
		topic: request.topic.topicName(),
		numPartitions: request.partitions,
		replication: request.replication,
		configEntries: { ...request.configEntries },
	}
}

function toResult(result: RawTopicResult): TopicCreationResult {
	if (result.errorCode === null) {
		return { topic: result.topic, ok: true }
	}
	return { topic: result.topic, ok: false, error: new TopicCreationError(result.topic, result.errorCode, result.errorMessage) }
}

/**
 * Administrative client
 *
 * @example
 * ```typescript
 * const admin = new TypedAdmin(new AdminConfigBuilder().bootstrapServers(['localhost:9092']).build())
 *
 * await admin.createTopic(sessionTopic('abc'), 3, replication.fixed(1))
 * await admin.disconnect()
 * ```
 */
export class TypedAdmin {
	private readonly raw: RawAdmin
	private readonly logger: Logger

	/**
	 * @throws ConstructionError when the configuration cannot create a client
	 */
	constructor(config: ConnectionConfig<'admin'>, options: TypedAdminOptions = {}) {
		this.logger = resolveLogger(options, { component: 'admin', clientId: config.get('client.id') })
		this.raw = resolveClientFactory(options).createAdmin(config, this.logger)
	}

	/**
	 * Create the topic under its resolved name
	 *
	 * @throws TopicCreationError when the broker refuses the topic
	 * @throws BrokerError when the request itself fails
	 */
	async createTopic(
		topic: Topic<unknown>,
		partitions: number,
		replication: TopicReplication,
		options: CreateTopicOptions = {}
	): Promise<void> {
		const [result] = await this.createTopics(
			[{ topic, partitions, replication, configEntries: options.configEntries }],
			options.timeoutMs
		)
		if (!result) {
			throw new BrokerError('createTopics', BrokerErrorCode.Unknown, `no result for topic ${topic.topicName()}`)
		}
		if (!result.ok) {
			throw result.error
		}
	}

	/**
	 * Create several topics in one request
	 *
	 * Resolves with one result per request, in request order. Only a failure of
	 * the request as a whole rejects.
	 */
	async createTopics(requests: readonly TopicCreationRequest[], timeoutMs?: number): Promise<TopicCreationResult[]> {
		const specs = requests.map(toTopicSpec)

		let raw: RawTopicResult[]
		try {
			raw = await this.raw.createTopics(specs, timeoutMs)
		} catch (error) {
			const brokerError = toBrokerError(error, 'createTopics')
			this.logger.error('create topics request failed', { code: brokerError.code, error: brokerError.message })
			throw brokerError
		}

		const byTopic = new Map(raw.map(result => [result.topic, result]))
		return specs.map(spec => {
			const result = toResult(
				byTopic.get(spec.topic) ?? {
					topic: spec.topic,
					errorCode: BrokerErrorCode.Unknown,
					errorMessage: 'no result returned for topic',
				}
			)
			if (result.ok) {
				this.logger.info('topic created', { topic: spec.topic, partitions: spec.numPartitions })
			} else {
				this.logger.warn('topic creation failed', { topic: spec.topic, code: result.error.code })
			}
			return result
		})
	}

	async disconnect(): Promise<void> {
		await this.raw.disconnect()
		this.logger.info('admin disconnected')
	}
}
