/**
 * Raw broker client boundary and its kafkajs implementation
 */

export { KafkaJsClientFactory, type KafkaJsClientFactoryOptions } from './kafkajs.js'
export { parseBootstrapServers } from './kafkajs-config.js'
export type { ClientOptions } from './options.js'
export { replication } from './types.js'
export type {
	BrokerClientFactory,
	RawAdmin,
	RawConsumer,
	RawDeliveryReport,
	RawMessage,
	RawProducer,
	RawSendRequest,
	RawTopicResult,
	RawTopicSpec,
	TopicReplication,
} from './types.js'

// Errors
export {
	KafkaError,
	ConstructionError,
	BuilderConsumedError,
	SerializationError,
	BrokerError,
	BrokerErrorCode,
	TopicCreationError,
	ConsumerStateError,
	toBrokerError,
	isKafkaError,
	isRetriable,
	type BrokerOperation,
	type KnownBrokerErrorCode,
} from './errors.js'
