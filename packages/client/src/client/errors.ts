/**
 * Error hierarchy for the typed client layer
 *
 * Every failure is reported as one of these classes so callers can tell
 * construction, serialization, broker and administrative failures apart.
 */

import type { ClientRole } from '@/config/types.js'

/**
 * Error codes reported by brokers, named as in the Kafka protocol
 */
export const BrokerErrorCode = {
	Unknown: 'UNKNOWN',
	RequestTimedOut: 'REQUEST_TIMED_OUT',
	UnknownTopicOrPartition: 'UNKNOWN_TOPIC_OR_PARTITION',
	TopicAlreadyExists: 'TOPIC_ALREADY_EXISTS',
	InvalidPartitions: 'INVALID_PARTITIONS',
	InvalidReplicationFactor: 'INVALID_REPLICATION_FACTOR',
	InvalidReplicaAssignment: 'INVALID_REPLICA_ASSIGNMENT',
	NetworkException: 'NETWORK_EXCEPTION',
} as const

export type KnownBrokerErrorCode = (typeof BrokerErrorCode)[keyof typeof BrokerErrorCode]

/**
 * Broker-facing operations that can fail
 */
export type BrokerOperation = 'connect' | 'send' | 'subscribe' | 'receive' | 'createTopics' | 'disconnect'

const RETRIABLE_CODES = new Set<string>([
	BrokerErrorCode.RequestTimedOut,
	BrokerErrorCode.UnknownTopicOrPartition,
	BrokerErrorCode.NetworkException,
])

/**
 * Base class for all client errors
 */
export class KafkaError extends Error {
	/** Whether repeating the operation may succeed */
	readonly retriable: boolean
	override readonly cause?: unknown

	constructor(message: string, retriable = false, cause?: unknown) {
		super(message)
		this.name = 'KafkaError'
		this.retriable = retriable
		this.cause = cause

		// Maintains proper stack trace for where error was thrown (V8 only)
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor)
		}
	}
}

/**
 * The underlying client could not be created from a configuration
 */
export class ConstructionError extends KafkaError {
	readonly role: ClientRole
	/** Option key at fault, when one can be named */
	readonly option?: string

	constructor(role: ClientRole, message: string, option?: string, cause?: unknown) {
		super(`Cannot create ${role} client: ${message}`, false, cause)
		this.name = 'ConstructionError'
		this.role = role
		this.option = option
	}
}

/**
 * A builder was used after build()
 */
export class BuilderConsumedError extends KafkaError {
	readonly role: ClientRole

	constructor(role: ClientRole) {
		super(`${role} configuration builder was already built and cannot be reused`)
		this.name = 'BuilderConsumedError'
		this.role = role
	}
}

/**
 * A payload could not be encoded, or received bytes could not be decoded
 */
export class SerializationError extends KafkaError {
	readonly topic: string
	readonly operation: 'encode' | 'decode'

	constructor(topic: string, operation: 'encode' | 'decode', cause?: unknown) {
		const detail = cause instanceof Error ? `: ${cause.message}` : ''
		super(`Failed to ${operation} payload for topic ${topic}${detail}`, false, cause)
		this.name = 'SerializationError'
		this.topic = topic
		this.operation = operation
	}
}

/**
 * Failure reported by the broker or the transport underneath it
 */
export class BrokerError extends KafkaError {
	/** Protocol error name, e.g. REQUEST_TIMED_OUT */
	readonly code: string
	readonly operation: BrokerOperation

	constructor(operation: BrokerOperation, code: string, message: string, retriable?: boolean, cause?: unknown) {
		super(`${operation} failed (${code}): ${message}`, retriable ?? RETRIABLE_CODES.has(code), cause)
		this.name = 'BrokerError'
		this.code = code
		this.operation = operation
	}
}

/**
 * Creating one topic failed on the broker
 */
export class TopicCreationError extends KafkaError {
	readonly topic: string
	readonly code: string

	constructor(topic: string, code: string, message?: string) {
		super(`Cannot create topic ${topic} (${code})${message ? `: ${message}` : ''}`)
		this.name = 'TopicCreationError'
		this.topic = topic
		this.code = code
	}
}

/**
 * A consumer was used in a state that does not allow the call
 */
export class ConsumerStateError extends KafkaError {
	constructor(message: string) {
		super(message)
		this.name = 'ConsumerStateError'
	}
}

export function isKafkaError(error: unknown): error is KafkaError {
	return error instanceof KafkaError
}

/**
 * Whether repeating the failed operation may succeed
 */
export function isRetriable(error: unknown): boolean {
	return isKafkaError(error) && error.retriable
}

function readStringField(value: object, field: string): string | undefined {
	const candidate: unknown = Reflect.get(value, field)
	return typeof candidate === 'string' ? candidate : undefined
}

/**
 * Wrap anything thrown by a raw client as a BrokerError
 *
 * kafkajs errors carry the protocol error name in `type` and their own
 * retriable flag; both are kept.
 */
export function toBrokerError(error: unknown, operation: BrokerOperation): BrokerError {
	if (error instanceof BrokerError) {
		return error
	}
	if (!(error instanceof Error)) {
		return new BrokerError(operation, BrokerErrorCode.Unknown, String(error))
	}

	const retriable: unknown = Reflect.get(error, 'retriable')
	const code =
		readStringField(error, 'type') ??
		(error.name === 'KafkaJSRequestTimeoutError' ? BrokerErrorCode.RequestTimedOut : BrokerErrorCode.Unknown)

	return new BrokerError(operation, code, error.message, typeof retriable === 'boolean' ? retriable : undefined, error)
}
